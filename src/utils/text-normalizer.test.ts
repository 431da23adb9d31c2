import { describe, it, expect } from 'vitest';
import { normalizeText, stripHtml, stripHtmlWithRegex, stripMarkdown } from './text-normalizer.js';

describe('normalizeText', () => {
  it('strips HTML tags', () => {
    expect(normalizeText('<p>Hello <strong>world</strong></p>')).toBe('Hello world');
  });

  it('decodes entities through the parser', () => {
    expect(normalizeText('Fish &amp; chips')).toBe('Fish & chips');
  });

  it('strips bold and italic markdown', () => {
    expect(normalizeText('**Bold** and *italic* text')).toBe('Bold and italic text');
  });

  it('keeps link labels', () => {
    expect(normalizeText('See [the docs](https://example.com/a_b_c) now')).toBe('See the docs now');
  });

  it('removes headings and list markers', () => {
    expect(normalizeText('## Heading\n- item one\n- item two\n1. first')).toBe(
      'Heading item one item two first'
    );
  });

  it('leaves snake_case identifiers alone', () => {
    expect(normalizeText('snake_case_name stays')).toBe('snake_case_name stays');
  });

  it('strips underscore emphasis and inline code', () => {
    expect(normalizeText('_emphasis_ and `code` sample')).toBe('emphasis and code sample');
  });

  it('collapses whitespace and trims', () => {
    expect(normalizeText('  multiple   spaces\n\nand lines  ')).toBe('multiple spaces and lines');
  });

  it('handles empty and missing input', () => {
    expect(normalizeText('')).toBe('');
    expect(normalizeText(undefined)).toBe('');
    expect(normalizeText(null)).toBe('');
  });

  it('is deterministic', () => {
    const raw = '<div><h2>Release</h2><p>**New** [feature](https://x.test)</p></div>';
    expect(normalizeText(raw)).toBe(normalizeText(raw));
  });
});

describe('stripHtml', () => {
  it('returns plain text untouched', () => {
    expect(stripHtml('plain text')).toBe('plain text');
  });
});

describe('stripHtmlWithRegex', () => {
  it('removes tags, scripts and entities', () => {
    expect(stripHtmlWithRegex('<div>a &lt; b</div><script>x()</script>')).toBe('a < b');
  });

  it('decodes numeric entities', () => {
    expect(stripHtmlWithRegex('&#65;&#x42;')).toBe('AB');
  });
});

describe('stripMarkdown', () => {
  it('drops image syntax but keeps alt text', () => {
    expect(stripMarkdown('![diagram](img.png)')).toBe('diagram');
  });
});
