/**
 * Feature documents generated from the feature matrix
 */
import { z } from 'zod';

export const SourceLinkSchema = z.object({
  url: z.string(),
  title: z.string(),
  feedSource: z.string(),
});

export const FeatureSchema = z.object({
  featureCapability: z.string(),
  category: z.string(),
  firstIntroduced: z.string(),
  currentStatus: z.string(),
  latestUpdate: z.string(),
  keyMilestones: z.string(),
  sourceLinks: z.array(SourceLinkSchema),
  detectionDate: z.string(),
  lastModified: z.string(),
});

export const FeatureDocumentSchema = z.object({
  metadata: z.object({
    platform: z.string(),
    lastUpdated: z.string(),
    generatedBy: z.string(),
    feedSources: z.array(z.string()),
  }),
  features: z.array(FeatureSchema),
});

export type SourceLink = z.infer<typeof SourceLinkSchema>;
export type Feature = z.infer<typeof FeatureSchema>;
export type FeatureDocument = z.infer<typeof FeatureDocumentSchema>;

/**
 * One table of the matrix and the document it becomes
 */
export interface PlatformTable {
  platform: string;
  /** Heading texts tried in order */
  headingPatterns: string[];
  outputFile: string;
}
