import pino from 'pino';
import { loadLogSettings } from '../config/index.js';

let loggerInstance: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    const settings = loadLogSettings();
    loggerInstance = settings.pretty
      ? pino({
          level: settings.level,
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          },
        })
      : pino({ level: settings.level });
  }
  return loggerInstance;
}

export function createChildLogger(name: string): pino.Logger {
  return getLogger().child({ component: name });
}

export function resetLogger(): void {
  loggerInstance = null;
}
