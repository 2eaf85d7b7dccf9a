import { pino, type Logger } from 'pino';

export type { Logger };

// Root logger. Embedding applications can pass their own pino instance to CloudClient instead.
export const logger: Logger = pino({
  name: 'do-cloud-client',
  level: process.env['LOG_LEVEL'] ?? 'info',
});

export function createLogger(module: string, parent: Logger = logger): Logger {
  return parent.child({ module });
}
