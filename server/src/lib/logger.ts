import pino from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';

const logger = pino({
  level: process.env.LOG_LEVEL ?? (isProduction ? 'info' : 'debug'),
  ...(isProduction || isTest
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true },
        },
      }),
});

/**
 * Creates a child logger scoped to a single pipeline run.
 */
export function createRunLogger(
  runId: string,
  extra?: Record<string, unknown>,
) {
  return logger.child({ runId, ...extra });
}

export type { Logger } from 'pino';

export default logger;
