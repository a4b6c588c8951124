import pino from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test';

const logger = pino({
  level: process.env.LOG_LEVEL ?? (isProduction ? 'info' : isTest ? 'silent' : 'debug'),
  redact: ['key', 'apiKey', 'headers["ocp-apim-subscription-key"]', 'headers["api-key"]'],
  ...(isProduction || isTest
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true },
        },
      }),
});

export type Logger = pino.Logger;

/**
 * Creates a child logger scoped to one resume analysis.
 */
export function createAnalysisLogger(
  requestId: string,
  extra?: Record<string, unknown>,
): Logger {
  return logger.child({ requestId, ...extra });
}

export default logger;
