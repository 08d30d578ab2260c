import pino from 'pino';

export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

function buildRootLogger(): pino.Logger {
  const level = process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info');
  const loggerOptions: pino.LoggerOptions =
    process.env.NODE_ENV === 'development'
      ? {
          level,
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          },
        }
      : { level };

  return pino(loggerOptions);
}

const rootLogger = buildRootLogger();

/** Component logger; request-scoped children come from `createRequestLogger`. */
export function createLogger(context?: Record<string, unknown>): pino.Logger {
  return rootLogger.child({ ...context });
}

export function createRequestLogger(
  base: pino.Logger,
  correlationId: string = generateCorrelationId()
): pino.Logger {
  return base.child({ correlationId });
}

export type Logger = pino.Logger;

export const logger = createLogger({ component: 'root' });
