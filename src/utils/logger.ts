import pino from 'pino';

let correlationId: string | undefined;
let baseLogger: pino.Logger | undefined;

export function setCorrelationId(id: string): void {
  correlationId = id;
}

export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

// stdout carries the report, so every log line goes to stderr.
function getBaseLogger(): pino.Logger {
  if (baseLogger) {
    return baseLogger;
  }

  baseLogger =
    process.env.NODE_ENV === 'development'
      ? pino({
          level: 'warn',
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
              destination: 2,
            },
          },
        })
      : pino({ level: 'warn' }, pino.destination(2));

  return baseLogger;
}

/**
 * Sets the level of the shared base logger. Only loggers created afterwards
 * pick up the new level, so call this before building adapters.
 */
export function setLogLevel(level: pino.LevelWithSilent): void {
  getBaseLogger().level = level;
}

export function createLogger(context?: Record<string, unknown>): pino.Logger {
  const correlationIdValue = correlationId || generateCorrelationId();
  if (!correlationId) {
    setCorrelationId(correlationIdValue);
  }

  return getBaseLogger().child({
    correlationId: correlationIdValue,
    ...context,
  });
}
