import pino from 'pino';

export type Logger = pino.Logger;

function createLogger(): Logger {
  const level = process.env.LOG_LEVEL ?? 'info';
  const options: pino.LoggerOptions = {
    level,
    name: 'tabrelay',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (process.env.NODE_ENV === 'development') {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino(options);
}

export const logger = createLogger();

export function componentLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}
