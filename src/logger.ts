import { createLogger, format, type Logger, transports } from 'winston';

export const logger = createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  silent: process.env.NODE_ENV === 'test',
  transports: [new transports.Console()],
  format: format.combine(
    format.splat(),
    format.colorize(),
    format.timestamp(),
    format.printf(({ timestamp, level, message, component }) => {
      const prefix = typeof component === 'string' ? `[${component}] ` : '';
      return `[${String(timestamp)}] ${level}: ${prefix}${String(message)}`;
    })
  ),
});

export const loggerFor = (component: string): Logger => logger.child({ component });
