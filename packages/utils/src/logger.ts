import winston from 'winston';
import { isDevelopment, PATHS } from '@visionrig/config/node';

export type Logger = winston.Logger;

function resolveLevel(): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  return isDevelopment() ? 'debug' : 'info';
}

/**
 * Create a logger instance with consistent formatting
 * Console output for every environment, JSON files outside development.
 * LOG_SILENT=true mutes every transport (used by the test setup).
 */
export function createLogger(service: string): Logger {
  const silent = process.env.LOG_SILENT === 'true';

  const format = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.json()
  );

  const consoleFormat = winston.format.combine(
    winston.format.colorize(),
    winston.format.printf(({ level, message, timestamp, service: name, ...metadata }) => {
      let msg = `${String(timestamp)} [${String(name)}] ${level}: ${String(message)}`;
      if (Object.keys(metadata).length > 0) {
        msg += ` ${JSON.stringify(metadata)}`;
      }
      return msg;
    })
  );

  const logger = winston.createLogger({
    level: resolveLevel(),
    format,
    silent,
    defaultMeta: { service },
    transports: [
      // Console output
      new winston.transports.Console({
        format: consoleFormat,
      }),
    ],
  });

  // Add file transports in production
  if (!isDevelopment() && !silent) {
    logger.add(
      new winston.transports.File({
        filename: `${PATHS.LOGS}/error.log`,
        level: 'error',
      })
    );
    logger.add(
      new winston.transports.File({
        filename: `${PATHS.LOGS}/combined.log`,
      })
    );
  }

  return logger;
}

/**
 * Default logger instance
 */
export const logger = createLogger('visionrig');
