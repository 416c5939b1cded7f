/**
 * Logger — Winston-based with file + console output
 */

import winston from 'winston';
import { existsSync, mkdirSync } from 'fs';
import type { LogLevel } from '../core/config.js';
import type { Logger } from '../core/types.js';

export function createLogger(logDir: string, level: LogLevel = 'info'): Logger {
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  const logger = winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    ),
    transports: [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.printf(({ timestamp, level, message, ...meta }) => {
            const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
            return `${String(timestamp)} [${level}] ${String(message)}${metaStr}`;
          })
        ),
      }),
      new winston.transports.File({
        filename: `${logDir}/error.log`,
        level: 'error',
      }),
      new winston.transports.File({
        filename: `${logDir}/combined.log`,
      }),
    ],
  });

  return {
    info: (msg, meta) => logger.info(msg, meta),
    warn: (msg, meta) => logger.warn(msg, meta),
    error: (msg, meta) => logger.error(msg, meta),
    debug: (msg, meta) => logger.debug(msg, meta),
  };
}

/** Console-only logger for the CLI, where writing log files is unwanted. */
export function createConsoleLogger(level: LogLevel = 'warn'): Logger {
  const logger = winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.printf(({ level, message }) => `[${level}] ${String(message)}`)
    ),
    transports: [new winston.transports.Console({ stderrLevels: ['error', 'warn', 'info', 'debug'] })],
  });

  return {
    info: (msg, meta) => logger.info(msg, meta),
    warn: (msg, meta) => logger.warn(msg, meta),
    error: (msg, meta) => logger.error(msg, meta),
    debug: (msg, meta) => logger.debug(msg, meta),
  };
}
