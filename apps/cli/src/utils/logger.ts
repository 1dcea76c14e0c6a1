import fs from 'fs';
import path from 'path';
import winston from 'winston';
import { config, LogLevel, resolveLogLevel } from '../config/curator.config';

const baseFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true })
);

const lineFormat = winston.format.printf(({ level, message, timestamp, stack }) => {
  if (stack) {
    return `${timestamp} [${level.toUpperCase()}]: ${message}\n${stack}`;
  }
  return `${timestamp} [${level.toUpperCase()}]: ${message}`;
});

// Everything goes to stderr so the review prompt owns stdout
const consoleTransport = new winston.transports.Console({
  level: resolveLogLevel(config.logLevel),
  stderrLevels: ['error', 'warn', 'info', 'debug'],
  format: winston.format.combine(lineFormat, winston.format.colorize({ all: true })),
});

export const logger = winston.createLogger({
  level: 'debug',
  format: baseFormat,
  transports: [consoleTransport],
});

export interface LoggerOptions {
  level?: LogLevel;
  logFile?: string;
}

/**
 * Apply command-line logging choices: console verbosity and an optional
 * file that receives every level.
 */
export function configureLogger(options: LoggerOptions): void {
  if (options.level) {
    consoleTransport.level = options.level;
  }

  if (options.logFile) {
    const logDir = path.dirname(path.resolve(options.logFile));
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
      logger.info(`Created directory for log file: ${logDir}`);
    }

    logger.add(
      new winston.transports.File({
        filename: options.logFile,
        level: 'debug',
        format: lineFormat,
        options: { flags: 'w' },
      })
    );
    logger.info(`Logging detailed output (debug and above) to: ${options.logFile}`);
  }
}
