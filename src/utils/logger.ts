import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'node:path';
import fs from 'node:fs';

const isTestRun = process.env.VITEST !== undefined || process.env.NODE_ENV === 'test';

// --- Define Log Format ---
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.printf(({ timestamp, level, message, stack }) => {
    return `${timestamp} [${level.toUpperCase()}]: ${stack || message}`;
  })
);

const consoleFormat = winston.format.combine(winston.format.colorize(), logFormat);

// --- System Logger ---
export const systemLogger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: logFormat,
  transports: [
    new winston.transports.Console({
      format: consoleFormat,
      // the console client owns stdout, so logs go to stderr
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
      silent: isTestRun,
    }),
  ],
  exitOnError: false,
});

let fileLoggingDir: string | null = null;

/**
 * Adds daily-rotating system and error files under `dir`, plus handlers for
 * uncaught exceptions and unhandled rejections. Calling it again is a no-op.
 */
export function enableFileLogging(dir: string): void {
  if (fileLoggingDir !== null) return;
  fileLoggingDir = path.resolve(dir);
  if (!fs.existsSync(fileLoggingDir)) {
    fs.mkdirSync(fileLoggingDir, { recursive: true });
  }

  systemLogger.add(
    new DailyRotateFile({
      filename: path.join(fileLoggingDir, 'system-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      zippedArchive: true,
      maxSize: '20m',
      maxFiles: '14d',
      level: 'info',
      utc: true,
    })
  );
  systemLogger.add(
    new DailyRotateFile({
      filename: path.join(fileLoggingDir, 'error-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      zippedArchive: true,
      maxSize: '20m',
      maxFiles: '30d',
      level: 'error',
      utc: true,
    })
  );
  systemLogger.exceptions.handle(
    new DailyRotateFile({
      filename: path.join(fileLoggingDir, 'exceptions-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      zippedArchive: true,
      maxSize: '10m',
      maxFiles: '30d',
      utc: true,
    })
  );
  systemLogger.rejections.handle(
    new DailyRotateFile({
      filename: path.join(fileLoggingDir, 'rejections-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      zippedArchive: true,
      maxSize: '10m',
      maxFiles: '30d',
      utc: true,
    })
  );
  systemLogger.debug(`File logging enabled in ${fileLoggingDir}`);
}

export function setLogLevel(level: string): void {
  systemLogger.level = level;
}

// --- Context-Aware Logging Helpers ---

export interface ContextLogger {
  debug(message: string, metadata?: Record<string, unknown>): void;
  info(message: string, metadata?: Record<string, unknown>): void;
  warn(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, metadata?: Record<string, unknown>): void;
}

/**
 * Creates a logger that prefixes every message with `[context]`.
 * Useful for consistently logging from a specific component.
 */
export function createContextLogger(context: string): ContextLogger {
  return {
    debug: (message, metadata) => systemLogger.debug(`[${context}] ${message}`, metadata),
    info: (message, metadata) => systemLogger.info(`[${context}] ${message}`, metadata),
    warn: (message, metadata) => systemLogger.warn(`[${context}] ${message}`, metadata),
    error: (message, metadata) => systemLogger.error(`[${context}] ${message}`, metadata),
  };
}
