import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';
import util from 'util';

const rawLogLevel = (process.env.LOG_LEVEL || 'info').toLowerCase();
const levelMap: Record<string, string> = {
  trace: 'silly',
  silly: 'silly',
  debug: 'debug',
  verbose: 'verbose',
  info: 'info',
  warn: 'warn',
  warning: 'warn',
  error: 'error',
  fatal: 'error',
};
const mappedLogLevel = levelMap[rawLogLevel];
const logLevel = mappedLogLevel || 'info';

if (!mappedLogLevel) {
  console.warn(`Unknown LOG_LEVEL="${rawLogLevel}", defaulting to "${logLevel}".`);
}

// Jest runs with NODE_ENV=test; rotated file streams stay off there.
const fileLoggingEnabled = process.env.NODE_ENV !== 'test' && process.env.LOG_TO_FILE !== 'false';

const logsDir = path.join(process.cwd(), 'logs');
if (fileLoggingEnabled) {
  try {
    if (!fs.existsSync(logsDir)) {
      fs.mkdirSync(logsDir, { recursive: true });
    }
  } catch (error) {
    console.warn('Failed to ensure logs directory exists:', (error as Error).message);
  }
}

const customFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  winston.format.errors({ stack: true }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaKeys = Object.keys(meta);
    const metaSuffix =
      metaKeys.length > 0
        ? ` ${util.inspect(meta, { depth: 6, colors: false, breakLength: 120 })}`
        : '';
    return `${timestamp} [${level}]: ${message}${metaSuffix}`;
  })
);

const transports: winston.transport[] = [
  // stdout carries command results (versions, keys, URLs) for shell capture.
  new winston.transports.Console({
    format: consoleFormat,
    stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
    silent: process.env.NODE_ENV === 'test',
  }),
];

if (fileLoggingEnabled) {
  transports.push(
    new DailyRotateFile({
      filename: path.join(logsDir, 'publisher-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      maxFiles: '30d',
      format: customFormat,
    })
  );

  transports.push(
    new DailyRotateFile({
      filename: path.join(logsDir, 'error-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      maxFiles: '90d',
      level: 'error',
      format: customFormat,
    })
  );
}

const logger = winston.createLogger({
  level: logLevel,
  transports,
  exitOnError: true,
  ...(fileLoggingEnabled && {
    rejectionHandlers: [
      new DailyRotateFile({
        filename: path.join(logsDir, 'rejections-%DATE%.log'),
        datePattern: 'YYYY-MM-DD',
        maxFiles: '90d',
        format: customFormat,
      }),
    ],
  }),
});

export default logger;

export type LogMeta = Record<string, unknown>;

export interface LogContext {
  run_id?: string;
  stage?: string;
  version?: number;
  job_id?: string;
  execution_key?: string;
  duration_ms?: number;
  [key: string]: unknown;
}

export interface ContextLogger {
  trace(message: string, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  fatal(message: string, meta?: LogMeta): void;
  child(extra: LogContext): ContextLogger;
}

export function createContextLogger(context: LogContext): ContextLogger {
  return {
    trace: (message, meta) => logger.log('silly', message, { ...context, ...meta }),
    debug: (message, meta) => logger.debug(message, { ...context, ...meta }),
    info: (message, meta) => logger.info(message, { ...context, ...meta }),
    warn: (message, meta) => logger.warn(message, { ...context, ...meta }),
    error: (message, meta) => logger.error(message, { ...context, ...meta }),
    fatal: (message, meta) => logger.log('error', message, { ...context, ...meta, fatal: true }),
    child: (extra) => createContextLogger({ ...context, ...extra }),
  };
}
