import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';

type LogMeta = Record<string, unknown>;

const logLevel = process.env.LOG_LEVEL || 'info';
const logDir = process.env.LOG_DIR;
const isProduction = process.env.NODE_ENV === 'production';

// Console format for development
const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta, null, 2) : '';
    return `${timestamp} [${level}]: ${message} ${metaStr}`;
  })
);

// JSON format for file logs (machine-readable)
const fileFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: consoleFormat,
    // The CLI prints nothing else on stdout, so keep logs on stderr
    stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
    silent: process.env.NODE_ENV === 'test',
  }),
];

// File logs only when a directory is configured; the generator itself writes no files
if (logDir) {
  transports.push(
    new DailyRotateFile({
      filename: path.join(logDir, 'error-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      maxFiles: '30d',
      maxSize: '20m',
      zippedArchive: isProduction,
    }),
    new DailyRotateFile({
      filename: path.join(logDir, 'combined-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      maxFiles: '14d',
      maxSize: '20m',
      zippedArchive: isProduction,
    })
  );
}

const logger = winston.createLogger({
  level: logLevel,
  format: fileFormat,
  defaultMeta: {
    service: 'quant-item-forge',
    environment: process.env.NODE_ENV || 'development',
    version: '1.0.0',
  },
  transports,
});

export default logger;

export const logError = (error: Error, context?: LogMeta) => {
  logger.error('Application Error', {
    errorName: error.name,
    message: error.message,
    stack: error.stack,
    ...context,
  });
};

export const logGeneration = (action: string, details: LogMeta) => {
  logger.info('Generation Operation', {
    action,
    ...details,
  });
};
