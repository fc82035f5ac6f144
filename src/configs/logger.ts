import path from 'path';
import * as winston from 'winston';
import { loadLogEnv } from '@/configs/env';

const env = loadLogEnv();

const { combine, timestamp, json, colorize, printf, errors } = winston.format;

// Helper function to create level filter
const levelFilter = (level: string) =>
  winston.format((info) => {
    return info.level === level ? info : false;
  })();

const customFormat = printf(({ level, message, timestamp, counter }) => {
  const scope = counter ? ` [${String(counter)}]` : '';
  return `${timestamp} ${level}${scope} ${message}`;
});

// Console format for development (custom format with colors)
const consoleFormat = combine(
  timestamp({
    format: 'DD-MM-YYYY HH:mm:ss',
  }),
  errors({ stack: true }),
  colorize(),
  customFormat
);

// File format (JSON)
const fileFormat = combine(timestamp(), errors({ stack: true }), json());

const fileLevels = ['fatal', 'error', 'warn', 'info', 'debug'] as const;

const isTest = env.NODE_ENV === 'test';
const logDir = env.LOG_DIR;

const logger = winston.createLogger({
  level: env.LOG_LEVEL === 'silent' ? 'fatal' : env.LOG_LEVEL,
  silent: isTest || env.LOG_LEVEL === 'silent',
  levels: {
    fatal: 0,
    error: 1,
    warn: 2,
    info: 3,
    debug: 4,
  },
  transports: [
    new winston.transports.Console({
      format: consoleFormat,
    }),

    // One JSON file per level, only when a log directory is configured
    ...(isTest || !logDir
      ? []
      : fileLevels.map(
          (level) =>
            new winston.transports.File({
              filename: path.join(logDir, `${level}.log`),
              format: combine(levelFilter(level), fileFormat),
            })
        )),
  ],
});

if (env.NODE_ENV === 'production') {
  logger.clear();
  logger.add(
    new winston.transports.Console({
      format: json(),
    })
  );
}

export type Logger = winston.Logger;

export default logger;
