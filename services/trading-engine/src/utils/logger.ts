/**
 * Trading Engine Logger
 * Structured logging with Winston
 */

import winston from 'winston';
import { config } from '../config';

const isDevelopment = config.env === 'development';

// Define custom log levels
const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

winston.addColors({
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'white',
});

const prettyFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.colorize({ all: true }),
  winston.format.printf(({ timestamp, level, message, module, ...metadata }) => {
    const scope = typeof module === 'string' ? ` (${module})` : '';
    let msg = `${String(timestamp)} [${level}]${scope}: ${String(message)}`;
    delete metadata.service;
    delete metadata.environment;
    if (Object.keys(metadata).length > 0) {
      msg += ` ${JSON.stringify(metadata)}`;
    }
    return msg;
  })
);

const jsonFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: config.logging.format === 'json' ? jsonFormat : prettyFormat,
  }),
];

if (config.logging.fileEnabled) {
  transports.push(
    new winston.transports.File({
      filename: `${config.logging.directory}/error.log`,
      level: 'error',
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    }),
    new winston.transports.File({
      filename: `${config.logging.directory}/combined.log`,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );
}

export const logger = winston.createLogger({
  level: isDevelopment ? 'debug' : config.logging.level,
  levels,
  format: jsonFormat,
  defaultMeta: {
    service: config.serviceName,
    environment: config.env,
  },
  transports,
  silent: config.env === 'test',
  exitOnError: false,
});

// Create child loggers for different modules
export const createLogger = (module: string) => {
  return logger.child({ module });
};
