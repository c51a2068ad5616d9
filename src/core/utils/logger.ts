// Logger utility - structured logging with configurable level and format

import winston from 'winston';

const logLevel = process.env.LOG_LEVEL || 'info';
const logFormat = process.env.LOG_FORMAT || 'json';

export const logger = winston.createLogger({
  level: logLevel,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    logFormat === 'json'
      ? winston.format.json()
      : winston.format.combine(winston.format.colorize(), winston.format.simple())
  ),
  defaultMeta: {
    service: 'image-job-queue',
    version: process.env.npm_package_version || '1.0.0',
  },
  transports: [
    new winston.transports.Console({
      handleExceptions: true,
      handleRejections: true,
    }),
  ],
});

// File logging when LOG_TO_FILE is enabled
if (process.env.LOG_TO_FILE === 'true') {
  const logDir = process.env.LOG_DIR || '/tmp';

  logger.add(
    new winston.transports.File({
      filename: `${logDir}/error.log`,
      level: 'error',
      format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    })
  );

  logger.add(
    new winston.transports.File({
      filename: `${logDir}/combined.log`,
      format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    })
  );
}

export default logger;
