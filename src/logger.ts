/**
 * Logging configuration for cluster-scripter
 */

import winston from 'winston';
import config from './config.js';

// Custom format for timestamps
const timestampFormat = winston.format.timestamp({
  format: 'YYYY-MM-DD HH:mm:ss'
});

// Custom format for log messages
const logFormat = winston.format.printf(({ timestamp, level, message, ...meta }) => {
  let logMessage = `${timestamp} - ${level.toUpperCase()} - ${message}`;

  if (Object.keys(meta).length > 0) {
    logMessage += ` - ${JSON.stringify(meta)}`;
  }

  return logMessage;
});

// Create logger instance
const logger = winston.createLogger({
  level: config.logLevel.toLowerCase(),
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    timestampFormat,
    logFormat
  ),
  transports: [
    // Console transport on stderr; stdout belongs to the interactive session
    new winston.transports.Console({
      stderrLevels: Object.keys(winston.config.npm.levels),
      format: winston.format.combine(
        timestampFormat,
        logFormat,
        winston.format.colorize({ all: true })
      )
    })
  ]
});

// Add file transport if log file is specified
if (config.logFile) {
  logger.add(new winston.transports.File({
    filename: config.logFile,
    format: winston.format.combine(
      timestampFormat,
      logFormat
    )
  }));
}

// Create child loggers for different modules
export const createLogger = (module: string) => {
  return logger.child({ module });
};

// Export default logger
export { logger };
