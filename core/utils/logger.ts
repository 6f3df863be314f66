import winston from 'winston';
import path from 'path';
import { loggingConfig } from '@core/config/logging';
import type { LoggerService } from '@core/config/logging';

export interface ILoggerFactory {
  createServiceLogger(serviceName: LoggerService): winston.Logger;
}

// Add colors to Winston
winston.addColors(loggingConfig.colors);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.colorize({ all: loggingConfig.format.colorize }),
  winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
    // Concise output unless debugging
    if (process.env.SOLCONF_DEBUG !== 'true') {
      return `${level}${service ? ` [${service}]` : ''}: ${message}`;
    }

    let msg = `${timestamp} [${level}]${service ? ` [${service}]` : ''} ${message}`;
    if (Object.keys(metadata).length > 0) {
      msg += '\n' + JSON.stringify(metadata, null, 2);
    }
    return msg;
  })
);

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.json()
);

function getServiceLogLevel(serviceName: LoggerService): string {
  // Explicit LOG_LEVEL takes precedence
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }

  // During tests, respect TEST_LOG_LEVEL or default to error for minimal output
  if (process.env.NODE_ENV === 'test') {
    return process.env.TEST_LOG_LEVEL || 'error';
  }

  if (process.env.SOLCONF_DEBUG === 'true') {
    return 'debug';
  }

  return loggingConfig.services[serviceName].level;
}

function createTransports(): winston.transport[] {
  const transports: winston.transport[] = [];

  // Only use console transport outside of tests; everything goes to stderr
  if (process.env.NODE_ENV !== 'test') {
    transports.push(
      new winston.transports.Console({
        format: consoleFormat,
        stderrLevels: Object.keys(loggingConfig.levels)
      })
    );
  }

  const logDir = process.env.SOLCONF_LOG_DIR;
  if (logDir) {
    transports.push(
      new winston.transports.File({
        filename: path.join(logDir, loggingConfig.files.mainLog),
        format: fileFormat,
        maxsize: loggingConfig.files.maxSize,
        maxFiles: loggingConfig.files.maxFiles,
        tailable: loggingConfig.files.tailable
      })
    );
  }

  // winston warns when a logger has no transports at all
  if (transports.length === 0) {
    transports.push(new winston.transports.Console({ silent: true }));
  }

  return transports;
}

/**
 * Factory service for creating Winston loggers
 */
export class LoggerFactory implements ILoggerFactory {
  /**
   * Create a service-specific logger
   * @param serviceName The name of the service to create a logger for
   */
  createServiceLogger(serviceName: LoggerService): winston.Logger {
    return winston.createLogger({
      level: getServiceLogLevel(serviceName),
      levels: loggingConfig.levels,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
      ),
      defaultMeta: { service: serviceName },
      transports: createTransports()
    });
  }
}

export const loggerFactory = new LoggerFactory();

export function createServiceLogger(serviceName: LoggerService): winston.Logger {
  return loggerFactory.createServiceLogger(serviceName);
}

export const treeLogger = createServiceLogger('tree');
export const modifierLogger = createServiceLogger('modifiers');
export const evaluatorLogger = createServiceLogger('evaluator');
export const resolutionLogger = createServiceLogger('resolution');
export const overrideLogger = createServiceLogger('overrides');
export const loaderLogger = createServiceLogger('loader');
export const cliLogger = createServiceLogger('cli');
