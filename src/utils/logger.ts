import winston from 'winston';
import path from 'path';

/**
 * Logger Configuration
 *
 * Structured logging for crawl runs. File transports are skipped under
 * NODE_ENV=test so test processes leave no log files behind.
 */

const isTest = process.env.NODE_ENV === 'test';

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...metadata }) => {
    let msg = `${timestamp} [${level}] ${message}`;
    if (Object.keys(metadata).length > 0) {
      msg += ` ${JSON.stringify(metadata)}`;
    }
    return msg;
  })
);

function buildTransports(): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: consoleFormat,
      silent: isTest,
    }),
  ];

  if (!isTest) {
    const logDir = process.env.LOG_DIR || path.join(process.cwd(), 'logs');
    transports.push(
      new winston.transports.File({
        filename: path.join(logDir, 'combined.log'),
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      }),
      new winston.transports.File({
        filename: path.join(logDir, 'error.log'),
        level: 'error',
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      })
    );
  }

  return transports;
}

/**
 * Create a logger instance
 * @param component Component name (e.g., 'LinkDiscovery', 'CsvRecordStore')
 */
export function createLogger(component: string): winston.Logger {
  return winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: logFormat,
    defaultMeta: { component },
    transports: buildTransports(),
  });
}

/**
 * Default logger instance
 */
export const logger = createLogger('App');

/**
 * Tags every entry with the id of the crawl run it belongs to
 */
export class RunLogger {
  private logger: winston.Logger;
  private runId: string;

  constructor(runId: string, component: string = 'Crawl') {
    this.runId = runId;
    this.logger = createLogger(`${component}:${runId}`);
  }

  info(message: string, metadata?: object) {
    this.logger.info(message, { runId: this.runId, ...metadata });
  }

  error(message: string, error?: Error | unknown, metadata?: object) {
    this.logger.error(message, {
      runId: this.runId,
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
      ...metadata,
    });
  }

  warn(message: string, metadata?: object) {
    this.logger.warn(message, { runId: this.runId, ...metadata });
  }

  debug(message: string, metadata?: object) {
    this.logger.debug(message, { runId: this.runId, ...metadata });
  }

  started(metadata?: object) {
    this.info('Run started', metadata);
  }

  completed(metadata?: object) {
    this.info('Run completed', metadata);
  }

  failed(error: Error | unknown, metadata?: object) {
    this.error('Run failed', error, metadata);
  }
}
