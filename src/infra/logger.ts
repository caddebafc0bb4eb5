import winston from 'winston';

export type LogContext = Record<string, unknown>;

export interface ILogger {
  info(message: string, context?: LogContext): void;
  error(message: string, error?: unknown): void;
  warn(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
}

export class WinstonLogger implements ILogger {
  private logger: winston.Logger;
  private static sharedLogger: winston.Logger | null = null;

  /**
   * @param component Tag added to every line, e.g. `condition-waiter`
   */
  constructor(component?: string) {
    // One shared root logger so every component writes to the same transports
    const root = WinstonLogger.sharedLogger ?? WinstonLogger.createRootLogger();
    WinstonLogger.sharedLogger = root;

    this.logger = component ? root.child({ component }) : root;
  }

  private static createRootLogger(): winston.Logger {
    const logFile = process.env.LOG_FILE;

    const transports = [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
            const tag = typeof component === 'string' ? ` [${component}]` : '';
            return `${timestamp} [${level}]${tag}: ${message} ${Object.keys(meta).length ? JSON.stringify(meta) : ''}`;
          })
        ),
      }),
      ...(logFile
        ? [new winston.transports.File({ filename: logFile, level: 'debug', options: { flags: 'a' } })]
        : []),
    ];

    const logger = winston.createLogger({
      level: process.env.LOG_LEVEL || 'info',
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
      ),
      transports,
    });

    logger.on('error', (err) => {
      console.error('Winston logger error:', err);
    });

    return logger;
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(message, context);
  }

  error(message: string, error?: unknown): void {
    if (error instanceof Error) {
      this.logger.error(message, {
        errorMessage: error.message,
        errorName: error.name,
        stack: error.stack,
      });
    } else {
      this.logger.error(message, { error });
    }
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(message, context);
  }
}

export class LoggerStub implements ILogger {
  info(_message: string, _context?: LogContext): void {}
  error(_message: string, _error?: unknown): void {}
  warn(_message: string, _context?: LogContext): void {}
  debug(_message: string, _context?: LogContext): void {}
}

/**
 * Message text of anything that was thrown.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
