import winston from 'winston';

export type LogMeta = Record<string, unknown>;

export class Logger {
  private logger: winston.Logger;

  constructor(context: string) {
    const transports: winston.transport[] = [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.simple()
        ),
      }),
    ];
    if (process.env.LOG_FILE) {
      transports.push(new winston.transports.File({ filename: process.env.LOG_FILE }));
    }

    this.logger = winston.createLogger({
      level: process.env.LOG_LEVEL || 'info',
      silent: process.env.NODE_ENV === 'test' && !process.env.LOG_LEVEL,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
      ),
      defaultMeta: { service: context },
      transports,
    });
  }

  public info(message: string, meta?: LogMeta): void {
    this.logger.info(message, meta);
  }

  public error(message: string, meta?: LogMeta): void {
    this.logger.error(message, meta);
  }

  public warn(message: string, meta?: LogMeta): void {
    this.logger.warn(message, meta);
  }

  public debug(message: string, meta?: LogMeta): void {
    this.logger.debug(message, meta);
  }
}
