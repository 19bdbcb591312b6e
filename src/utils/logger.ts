import * as winston from 'winston';
import * as path from 'path';
import * as fs from 'fs';

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

    const logDir = process.env.REMOTE_SESSION_LOG_DIR;
    if (logDir || process.env.NODE_ENV === 'production') {
      const dir = logDir || path.join(process.cwd(), 'logs');
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }

      transports.push(
        new winston.transports.File({
          filename: path.join(dir, 'remote-session-error.log'),
          level: 'error',
          format: winston.format.combine(
            winston.format.timestamp(),
            winston.format.json()
          ),
        }),
        new winston.transports.File({
          filename: path.join(dir, 'remote-session-combined.log'),
          format: winston.format.combine(
            winston.format.timestamp(),
            winston.format.json()
          ),
        })
      );
    }

    this.logger = winston.createLogger({
      level: process.env.LOG_LEVEL || 'info',
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.splat(),
        winston.format.json()
      ),
      defaultMeta: { service: 'remote-session', context },
      transports,
    });
  }

  info(message: string, meta?: unknown) {
    this.logger.info(message, meta);
  }

  error(message: string, meta?: unknown) {
    this.logger.error(message, meta);
  }

  warn(message: string, meta?: unknown) {
    this.logger.warn(message, meta);
  }

  debug(message: string, meta?: unknown) {
    this.logger.debug(message, meta);
  }
}
