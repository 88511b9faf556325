import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';

class LoggingConfig {
  private logLevel: string;
  private rotation: string;
  private retention: string;
  private compression: boolean;
  private logDir: string;
  private silent: boolean;

  constructor() {
    this.logLevel = process.env.LOG_LEVEL || 'info';
    this.rotation = process.env.LOG_ROTATION || '10MB';
    this.retention = process.env.LOG_RETENTION || '30d';
    this.compression = true;
    this.logDir = process.env.LOG_DIR || path.join(process.cwd(), 'logs');
    // Test runs keep everything in memory: no files, no console noise.
    this.silent = process.env.NODE_ENV === 'test';
  }

  private createConsoleFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.colorize({ all: true }),
      winston.format.printf((info) => {
        const { timestamp, level, message, stack, ...meta } = info;
        const stackStr = stack ? `\n${String(stack)}` : '';
        const metaStr = Object.keys(meta).length ? ` | ${JSON.stringify(meta)}` : '';
        return `${String(timestamp)} | ${level} | ${String(message)}${metaStr}${stackStr}`;
      })
    );
  }

  private createFileFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.printf((info) => {
        const { timestamp, level, message, stack, ...meta } = info;
        const stackStr = stack ? `\nStack: ${String(stack)}` : '';
        const metaStr = Object.keys(meta).length ? ` | ${JSON.stringify(meta)}` : '';
        return `${String(timestamp)} | ${level} | ${String(message)}${metaStr}${stackStr}`;
      })
    );
  }

  private parseRotation(rotation: string): { maxSize?: string; datePattern?: string } {
    if (rotation.includes('MB') || rotation.includes('KB') || rotation.includes('GB')) {
      return { maxSize: rotation };
    } else if (rotation.includes('day') || rotation.includes('hour')) {
      return { datePattern: 'YYYY-MM-DD' };
    }
    return { maxSize: '10MB' };
  }

  private parseRetention(retention: string): string {
    // "30 days" -> "30d"
    const match = retention.match(/(\d+)\s*(day|days|d|hour|hours|h)/i);
    if (match) {
      const num = match[1];
      const unit = match[2].toLowerCase();
      if (unit.startsWith('d')) return `${num}d`;
      if (unit.startsWith('h')) return `${num}h`;
    }
    return '30d';
  }

  private createFileTransport(name: string, level?: string): DailyRotateFile {
    const rotationConfig = this.parseRotation(this.rotation);

    return new DailyRotateFile({
      filename: path.join(this.logDir, `${name}-%DATE%.log`),
      datePattern: rotationConfig.datePattern || 'YYYY-MM-DD',
      maxSize: rotationConfig.maxSize,
      maxFiles: this.parseRetention(this.retention),
      zippedArchive: this.compression,
      level,
      format: this.createFileFormat(),
    });
  }

  setupLogging(): winston.Logger {
    const logger = winston.createLogger({
      level: this.logLevel.toLowerCase(),
      format: this.createFileFormat(),
      transports: [],
      exitOnError: false,
    });

    logger.add(
      new winston.transports.Console({
        level: this.logLevel.toLowerCase(),
        format: this.createConsoleFormat(),
        silent: this.silent,
      })
    );

    if (this.silent) {
      return logger;
    }

    if (!fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }

    logger.add(this.createFileTransport('sys'));
    logger.add(this.createFileTransport('error', 'error'));
    logger.add(this.createFileTransport('combined', 'silly'));

    return logger;
  }
}

export const loggingConfig = new LoggingConfig();

export const logger = loggingConfig.setupLogging();

export { LoggingConfig };

export function auditLog(event: string, details: Record<string, unknown> = {}) {
  logger.info(`[AUDIT] ${event}`, details);
}
