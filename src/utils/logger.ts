import winston from 'winston';
import { join } from 'path';
import { config } from '../config/index.js';
import type { LoggingConfig } from '../types/config.js';

const lineFormat = (colour: boolean) =>
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    const levelStr = colour ? level : level.toUpperCase();
    return `${timestamp} [${levelStr}] ${message}${metaStr}`;
  });

export class Logger {
  private static instance: winston.Logger;
  private static runLog: winston.transport | null = null;

  static getInstance(): winston.Logger {
    if (!Logger.instance) {
      Logger.instance = winston.createLogger({
        level: config.logging.level,
        format: winston.format.combine(
          winston.format.timestamp({
            format: 'YYYY-MM-DD HH:mm:ss',
          }),
          winston.format.errors({ stack: true }),
          lineFormat(false)
        ),
        transports: [
          new winston.transports.Console({
            format: winston.format.combine(winston.format.colorize(), lineFormat(true)),
          }),
        ],
      });
    }

    return Logger.instance;
  }

  /**
   * Mirrors every log line of the current run into `<dir>/output.log`.
   * Returns the log file path.
   */
  static attachRunLog(dir: string): string {
    const filename = join(dir, 'output.log');
    Logger.detachRunLog();
    Logger.runLog = new winston.transports.File({ filename });
    Logger.getInstance().add(Logger.runLog);
    return filename;
  }

  static detachRunLog(): void {
    if (Logger.runLog) {
      Logger.getInstance().remove(Logger.runLog);
      Logger.runLog = null;
    }
  }

  static info(message: string, meta?: Record<string, unknown>): void {
    Logger.getInstance().info(message, meta);
  }

  static warn(message: string, meta?: Record<string, unknown>): void {
    Logger.getInstance().warn(message, meta);
  }

  static error(message: string, meta?: Record<string, unknown>): void {
    Logger.getInstance().error(message, meta);
  }

  static debug(message: string, meta?: Record<string, unknown>): void {
    Logger.getInstance().debug(message, meta);
  }

  static setLevel(level: LoggingConfig['level']): void {
    Logger.getInstance().level = level;
  }
}

/** Error text for log context, cut to keep single lines readable. */
export function errorText(error: unknown, max = 200): string {
  const message = error instanceof Error ? error.message : String(error);
  return message.length > max ? `${message.slice(0, max)}…` : message;
}
