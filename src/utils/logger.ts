import * as winston from 'winston';
import * as path from 'path';
import * as fs from 'fs';

/**
 * Logger levels
 */
export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  HTTP = 'http',
  VERBOSE = 'verbose',
  DEBUG = 'debug',
  SILLY = 'silly',
}

/**
 * Log categories for better organization
 */
export enum LogCategory {
  SYSTEM = 'system',
  COMMAND = 'command',
  DATABASE = 'database',
  MUSIC = 'music',
  EVENT = 'event',
}

/**
 * Structured context attached to a log entry
 */
export interface LogContext {
  userId?: string;
  guildId?: string;
  channelId?: string;
  commandName?: string;
  category?: LogCategory;
  duration?: number;
  error?: Error;
  metadata?: Record<string, unknown>;
}

interface LoggerConfig {
  level: LogLevel;
  file: string;
  maxSize: number;
  maxFiles: number;
  writeFiles: boolean;
  format: winston.Logform.Format;
}

const CATEGORY_BADGES: Record<LogCategory, string> = {
  [LogCategory.SYSTEM]: '🔧',
  [LogCategory.COMMAND]: '⚡',
  [LogCategory.DATABASE]: '💾',
  [LogCategory.MUSIC]: '🎵',
  [LogCategory.EVENT]: '📅',
};

const LOG_LEVELS: readonly string[] = Object.values(LogLevel);
const LOG_CATEGORIES: readonly string[] = Object.values(LogCategory);

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.includes(value);
}

function isLogCategory(value: unknown): value is LogCategory {
  return typeof value === 'string' && LOG_CATEGORIES.includes(value);
}

/**
 * Resolve LOG_LEVEL (case-insensitive) into a winston level
 */
export function resolveLogLevel(raw: string | undefined): LogLevel {
  const normalized = (raw || '').trim().toLowerCase();
  if (normalized === 'warning') {
    return LogLevel.WARN;
  }
  if (normalized === 'critical') {
    return LogLevel.ERROR;
  }
  return isLogLevel(normalized) ? normalized : LogLevel.INFO;
}

/**
 * Winston-backed logger with category and guild/user context support
 */
export class Logger {
  private readonly logger: winston.Logger;
  private readonly config: LoggerConfig;

  constructor() {
    this.config = {
      level: resolveLogLevel(process.env.LOG_LEVEL),
      file: process.env.LOG_FILE || 'logs/bot.log',
      maxSize: 5242880, // 5MB
      maxFiles: 5,
      writeFiles: process.env.NODE_ENV !== 'test',
      format: winston.format.combine(
        winston.format.timestamp({
          format: 'YYYY-MM-DD HH:mm:ss',
        }),
        winston.format.errors({ stack: true }),
        winston.format.json(),
      ),
    };

    if (this.config.writeFiles) {
      this.ensureLogDirectory();
    }
    this.logger = this.createLogger();
  }

  private ensureLogDirectory(): void {
    const logDir = path.dirname(this.config.file);
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
  }

  private getCircularReplacer(): (key: string, value: unknown) => unknown {
    const seen = new WeakSet<object>();
    return (_key, value) => {
      if (typeof value === 'object' && value !== null) {
        if (seen.has(value)) {
          return '[Circular]';
        }
        seen.add(value);
      }
      return value;
    };
  }

  private createLogger(): winston.Logger {
    const transports: winston.transport[] = [];

    transports.push(
      new winston.transports.Console({
        level: this.config.level,
        silent: process.env.NODE_ENV === 'test' && !process.env.LOG_LEVEL,
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.timestamp({
            format: 'HH:mm:ss',
          }),
          winston.format.printf(({ timestamp, level, message, category, userId, guildId, ...meta }) => {
            let log = `${timestamp}`;

            if (isLogCategory(category)) {
              log += ` ${CATEGORY_BADGES[category]}`;
            }

            log += ` [${level}]`;

            const context: string[] = [];
            if (typeof guildId === 'string') {
              context.push(`G:${guildId.slice(-4)}`);
            }
            if (typeof userId === 'string') {
              context.push(`U:${userId.slice(-4)}`);
            }
            if (context.length > 0) {
              log += ` (${context.join('|')})`;
            }

            log += `: ${message}`;

            if (Object.keys(meta).length > 0) {
              try {
                log += ` ${JSON.stringify(meta, this.getCircularReplacer())}`;
              } catch {
                log += ' [Unserializable metadata]';
              }
            }

            return log;
          }),
        ),
      }),
    );

    if (this.config.writeFiles) {
      transports.push(
        new winston.transports.File({
          filename: this.config.file,
          level: this.config.level,
          format: this.config.format,
          maxsize: this.config.maxSize,
          maxFiles: this.config.maxFiles,
          tailable: true,
        }),
      );

      transports.push(
        new winston.transports.File({
          filename: this.config.file.replace('.log', '.error.log'),
          level: LogLevel.ERROR,
          format: this.config.format,
          maxsize: this.config.maxSize,
          maxFiles: this.config.maxFiles,
          tailable: true,
        }),
      );
    }

    return winston.createLogger({
      level: this.config.level,
      format: this.config.format,
      transports,
      exitOnError: false,
    });
  }

  public error(message: string, context?: LogContext): void {
    this.logger.error(message, this.formatContext(context));
  }

  public warn(message: string, context?: LogContext): void {
    this.logger.warn(message, this.formatContext(context));
  }

  public info(message: string, context?: LogContext): void {
    this.logger.info(message, this.formatContext(context));
  }

  public debug(message: string, context?: LogContext): void {
    this.logger.debug(message, this.formatContext(context));
  }

  /**
   * Flatten a LogContext into winston metadata
   */
  private formatContext(context?: LogContext): Record<string, unknown> {
    if (!context) {
      return {};
    }

    const formatted: Record<string, unknown> = {};

    if (context.userId) {formatted.userId = context.userId;}
    if (context.guildId) {formatted.guildId = context.guildId;}
    if (context.channelId) {formatted.channelId = context.channelId;}
    if (context.commandName) {formatted.commandName = context.commandName;}
    if (context.category) {formatted.category = context.category;}
    if (context.duration !== undefined) {formatted.duration = context.duration;}
    if (context.error) {
      formatted.error = {
        name: context.error.name,
        message: context.error.message,
        stack: context.error.stack,
      };
    }
    if (context.metadata) {formatted.metadata = context.metadata;}

    return formatted;
  }

  public command(commandName: string, userId: string, guildId?: string, duration?: number, error?: Error): void {
    const message = error
      ? `Command failed: ${commandName} - ${error.message}`
      : `Command executed: ${commandName}`;

    const context: LogContext = {
      category: LogCategory.COMMAND,
      commandName,
      userId,
      guildId,
      duration,
      error,
    };

    if (error) {
      this.error(message, context);
    } else {
      this.info(message, context);
    }
  }

  public music(operation: string, guildId: string, userId?: string, track?: string, error?: Error): void {
    const message = error
      ? `Music ${operation} failed - ${error.message}`
      : `Music ${operation}${track ? `: ${track}` : ''}`;

    const context: LogContext = {
      category: LogCategory.MUSIC,
      guildId,
      userId,
      error,
      metadata: { operation, track },
    };

    if (error) {
      this.error(message, context);
    } else {
      this.info(message, context);
    }
  }

  /**
   * Close logger and flush all transports
   */
  public close(): Promise<void> {
    return new Promise(resolve => {
      this.logger.end(() => {
        resolve();
      });
    });
  }
}
