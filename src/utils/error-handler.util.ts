import { Logger, LogContext } from './logger';

/**
 * Raised when the bot cannot start because of missing or invalid settings
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Raised by withTimeout when the wrapped operation does not settle in time
 */
export class TimeoutError extends Error {
  constructor(operationName: string, timeoutMs: number) {
    super(`${operationName} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Utilitário para tratamento padronizado de erros
 */
export class ErrorHandler {
  /**
   * Normalize anything thrown into an Error instance
   */
  static toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
  }

  /**
   * Wrapper para operações que podem falhar silenciosamente
   */
  static async safeExecute<T>(
    operation: () => Promise<T>,
    logger: Logger,
    operationName: string,
    fallback: T,
    context?: LogContext,
  ): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      logger.warn(`${operationName} failed (safe execution)`, {
        ...context,
        error: ErrorHandler.toError(error),
      });
      return fallback;
    }
  }

  /**
   * Race a promise against a timer; the timer is always cleared
   */
  static async withTimeout<T>(promise: Promise<T>, timeoutMs: number, operationName: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new TimeoutError(operationName, timeoutMs)), timeoutMs);
    });

    try {
      return await Promise.race([promise, timeout]);
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
    }
  }
}
