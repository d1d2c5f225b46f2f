import { Logger } from '@nestjs/common';
import { ExecutionError, describeError } from '../errors/engine.errors';

export interface RetryOptions {
  label: string;
  timeoutMs: number;
  retries: number;
  delayMs: number;
}

const logger = new Logger('Retry');

function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new Error(`${label}: превышен таймаут ${timeoutMs} мс`)),
      timeoutMs,
    );
  });

  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Вызов внешней системы с таймаутом и ограниченным числом повторов.
 * После исчерпания попыток бросает восстановимую ExecutionError.
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  // Первая попытка плюс retries повторов
  const attempts = Math.max(0, options.retries) + 1;
  let lastError = '';

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await withTimeout(operation(), options.timeoutMs, options.label);
    } catch (error) {
      lastError = describeError(error);
      logger.warn(`${options.label}: попытка ${attempt}/${attempts} не удалась: ${lastError}`);

      if (attempt < attempts && options.delayMs > 0) {
        await sleep(options.delayMs * attempt);
      }
    }
  }

  throw new ExecutionError(`${options.label}: попытки исчерпаны (${lastError})`, {
    attempts,
    timeoutMs: options.timeoutMs,
  });
}
