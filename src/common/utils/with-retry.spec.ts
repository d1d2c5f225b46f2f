import { EngineErrorKind, ExecutionError } from '../errors/engine.errors';
import { withRetry } from './with-retry';

describe('withRetry', () => {
  const options = { label: 'getKline', timeoutMs: 50, retries: 2, delayMs: 0 };

  it('should return the first successful result', async () => {
    const operation = jest.fn().mockResolvedValue('ok');

    await expect(withRetry(operation, options)).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should retry after a failure', async () => {
    const operation = jest.fn().mockRejectedValueOnce(new Error('down')).mockResolvedValueOnce('ok');

    await expect(withRetry(operation, options)).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('should throw a recoverable execution error when attempts run out', async () => {
    const operation = jest.fn().mockRejectedValue(new Error('down'));

    const error = await withRetry(operation, options).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ExecutionError);
    expect(error).toMatchObject({
      kind: EngineErrorKind.EXECUTION_FAILED,
      recoverable: true,
      message: 'getKline: попытки исчерпаны (down)',
    });
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('should make a single attempt without retries', async () => {
    const operation = jest.fn().mockRejectedValue(new Error('down'));

    await expect(withRetry(operation, { ...options, retries: 0 })).rejects.toBeInstanceOf(ExecutionError);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should give up on a call that never answers', async () => {
    const operation = () => new Promise<string>(() => undefined);

    await expect(withRetry(operation, { ...options, timeoutMs: 10, retries: 0 })).rejects.toThrow(
      'getKline: попытки исчерпаны (getKline: превышен таймаут 10 мс)',
    );
  });
});
