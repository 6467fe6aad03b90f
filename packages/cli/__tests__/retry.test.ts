import { DataValidationError } from '@vecsync/core';
import { withRetry } from '../src/retry';

describe('withRetry', () => {
  it('retries transport failures until one succeeds', async () => {
    const fn = jest.fn()
      .mockRejectedValueOnce(new Error('ECONNRESET'))
      .mockResolvedValueOnce('ok');
    const onRetry = jest.fn();

    await expect(withRetry(fn, { retries: 2, baseDelayMs: 1, onRetry })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledWith(1, new Error('ECONNRESET'));
  });

  it('gives up after the configured retries', async () => {
    const fn = jest.fn().mockRejectedValue(new Error('down'));
    await expect(withRetry(fn, { retries: 2, baseDelayMs: 1 })).rejects.toThrow('down');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('never retries validation errors', async () => {
    const fn = jest.fn().mockRejectedValue(new DataValidationError('Primary keys [id] missing in input rows'));
    await expect(withRetry(fn, { retries: 5, baseDelayMs: 1 })).rejects.toThrow(DataValidationError);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
