import { describe, it, expect, vi } from 'vitest';
import { withRetry, isRetryableError, calculateDelay } from '@warrant-ledger/page-text';
import { AcquisitionError } from '@warrant-ledger/types';

const NO_DELAY = { initialDelayMs: 0, maxDelayMs: 0 };

describe('Retry Logic', () => {
  describe('isRetryableError', () => {
    it('should retry only acquisition errors flagged retryable', () => {
      expect(isRetryableError(new AcquisitionError('doc-a', 'busy'))).toBe(true);
      expect(isRetryableError(new AcquisitionError('doc-a', 'corrupt', { retryable: false }))).toBe(false);
      expect(isRetryableError(new Error('boom'))).toBe(false);
      expect(isRetryableError(null)).toBe(false);
    });
  });

  describe('calculateDelay', () => {
    it('should return initial delay plus up to 30% jitter for first attempt', () => {
      const delay = calculateDelay(1, 1000, 30000, 2);
      expect(delay).toBeGreaterThanOrEqual(1000);
      expect(delay).toBeLessThanOrEqual(1300);
    });

    it('should cap at the maximum delay', () => {
      expect(calculateDelay(10, 1000, 5000, 2)).toBe(5000);
    });
  });

  describe('withRetry', () => {
    it('should return the result of a first successful attempt', async () => {
      const fn = vi.fn(async () => 'ok');
      await expect(withRetry(fn, NO_DELAY)).resolves.toBe('ok');
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should retry a retryable failure and report each retry', async () => {
      const onRetry = vi.fn();
      const fn = vi.fn(async (attempt: number) => {
        if (attempt < 3) throw new AcquisitionError('doc-a', 'engine busy');
        return attempt;
      });

      await expect(withRetry(fn, { ...NO_DELAY, onRetry })).resolves.toBe(3);
      expect(fn).toHaveBeenCalledTimes(3);
      expect(onRetry).toHaveBeenCalledTimes(2);
      expect(onRetry.mock.calls[0]?.[0]).toBe(1);
    });

    it('should not retry a non-retryable failure', async () => {
      const fn = vi.fn(async () => {
        throw new AcquisitionError('doc-a', 'corrupt', { retryable: false });
      });

      await expect(withRetry(fn, NO_DELAY)).rejects.toThrow('corrupt');
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should give up after maxRetries', async () => {
      const fn = vi.fn(async () => {
        throw new AcquisitionError('doc-a', 'engine busy');
      });

      await expect(withRetry(fn, { ...NO_DELAY, maxRetries: 2 })).rejects.toThrow('engine busy');
      expect(fn).toHaveBeenCalledTimes(3);
    });
  });
});
