import { describe, it, expect, vi, afterEach } from 'vitest';
import { isUniqueViolation, rollbackSafely } from '../pool.js';
import { logger } from '../../logger.js';

describe('rollbackSafely', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should issue ROLLBACK on the client', async () => {
    const client = { query: vi.fn().mockResolvedValue(undefined) };

    await rollbackSafely(client);

    expect(client.query).toHaveBeenCalledWith('ROLLBACK');
  });

  it('should log a failing ROLLBACK and keep the original error', async () => {
    const rollbackError = new Error('connection lost');
    const client = { query: vi.fn().mockRejectedValue(rollbackError) };
    const errorSpy = vi.spyOn(logger, 'error');

    const run = async () => {
      try {
        throw new Error('insert failed');
      } catch (error) {
        await rollbackSafely(client);
        throw error;
      }
    };

    await expect(run()).rejects.toThrow('insert failed');
    expect(errorSpy).toHaveBeenCalledWith({ err: rollbackError }, 'Transaction rollback failed');
  });
});

describe('isUniqueViolation', () => {
  it('should recognise Postgres error 23505', () => {
    expect(isUniqueViolation({ code: '23505' })).toBe(true);
    expect(isUniqueViolation({ code: '23503' })).toBe(false);
    expect(isUniqueViolation(new Error('boom'))).toBe(false);
    expect(isUniqueViolation(null)).toBe(false);
  });
});
