import { describe, it, expect, beforeEach, vi } from 'vitest';
import { HttpRetryPolicy } from '../../../src/application/policies/http-retry.policy';
import {
  JobAbortedError,
  MalformedResponseError,
  RawHttpError,
  StructuredApiError,
  TransportError,
} from '../../../src/domain/errors/scan-client.errors';
import { ProblemDetails } from '../../../src/domain/value-objects/problem-details.vo';
import { RecordingDelayAdapter } from '../../in-memory-adapters';
import { createTestConfig } from '../helpers/test-fixtures';

function apiError(status: number, retryAfterMs?: number): StructuredApiError {
  const problem: ProblemDetails = {
    success: false,
    type: 'about:blank',
    title: 'Error',
    status,
    detail: `HTTP ${status}`,
    code: `E${status}`,
    retryable: status >= 500 || status === 429,
  };
  return new StructuredApiError(problem, retryAfterMs);
}

describe('HttpRetryPolicy', () => {
  let delay: RecordingDelayAdapter;
  let policy: HttpRetryPolicy;

  beforeEach(() => {
    delay = new RecordingDelayAdapter();
    policy = new HttpRetryPolicy(delay, createTestConfig());
  });

  it('returns the first successful result without waiting', async () => {
    const attempt = vi.fn().mockResolvedValue('ok');

    await expect(policy.execute('test', attempt)).resolves.toBe('ok');
    expect(attempt).toHaveBeenCalledTimes(1);
    expect(delay.waits).toEqual([]);
  });

  it('retries 5xx three times with 1s, 2s and 4s backoff', async () => {
    const attempt = vi
      .fn()
      .mockRejectedValueOnce(apiError(500))
      .mockRejectedValueOnce(apiError(500))
      .mockRejectedValueOnce(apiError(500))
      .mockResolvedValueOnce('ok');

    await expect(policy.execute('test', attempt)).resolves.toBe('ok');
    expect(attempt).toHaveBeenCalledTimes(4);
    expect(delay.waits).toEqual([1000, 2000, 4000]);
  });

  it('surfaces the fourth consecutive 5xx', async () => {
    const attempt = vi.fn().mockRejectedValue(apiError(500));

    const error = await policy.execute('test', attempt).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StructuredApiError);
    expect(attempt).toHaveBeenCalledTimes(4);
    expect(delay.waits).toEqual([1000, 2000, 4000]);
  });

  it('retries a transport failure like a 5xx', async () => {
    const attempt = vi
      .fn()
      .mockRejectedValueOnce(new TransportError('socket hang up'))
      .mockResolvedValueOnce('ok');

    await expect(policy.execute('test', attempt)).resolves.toBe('ok');
    expect(delay.waits).toEqual([1000]);
  });

  it('retries a 429 exactly once after the resolved delay', async () => {
    const attempt = vi.fn().mockRejectedValue(apiError(429, 1000));

    await expect(policy.execute('test', attempt)).rejects.toBeInstanceOf(StructuredApiError);
    expect(attempt).toHaveBeenCalledTimes(2);
    expect(delay.waits).toEqual([1000]);
  });

  it('uses the default rate-limit delay when the 429 carries none', async () => {
    const attempt = vi
      .fn()
      .mockRejectedValueOnce(new RawHttpError(429))
      .mockResolvedValueOnce('ok');

    await expect(policy.execute('test', attempt)).resolves.toBe('ok');
    expect(delay.waits).toEqual([2000]);
  });

  it('keeps separate budgets for 429 and 5xx', async () => {
    const attempt = vi
      .fn()
      .mockRejectedValueOnce(apiError(429, 500))
      .mockRejectedValueOnce(apiError(503))
      .mockResolvedValueOnce('ok');

    await expect(policy.execute('test', attempt)).resolves.toBe('ok');
    expect(delay.waits).toEqual([500, 1000]);
  });

  it.each([400, 401, 404, 422])('never retries a %i', async (status) => {
    const attempt = vi.fn().mockRejectedValue(apiError(status));

    await expect(policy.execute('test', attempt)).rejects.toBeInstanceOf(StructuredApiError);
    expect(attempt).toHaveBeenCalledTimes(1);
  });

  it('never retries a malformed response', async () => {
    const attempt = vi.fn().mockRejectedValue(new MalformedResponseError('bad', 202));

    await expect(policy.execute('test', attempt)).rejects.toBeInstanceOf(MalformedResponseError);
    expect(attempt).toHaveBeenCalledTimes(1);
  });

  it('rethrows errors that are not client errors untouched', async () => {
    const bug = new TypeError('boom');

    await expect(policy.execute('test', () => Promise.reject(bug))).rejects.toBe(bug);
  });

  it('stops with JobAbortedError when aborted during a backoff', async () => {
    const controller = new AbortController();
    const attempt = vi.fn().mockImplementation(async () => {
      controller.abort();
      throw apiError(500);
    });

    await expect(policy.execute('test', attempt, controller.signal)).rejects.toBeInstanceOf(
      JobAbortedError,
    );
    expect(attempt).toHaveBeenCalledTimes(1);
  });

  it('honours the configured retry budget', async () => {
    const strict = new HttpRetryPolicy(delay, createTestConfig({ UPLOAD_MAX_SERVER_RETRIES: '1' }));
    const attempt = vi.fn().mockRejectedValue(apiError(502));

    await expect(strict.execute('test', attempt)).rejects.toBeInstanceOf(StructuredApiError);
    expect(attempt).toHaveBeenCalledTimes(2);
  });
});
