// src/core/fetch/__tests__/retry.test.ts
import { describe, it, expect, jest } from '@jest/globals';
import { BoostError, ErrorCode } from '../../errors.js';
import { withDeadline, withRetry } from '../retry.js';

describe('withRetry', () => {
  it('returns the first successful value', async () => {
    const task = jest.fn(async (attempt: number) => `value-${attempt}`);

    const result = await withRetry(task, { attempts: 3, delayMs: 0, label: 'test' });

    expect(result).toEqual({ ok: true, value: 'value-1', attempts: 1 });
    expect(task).toHaveBeenCalledTimes(1);
  });

  it('retries until an attempt succeeds', async () => {
    let calls = 0;
    const result = await withRetry(
      async () => {
        calls++;
        if (calls < 3) throw new Error(`failure ${calls}`);
        return 'done';
      },
      { attempts: 3, delayMs: 1, label: 'test' }
    );

    expect(result).toEqual({ ok: true, value: 'done', attempts: 3 });
  });

  it('reports the last error after exhausting attempts', async () => {
    let calls = 0;
    const result = await withRetry(
      async () => {
        calls++;
        throw new BoostError(ErrorCode.NETWORK_ERROR, `failure ${calls}`, true, 'try later');
      },
      { attempts: 2, delayMs: 1, label: 'test' }
    );

    expect(result).toEqual({ ok: false, error: 'failure 2 (try later)', attempts: 2 });
  });

  it('stops waiting when the signal aborts', async () => {
    const controller = new AbortController();
    const task = jest.fn(async () => {
      controller.abort();
      throw new Error('fail');
    });

    const result = await withRetry(task, { attempts: 5, delayMs: 60000, label: 'test', signal: controller.signal });

    expect(result).toEqual({ ok: false, error: 'aborted', attempts: 1 });
    expect(task).toHaveBeenCalledTimes(1);
  });
});

describe('withDeadline', () => {
  it('resolves with the task value when it finishes in time', async () => {
    await expect(withDeadline(Promise.resolve(42), 1000)).resolves.toBe(42);
  });

  it('rejects with a timeout and runs the teardown', async () => {
    const teardown = jest.fn(async () => undefined);
    const never = new Promise<string>(() => undefined);

    await expect(withDeadline(never, 20, teardown)).rejects.toMatchObject({
      code: ErrorCode.TIMEOUT,
      message: 'Timed out after 0s',
    });
    expect(teardown).toHaveBeenCalledTimes(1);
  });

  it('mentions a failed teardown in the timeout error', async () => {
    const never = new Promise<string>(() => undefined);

    await expect(
      withDeadline(never, 10, async () => {
        throw new Error('close failed');
      })
    ).rejects.toThrow('Timed out after 0s (teardown failed: close failed)');
  });

  it('rejects with ABORTED and runs the teardown when the signal fires', async () => {
    const teardown = jest.fn(async () => undefined);
    const never = new Promise<string>(() => undefined);
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);

    await expect(withDeadline(never, 60000, teardown, controller.signal)).rejects.toMatchObject({
      code: ErrorCode.ABORTED,
      message: 'Aborted',
      retryable: false,
    });
    expect(teardown).toHaveBeenCalledTimes(1);
  });

  it('rejects at once for a signal that already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(withDeadline(new Promise<string>(() => undefined), 60000, undefined, controller.signal)).rejects.toMatchObject({
      code: ErrorCode.ABORTED,
    });
  });
});
