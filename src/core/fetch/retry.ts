// src/core/fetch/retry.ts
import { setTimeout as sleep } from 'node:timers/promises';
import { BoostError, ErrorCode, describeError } from '../errors.js';
import type { Logger } from '../logging/logger.js';

export interface RetryOptions {
  attempts: number;
  delayMs: number;
  label: string;
  logger?: Logger;
  signal?: AbortSignal;
}

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: string; attempts: number };

/**
 * Run `task` up to `attempts` times with a fixed delay between attempts.
 * Never throws for task failures; an abort during the delay ends the loop early.
 */
export async function withRetry<T>(
  task: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<RetryResult<T>> {
  const { attempts, delayMs, label, logger, signal } = options;
  let lastError = 'no attempt made';

  for (let attempt = 1; attempt <= attempts; attempt++) {
    if (signal?.aborted) {
      return { ok: false, error: 'aborted', attempts: attempt - 1 };
    }

    try {
      logger?.debug(`${label} attempt ${attempt}/${attempts}`);
      const value = await task(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (error) {
      lastError = describeError(error);
      logger?.warn(`${label} attempt ${attempt}/${attempts} failed: ${lastError}`);
    }

    if (attempt < attempts) {
      logger?.debug(`${label}: waiting ${Math.round(delayMs / 1000)}s before next attempt`);
      try {
        await sleep(delayMs, undefined, signal ? { signal } : undefined);
      } catch {
        return { ok: false, error: 'aborted', attempts: attempt };
      }
    }
  }

  return { ok: false, error: lastError, attempts };
}

/**
 * Race `task` against a deadline and an optional abort signal. When either fires first,
 * `teardown` runs (to release whatever the task holds) and the returned promise rejects
 * with a TIMEOUT or ABORTED error.
 */
export async function withDeadline<T>(
  task: Promise<T>,
  timeoutMs: number,
  teardown?: () => Promise<void> | void,
  signal?: AbortSignal
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const stopped = new Promise<never>((_, reject) => {
    const stop = (code: ErrorCode, message: string, retryable: boolean) => {
      void (async () => {
        let failure = '';
        try {
          await teardown?.();
        } catch (error) {
          failure = ` (teardown failed: ${describeError(error)})`;
        }
        reject(new BoostError(code, `${message}${failure}`, retryable));
      })();
    };

    timer = setTimeout(
      () => stop(ErrorCode.TIMEOUT, `Timed out after ${Math.round(timeoutMs / 1000)}s`, true),
      timeoutMs
    );
    if (signal) {
      onAbort = () => {
        clearTimeout(timer);
        stop(ErrorCode.ABORTED, 'Aborted', false);
      };
      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }
    }
  });

  try {
    return await Promise.race([task, stopped]);
  } finally {
    clearTimeout(timer);
    if (signal && onAbort) {
      signal.removeEventListener('abort', onAbort);
    }
  }
}
