// src/core/process/run-with-timeout.ts
import { spawn } from 'node:child_process';
import { constants as osConstants } from 'node:os';
import { createInterface } from 'node:readline';
import { KILL_GRACE_MS, LIVENESS_POLL_MS, TIMEOUT_EXIT_CODE } from '../config/constants.js';
import { BoostError, ErrorCode } from '../errors.js';

export interface RunOptions {
  timeoutMs: number;
  graceMs?: number;
  pollMs?: number;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  onLine?: (line: string, stream: 'stdout' | 'stderr') => void;
}

export interface RunResult {
  status: number;
  timedOut: boolean;
  durationMs: number;
  output: string[];
}

function signalStatus(signal: NodeJS.Signals): number {
  const number = osConstants.signals[signal];
  return typeof number === 'number' ? 128 + number : 1;
}

/**
 * Run a command to completion, terminating it once `timeoutMs` has elapsed.
 * Liveness is checked every `pollMs`; an overdue child gets SIGTERM, then SIGKILL
 * after `graceMs` if it is still there. A timed out run reports status 124.
 */
export function runWithTimeout(command: string, args: string[], options: RunOptions): Promise<RunResult> {
  const graceMs = options.graceMs ?? KILL_GRACE_MS;
  const pollMs = options.pollMs ?? LIVENESS_POLL_MS;

  return new Promise<RunResult>((resolve, reject) => {
    const startedAt = Date.now();
    const output: string[] = [];
    let timedOut = false;
    let killTimer: NodeJS.Timeout | undefined;

    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const capture = (stream: NodeJS.ReadableStream, name: 'stdout' | 'stderr') => {
      createInterface({ input: stream }).on('line', (line) => {
        output.push(line);
        options.onLine?.(line, name);
      });
    };
    capture(child.stdout, 'stdout');
    capture(child.stderr, 'stderr');

    const isAlive = () => child.exitCode === null && child.signalCode === null;

    const poll = setInterval(() => {
      if (timedOut || !isAlive() || Date.now() - startedAt < options.timeoutMs) {
        return;
      }
      timedOut = true;
      child.kill('SIGTERM');
      killTimer = setTimeout(() => {
        if (isAlive()) {
          child.kill('SIGKILL');
        }
      }, graceMs);
    }, pollMs);

    const finish = () => {
      clearInterval(poll);
      if (killTimer) clearTimeout(killTimer);
    };

    child.on('error', (error) => {
      finish();
      reject(
        new BoostError(ErrorCode.INVALID_INPUT, `Failed to start ${command}: ${error.message}`, false, undefined, {
          command,
          args,
        })
      );
    });

    child.on('close', (code, signal) => {
      finish();
      let status: number;
      if (timedOut) {
        status = TIMEOUT_EXIT_CODE;
      } else if (code !== null) {
        status = code;
      } else {
        status = signal ? signalStatus(signal) : 1;
      }
      resolve({ status, timedOut, durationMs: Date.now() - startedAt, output });
    });
  });
}
