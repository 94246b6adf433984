// src/core/process/__tests__/run-with-timeout.test.ts
import { describe, it, expect } from '@jest/globals';
import { BoostError } from '../../errors.js';
import { runWithTimeout } from '../run-with-timeout.js';

const node = process.execPath;

describe('runWithTimeout', () => {
  it('reports the exit code of a child that finishes on its own', async () => {
    const result = await runWithTimeout(node, ['-e', 'process.exit(3)'], { timeoutMs: 5000, pollMs: 50 });

    expect(result.status).toBe(3);
    expect(result.timedOut).toBe(false);
  });

  it('captures stdout and stderr line by line', async () => {
    const lines: Array<[string, string]> = [];
    const result = await runWithTimeout(
      node,
      ['-e', 'console.log("one"); console.log("two"); console.error("oops")'],
      { timeoutMs: 5000, pollMs: 50, onLine: (line, stream) => lines.push([stream, line]) }
    );

    expect(result.status).toBe(0);
    expect(result.output).toEqual(expect.arrayContaining(['one', 'two', 'oops']));
    expect(lines.filter(([stream]) => stream === 'stdout').map(([, line]) => line)).toEqual(['one', 'two']);
    expect(lines.filter(([stream]) => stream === 'stderr').map(([, line]) => line)).toEqual(['oops']);
  });

  it('terminates a never-ending child and reports 124', async () => {
    const started = Date.now();
    const result = await runWithTimeout(node, ['-e', 'setInterval(() => {}, 1000)'], {
      timeoutMs: 300,
      graceMs: 200,
      pollMs: 50,
    });

    expect(result.status).toBe(124);
    expect(result.timedOut).toBe(true);
    expect(Date.now() - started).toBeLessThan(5000);
  });

  it('kills a child that ignores SIGTERM after the grace period', async () => {
    const result = await runWithTimeout(
      node,
      ['-e', 'process.on("SIGTERM", () => {}); console.log("ready"); setInterval(() => {}, 1000)'],
      { timeoutMs: 1500, graceMs: 200, pollMs: 50 }
    );

    expect(result.status).toBe(124);
    expect(result.timedOut).toBe(true);
    expect(result.output).toEqual(['ready']);
    expect(result.durationMs).toBeGreaterThanOrEqual(1700);
  });

  it('maps a signal death to 128 + signal number', async () => {
    const result = await runWithTimeout(node, ['-e', 'process.kill(process.pid, "SIGKILL")'], {
      timeoutMs: 5000,
      pollMs: 50,
    });

    expect(result.status).toBe(137);
    expect(result.timedOut).toBe(false);
  });

  it('rejects when the command cannot be started', async () => {
    await expect(runWithTimeout('/nonexistent/generator', [], { timeoutMs: 1000 })).rejects.toBeInstanceOf(BoostError);
  });
});
