import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { Command } from 'commander';
import { mkdtempSync, rmSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { buildProgram, runCli } from '../index.js';
import { EpisodeBatchRunner, type BatchSummary } from '../../core/batch/runner.js';
import { createMonitorDriver, type MonitorDriver } from '../../core/monitor/index.js';

jest.mock('../../core/batch/runner.js');
jest.mock('../../core/monitor/index.js');

const MONITOR_ENV = {
  BOOST_PAGE_URL: 'https://fund.example.com/project',
  PODHOME_API_KEY: 'test-secret',
  PODHOME_SCHEDULE_URL: 'https://host.example.com/schedule',
  FINAL_GOAL: '2100000',
};

const summary = (failed: number): BatchSummary => ({
  total: 2,
  success: 2 - failed,
  failed,
  skipped: 0,
  duration: 1,
  failures: [],
});

describe('CLI Integration Tests', () => {
  let exitSpy: jest.SpiedFunction<typeof process.exit>;
  let errorSpy: jest.SpiedFunction<typeof console.error>;
  let logSpy: jest.SpiedFunction<typeof console.log>;

  beforeEach(() => {
    jest.clearAllMocks();
    exitSpy = jest.spyOn(process, 'exit').mockImplementation((() => undefined) as never);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should list both commands in help', () => {
    const help = buildProgram().helpInformation();
    expect(help).toContain('monitor');
    expect(help).toContain('episodes');
  });

  it('runs parseAsync via runCli with provided argv', async () => {
    const parseSpy = jest.spyOn(Command.prototype, 'parseAsync').mockResolvedValue(new Command());

    await runCli(['node', 'boostwatch', '--help']);

    expect(parseSpy).toHaveBeenCalledWith(['node', 'boostwatch', '--help']);
    parseSpy.mockRestore();
  });

  it('auto-runs when NODE_ENV is not test', async () => {
    const originalEnv = process.env.NODE_ENV;
    const originalArgv = process.argv;
    const writeSpy = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    process.env.NODE_ENV = 'production';
    process.argv = ['node', 'boostwatch', '--help'];

    try {
      await jest.isolateModulesAsync(async () => {
        await import('../index.js');
      });
      expect(exitSpy).toHaveBeenCalled();
    } finally {
      process.env.NODE_ENV = originalEnv;
      process.argv = originalArgv;
      writeSpy.mockRestore();
    }
  });

  describe('episodes', () => {
    const run = () => jest.mocked(EpisodeBatchRunner.prototype.run);

    it('runs the batch for the parsed range', async () => {
      run().mockResolvedValue(summary(0));

      await runCli(['node', 'boostwatch', 'episodes', '3-4', '--command', './generate.sh', '--timeout', '90', '--yes']);

      expect(logSpy).toHaveBeenCalledWith('Episodes (2): 3, 4');
      expect(run()).toHaveBeenCalledWith({
        episodes: [3, 4],
        command: './generate.sh',
        timeoutMs: 90000,
        continueOnError: false,
        dryRun: false,
      });
      expect(exitSpy).not.toHaveBeenCalled();
    });

    it('passes dry-run and continue-on-error through', async () => {
      run().mockResolvedValue(summary(0));

      await runCli(['node', 'boostwatch', 'episodes', '1', '--command', 'gen', '--dry-run', '--continue-on-error']);

      expect(run().mock.calls[0][0]).toMatchObject({ dryRun: true, continueOnError: true });
    });

    it('exits with 1 when an episode failed', async () => {
      run().mockResolvedValue(summary(1));

      await runCli(['node', 'boostwatch', 'episodes', '1,2', '--command', 'gen', '--yes']);

      expect(exitSpy).toHaveBeenCalledWith(1);
    });

    it('rejects a malformed range', async () => {
      await runCli(['node', 'boostwatch', 'episodes', '5-3', '--command', 'gen', '--yes']);

      expect(errorSpy).toHaveBeenCalledWith('Error:', 'Invalid range 5-3: start must not exceed end');
      expect(exitSpy).toHaveBeenCalledWith(1);
      expect(run()).not.toHaveBeenCalled();
    });

    it('requires a generator command', async () => {
      const original = process.env.EPISODE_GENERATOR_COMMAND;
      delete process.env.EPISODE_GENERATOR_COMMAND;

      try {
        await runCli(['node', 'boostwatch', 'episodes', '1-2', '--yes']);
      } finally {
        if (original !== undefined) process.env.EPISODE_GENERATOR_COMMAND = original;
      }

      expect(errorSpy).toHaveBeenCalledWith('Error: No generator command (pass --command or set EPISODE_GENERATOR_COMMAND)');
      expect(exitSpy).toHaveBeenCalledWith(1);
      expect(run()).not.toHaveBeenCalled();
    });
  });

  describe('monitor', () => {
    let scratchDir: string;
    let saved: Record<string, string | undefined>;
    let driver: { run: jest.Mock<MonitorDriver['run']>; shutdown: jest.Mock<MonitorDriver['shutdown']> };

    beforeEach(() => {
      scratchDir = mkdtempSync(path.join(os.tmpdir(), 'boostwatch-cli-'));
      const env: Record<string, string> = { ...MONITOR_ENV, SCRATCH_DIR: scratchDir };
      saved = {};
      for (const [key, value] of Object.entries(env)) {
        saved[key] = process.env[key];
        process.env[key] = value;
      }
      driver = {
        run: jest.fn<MonitorDriver['run']>().mockResolvedValue(undefined),
        shutdown: jest.fn<MonitorDriver['shutdown']>().mockResolvedValue(undefined),
      };
      jest.mocked(createMonitorDriver).mockReturnValue(driver as unknown as MonitorDriver);
    });

    afterEach(() => {
      for (const [key, value] of Object.entries(saved)) {
        if (value === undefined) delete process.env[key];
        else process.env[key] = value;
      }
      rmSync(scratchDir, { recursive: true, force: true });
    });

    it('builds the driver from environment and flags, runs once and shuts down', async () => {
      await runCli(['node', 'boostwatch', 'monitor', '--once', '--no-js', '--dry-run', '--retries', '5']);

      expect(createMonitorDriver).toHaveBeenCalledTimes(1);
      expect(jest.mocked(createMonitorDriver).mock.calls[0][0]).toMatchObject({
        pageUrl: 'https://fund.example.com/project',
        useBrowser: false,
        dryRun: true,
        maxRetries: 5,
        scratchDir,
        boost: { finalGoal: 2100000, satoshisPerMinute: 21, earliestTime: 10, startTime: 22 },
      });
      expect(driver.run).toHaveBeenCalledWith(expect.any(AbortSignal), true);
      expect(driver.shutdown).toHaveBeenCalledTimes(1);
      expect(exitSpy).not.toHaveBeenCalled();
    });

    it('shuts down and sets the exit code when the loop fails', async () => {
      const originalExitCode = process.exitCode;
      driver.run.mockRejectedValue(new Error('disk full'));

      try {
        await runCli(['node', 'boostwatch', 'monitor', '--once']);
        expect(process.exitCode).toBe(1);
      } finally {
        process.exitCode = originalExitCode;
      }

      expect(driver.shutdown).toHaveBeenCalledTimes(1);
    });

    it('exits with 1 on invalid configuration', async () => {
      delete process.env.PODHOME_API_KEY;

      await runCli(['node', 'boostwatch', 'monitor', '--once']);

      expect(errorSpy.mock.calls[0][0]).toBe('Error:');
      expect(String(errorSpy.mock.calls[0][1])).toContain('PODHOME_API_KEY');
      expect(exitSpy).toHaveBeenCalledWith(1);
      expect(createMonitorDriver).not.toHaveBeenCalled();
    });
  });
});
