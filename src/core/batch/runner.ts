// src/core/batch/runner.ts
import { describeError } from '../errors.js';
import { runWithTimeout, type RunResult } from '../process/run-with-timeout.js';

export interface EpisodeBatchOptions {
  episodes: number[];
  command: string;
  args?: string[];  // placed before the episode number
  timeoutMs: number;
  continueOnError: boolean;
  dryRun?: boolean;
  cwd?: string;
}

export interface BatchSummary {
  total: number;
  success: number;
  failed: number;
  skipped: number;
  duration: number;
  failures: Array<{ episode: number; error: string }>;
}

export type CommandRunner = (command: string, args: string[], options: { timeoutMs: number; cwd?: string }) => Promise<RunResult>;

const defaultRunner: CommandRunner = (command, args, options) =>
  runWithTimeout(command, args, {
    ...options,
    onLine: (line) => console.log(`  ${line}`),
  });

export class EpisodeBatchRunner {
  constructor(private runCommand: CommandRunner = defaultRunner) {}

  async run(options: EpisodeBatchOptions): Promise<BatchSummary> {
    const { episodes, command } = options;
    const args = options.args ?? [];
    const startTime = Date.now();

    if (options.dryRun) {
      console.log('Dry run, would process:');
      episodes.forEach((episode) => {
        console.log(`  Episode ${episode}: ${[command, ...args, String(episode)].join(' ')}`);
      });
      return { total: episodes.length, success: 0, failed: 0, skipped: episodes.length, duration: 0, failures: [] };
    }

    const failures: Array<{ episode: number; error: string }> = [];
    let successCount = 0;

    for (const [index, episode] of episodes.entries()) {
      console.log(`\n[${index + 1}/${episodes.length}] Episode ${episode}`);

      let error: string | undefined;
      try {
        const result = await this.runCommand(command, [...args, String(episode)], {
          timeoutMs: options.timeoutMs,
          cwd: options.cwd,
        });
        if (result.timedOut) {
          error = `timed out after ${Math.round(options.timeoutMs / 1000)}s`;
        } else if (result.status !== 0) {
          error = `exit code ${result.status}`;
        }
      } catch (caught) {
        error = describeError(caught);
      }

      if (error === undefined) {
        successCount++;
        console.log(`✓ Episode ${episode}`);
        continue;
      }

      failures.push({ episode, error });
      console.log(`✗ Episode ${episode} (${error})`);
      if (!options.continueOnError) {
        console.log('Stopping at first failure; use --continue-on-error to keep going.');
        break;
      }
    }

    const processed = successCount + failures.length;
    const summary: BatchSummary = {
      total: episodes.length,
      success: successCount,
      failed: failures.length,
      skipped: episodes.length - processed,
      duration: Date.now() - startTime,
      failures,
    };

    this.printSummary(summary);
    return summary;
  }

  private printSummary(summary: BatchSummary): void {
    console.log('\n' + '━'.repeat(50));
    console.log(
      `Summary: ${summary.success} success, ${summary.skipped} skipped, ${summary.failed} failed, ${(summary.duration / 1000).toFixed(1)}s`
    );

    if (summary.failures.length > 0) {
      console.log('\nFailed episodes:');
      summary.failures.forEach(({ episode, error }) => {
        console.log(`  - ${episode}: ${error}`);
      });
    }
  }
}
