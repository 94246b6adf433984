// src/cli/commands/episodes.ts
import { Command } from 'commander';
import { createInterface } from 'node:readline/promises';
import { parseEpisodeRange } from '../../core/batch/episode-range.js';
import { EpisodeBatchRunner } from '../../core/batch/runner.js';
import { loadBatchSettings, loadEnvironment } from '../../core/config/settings.js';
import { describeError } from '../../core/errors.js';
import { integerInRange } from '../options.js';

export interface EpisodesCommandOptions {
  dryRun: boolean;
  continueOnError: boolean;
  timeout?: number;
  command?: string;
  yes: boolean;
  envFile?: string;
}

async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(question);
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    rl.close();
  }
}

export function registerEpisodesCommand(program: Command): void {
  program
    .command('episodes <range>')
    .description('Run the episode generator for a range such as 1-10, 1,3,5 or 1-5,10,15-20')
    .option('--dry-run', 'List the commands without running them', false)
    .option('--continue-on-error', 'Keep going after a failed episode', false)
    .option('--timeout <seconds>', 'Time limit per episode', integerInRange(1))
    .option('--command <path>', 'Generator command (default: EPISODE_GENERATOR_COMMAND)')
    .option('-y, --yes', 'Do not ask for confirmation', false)
    .option('--env-file <path>', 'Read environment from this file instead of .env')
    .action(async (range: string, options: EpisodesCommandOptions) => {
      try {
        loadEnvironment(options.envFile);
        const settings = loadBatchSettings();
        const episodes = parseEpisodeRange(range);
        const command = options.command ?? settings.generatorCommand;
        if (!command) {
          console.error('Error: No generator command (pass --command or set EPISODE_GENERATOR_COMMAND)');
          process.exit(1);
          return;
        }

        console.log(`Episodes (${episodes.length}): ${episodes.join(', ')}`);

        if (!options.dryRun && !options.yes && process.stdin.isTTY) {
          if (!(await confirm('Continue? (y/N): '))) {
            console.log('Aborted.');
            return;
          }
        }

        const runner = new EpisodeBatchRunner();
        const summary = await runner.run({
          episodes,
          command,
          timeoutMs: options.timeout !== undefined ? options.timeout * 1000 : settings.episodeTimeoutMs,
          continueOnError: options.continueOnError,
          dryRun: options.dryRun,
        });

        if (summary.failed > 0) {
          process.exit(1);
        }
      } catch (error) {
        console.error('Error:', describeError(error));
        process.exit(1);
      }
    });
}
