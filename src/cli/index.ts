#!/usr/bin/env node

import { Command } from 'commander';
import { registerEpisodesCommand } from './commands/episodes.js';
import { registerMonitorCommand } from './commands/monitor.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('boostwatch')
    .description('Release boosting for podcasts: donations move the next episode earlier')
    .version('0.1.0');

  registerMonitorCommand(program);
  registerEpisodesCommand(program);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(argv);
}

if (process.env.NODE_ENV !== 'test') {
  void runCli();
}
