// src/cli/commands/monitor.ts
import { Command } from 'commander';
import path from 'node:path';
import { loadEnvironment, loadMonitorSettings, type MonitorSettings } from '../../core/config/settings.js';
import { RETRY_LIMITS, SCRAPER_TIMEOUT_LIMITS } from '../../core/config/constants.js';
import { describeError } from '../../core/errors.js';
import { Logger } from '../../core/logging/logger.js';
import { createMonitorDriver } from '../../core/monitor/index.js';
import { integerInRange } from '../options.js';

export interface MonitorCommandOptions {
  js: boolean;
  debug: boolean;
  retries?: number;
  timeout?: number;
  interval?: number;
  once: boolean;
  dryRun: boolean;
  envFile?: string;
}

/** CLI flags win over the environment. */
export function applyMonitorOverrides(settings: MonitorSettings, options: MonitorCommandOptions): MonitorSettings {
  return {
    ...settings,
    useBrowser: settings.useBrowser && options.js,
    debug: settings.debug || options.debug,
    dryRun: settings.dryRun || options.dryRun,
    maxRetries: options.retries ?? settings.maxRetries,
    scraperTimeoutMs: options.timeout !== undefined ? options.timeout * 1000 : settings.scraperTimeoutMs,
    checkIntervalMs: options.interval !== undefined ? options.interval * 1000 : settings.checkIntervalMs,
  };
}

export function registerMonitorCommand(program: Command): void {
  program
    .command('monitor')
    .description('Watch the crowdfunding page and move the next episode earlier as donations come in')
    .option('--no-js', 'Skip the headless browser check (HTML only)')
    .option('--debug', 'Print debug output', false)
    .option('--retries <n>', `Fetch attempts per source (${RETRY_LIMITS.min}-${RETRY_LIMITS.max})`, integerInRange(RETRY_LIMITS.min, RETRY_LIMITS.max))
    .option(
      '--timeout <seconds>',
      `Browser timeout per attempt (${SCRAPER_TIMEOUT_LIMITS.min}-${SCRAPER_TIMEOUT_LIMITS.max})`,
      integerInRange(SCRAPER_TIMEOUT_LIMITS.min, SCRAPER_TIMEOUT_LIMITS.max)
    )
    .option('--interval <seconds>', 'Seconds between checks', integerInRange(1))
    .option('--once', 'Run a single check and exit', false)
    .option('--dry-run', 'Log schedule changes and notifications instead of sending them', false)
    .option('--env-file <path>', 'Read environment from this file instead of .env')
    .action(async (options: MonitorCommandOptions) => {
      let settings: MonitorSettings;
      try {
        loadEnvironment(options.envFile);
        settings = applyMonitorOverrides(loadMonitorSettings(), options);
      } catch (error) {
        console.error('Error:', describeError(error));
        process.exit(1);
        return;
      }

      const logger = new Logger({ debug: settings.debug, logFile: path.join(settings.scratchDir, 'debug.log') });
      const driver = createMonitorDriver(settings, logger);
      const controller = new AbortController();
      const stop = (signal: NodeJS.Signals) => {
        logger.info(`Received ${signal}, shutting down`);
        controller.abort();
      };
      process.once('SIGINT', stop);
      process.once('SIGTERM', stop);

      logger.info(`Monitoring ${settings.pageUrl} every ${Math.round(settings.checkIntervalMs / 1000)}s`);
      logger.info(`Browser check: ${settings.useBrowser ? 'on' : 'off'}${settings.dryRun ? ', dry run' : ''}`);

      try {
        await driver.run(controller.signal, options.once);
      } catch (error) {
        logger.error(describeError(error));
        process.exitCode = 1;
      } finally {
        process.off('SIGINT', stop);
        process.off('SIGTERM', stop);
        await driver.shutdown();
      }
    });
}
