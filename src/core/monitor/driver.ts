// src/core/monitor/driver.ts
import { setTimeout as sleep } from 'node:timers/promises';
import { MAX_BROWSER_FAILURES } from '../config/constants.js';
import { compareSnapshots } from '../detect/detector.js';
import { describeError } from '../errors.js';
import type { MarkupFetcher } from '../fetch/markup.js';
import type { RenderedFetcher } from '../fetch/rendered.js';
import type { Logger } from '../logging/logger.js';
import type { BoostAction, ChangeResult, MonitorMode, SnapshotSource } from '../types/index.js';
import type { BoostScheduler } from './scheduler.js';
import type { SnapshotStore } from './snapshot-store.js';

export interface MonitorDriverOptions {
  pageUrl: string;
  checkIntervalMs: number;
  finalGoal: number;
  store: SnapshotStore;
  markup: Pick<MarkupFetcher, 'fetch'>;
  rendered?: Pick<RenderedFetcher, 'fetch' | 'close'>;  // absent when browser fetching is off
  scheduler: Pick<BoostScheduler, 'handleChange'>;
  logger: Logger;
}

export interface CycleReport {
  cycle: number;
  mode: MonitorMode;
  changes: ChangeResult[];
  action?: BoostAction;
}

const LABELS: Record<SnapshotSource, string> = { markup: 'HTML', rendered: 'JavaScript' };

export class MonitorDriver {
  private mode: MonitorMode = 'NORMAL';
  private browserFailures = 0;
  private cycles = 0;

  constructor(private options: MonitorDriverOptions) {}

  getMode(): MonitorMode {
    return this.mode;
  }

  getCycleCount(): number {
    return this.cycles;
  }

  async runCycle(signal?: AbortSignal): Promise<CycleReport> {
    const { logger, pageUrl } = this.options;
    this.cycles++;
    logger.debug(`Cycle ${this.cycles} (${this.mode})`);

    const changes: ChangeResult[] = [];

    const markup = await this.options.markup.fetch(pageUrl, signal);
    if (markup.ok) {
      changes.push(await this.checkSource('markup', markup.content));
    } else {
      logger.error(`HTML fetch failed after ${markup.attempts} attempt(s): ${markup.error}`);
    }

    const rendered = this.options.rendered;
    if (rendered && this.mode === 'NORMAL' && !signal?.aborted) {
      const outcome = await rendered.fetch(pageUrl, signal);
      if (outcome.ok) {
        this.browserFailures = 0;
        changes.push(await this.checkSource('rendered', outcome.content));
      } else if (signal?.aborted) {
        logger.debug('JavaScript fetch interrupted by shutdown');
      } else {
        await this.recordBrowserFailure(outcome.error);
      }
    }

    const change = changes.find((c) => c.source === 'rendered' && c.changed) ?? changes.find((c) => c.changed);
    const report: CycleReport = { cycle: this.cycles, mode: this.mode, changes };
    if (change) {
      report.action = await this.options.scheduler.handleChange(change);
      logger.info(`Action: ${report.action.kind}`);
    }
    return report;
  }

  /** Cycle until `signal` aborts; with `once`, a single cycle. */
  async run(signal: AbortSignal, once = false): Promise<void> {
    const { logger, checkIntervalMs } = this.options;
    await this.options.store.init();

    while (!signal.aborted) {
      try {
        await this.runCycle(signal);
      } catch (error) {
        logger.error(`Cycle ${this.cycles} failed: ${describeError(error)}`);
      }

      if (once || signal.aborted) break;

      logger.debug(`Next check in ${Math.round(checkIntervalMs / 1000)}s`);
      try {
        await sleep(checkIntervalMs, undefined, { signal });
      } catch {
        break;
      }
    }
  }

  /** Release the browser and clear half-written snapshots. */
  async shutdown(): Promise<void> {
    const { logger } = this.options;
    try {
      await this.options.rendered?.close();
    } catch (error) {
      logger.warn(`Browser close failed: ${describeError(error)}`);
    }
    const removed = await this.options.store.cleanupTemp();
    if (removed > 0) {
      logger.debug(`Removed ${removed} temporary file(s)`);
    }
    logger.info(`Monitor stopped after ${this.cycles} cycle(s)`);
  }

  private async checkSource(source: SnapshotSource, content: string): Promise<ChangeResult> {
    const { store, logger, finalGoal } = this.options;
    const label = LABELS[source];

    const previous = await store.read(source, 'previous');
    await store.write(source, content);
    const result = compareSnapshots(source, content, previous, { finalGoal });
    await store.rotate(source);

    if (result.firstRun) {
      logger.info(`${label}: first snapshot stored (${result.currentLines.length} goal lines)`);
    } else if (result.changed) {
      logger.info(`${label}: change detected`);
      result.diff.forEach((line) => logger.info(`  ${line}`));
    } else {
      logger.debug(`${label}: no change`);
    }
    return result;
  }

  private async recordBrowserFailure(error: string): Promise<void> {
    const { logger } = this.options;
    this.browserFailures++;
    logger.warn(`JavaScript fetch failed (${this.browserFailures}/${MAX_BROWSER_FAILURES}): ${error}`);

    if (this.browserFailures >= MAX_BROWSER_FAILURES) {
      this.mode = 'DEGRADED';
      logger.warn('Too many browser failures, continuing with HTML checks only');
      try {
        await this.options.rendered?.close();
      } catch (closeError) {
        logger.debug(`Browser close failed: ${describeError(closeError)}`);
      }
    }
  }
}
