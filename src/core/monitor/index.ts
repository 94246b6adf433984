// src/core/monitor/index.ts
import { CompanionBotClient } from '../api/companion.js';
import { PodcastHostClient } from '../api/podhome.js';
import { TelegramNotifier } from '../api/telegram.js';
import type { MonitorSettings } from '../config/settings.js';
import { BrowserManager, PageRenderer } from '../fetch/browser.js';
import { MarkupFetcher } from '../fetch/markup.js';
import { RenderedFetcher } from '../fetch/rendered.js';
import type { Logger } from '../logging/logger.js';
import { MonitorDriver } from './driver.js';
import { BoostScheduler } from './scheduler.js';
import { SnapshotStore } from './snapshot-store.js';

export { MonitorDriver } from './driver.js';
export { BoostScheduler } from './scheduler.js';
export { SnapshotStore } from './snapshot-store.js';

/** Wire fetchers, store, scheduler and API clients from settings. */
export function createMonitorDriver(settings: MonitorSettings, logger: Logger): MonitorDriver {
  const markup = new MarkupFetcher({
    maxRetries: settings.maxRetries,
    retryDelayMs: settings.retryDelayMs,
    logger,
  });

  const rendered = settings.useBrowser
    ? new RenderedFetcher(new PageRenderer(new BrowserManager(logger), logger), {
        maxRetries: settings.maxRetries,
        retryDelayMs: settings.retryDelayMs,
        timeoutMs: settings.scraperTimeoutMs,
        logger,
      })
    : undefined;

  const scheduler = new BoostScheduler({
    host: new PodcastHostClient(settings.podcastHost),
    boost: settings.boost,
    logger,
    notifier: settings.telegram ? new TelegramNotifier(settings.telegram) : undefined,
    notificationThreshold: settings.telegram?.notificationThreshold,
    companion: settings.companion ? new CompanionBotClient(settings.companion) : undefined,
    dryRun: settings.dryRun,
  });

  return new MonitorDriver({
    pageUrl: settings.pageUrl,
    checkIntervalMs: settings.checkIntervalMs,
    finalGoal: settings.boost.finalGoal,
    store: new SnapshotStore(settings.scratchDir),
    markup,
    rendered,
    scheduler,
    logger,
  });
}
