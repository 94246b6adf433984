// src/core/monitor/scheduler.ts
import type { CompanionBotClient } from '../api/companion.js';
import type { PodcastHostClient } from '../api/podhome.js';
import { escapeHtml, type TelegramNotifier } from '../api/telegram.js';
import type { BoostSettings } from '../config/settings.js';
import { isGoalReached, parseDonationTotal } from '../detect/donations.js';
import { describeError } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import { computePublishTime, earliestPublishTime, formatBerlinTime } from '../schedule/publish-time.js';
import type { BoostAction, ChangeResult, Episode } from '../types/index.js';

export type EpisodeHost = Pick<PodcastHostClient, 'getEarliestScheduledEpisode' | 'publishNow' | 'reschedule'>;
export type Notifier = Pick<TelegramNotifier, 'send'>;
export type CompanionBackend = Pick<CompanionBotClient, 'updateDonations' | 'syncEpisodes'>;

export interface BoostSchedulerOptions {
  host: EpisodeHost;
  boost: BoostSettings;
  logger: Logger;
  notifier?: Notifier;
  notificationThreshold?: number;
  companion?: CompanionBackend;
  dryRun?: boolean;
  now?: () => Date;
}

/**
 * Turns a detected change on the campaign page into a schedule update for the next
 * episode, then tells the chat and the companion bot about it.
 */
export class BoostScheduler {
  private now: () => Date;

  constructor(private options: BoostSchedulerOptions) {
    this.now = options.now ?? (() => new Date());
  }

  async handleChange(change: ChangeResult): Promise<BoostAction> {
    const { logger } = this.options;

    let episode: Episode | undefined;
    try {
      episode = await this.options.host.getEarliestScheduledEpisode();
    } catch (error) {
      logger.error(`Could not load episodes: ${describeError(error)}`);
      return { kind: 'failed', error: describeError(error) };
    }

    if (!episode) {
      logger.warn('No scheduled episode found, nothing to boost');
      return { kind: 'no_episode' };
    }

    logger.info(`Episode: ${episode.title} (${episode.episode_id}), scheduled for ${episode.publish_date}`);

    try {
      if (isGoalReached(change.currentLines)) {
        return await this.handleGoalReached(episode);
      }
      return await this.handleDonations(episode, change);
    } catch (error) {
      logger.error(`Schedule update failed for ${episode.episode_id}: ${describeError(error)}`);
      return { kind: 'failed', error: describeError(error), episode };
    }
  }

  private async handleGoalReached(episode: Episode): Promise<BoostAction> {
    const { boost, logger } = this.options;
    const earliest = earliestPublishTime(episode.publish_date, boost);
    logger.info(`Funding goal reached (${boost.finalGoal} sats)`);

    let action: BoostAction;
    let outcome: string;
    if (this.now().getTime() > Date.parse(earliest)) {
      await this.mutate(`publish ${episode.episode_id} now`, () => this.options.host.publishNow(episode.episode_id));
      action = { kind: 'published', episode, donations: boost.finalGoal };
      outcome = 'Episode has been published!';
    } else {
      await this.mutate(`reschedule ${episode.episode_id} to ${earliest}`, () =>
        this.options.host.reschedule(episode.episode_id, earliest)
      );
      action = { kind: 'rescheduled', episode, donations: boost.finalGoal, publishDate: earliest, goalReached: true };
      outcome = `Episode moved to ${formatBerlinTime(earliest)}!`;
    }

    await this.notify([
      '<b>Release boosting update for episode:</b>',
      escapeHtml(episode.title),
      `Donations: ${boost.finalGoal} sats`,
      outcome,
    ]);
    await this.companionCall('update-donations', (c) => c.updateDonations(episode.episode_id, boost.finalGoal));
    await this.companionCall('sync-episodes', (c) => c.syncEpisodes());
    return action;
  }

  private async handleDonations(episode: Episode, change: ChangeResult): Promise<BoostAction> {
    const { boost, logger } = this.options;

    const donations = parseDonationTotal(change.currentLines);
    if (donations === undefined) {
      logger.warn('Changed goal text holds no donation total, schedule left as is');
      return { kind: 'skipped', reason: 'donation total not found', episode };
    }

    const previous = parseDonationTotal(change.previousLines) ?? 0;
    const increase = donations - previous;
    const next = computePublishTime(donations, episode.publish_date, boost);

    logger.info(`Donations: ${donations} sats (${increase >= 0 ? '+' : ''}${increase}), remaining ${boost.finalGoal - donations} sats`);
    logger.info(
      `Time reduction: ${next.reduction.minutes} minutes${next.reduction.capped ? ' (maximum)' : ''}${next.clampedToEarliest ? ', earliest time reached' : ''}`
    );

    if (next.changed) {
      await this.mutate(`reschedule ${episode.episode_id} to ${next.publishDate}`, () =>
        this.options.host.reschedule(episode.episode_id, next.publishDate)
      );
    } else {
      logger.info(`Publish time unchanged (${episode.publish_date})`);
    }

    if (next.changed && increase >= (this.options.notificationThreshold ?? 0)) {
      await this.notify([
        '<b>Release boosting update for episode:</b>',
        escapeHtml(episode.title),
        `Donations: ${donations} sats`,
        `Remaining to goal: ${Math.max(boost.finalGoal - donations, 0)} sats`,
        `Episode moved to ${formatBerlinTime(next.publishDate)}!`,
      ]);
    }

    if (increase > 0) {
      await this.companionCall('update-donations', (c) => c.updateDonations(episode.episode_id, donations));
    }
    if (next.changed) {
      await this.companionCall('sync-episodes', (c) => c.syncEpisodes());
    }

    return next.changed
      ? { kind: 'rescheduled', episode, donations, publishDate: next.publishDate, goalReached: false }
      : { kind: 'unchanged', episode, donations, publishDate: episode.publish_date };
  }

  /** Host mutations: skipped in dry-run, errors propagate. */
  private async mutate(description: string, call: () => Promise<void>): Promise<void> {
    if (this.options.dryRun) {
      this.options.logger.info(`[dry-run] Would ${description}`);
      return;
    }
    await call();
    this.options.logger.info(`Done: ${description}`);
  }

  private async notify(lines: string[]): Promise<void> {
    const { notifier, logger } = this.options;
    if (!notifier) return;
    if (this.options.dryRun) {
      logger.info('[dry-run] Would send Telegram message');
      return;
    }
    try {
      await notifier.send(lines.join('\n'));
      logger.debug('Telegram message sent');
    } catch (error) {
      logger.warn(`Telegram message failed: ${describeError(error)}`);
    }
  }

  private async companionCall(name: string, call: (companion: CompanionBackend) => Promise<void>): Promise<void> {
    const { companion, logger } = this.options;
    if (!companion) return;
    if (this.options.dryRun) {
      logger.info(`[dry-run] Would call companion ${name}`);
      return;
    }
    try {
      await call(companion);
      logger.debug(`Companion ${name} done`);
    } catch (error) {
      logger.warn(`Companion ${name} failed: ${describeError(error)}`);
    }
  }
}
