// src/core/monitor/__tests__/index.test.ts
import { describe, it, expect } from '@jest/globals';
import type { MonitorSettings } from '../../config/settings.js';
import { Logger } from '../../logging/logger.js';
import { MonitorDriver, createMonitorDriver } from '../index.js';

const settings: MonitorSettings = {
  pageUrl: 'https://fund.example.com/project',
  checkIntervalMs: 30000,
  maxRetries: 3,
  retryDelayMs: 10000,
  scraperTimeoutMs: 120000,
  useBrowser: false,
  debug: false,
  dryRun: true,
  scratchDir: '/tmp/boostwatch-wiring',
  podcastHost: { apiKey: 'test-secret', episodesUrl: 'https://host.example.com/e', scheduleUrl: 'https://host.example.com/s' },
  boost: { finalGoal: 2100000, satoshisPerMinute: 21, maxReductionHours: 12, earliestTime: 10, startTime: 22 },
  telegram: { botToken: 'test-token', chatId: '1', silent: false, notificationThreshold: 0 },
  companion: { baseUrl: 'https://bot.example.com', webhookToken: 'test-secret' },
};

describe('createMonitorDriver', () => {
  it('builds a driver that starts in NORMAL mode', () => {
    const driver = createMonitorDriver(settings, new Logger());

    expect(driver).toBeInstanceOf(MonitorDriver);
    expect(driver.getMode()).toBe('NORMAL');
    expect(driver.getCycleCount()).toBe(0);
  });

  it('does not launch a browser while wiring', () => {
    const driver = createMonitorDriver({ ...settings, useBrowser: true }, new Logger());

    expect(driver.getMode()).toBe('NORMAL');
  });
});
