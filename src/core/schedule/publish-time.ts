// src/core/schedule/publish-time.ts
import type { BoostSettings } from '../config/settings.js';
import { DISPLAY_TIME_ZONE } from '../config/constants.js';
import { BoostError, ErrorCode } from '../errors.js';

const MS_PER_MINUTE = 60_000;

export type ScheduleSettings = Pick<
  BoostSettings,
  'satoshisPerMinute' | 'maxReductionHours' | 'earliestTime' | 'startTime'
>;

export interface Reduction {
  minutes: number;
  capped: boolean;
}

export interface PublishTime {
  publishDate: string;   // YYYY-MM-DDTHH:MM:00Z
  changed: boolean;      // differs from the episode's current publish date
  reduction: Reduction;
  clampedToEarliest: boolean;
}

export function computeReduction(donations: number, settings: ScheduleSettings): Reduction {
  const maxMinutes = settings.maxReductionHours * 60;
  const minutes = Math.floor(Math.max(donations, 0) / settings.satoshisPerMinute);
  return minutes > maxMinutes ? { minutes: maxMinutes, capped: true } : { minutes, capped: false };
}

const ZONELESS_DATE_TIME = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)$/;

/** Host dates without a zone are UTC, never local time. */
function parsePublishDate(value: string): Date {
  const trimmed = value.trim();
  const zoneless = ZONELESS_DATE_TIME.exec(trimmed);
  const date = new Date(zoneless ? `${zoneless[1]}T${zoneless[2]}Z` : trimmed);
  if (Number.isNaN(date.getTime())) {
    throw new BoostError(ErrorCode.INVALID_INPUT, `Invalid publish date: ${value}`, false, undefined, { value });
  }
  return date;
}

function utcMidnight(date: Date): number {
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

function toPublishIso(ms: number): string {
  return new Date(ms).toISOString().slice(0, 16) + ':00Z';
}

function sameMinute(a: Date, b: Date): boolean {
  return Math.floor(a.getTime() / MS_PER_MINUTE) === Math.floor(b.getTime() / MS_PER_MINUTE);
}

/**
 * Move the publish time of day from `startTime` towards `earliestTime` by the donation
 * reduction, on the calendar date (UTC) the episode is currently scheduled for.
 * Times past midnight roll over to the adjacent day.
 */
export function computePublishTime(
  donations: number,
  currentPublishDate: string,
  settings: ScheduleSettings
): PublishTime {
  const current = parsePublishDate(currentPublishDate);
  const reduction = computeReduction(donations, settings);

  const earliestMinutes = Math.round(settings.earliestTime * 60);
  let totalMinutes = Math.round(settings.startTime * 60) - reduction.minutes;
  const clampedToEarliest = totalMinutes < earliestMinutes;
  if (clampedToEarliest) {
    totalMinutes = earliestMinutes;
  }

  // Minutes outside 0..1439 land on the previous or next day
  const ms = utcMidnight(current) + totalMinutes * MS_PER_MINUTE;

  return {
    publishDate: toPublishIso(ms),
    changed: !sameMinute(new Date(ms), current),
    reduction,
    clampedToEarliest,
  };
}

export function earliestPublishTime(currentPublishDate: string, settings: Pick<BoostSettings, 'earliestTime'>): string {
  const current = parsePublishDate(currentPublishDate);
  return toPublishIso(utcMidnight(current) + Math.round(settings.earliestTime * 60) * MS_PER_MINUTE);
}

const berlinFormat = new Intl.DateTimeFormat('en-CA', {
  timeZone: DISPLAY_TIME_ZONE,
  year: 'numeric',
  month: '2-digit',
  day: '2-digit',
  hour: '2-digit',
  minute: '2-digit',
  second: '2-digit',
  hourCycle: 'h23',
});

/** `YYYY-MM-DD HH:MM:SS` wall-clock time in Berlin, for notifications. */
export function formatBerlinTime(iso: string): string {
  const parts = new Map(berlinFormat.formatToParts(parsePublishDate(iso)).map((p) => [p.type, p.value]));
  return `${parts.get('year')}-${parts.get('month')}-${parts.get('day')} ${parts.get('hour')}:${parts.get('minute')}:${parts.get('second')}`;
}
