// src/core/types/index.ts
export type SnapshotSource = 'markup' | 'rendered';

export type SnapshotSlot = 'current' | 'previous';

export interface Snapshot {
  source: SnapshotSource;
  content: string;
  capturedAt: string;  // ISO 8601
}

export type FetchOutcome =
  | { ok: true; content: string; attempts: number }
  | { ok: false; error: string; attempts: number };

export interface ChangeResult {
  source: SnapshotSource;
  changed: boolean;
  firstRun: boolean;
  currentLines: string[];
  previousLines: string[];
  diff: string[];
}

export type MonitorMode = 'NORMAL' | 'DEGRADED';

/** Episode as returned by the podcast host's episode listing */
export interface Episode {
  episode_id: string;
  episode_nr?: number;
  title: string;
  publish_date: string;
  description?: string;
  enclosure_url?: string;
}

export type BoostAction =
  | { kind: 'no_episode' }
  | { kind: 'skipped'; reason: string; episode: Episode }
  | { kind: 'unchanged'; episode: Episode; donations: number; publishDate: string }
  | { kind: 'published'; episode: Episode; donations: number }
  | { kind: 'rescheduled'; episode: Episode; donations: number; publishDate: string; goalReached: boolean }
  | { kind: 'failed'; error: string; episode?: Episode };
