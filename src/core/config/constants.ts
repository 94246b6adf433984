// src/core/config/constants.ts
export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const MARKUP_REQUEST_TIMEOUT = 45000;
export const API_REQUEST_TIMEOUT = 20000;

export const DEFAULT_CHECK_INTERVAL_SECONDS = 30;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_RETRY_DELAY_SECONDS = 10;
export const DEFAULT_SCRAPER_TIMEOUT_SECONDS = 120;
export const DEFAULT_EPISODE_TIMEOUT_SECONDS = 3600;

export const RETRY_LIMITS = { min: 1, max: 10 } as const;
export const SCRAPER_TIMEOUT_LIMITS = { min: 30, max: 600 } as const;

export const MAX_BROWSER_FAILURES = 3;
export const MAX_GOAL_LINES = 50;
export const MAX_DIFF_LINES = 10;

// Exit status reported for a child killed after its deadline, as coreutils timeout does
export const TIMEOUT_EXIT_CODE = 124;
export const KILL_GRACE_MS = 2000;
export const LIVENESS_POLL_MS = 1000;

export const GOAL_LINE_PATTERN = /goal|target|raised|funded|bitcoin|btc|sats|progress|funding|campaign/i;
export const RENDERED_LINE_PATTERN = /goal|target|raised|funded|%|bitcoin|btc|sats|progress|funding|campaign/i;
export const GOAL_REACHED_PATTERN = /100%|completed|abgeschlossen|reached|achieved|goal.*reached|target.*met/i;
export const NUMERIC_AMOUNT_PATTERN = /\d+(?:,\d{3})*(?:\.\d+)?\s*(?:%|btc|sats|bitcoin|\$|€|USD)/gi;

export const GOAL_ELEMENT_HINTS = ['goal', 'progress', 'fund', 'target', 'amount', 'raised', 'percent', 'campaign'] as const;
export const STRIPPED_ELEMENTS = 'script, style, noscript, iframe, embed, object';

export const SATS_PER_BTC = 100_000_000;
export const DISPLAY_TIME_ZONE = 'Europe/Berlin';
