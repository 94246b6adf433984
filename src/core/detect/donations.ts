// src/core/detect/donations.ts
import { GOAL_REACHED_PATTERN, SATS_PER_BTC } from '../config/constants.js';

const SATS_AMOUNT = /(\d+(?:,\d{3})*)\s*(?:sats?|satoshis?)\b/i;
const BTC_AMOUNT = /(\d+(?:\.\d+)?)\s*btc\b/i;

/** An empty goal line set counts as reached: the campaign widget is gone. */
export function isGoalReached(lines: string[]): boolean {
  if (lines.length === 0) {
    return true;
  }
  return GOAL_REACHED_PATTERN.test(lines.join('\n'));
}

/**
 * Best-effort satoshi total from goal lines: an explicit sats amount, then a BTC
 * amount, then a text that is nothing but a (comma grouped) number.
 */
export function parseDonationTotal(lines: string[]): number | undefined {
  const text = lines.join('\n');

  const sats = SATS_AMOUNT.exec(text);
  if (sats) {
    return Number.parseInt(sats[1].replace(/,/g, ''), 10);
  }

  const btc = BTC_AMOUNT.exec(text);
  if (btc) {
    return Math.round(Number.parseFloat(btc[1]) * SATS_PER_BTC);
  }

  const bare = text.replace(/,/g, '').replace(/sats/gi, '').replace(/\s+/g, '');
  if (/^\d+$/.test(bare)) {
    return Number.parseInt(bare, 10);
  }

  return undefined;
}
