// src/core/detect/__tests__/donations.test.ts
import { describe, it, expect } from '@jest/globals';
import { isGoalReached, parseDonationTotal } from '../donations.js';

describe('isGoalReached', () => {
  it.each([
    [['Goal: 100%']],
    [['Campaign completed']],
    [['Ziel abgeschlossen']],
    [['Funding goal was reached today']],
    [['target met']],
  ])('recognises %j', (lines) => {
    expect(isGoalReached(lines)).toBe(true);
  });

  it('treats an empty line set as reached', () => {
    expect(isGoalReached([])).toBe(true);
  });

  it('is false while the campaign is running', () => {
    expect(isGoalReached(['Goal: 45%', 'Raised 945,000 sats'])).toBe(false);
  });
});

describe('parseDonationTotal', () => {
  it('reads a sats amount with thousands separators', () => {
    expect(parseDonationTotal(['Progress 10%', 'Raised 12,345 sats'])).toBe(12345);
  });

  it('accepts sat and satoshis spellings', () => {
    expect(parseDonationTotal(['1 sat donated'])).toBe(1);
    expect(parseDonationTotal(['Raised 500 satoshis'])).toBe(500);
  });

  it('converts BTC amounts when no sats amount exists', () => {
    expect(parseDonationTotal(['Raised 0.015 BTC'])).toBe(1500000);
  });

  it('prefers sats over BTC', () => {
    expect(parseDonationTotal(['0.5 btc goal', 'raised 2100 sats'])).toBe(2100);
  });

  it('falls back to a bare number', () => {
    expect(parseDonationTotal(['42,000'])).toBe(42000);
  });

  it('returns undefined when no amount can be derived', () => {
    expect(parseDonationTotal(['Goal: 45%'])).toBeUndefined();
    expect(parseDonationTotal([])).toBeUndefined();
  });
});
