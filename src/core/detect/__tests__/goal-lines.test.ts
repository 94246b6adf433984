// src/core/detect/__tests__/goal-lines.test.ts
import { describe, it, expect } from '@jest/globals';
import { extractGoalLines, snapshotToText } from '../goal-lines.js';

describe('extractGoalLines', () => {
  it('keeps keyword lines, normalised, deduplicated and sorted', () => {
    const text = [
      'Welcome to our page',
      '  Raised:    12,000   sats ',
      'Funding progress 40%',
      'Raised: 12,000 sats',
      'Contact us',
    ].join('\n');

    expect(extractGoalLines(text)).toEqual(['Funding progress 40%', 'Raised: 12,000 sats']);
  });

  it('matches keywords case-insensitively', () => {
    expect(extractGoalLines('GOAL REACHED\nnothing here')).toEqual(['GOAL REACHED']);
  });

  it('strips the final goal in plain and grouped form', () => {
    const text = ['Goal: 2100000 sats', 'Target 2,100,000 sats', 'Raised 21000000 sats'].join('\n');

    expect(extractGoalLines(text, { finalGoal: 2100000 })).toEqual(['Goal: sats', 'Raised 21000000 sats', 'Target sats']);
  });

  it('keeps the keyword when the final goal is removed', () => {
    expect(extractGoalLines('2,100,000 sats\n', { finalGoal: 2100000 })).toEqual(['sats']);
  });

  it('caps the number of lines', () => {
    const text = Array.from({ length: 60 }, (_, i) => `goal line ${String(i).padStart(2, '0')}`).join('\n');

    const lines = extractGoalLines(text);

    expect(lines).toHaveLength(50);
    expect(lines[49]).toBe('goal line 49');
  });

  it('returns an empty list when nothing matches', () => {
    expect(extractGoalLines('Hello\nWorld')).toEqual([]);
  });
});

describe('snapshotToText', () => {
  it('flattens markup snapshots', () => {
    const text = snapshotToText({ source: 'markup', content: '<body><div>Goal: 50%</div><script>var progress = 1;</script></body>' });

    expect(text.trim()).toBe('Goal: 50%');
  });

  it('passes rendered snapshots through', () => {
    expect(snapshotToText({ source: 'rendered', content: '<b>Goal</b>' })).toBe('<b>Goal</b>');
  });
});
