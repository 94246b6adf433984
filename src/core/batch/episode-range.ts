// src/core/batch/episode-range.ts
import { BoostError, ErrorCode } from '../errors.js';

const RANGE = /^(\d+)-(\d+)$/;
const SINGLE = /^\d+$/;

/**
 * Parse an episode selection such as `1-5,10,15-20` into sorted, unique episode numbers.
 */
export function parseEpisodeRange(input: string): number[] {
  const episodes = new Set<number>();
  const parts = input.split(',').map((part) => part.replace(/\s+/g, ''));

  if (parts.every((part) => part.length === 0)) {
    throw new BoostError(ErrorCode.INVALID_INPUT, 'No episode numbers given', false, 'Use e.g. 1-10, 1,3,5 or 1-5,10');
  }

  for (const part of parts) {
    const range = RANGE.exec(part);
    if (range) {
      const start = Number.parseInt(range[1], 10);
      const end = Number.parseInt(range[2], 10);
      if (start > end) {
        throw new BoostError(ErrorCode.INVALID_INPUT, `Invalid range ${part}: start must not exceed end`);
      }
      for (let episode = start; episode <= end; episode++) {
        episodes.add(episode);
      }
    } else if (SINGLE.test(part)) {
      episodes.add(Number.parseInt(part, 10));
    } else {
      throw new BoostError(
        ErrorCode.INVALID_INPUT,
        `Invalid episode format: "${part}"`,
        false,
        'Use e.g. 1-10, 1,3,5 or 1-5,10'
      );
    }
  }

  return Array.from(episodes).sort((a, b) => a - b);
}
