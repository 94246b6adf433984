// src/cli/options.ts
import { InvalidArgumentError } from 'commander';

/** commander argument parser for an integer within [min, max]. */
export function integerInRange(min: number, max: number = Number.MAX_SAFE_INTEGER): (value: string) => number {
  return (value: string) => {
    if (!/^\d+$/.test(value.trim())) {
      throw new InvalidArgumentError('Not a whole number.');
    }
    const parsed = Number.parseInt(value, 10);
    if (parsed < min || parsed > max) {
      throw new InvalidArgumentError(
        max === Number.MAX_SAFE_INTEGER ? `Must be at least ${min}.` : `Must be between ${min} and ${max}.`
      );
    }
    return parsed;
  };
}
