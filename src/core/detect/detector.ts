// src/core/detect/detector.ts
import { diffArrays } from 'diff';
import { MAX_DIFF_LINES } from '../config/constants.js';
import type { ChangeResult, SnapshotSource } from '../types/index.js';
import { extractGoalLines, snapshotToText, type GoalLineOptions } from './goal-lines.js';

export interface CompareOptions extends GoalLineOptions {
  maxDiffLines?: number;
}

/** Unified-style `+`/`-` lines between two goal line sets, truncated. */
export function diffGoalLines(previous: string[], current: string[], limit: number = MAX_DIFF_LINES): string[] {
  const lines: string[] = [];
  for (const part of diffArrays(previous, current)) {
    if (!part.added && !part.removed) continue;
    const marker = part.added ? '+' : '-';
    for (const value of part.value) {
      lines.push(`${marker} ${value}`);
    }
  }
  return lines.slice(0, limit);
}

export function compareSnapshots(
  source: SnapshotSource,
  current: string,
  previous: string | undefined,
  options: CompareOptions = {}
): ChangeResult {
  const currentLines = extractGoalLines(snapshotToText({ source, content: current }), options);

  if (previous === undefined) {
    return { source, changed: false, firstRun: true, currentLines, previousLines: [], diff: [] };
  }

  const previousLines = extractGoalLines(snapshotToText({ source, content: previous }), options);
  const changed = currentLines.join('\n') !== previousLines.join('\n');

  return {
    source,
    changed,
    firstRun: false,
    currentLines,
    previousLines,
    diff: changed ? diffGoalLines(previousLines, currentLines, options.maxDiffLines) : [],
  };
}
