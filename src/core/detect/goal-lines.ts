// src/core/detect/goal-lines.ts
import { GOAL_LINE_PATTERN, MAX_GOAL_LINES } from '../config/constants.js';
import { htmlToText } from '../fetch/rendered-text.js';
import type { Snapshot } from '../types/index.js';

export interface GoalLineOptions {
  finalGoal?: number;  // campaign-wide constant that appears on every page version
  maxLines?: number;
}

/** Rendered snapshots already hold goal text; markup snapshots are flattened first. */
export function snapshotToText(snapshot: Pick<Snapshot, 'source' | 'content'>): string {
  return snapshot.source === 'markup' ? htmlToText(snapshot.content) : snapshot.content;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function finalGoalPattern(finalGoal: number): RegExp {
  const plain = String(finalGoal);
  const grouped = finalGoal.toLocaleString('en-US');
  const forms = Array.from(new Set([grouped, plain])).map(escapeRegExp);
  return new RegExp(`(?<![\\d,.])(?:${forms.join('|')})(?![\\d]|[,.]\\d)`, 'g');
}

/**
 * Keep the lines that talk about funding progress, normalised so that layout-only
 * edits (whitespace, ordering, duplicates) never register as a change.
 */
export function extractGoalLines(text: string, options: GoalLineOptions = {}): string[] {
  const goal = options.finalGoal !== undefined ? finalGoalPattern(options.finalGoal) : undefined;
  const lines = new Set<string>();

  for (const raw of text.split(/\r?\n/)) {
    if (!GOAL_LINE_PATTERN.test(raw)) continue;

    let line = raw.replace(/\s+/g, ' ').trim();
    if (goal) {
      line = line.replace(goal, '').replace(/\s+/g, ' ').trim();
    }
    if (line.length > 0) {
      lines.add(line);
    }
  }

  return Array.from(lines).sort().slice(0, options.maxLines ?? MAX_GOAL_LINES);
}
