// src/core/monitor/snapshot-store.ts
import { copyFile, mkdir, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { SnapshotSlot, SnapshotSource } from '../types/index.js';

const FILE_NAMES: Record<SnapshotSource, Record<SnapshotSlot, string>> = {
  markup: { current: 'current.html', previous: 'previous.html' },
  rendered: { current: 'current_js.txt', previous: 'previous_js.txt' },
};

function isMissing(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/** The current/previous snapshot pair per source, kept in the scratch directory. */
export class SnapshotStore {
  constructor(private dir: string) {}

  pathFor(source: SnapshotSource, slot: SnapshotSlot): string {
    return path.join(this.dir, FILE_NAMES[source][slot]);
  }

  async init(): Promise<void> {
    await mkdir(this.dir, { recursive: true });
  }

  /** Replace the current snapshot; readers never see a half-written file. */
  async write(source: SnapshotSource, content: string): Promise<void> {
    const target = this.pathFor(source, 'current');
    const temp = `${target}.${process.pid}.tmp`;
    await writeFile(temp, content, 'utf-8');
    await rename(temp, target);
  }

  async read(source: SnapshotSource, slot: SnapshotSlot): Promise<string | undefined> {
    try {
      return await readFile(this.pathFor(source, slot), 'utf-8');
    } catch (error) {
      if (isMissing(error)) return undefined;
      throw error;
    }
  }

  /** Copy current over previous, ready for the next comparison. */
  async rotate(source: SnapshotSource): Promise<void> {
    try {
      await copyFile(this.pathFor(source, 'current'), this.pathFor(source, 'previous'));
    } catch (error) {
      if (!isMissing(error)) throw error;
    }
  }

  /** Remove leftover `*.tmp` files; returns how many were deleted. */
  async cleanupTemp(): Promise<number> {
    let entries: string[];
    try {
      entries = await readdir(this.dir);
    } catch (error) {
      if (isMissing(error)) return 0;
      throw error;
    }

    const temps = entries.filter((name) => name.endsWith('.tmp'));
    await Promise.all(temps.map((name) => rm(path.join(this.dir, name), { force: true })));
    return temps.length;
  }
}
