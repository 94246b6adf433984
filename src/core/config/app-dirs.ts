import os from 'node:os';
import path from 'node:path';

/**
 * Default scratch directory for snapshots, logs and temp files.
 * Nothing in it is versioned; it is safe to wipe between runs.
 */
export function getScratchDir(appName: string): string {
  if (process.platform === 'win32') {
    const base = process.env.LOCALAPPDATA || process.env.TEMP;
    if (base) {
      return path.join(base, appName);
    }
  }

  return path.join(os.tmpdir(), appName);
}
