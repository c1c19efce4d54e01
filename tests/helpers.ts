import fs from 'fs';
import os from 'os';
import path from 'path';

const dirs: string[] = [];

export function scratchDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'memory-notes-test-'));
  dirs.push(dir);
  return dir;
}

export function cleanupScratchDirs(): void {
  for (const dir of dirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

// 2024-02-29 12:34:56 UTC
export const FIXED_NOW = new Date(Date.UTC(2024, 1, 29, 12, 34, 56));
