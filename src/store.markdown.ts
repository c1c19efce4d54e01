import fs from 'fs';
import path from 'path';
import { type IMemoryStore, NO_MEMORIES } from './store.js';
import type { MemoryEntry } from './types.js';
import { StoreError, describeError } from './errors.js';
import { formatTimestamp, toUnixSeconds } from './timestamp.js';
import { logger } from './logger.js';

export const DEFAULT_MEMORY_FILE = 'memories.md';

export interface MarkdownStoreOptions {
  filePath?: string; // markdown log, relative paths resolve against cwd
  now?: () => Date;
}

export function renderEntry(entry: MemoryEntry): string {
  return `## ${formatTimestamp(toUnixSeconds(entry.timestamp))}\n${entry.text}\n\n`;
}

/**
 * Append-only markdown log. Each record is a level-2 heading with the UTC
 * write time, the raw text and a blank line. The file is only ever extended.
 */
export class MarkdownMemoryStore implements IMemoryStore {
  readonly location: string;
  private readonly now: () => Date;

  constructor(opts: MarkdownStoreOptions = {}) {
    this.location = path.resolve(opts.filePath ?? DEFAULT_MEMORY_FILE);
    this.now = opts.now ?? (() => new Date());
  }

  append(text: string): void {
    const record = renderEntry({ timestamp: this.now(), text });
    try {
      // one write per record; the 'a' flag creates the file when missing
      fs.appendFileSync(this.location, record, { encoding: 'utf8', flag: 'a' });
    } catch (e) {
      throw new StoreError(`Cannot append to ${this.location}: ${describeError(e)}`, this.location, { cause: e });
    }
    logger.debug({ file: this.location, bytes: Buffer.byteLength(record) }, 'Memory appended');
  }

  readAll(): string {
    if (!fs.existsSync(this.location)) return NO_MEMORIES;
    let content: string;
    try {
      content = fs.readFileSync(this.location, 'utf8');
    } catch (e) {
      throw new StoreError(`Cannot read ${this.location}: ${describeError(e)}`, this.location, { cause: e });
    }
    if (content.trim() === '') return NO_MEMORIES;
    return content;
  }
}
