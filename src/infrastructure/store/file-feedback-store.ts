import { mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Logger } from 'pino';
import type { FeedbackEntry } from '../../domain/index.js';
import type { FeedbackStore } from '../../application/index.js';
import { feedbackEntrySchema } from './artifact-schemas.js';
import { writeJsonFile } from './file-artifact-store.js';

/**
 * Feedback ledger kept as one JSON array. Appends rewrite the file
 * with the new entry last; existing entries are never changed.
 */
export class FileFeedbackStore implements FeedbackStore {
  constructor(
    private readonly path: string,
    private readonly log: Logger,
  ) {}

  async load(): Promise<FeedbackEntry[]> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (err: unknown) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
      this.log.warn({ err, path: this.path }, 'Feedback ledger unreadable, treating as empty');
      return [];
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (err: unknown) {
      this.log.warn({ err, path: this.path }, 'Feedback ledger is not valid JSON, treating as empty');
      return [];
    }
    if (!Array.isArray(json)) {
      this.log.warn({ path: this.path }, 'Feedback ledger is not a list, treating as empty');
      return [];
    }

    const entries: FeedbackEntry[] = [];
    json.forEach((raw: unknown, position) => {
      const parsed = feedbackEntrySchema.safeParse(raw);
      if (parsed.success) entries.push(parsed.data);
      else this.log.warn({ position }, 'Skipping malformed feedback entry');
    });
    return entries;
  }

  async append(entry: FeedbackEntry): Promise<void> {
    const entries = await this.load();
    entries.push(entry);
    await mkdir(dirname(this.path), { recursive: true });
    await writeJsonFile(this.path, entries);
  }
}
