import type { FeedbackEntry } from '../../domain/index.js';
import type { FeedbackStore } from '../../application/index.js';

export class MemoryFeedbackStore implements FeedbackStore {
  private readonly entries: FeedbackEntry[];

  constructor(initial: readonly FeedbackEntry[] = []) {
    this.entries = [...initial];
  }

  load(): Promise<FeedbackEntry[]> {
    return Promise.resolve([...this.entries]);
  }

  append(entry: FeedbackEntry): Promise<void> {
    this.entries.push(entry);
    return Promise.resolve();
  }
}
