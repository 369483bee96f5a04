import type { FeedbackEntry } from '../domain/index.js';

export type FeedbackIndex = ReadonlyMap<string, FeedbackEntry>;

/**
 * Latest decision per fingerprint.
 *
 * When a fingerprint has several entries, the most recent timestamp
 * wins; equal or unparseable timestamps defer to ledger order, so a
 * later append always supersedes an earlier one it cannot be ordered
 * against.
 */
export function indexFeedback(entries: readonly FeedbackEntry[]): FeedbackIndex {
  const latest = new Map<string, { entry: FeedbackEntry; ms: number }>();

  for (const entry of entries) {
    const ms = Date.parse(entry.timestamp);
    const current = latest.get(entry.fingerprint);
    if (
      current === undefined ||
      !Number.isFinite(ms) ||
      !Number.isFinite(current.ms) ||
      ms >= current.ms
    ) {
      latest.set(entry.fingerprint, { entry, ms });
    }
  }

  return new Map([...latest].map(([fp, { entry }]) => [fp, entry]));
}
