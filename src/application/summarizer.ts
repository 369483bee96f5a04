import type { TriagedItem, TriageSummary } from '../domain/index.js';

/**
 * Reduces the triaged set to the counts planning works from.
 *
 * `internal_high_count` requires label "internal_error" AND priority
 * "high"; severity and confidence play no part. Unclassified items are
 * only reflected in `unclassified_count`.
 */
export function summarizeTriage(items: readonly TriagedItem[], logCount: number): TriageSummary {
  const byLabel: Record<string, number> = {};
  const byPriority: Record<string, number> = {};
  let classified = 0;
  let internalHigh = 0;

  for (const item of items) {
    const triage = item.triage;
    if (!triage.classified) continue;

    classified++;
    byLabel[triage.label] = (byLabel[triage.label] ?? 0) + 1;
    byPriority[triage.priority] = (byPriority[triage.priority] ?? 0) + 1;

    if (triage.label === 'internal_error' && triage.priority === 'high') {
      internalHigh++;
    }
  }

  return {
    log_count: logCount,
    cluster_count: items.length,
    triaged_cluster_count: items.length,
    classified_count: classified,
    unclassified_count: items.length - classified,
    by_label: byLabel,
    by_priority: byPriority,
    internal_high_count: internalHigh,
  };
}
