/** Classification labels the judgment oracle may assign. */
export const LABELS = ['timeout', 'external_service', 'internal_error', 'noise'] as const;
export type Label = (typeof LABELS)[number];

/** Shared scale for priority and severity. */
export const LEVELS = ['low', 'medium', 'high'] as const;
export type Level = (typeof LEVELS)[number];

/** Numeric rank of a level, for threshold comparisons. */
export function levelRank(level: Level): number {
  return LEVELS.indexOf(level);
}

/**
 * Triage attached to a cluster.
 *
 * `classified === false` is the safe placeholder for clusters the oracle
 * never classified; such clusters are excluded from ticket drafting.
 */
export type Triage =
  | {
      readonly classified: true;
      readonly label: Label;
      readonly priority: Level;
      readonly severity: Level;
      readonly confidence: number; // 0.0 – 1.0
      readonly reason: string;
    }
  | { readonly classified: false; readonly reason: string };

/** Unit passed to the summarizer, planner and action agents. */
export interface TriagedItem {
  readonly idx: number;
  readonly fingerprint: string;
  readonly service: string | null;
  readonly component: string;
  readonly message: string;
  readonly count: number;
  readonly first_seen: string | null;
  readonly last_seen: string | null;
  readonly merged_member_idxs: readonly number[];
  readonly stack_excerpt: string;
  readonly triage: Triage;
}

/** Aggregate counts consumed by planning. */
export interface TriageSummary {
  readonly log_count: number;
  readonly cluster_count: number;
  readonly triaged_cluster_count: number;
  readonly classified_count: number;
  readonly unclassified_count: number;
  readonly by_label: Readonly<Record<string, number>>;
  readonly by_priority: Readonly<Record<string, number>>;
  readonly internal_high_count: number;
}
