import type { Label, Level } from './triage.js';

/** Downstream agents a plan can schedule, in execution order. */
export const AGENT_NAMES = ['ticket_drafts', 'filter_suggestions', 'report_draft'] as const;
export type AgentName = (typeof AGENT_NAMES)[number];

export const REPORT_SECTIONS = ['summary', 'ticket_links', 'filters'] as const;
export type ReportSection = (typeof REPORT_SECTIONS)[number];

export interface TicketDraftsAction {
  readonly agent: 'ticket_drafts';
  readonly run: boolean;
  readonly max_tickets: number | null;
  readonly min_severity: Level | null;
  readonly min_confidence: number | null;
  /** Explicit selection; `null` selects every high-priority internal error. */
  readonly cluster_indices: readonly number[] | null;
  /** Fingerprints already reviewed by a human; never drafted again. */
  readonly exclude_fingerprints: readonly string[];
}

export interface FilterSuggestionsAction {
  readonly agent: 'filter_suggestions';
  readonly run: boolean;
  readonly for_labels: readonly Label[];
  readonly min_count: number | null;
}

export interface ReportDraftAction {
  readonly agent: 'report_draft';
  readonly run: boolean;
  readonly include_sections: readonly ReportSection[];
}

export type PlanAction = TicketDraftsAction | FilterSuggestionsAction | ReportDraftAction;

export type PlanStrategy = 'policy_oracle' | 'fallback' | 'default';

export interface GlobalPolicy {
  readonly ticket_strategy: string;
  readonly noise_handling: string;
}

/**
 * The set of actions selected for one run.
 *
 * Produced fresh each run and persisted only as an audit artifact.
 * `dropped` records candidate actions the normalizer refused.
 */
export interface ActionPlan {
  readonly strategy: PlanStrategy;
  readonly actions: readonly PlanAction[];
  readonly global_policy: GlobalPolicy;
  readonly reasoning: string;
  readonly dropped: readonly { readonly index: number; readonly reason: string }[];
}
