import type { ActionPlan, AgentName } from './plan.js';
import type { TriageSummary } from './triage.js';

export interface UsageSnapshot {
  readonly calls: number;
  readonly retries: number;
  readonly failures: number;
  readonly prompt_tokens: number;
  readonly completion_tokens: number;
  readonly total_tokens: number;
}

export interface RunTiming {
  readonly started_at: string;
  readonly finished_at: string;
  readonly duration_ms: number;
}

export interface AgentError {
  readonly agent: AgentName;
  readonly error: string;
}

export interface ReviewOutcome {
  readonly reviewed: number;
  readonly approved: number;
  readonly rejected: number;
  readonly skipped_all: boolean;
}

/** Per-agent results of an executed plan, keyed by agent name. */
export interface AgentResults {
  readonly ticket_drafts?: {
    readonly draft_count: number;
    readonly skipped_count: number;
    readonly review: ReviewOutcome | null;
    readonly submitted: readonly string[];
  };
  readonly filter_suggestions?: {
    readonly suggestion_count: number;
    readonly skipped_count: number;
  };
  readonly report_draft?: {
    readonly length: number;
    readonly generated_by: 'oracle' | 'local';
    readonly page_id: string | null;
  };
}

export type StopReason = 'no_logs' | 'log_source_failed';

/**
 * Outcome of one pipeline run. Write-once; every run produces one,
 * including degraded and early-stopped runs.
 */
export type RunResult =
  | {
      readonly status: 'stopped';
      readonly stopped: StopReason;
      readonly log_count: number;
      readonly timing: RunTiming;
      readonly usage: UsageSnapshot;
      readonly errors: readonly string[];
    }
  | {
      readonly status: 'completed';
      readonly log_count: number;
      readonly cluster_count: number;
      readonly timing: RunTiming;
      readonly usage: UsageSnapshot;
      readonly summary: TriageSummary;
      readonly plan: ActionPlan;
      readonly results: AgentResults;
      readonly skipped_agents: readonly AgentName[];
      readonly submitted_tickets: readonly string[];
      readonly errors: readonly AgentError[];
    };
