import type {
  ActionPlan,
  Cluster,
  FeedbackEntry,
  FilterSuggestionSet,
  LogEvent,
  RawRecord,
  RefineReport,
  ReportDraft,
  RunResult,
  SkippedItem,
  TicketDraft,
  TicketDraftSet,
  TriagedItem,
  TriageSummary,
} from '../domain/index.js';
import type { UsageContext } from './usage.js';

// ─── Judgment oracle ─────────────────────────────────────────

export type OracleErrorKind =
  | 'disabled'
  | 'rate_limited'
  | 'transport'
  | 'json_parse_failed'
  | 'not_an_object';

/**
 * Result of one oracle call. Failures are values, never exceptions:
 * callers treat `ok: false` as "no usable result" and degrade.
 */
export type OracleResult =
  | { readonly ok: true; readonly data: Readonly<Record<string, unknown>> }
  | {
      readonly ok: false;
      readonly error: OracleErrorKind;
      readonly detail: string;
      readonly raw?: string;
    };

export interface OracleRequest {
  /** Short tag for logs, e.g. "classify". */
  readonly purpose: string;
  readonly system: string;
  readonly task: string;
  readonly payload: unknown;
}

export interface JudgmentOracle {
  judge(request: OracleRequest, usage: UsageContext): Promise<OracleResult>;
}

// ─── Collaborators ───────────────────────────────────────────

export interface LogSource {
  readonly name: string;
  fetch(): Promise<RawRecord[]>;
}

export interface TicketSink {
  submit(draft: TicketDraft): Promise<string | null>;
}

export interface ReportSink {
  publish(markdown: string): Promise<string | null>;
}

// ─── Human approval ──────────────────────────────────────────

export type Decision =
  | { readonly kind: 'approve' | 'reject'; readonly reason?: string }
  | { readonly kind: 'skip_all' };

export interface DecisionPort {
  requestDecision(
    draft: TicketDraft,
    position: { readonly index: number; readonly total: number },
  ): Promise<Decision>;
  /** Releases the input once the review session is over. */
  close?(): void;
}

// ─── Persistence ─────────────────────────────────────────────

/** Shapes of the per-stage hand-off artifacts. */
export interface ArtifactMap {
  events: { readonly count: number; readonly items: readonly LogEvent[] };
  clusters: {
    readonly cluster_count: number;
    readonly log_count: number;
    readonly clusters: readonly Cluster[];
  };
  clusters_refined: { readonly clusters: readonly Cluster[]; readonly report: RefineReport };
  triaged: { readonly items: readonly TriagedItem[]; readonly skipped: readonly SkippedItem[] };
  summary: TriageSummary;
  plan: ActionPlan;
  ticket_drafts: TicketDraftSet;
  filter_suggestions: FilterSuggestionSet;
  report: ReportDraft;
  run_result: RunResult;
}

export type ArtifactName = keyof ArtifactMap;

export interface ArtifactStore {
  load<K extends ArtifactName>(name: K): Promise<ArtifactMap[K] | null>;
  save<K extends ArtifactName>(name: K, value: ArtifactMap[K]): Promise<void>;
  /** Drops an artifact; a missing one is not an error. */
  remove(name: ArtifactName): Promise<void>;
}

/** Append-only ledger of human decisions. */
export interface FeedbackStore {
  load(): Promise<FeedbackEntry[]>;
  append(entry: FeedbackEntry): Promise<void>;
}
