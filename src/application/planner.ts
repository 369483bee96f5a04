import type { Logger } from 'pino';
import type { ActionPlan, FeedbackEntry, PlanAction, ReportSection, TriagedItem, TriageSummary } from '../domain/index.js';
import type { JudgmentOracle } from './ports.js';
import type { UsageContext } from './usage.js';
import type { FeedbackIndex } from './feedback.js';
import { indexFeedback } from './feedback.js';
import { filterAction, normalizePlan, reportAction, ticketAction } from './plan-normalizer.js';

const POLICY_SYSTEM = `You are the orchestration planner of a multi-agent log review system.

Available agents:
- ticket_drafts: drafts bug tickets for important clusters.
- filter_suggestions: proposes search-exclusion filters for noisy or non-actionable clusters.
- report_draft: writes a markdown summary of the review session.

Read the summary and the per-cluster view, decide which agents to run and
with which parameters, and explain your reasoning briefly.

Guidelines:
- ticket_drafts should run only if enough high-priority internal errors justify developer attention.
- A cluster carrying "feedback" was already reviewed by a human. Never propose a ticket for a
  cluster whose feedback.decision is "rejected"; "approved" clusters already have a ticket.
- filter_suggestions should run when there is significant noise, timeouts or external_service errors.
- report_draft should run when something meaningful happened, not on empty or trivial runs.
- Prefer conservative ticket creation.

Return a single JSON object:
{
  "actions": [
    { "agent": "ticket_drafts", "run": true|false, "max_tickets": <int|null>,
      "min_severity": "low"|"medium"|"high"|null, "min_confidence": <0..1|null>,
      "cluster_indices": [<idx>, ...] | null },
    { "agent": "filter_suggestions", "run": true|false,
      "for_labels": ["timeout", "external_service", "noise"], "min_count": <int|null> },
    { "agent": "report_draft", "run": true|false,
      "include_sections": ["summary", "ticket_links", "filters"] }
  ],
  "global_policy": { "ticket_strategy": "aggressive"|"balanced"|"conservative",
                     "noise_handling": "none"|"basic_filters"|"aggressive_filters" },
  "reason": "<short explanation>"
}`;

const POLICY_TASK = 'Decide which agents to run for the following review state.';

export type PlannerMode = 'oracle' | 'fallback';

export interface FallbackOptions {
  /**
   * `any_triaged`: suggest filters whenever anything was triaged.
   * `external_noise`: only when external_service + noise clusters reach the floor.
   */
  readonly filterMode?: 'any_triaged' | 'external_noise';
  readonly externalNoiseFloor?: number;
}

/** Per-cluster view sent to the policy oracle. */
export interface PolicyClusterView {
  readonly idx: number;
  readonly fingerprint: string;
  readonly service: string | null;
  readonly label: string | null;
  readonly priority: string | null;
  readonly severity: string | null;
  readonly confidence: number | null;
  readonly count: number;
  readonly component: string;
  readonly message: string;
  readonly feedback?: {
    readonly decision: FeedbackEntry['decision'];
    readonly reason: string | null;
    readonly timestamp: string;
  };
}

/**
 * Builds the policy oracle's cluster view, annotating every cluster whose
 * fingerprint has a ledger entry with that entry's latest decision.
 */
export function buildPolicyView(
  items: readonly TriagedItem[],
  feedback: FeedbackIndex | null,
): PolicyClusterView[] {
  return items.map((item) => {
    const triage = item.triage;
    const view: PolicyClusterView = {
      idx: item.idx,
      fingerprint: item.fingerprint,
      service: item.service,
      label: triage.classified ? triage.label : null,
      priority: triage.classified ? triage.priority : null,
      severity: triage.classified ? triage.severity : null,
      confidence: triage.classified ? triage.confidence : null,
      count: item.count,
      component: item.component,
      message: item.message,
    };

    const entry = feedback?.get(item.fingerprint);
    if (entry === undefined) return view;

    return {
      ...view,
      feedback: { decision: entry.decision, reason: entry.reason, timestamp: entry.timestamp },
    };
  });
}

/**
 * Deterministic plan from the summary alone. No oracle, no I/O, no
 * hidden state: equal summaries always yield equal plans.
 */
export function buildFallbackPlan(summary: TriageSummary, options: FallbackOptions = {}): ActionPlan {
  const externalNoise = (summary.by_label['external_service'] ?? 0) + (summary.by_label['noise'] ?? 0);

  const runTickets = summary.internal_high_count > 0;
  const runFilters = options.filterMode === 'external_noise'
    ? externalNoise >= (options.externalNoiseFloor ?? 1)
    : summary.triaged_cluster_count > 0;
  const runReport = runTickets || runFilters;

  const sections: ReportSection[] = ['summary'];
  if (runTickets) sections.push('ticket_links');
  if (runFilters || externalNoise > 0) sections.push('filters');

  return {
    strategy: 'fallback',
    actions: [ticketAction(runTickets), filterAction(runFilters), reportAction(runReport, sections)],
    global_policy: { ticket_strategy: 'baseline', noise_handling: 'basic_filters' },
    reasoning:
      'Static plan without policy oracle: draft tickets for high-priority internal errors, ' +
      'suggest filters for triaged clusters, and report when either ran.',
    dropped: [],
  };
}

/**
 * Marks every fingerprint of this run that a human already reviewed as
 * excluded from ticket drafting. Reads the ledger, never writes it.
 */
export function applyFeedbackSuppression(
  plan: ActionPlan,
  items: readonly TriagedItem[],
  feedback: FeedbackIndex | null,
): ActionPlan {
  if (feedback === null || feedback.size === 0) return plan;

  const reviewed = [...new Set(items.map((i) => i.fingerprint).filter((fp) => feedback.has(fp)))].sort();
  if (reviewed.length === 0) return plan;

  const actions = plan.actions.map((action): PlanAction =>
    action.agent === 'ticket_drafts' ? { ...action, exclude_fingerprints: reviewed } : action,
  );
  return { ...plan, actions };
}

/** Asks the policy oracle for a plan; `null` when the oracle was unreachable. */
export async function planWithPolicyOracle(
  summary: TriageSummary,
  items: readonly TriagedItem[],
  feedback: FeedbackIndex | null,
  oracle: JudgmentOracle,
  usage: UsageContext,
  log: Logger,
): Promise<ActionPlan | null> {
  const result = await oracle.judge(
    {
      purpose: 'plan',
      system: POLICY_SYSTEM,
      task: POLICY_TASK,
      payload: { summary, clusters: buildPolicyView(items, feedback) },
    },
    usage,
  );

  if (!result.ok) {
    log.warn({ error: result.error, detail: result.detail }, 'Policy oracle unavailable');
    return null;
  }

  const plan = normalizePlan(result.data, 'policy_oracle');
  if (plan.dropped.length > 0) {
    log.warn({ dropped: plan.dropped }, 'Policy oracle returned unusable actions');
  }
  return plan;
}

export interface PlanningRequest {
  readonly summary: TriageSummary;
  readonly items: readonly TriagedItem[];
  /** Ledger contents, or `null` when feedback is switched off. */
  readonly feedback: readonly FeedbackEntry[] | null;
  readonly mode: PlannerMode;
  readonly fallback?: FallbackOptions;
}

/**
 * Produces the run's plan. The deterministic fallback doubles as the
 * circuit breaker when the policy oracle cannot be reached.
 */
export async function planActions(
  request: PlanningRequest,
  oracle: JudgmentOracle,
  usage: UsageContext,
  log: Logger,
): Promise<ActionPlan> {
  const index = request.feedback === null ? null : indexFeedback(request.feedback);

  let plan: ActionPlan | null = null;
  if (request.mode === 'oracle') {
    plan = await planWithPolicyOracle(request.summary, request.items, index, oracle, usage, log);
  }
  if (plan === null) {
    plan = buildFallbackPlan(request.summary, request.fallback);
  }

  return applyFeedbackSuppression(plan, request.items, index);
}
