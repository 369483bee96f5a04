import { z } from 'zod';
import type {
  ActionPlan,
  Cluster,
  FeedbackEntry,
  LogEvent,
  PlanAction,
  RunResult,
  SkippedItem,
  TicketDraft,
  Triage,
  TriagedItem,
  TriageSummary,
} from '../../domain/index.js';
import { AGENT_NAMES, LABELS, LEVELS, REPORT_SECTIONS } from '../../domain/index.js';
import type { ArtifactMap, ArtifactName } from '../../application/index.js';

/**
 * Schemas for the artifacts persisted between stages.
 *
 * Loading validates against these, so a hand-edited or truncated file
 * is reported instead of flowing into the next stage.
 */

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const nullableString = z.string().nullable();
const count = z.number().int().min(0);
const level = z.enum(LEVELS);
const label = z.enum(LABELS);
const agentName = z.enum(AGENT_NAMES);

// ─── Clustering ──────────────────────────────────────────────

export const logEventSchema: Schema<LogEvent> = z.object({
  timestamp: nullableString,
  level: nullableString,
  service: nullableString,
  message: nullableString,
  component: nullableString,
  correlation_id: nullableString,
  raw: z.record(z.string(), z.unknown()),
});

export const clusterSchema: Schema<Cluster> = z.object({
  idx: count,
  component: z.string(),
  message: z.string(),
  service: nullableString,
  count: z.number().int().min(1),
  sample: logEventSchema,
  timestamps: z.array(nullableString),
  merged_member_idxs: z.array(count).optional(),
});

const skippedSchema: Schema<SkippedItem> = z.object({ idx: count.nullable(), reason: z.string() });

// ─── Triage ──────────────────────────────────────────────────

export const triageSchema: Schema<Triage> = z.discriminatedUnion('classified', [
  z.object({
    classified: z.literal(true),
    label,
    priority: level,
    severity: level,
    confidence: z.number().min(0).max(1),
    reason: z.string(),
  }),
  z.object({ classified: z.literal(false), reason: z.string() }),
]);

export const triagedItemSchema: Schema<TriagedItem> = z.object({
  idx: count,
  fingerprint: z.string(),
  service: nullableString,
  component: z.string(),
  message: z.string(),
  count: z.number().int().min(1),
  first_seen: nullableString,
  last_seen: nullableString,
  merged_member_idxs: z.array(count),
  stack_excerpt: z.string(),
  triage: triageSchema,
});

export const summarySchema: Schema<TriageSummary> = z.object({
  log_count: count,
  cluster_count: count,
  triaged_cluster_count: count,
  classified_count: count,
  unclassified_count: count,
  by_label: z.record(z.string(), count),
  by_priority: z.record(z.string(), count),
  internal_high_count: count,
});

// ─── Planning ────────────────────────────────────────────────

const planActionSchema: Schema<PlanAction> = z.discriminatedUnion('agent', [
  z.object({
    agent: z.literal('ticket_drafts'),
    run: z.boolean(),
    max_tickets: z.number().int().min(1).nullable(),
    min_severity: level.nullable(),
    min_confidence: z.number().min(0).max(1).nullable(),
    cluster_indices: z.array(count).nullable(),
    exclude_fingerprints: z.array(z.string()),
  }),
  z.object({
    agent: z.literal('filter_suggestions'),
    run: z.boolean(),
    for_labels: z.array(label),
    min_count: z.number().int().min(1).nullable(),
  }),
  z.object({
    agent: z.literal('report_draft'),
    run: z.boolean(),
    include_sections: z.array(z.enum(REPORT_SECTIONS)),
  }),
]);

export const planSchema: Schema<ActionPlan> = z.object({
  strategy: z.enum(['policy_oracle', 'fallback', 'default']),
  actions: z.array(planActionSchema),
  global_policy: z.object({ ticket_strategy: z.string(), noise_handling: z.string() }),
  reasoning: z.string(),
  dropped: z.array(z.object({ index: count, reason: z.string() })),
});

// ─── Agent output ────────────────────────────────────────────

const ticketDraftSchema: Schema<TicketDraft> = z.object({
  idx: count,
  fingerprint: z.string(),
  service: nullableString,
  component: z.string(),
  count: z.number().int().min(1),
  triage: triageSchema,
  ticket: z.object({
    summary: z.string(),
    description: z.string(),
    suggested_query: z.string(),
    hits_past_window: z.string(),
    notes_for_development: z.string(),
    steps_to_reproduce: z.string(),
    stack_trace_excerpt: z.string(),
  }),
});

// ─── Run metadata ────────────────────────────────────────────

const timingSchema = z.object({ started_at: z.string(), finished_at: z.string(), duration_ms: z.number() });

const usageSchema = z.object({
  calls: count,
  retries: count,
  failures: count,
  prompt_tokens: count,
  completion_tokens: count,
  total_tokens: count,
});

const reviewSchema = z.object({
  reviewed: count,
  approved: count,
  rejected: count,
  skipped_all: z.boolean(),
});

export const runResultSchema: Schema<RunResult> = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('stopped'),
    stopped: z.enum(['no_logs', 'log_source_failed']),
    log_count: count,
    timing: timingSchema,
    usage: usageSchema,
    errors: z.array(z.string()),
  }),
  z.object({
    status: z.literal('completed'),
    log_count: count,
    cluster_count: count,
    timing: timingSchema,
    usage: usageSchema,
    summary: summarySchema,
    plan: planSchema,
    results: z.object({
      ticket_drafts: z
        .object({
          draft_count: count,
          skipped_count: count,
          review: reviewSchema.nullable(),
          submitted: z.array(z.string()),
        })
        .optional(),
      filter_suggestions: z.object({ suggestion_count: count, skipped_count: count }).optional(),
      report_draft: z
        .object({ length: count, generated_by: z.enum(['oracle', 'local']), page_id: nullableString })
        .optional(),
    }),
    skipped_agents: z.array(agentName),
    submitted_tickets: z.array(z.string()),
    errors: z.array(z.object({ agent: agentName, error: z.string() })),
  }),
]);

export const feedbackEntrySchema: Schema<FeedbackEntry> = z.object({
  timestamp: z.string(),
  fingerprint: z.string().min(1),
  decision: z.enum(['approved', 'rejected']),
  reason: nullableString.default(null),
  idx: count.optional(),
  service: nullableString.optional(),
  summary: z.string().optional(),
  label: z.string().optional(),
});

export const artifactSchemas: { readonly [K in ArtifactName]: Schema<ArtifactMap[K]> } = {
  events: z.object({ count, items: z.array(logEventSchema) }),
  clusters: z.object({ cluster_count: count, log_count: count, clusters: z.array(clusterSchema) }),
  clusters_refined: z.object({
    clusters: z.array(clusterSchema),
    report: z.object({
      input_count: count,
      output_count: count,
      merged_groups: count,
      skipped_groups: z.array(z.object({ group: count, reason: z.string() })),
      unreferenced_idxs: z.array(count),
      degraded: z.boolean(),
    }),
  }),
  triaged: z.object({ items: z.array(triagedItemSchema), skipped: z.array(skippedSchema) }),
  summary: summarySchema,
  plan: planSchema,
  ticket_drafts: z.object({
    draft_count: count,
    skipped_count: count,
    drafts: z.array(ticketDraftSchema),
    skipped: z.array(skippedSchema),
  }),
  filter_suggestions: z.object({
    suggestions: z.array(
      z.object({
        idx: count,
        fingerprint: z.string(),
        service: nullableString,
        count: z.number().int().min(1),
        filter_clause: z.record(z.string(), z.unknown()),
      }),
    ),
    skipped: z.array(skippedSchema),
  }),
  report: z.object({
    markdown: z.string(),
    generated_by: z.enum(['oracle', 'local']),
    page_id: nullableString,
  }),
  run_result: runResultSchema,
};
