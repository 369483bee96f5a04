import type { Logger } from 'pino';
import { z } from 'zod';
import type {
  SkippedItem,
  TicketContent,
  TicketDraft,
  TicketDraftSet,
  TicketDraftsAction,
  TriagedItem,
} from '../../domain/index.js';
import { levelRank } from '../../domain/index.js';
import type { JudgmentOracle } from '../ports.js';
import type { UsageContext } from '../usage.js';
import { chunked, itemsByIdx } from '../oracle-values.js';

const TICKET_SYSTEM = `You are a senior backend engineer writing bug tickets for backend services.

You will receive a list of log clusters. Each cluster has an idx, the service,
the component, a representative message, an occurrence count, its triage
(label, priority, severity, confidence, reason), the time window it was seen in
and the first lines of its stack trace.

For EACH cluster fill the team's bug template with concrete, helpful content:
- Name the service, the component and, if visible in the stack excerpt, the
  method and line of the most relevant frame. If none is visible, say so.
- Describe frequency from the count and time window, e.g. "17 hits in past 24 hours".
- Propose a precise search query based on service, component and a stable part
  of the message (no timestamps, no ids). Never invent URLs.

Return a single JSON object with key "items". Each element has:
- "idx": the idx of the input cluster
- "summary": one-line ticket summary
- "description": issue description
- "suggested_query": search query string
- "hits_past_window": frequency statement
- "notes_for_development": notes for the developer
- "steps_to_reproduce": steps to reproduce, or what is unknown
- "stack_trace_excerpt": the relevant part of the stack trace only`;

const TICKET_TASK = 'Write one ticket draft for EACH of the following clusters. Respond with {"items": [...]} only.';

const text = z.unknown().transform((value) => (typeof value === 'string' ? value.trim() : ''));

const ticketSchema = z
  .object({
    summary: z.string().trim().min(1),
    description: text,
    issue_description: text,
    suggested_query: text,
    kql_filter: text,
    hits_past_window: text,
    notes_for_development: text,
    steps_to_reproduce: text,
    stack_trace_excerpt: text,
  })
  .transform(
    (raw): TicketContent => ({
      summary: raw.summary,
      description: raw.description || raw.issue_description,
      suggested_query: raw.suggested_query || raw.kql_filter,
      hits_past_window: raw.hits_past_window,
      notes_for_development: raw.notes_for_development,
      steps_to_reproduce: raw.steps_to_reproduce,
      stack_trace_excerpt: raw.stack_trace_excerpt,
    }),
  );

export interface TicketDraftOptions {
  readonly batchSize: number;
}

function isInternalHigh(item: TriagedItem): boolean {
  return item.triage.classified && item.triage.label === 'internal_error' && item.triage.priority === 'high';
}

/**
 * Picks the clusters the ticket agent drafts for.
 *
 * An explicit `cluster_indices` list wins over the default selection of
 * high-priority internal errors. Unclassified clusters, clusters below
 * the severity or confidence floor and already reviewed fingerprints
 * are skipped with a reason. `max_tickets` caps the rest in order.
 */
export function selectTicketCandidates(
  items: readonly TriagedItem[],
  action: TicketDraftsAction,
): { selected: TriagedItem[]; skipped: SkippedItem[] } {
  const skipped: SkippedItem[] = [];
  let pool: TriagedItem[];

  if (action.cluster_indices !== null) {
    const byIdx = new Map(items.map((item) => [item.idx, item]));
    pool = [];
    for (const idx of action.cluster_indices) {
      const item = byIdx.get(idx);
      if (item === undefined) skipped.push({ idx, reason: 'unknown cluster index' });
      else pool.push(item);
    }
  } else {
    pool = items.filter(isInternalHigh);
  }

  const excluded = new Set(action.exclude_fingerprints);
  const selected: TriagedItem[] = [];

  for (const item of pool) {
    const triage = item.triage;
    if (!triage.classified) {
      skipped.push({ idx: item.idx, reason: 'unclassified' });
    } else if (excluded.has(item.fingerprint)) {
      skipped.push({ idx: item.idx, reason: 'already reviewed' });
    } else if (action.min_severity !== null && levelRank(triage.severity) < levelRank(action.min_severity)) {
      skipped.push({ idx: item.idx, reason: `severity below ${action.min_severity}` });
    } else if (action.min_confidence !== null && triage.confidence < action.min_confidence) {
      skipped.push({ idx: item.idx, reason: `confidence below ${action.min_confidence}` });
    } else if (action.max_tickets !== null && selected.length >= action.max_tickets) {
      skipped.push({ idx: item.idx, reason: 'over max_tickets' });
    } else {
      selected.push(item);
    }
  }

  return { selected, skipped };
}

function ticketPayload(item: TriagedItem) {
  return {
    idx: item.idx,
    service: item.service,
    component: item.component,
    message: item.message,
    count: item.count,
    first_seen: item.first_seen,
    last_seen: item.last_seen,
    triage: item.triage,
    stack_excerpt: item.stack_excerpt,
  };
}

/** Drafts ticket text for the selected clusters, one oracle call per batch. */
export async function draftTickets(
  items: readonly TriagedItem[],
  action: TicketDraftsAction,
  oracle: JudgmentOracle,
  usage: UsageContext,
  options: TicketDraftOptions,
  log: Logger,
): Promise<TicketDraftSet> {
  const { selected, skipped } = selectTicketCandidates(items, action);
  const tickets = new Map<number, TicketContent>();
  const failed = new Map<number, string>();

  for (const batch of chunked(selected, options.batchSize)) {
    const result = await oracle.judge(
      { purpose: 'ticket_drafts', system: TICKET_SYSTEM, task: TICKET_TASK, payload: batch.map(ticketPayload) },
      usage,
    );

    if (!result.ok) {
      log.warn({ error: result.error, detail: result.detail, size: batch.length }, 'Ticket draft batch failed');
      for (const item of batch) failed.set(item.idx, `oracle_unavailable: ${result.error}`);
      continue;
    }

    const { byIdx, skipped: rejected } = itemsByIdx(result.data, new Set(batch.map((i) => i.idx)));
    skipped.push(...rejected);

    for (const [idx, raw] of byIdx) {
      const ticket = ticketSchema.safeParse(raw);
      if (ticket.success) tickets.set(idx, ticket.data);
      else failed.set(idx, 'invalid ticket draft (summary missing)');
    }
  }

  const drafts: TicketDraft[] = [];
  for (const item of selected) {
    const ticket = tickets.get(item.idx);
    if (ticket === undefined) {
      skipped.push({ idx: item.idx, reason: failed.get(item.idx) ?? 'no ticket draft returned for this idx' });
      continue;
    }
    drafts.push({
      idx: item.idx,
      fingerprint: item.fingerprint,
      service: item.service,
      component: item.component,
      count: item.count,
      triage: item.triage,
      ticket,
    });
  }

  log.info({ drafts: drafts.length, skipped: skipped.length }, 'Ticket drafts ready');
  return { draft_count: drafts.length, skipped_count: skipped.length, drafts, skipped };
}
