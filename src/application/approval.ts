import type { Logger } from 'pino';
import type { FeedbackEntry, ReviewOutcome, SubmittedTicket, TicketDraft } from '../domain/index.js';
import type { DecisionPort, FeedbackStore, TicketSink } from './ports.js';

export interface ReviewResult {
  readonly outcome: ReviewOutcome;
  /** Approved drafts, in review order. */
  readonly approved: readonly TicketDraft[];
}

/** Port that defers every draft; nothing is approved or recorded. */
export const deferredReview: DecisionPort = {
  requestDecision: () => Promise.resolve({ kind: 'skip_all' }),
};

/**
 * Walks the drafts in order and records one ledger entry per
 * approve/reject decision before asking about the next draft.
 * Skip-all ends the session; later drafts stay unreviewed. The port is
 * closed when the session ends.
 */
export async function reviewDrafts(
  drafts: readonly TicketDraft[],
  port: DecisionPort,
  feedback: FeedbackStore,
  clock: () => Date,
  log: Logger,
): Promise<ReviewResult> {
  const approved: TicketDraft[] = [];
  let rejected = 0;
  let skippedAll = false;

  try {
    for (const [index, draft] of drafts.entries()) {
      const decision = await port.requestDecision(draft, { index, total: drafts.length });

      if (decision.kind === 'skip_all') {
        skippedAll = true;
        log.info({ remaining: drafts.length - index }, 'Review skipped for remaining drafts');
        break;
      }

      const reason = decision.reason?.trim();
      const entry: FeedbackEntry = {
        timestamp: clock().toISOString(),
        fingerprint: draft.fingerprint,
        decision: decision.kind === 'approve' ? 'approved' : 'rejected',
        reason: reason !== undefined && reason !== '' ? reason : null,
        idx: draft.idx,
        service: draft.service,
        summary: draft.ticket.summary,
        ...(draft.triage.classified ? { label: draft.triage.label } : {}),
      };
      await feedback.append(entry);
      log.info({ idx: draft.idx, fingerprint: draft.fingerprint, decision: entry.decision }, 'Feedback recorded');

      if (decision.kind === 'approve') approved.push(draft);
      else rejected++;
    }
  } finally {
    port.close?.();
  }

  return {
    outcome: {
      reviewed: approved.length + rejected,
      approved: approved.length,
      rejected,
      skipped_all: skippedAll,
    },
    approved,
  };
}

/** Submits approved drafts; drafts the sink did not accept are left out. */
export async function submitApproved(
  drafts: readonly TicketDraft[],
  sink: TicketSink,
  log: Logger,
): Promise<SubmittedTicket[]> {
  const submitted: SubmittedTicket[] = [];
  for (const draft of drafts) {
    const ticketId = await sink.submit(draft);
    if (ticketId === null) {
      log.warn({ idx: draft.idx }, 'Ticket was not created');
      continue;
    }
    submitted.push({ idx: draft.idx, fingerprint: draft.fingerprint, ticket_id: ticketId });
  }
  return submitted;
}
