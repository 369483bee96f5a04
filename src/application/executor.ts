import type { Logger } from 'pino';
import type {
  ActionPlan,
  AgentError,
  AgentName,
  AgentResults,
  FilterSuggestionSet,
  ReportDraft,
  SubmittedTicket,
  TicketDraftSet,
  TriagedItem,
  TriageSummary,
} from '../domain/index.js';
import type {
  ArtifactStore,
  DecisionPort,
  FeedbackStore,
  JudgmentOracle,
  ReportSink,
  TicketSink,
} from './ports.js';
import type { UsageContext } from './usage.js';
import { reviewDrafts, submitApproved } from './approval.js';
import { draftTickets } from './agents/ticket-drafts.js';
import { suggestFilters } from './agents/filter-suggestions.js';
import { draftReport } from './agents/report-draft.js';

export interface ExecutionContext {
  readonly summary: TriageSummary;
  readonly items: readonly TriagedItem[];
  readonly oracle: JudgmentOracle;
  readonly usage: UsageContext;
  readonly artifacts: ArtifactStore;
  readonly feedback: FeedbackStore;
  readonly decisions: DecisionPort;
  readonly ticketSink: TicketSink;
  readonly reportSink: ReportSink;
  readonly clock: () => Date;
  readonly ticketBatchSize: number;
  readonly log: Logger;
}

export interface ExecutionOutcome {
  readonly results: AgentResults;
  readonly skipped_agents: readonly AgentName[];
  readonly submitted_tickets: readonly string[];
  readonly errors: readonly AgentError[];
}

type MutableResults = { -readonly [K in keyof AgentResults]: AgentResults[K] };

/**
 * Runs the plan's actions in order. A failing agent is logged and
 * recorded in `errors`; the remaining actions still run. Drafted
 * tickets go through human review, and only approved ones reach the
 * ticket sink, before the next action starts.
 */
export async function executePlan(plan: ActionPlan, ctx: ExecutionContext): Promise<ExecutionOutcome> {
  const { log } = ctx;
  const results: MutableResults = {};
  const skippedAgents: AgentName[] = [];
  const errors: AgentError[] = [];

  let ticketSet: TicketDraftSet | null = null;
  let submitted: SubmittedTicket[] = [];
  let filterSet: FilterSuggestionSet | null = null;

  for (const action of plan.actions) {
    if (!action.run) {
      log.info({ agent: action.agent }, 'Agent skipped by plan');
      skippedAgents.push(action.agent);
      continue;
    }

    log.info({ agent: action.agent }, 'Running agent');
    try {
      switch (action.agent) {
        case 'ticket_drafts': {
          ticketSet = await draftTickets(
            ctx.items, action, ctx.oracle, ctx.usage, { batchSize: ctx.ticketBatchSize }, log,
          );
          await ctx.artifacts.save('ticket_drafts', ticketSet);

          const review = ticketSet.drafts.length > 0
            ? await reviewDrafts(ticketSet.drafts, ctx.decisions, ctx.feedback, ctx.clock, log)
            : null;
          submitted = review === null ? [] : await submitApproved(review.approved, ctx.ticketSink, log);

          results.ticket_drafts = {
            draft_count: ticketSet.draft_count,
            skipped_count: ticketSet.skipped_count,
            review: review?.outcome ?? null,
            submitted: submitted.map((s) => s.ticket_id),
          };
          break;
        }
        case 'filter_suggestions': {
          filterSet = await suggestFilters(ctx.items, action, ctx.oracle, ctx.usage, log);
          await ctx.artifacts.save('filter_suggestions', filterSet);
          results.filter_suggestions = {
            suggestion_count: filterSet.suggestions.length,
            skipped_count: filterSet.skipped.length,
          };
          break;
        }
        case 'report_draft': {
          const draft = await draftReport(
            {
              summary: ctx.summary,
              sections: action.include_sections,
              drafts: ticketSet?.drafts ?? null,
              submitted,
              filters: filterSet?.suggestions ?? null,
            },
            ctx.oracle,
            ctx.usage,
            log,
          );
          const report: ReportDraft = { ...draft, page_id: await ctx.reportSink.publish(draft.markdown) };
          await ctx.artifacts.save('report', report);
          results.report_draft = {
            length: report.markdown.length,
            generated_by: report.generated_by,
            page_id: report.page_id,
          };
          break;
        }
      }
    } catch (err: unknown) {
      log.error({ err, agent: action.agent }, 'Agent failed');
      errors.push({ agent: action.agent, error: err instanceof Error ? err.message : String(err) });
    }
  }

  return {
    results,
    skipped_agents: skippedAgents,
    submitted_tickets: submitted.map((s) => s.ticket_id),
    errors,
  };
}
