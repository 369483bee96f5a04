import type { Logger } from 'pino';
import type {
  FilterSuggestion,
  ReportDraft,
  ReportSection,
  SubmittedTicket,
  TicketDraft,
  TriageSummary,
} from '../../domain/index.js';
import { REPORT_SECTIONS } from '../../domain/index.js';
import type { JudgmentOracle } from '../ports.js';
import type { UsageContext } from '../usage.js';

const REPORT_SYSTEM = `You write concise markdown reports summarizing an automated
log review session for a backend platform.

You receive the requested sections and, for each, its data:
- summary: counts of logs, clusters and classifications
- ticket_links: ticket drafts and the ids of the tickets that were created
- filters: proposed search-exclusion clauses

Keep the report short: at most about 30 lines, tables of at most 10 rows.
Where a ticket has no id, mention its summary instead. Never invent links.

Return a single JSON object: { "markdown": "<the report>" }`;

const REPORT_TASK = 'Write the review report for the following data.';

export interface ReportInput {
  readonly summary: TriageSummary;
  readonly sections: readonly ReportSection[];
  /** `null` when the ticket agent did not run in this run. */
  readonly drafts: readonly TicketDraft[] | null;
  readonly submitted: readonly SubmittedTicket[];
  /** `null` when the filter agent did not run in this run. */
  readonly filters: readonly FilterSuggestion[] | null;
}

function cell(value: string): string {
  return value.replace(/\r?\n/g, ' ').replace(/\|/g, '\\|');
}

function summaryBlock(summary: TriageSummary): string[] {
  const rows: [string, number][] = [
    ['Logs', summary.log_count],
    ['Clusters', summary.cluster_count],
    ['Classified', summary.classified_count],
    ['Unclassified', summary.unclassified_count],
    ['High-priority internal errors', summary.internal_high_count],
  ];
  for (const [label, count] of Object.entries(summary.by_label).sort(([a], [b]) => a.localeCompare(b))) {
    rows.push([`Label: ${label}`, count]);
  }
  return ['## Summary', '', '| Metric | Value |', '|---|---|', ...rows.map(([k, v]) => `| ${k} | ${v} |`)];
}

function ticketBlock(drafts: readonly TicketDraft[], submitted: readonly SubmittedTicket[]): string[] {
  if (drafts.length === 0) return ['## Tickets', '', '_No ticket drafts._'];
  const ids = new Map(submitted.map((s) => [s.idx, s.ticket_id]));
  return [
    '## Tickets',
    '',
    '| Service | Summary | Ticket | Count |',
    '|---|---|---|---|',
    ...drafts.map(
      (d) => `| ${cell(d.service ?? '-')} | ${cell(d.ticket.summary)} | ${ids.get(d.idx) ?? 'not submitted'} | ${d.count} |`,
    ),
  ];
}

function filterBlock(filters: readonly FilterSuggestion[]): string[] {
  if (filters.length === 0) return ['## Filters', '', '_No filter suggestions._'];
  return [
    '## Filters',
    '',
    '| Service | Filter | Count |',
    '|---|---|---|',
    ...filters.map((f) => `| ${cell(f.service ?? '-')} | \`${cell(JSON.stringify(f.filter_clause))}\` | ${f.count} |`),
  ];
}

/**
 * Markdown rendered without the oracle. Sections appear in canonical
 * order; a section whose agent did not run is left out.
 */
export function renderLocalReport(input: ReportInput): string {
  const blocks: string[][] = [];
  for (const section of REPORT_SECTIONS) {
    if (!input.sections.includes(section)) continue;
    if (section === 'summary') blocks.push(summaryBlock(input.summary));
    if (section === 'ticket_links' && input.drafts !== null) blocks.push(ticketBlock(input.drafts, input.submitted));
    if (section === 'filters' && input.filters !== null) blocks.push(filterBlock(input.filters));
  }
  return blocks.map((lines) => lines.join('\n')).join('\n\n');
}

function reportPayload(input: ReportInput): Record<string, unknown> {
  const payload: Record<string, unknown> = { sections: input.sections };
  if (input.sections.includes('summary')) payload['summary'] = input.summary;
  if (input.sections.includes('ticket_links') && input.drafts !== null) {
    const ids = new Map(input.submitted.map((s) => [s.idx, s.ticket_id]));
    payload['ticket_links'] = input.drafts.map((d) => ({
      idx: d.idx,
      service: d.service,
      summary: d.ticket.summary,
      count: d.count,
      ticket_id: ids.get(d.idx) ?? null,
    }));
  }
  if (input.sections.includes('filters') && input.filters !== null) {
    payload['filters'] = input.filters.map((f) => ({
      idx: f.idx,
      service: f.service,
      count: f.count,
      filter_clause: f.filter_clause,
    }));
  }
  return payload;
}

/** Writes the session report; falls back to the local renderer when the oracle fails. */
export async function draftReport(
  input: ReportInput,
  oracle: JudgmentOracle,
  usage: UsageContext,
  log: Logger,
): Promise<Omit<ReportDraft, 'page_id'>> {
  const result = await oracle.judge(
    { purpose: 'report_draft', system: REPORT_SYSTEM, task: REPORT_TASK, payload: reportPayload(input) },
    usage,
  );

  if (result.ok) {
    const markdown = result.data['markdown'];
    if (typeof markdown === 'string' && markdown.trim() !== '') {
      return { markdown, generated_by: 'oracle' };
    }
    log.warn('Report oracle returned no markdown, rendering locally');
  } else {
    log.warn({ error: result.error, detail: result.detail }, 'Report oracle unavailable, rendering locally');
  }

  return { markdown: renderLocalReport(input), generated_by: 'local' };
}
