import type { Triage } from './triage.js';

/** Reason an item did not make it into an agent's output. */
export interface SkippedItem {
  readonly idx: number | null;
  readonly reason: string;
}

export interface TicketContent {
  readonly summary: string;
  readonly description: string;
  readonly suggested_query: string;
  readonly hits_past_window: string;
  readonly notes_for_development: string;
  readonly steps_to_reproduce: string;
  readonly stack_trace_excerpt: string;
}

/** A ticket proposal awaiting human approval. */
export interface TicketDraft {
  readonly idx: number;
  readonly fingerprint: string;
  readonly service: string | null;
  readonly component: string;
  readonly count: number;
  readonly triage: Triage;
  readonly ticket: TicketContent;
}

export interface TicketDraftSet {
  readonly draft_count: number;
  readonly skipped_count: number;
  readonly drafts: readonly TicketDraft[];
  readonly skipped: readonly SkippedItem[];
}

/** A search-exclusion clause proposed for a noisy cluster. */
export interface FilterSuggestion {
  readonly idx: number;
  readonly fingerprint: string;
  readonly service: string | null;
  readonly count: number;
  readonly filter_clause: Readonly<Record<string, unknown>>;
}

export interface FilterSuggestionSet {
  readonly suggestions: readonly FilterSuggestion[];
  readonly skipped: readonly SkippedItem[];
}

export interface ReportDraft {
  readonly markdown: string;
  readonly generated_by: 'oracle' | 'local';
  readonly page_id: string | null;
}

/** A draft that the ticket sink accepted. */
export interface SubmittedTicket {
  readonly idx: number;
  readonly fingerprint: string;
  readonly ticket_id: string;
}
