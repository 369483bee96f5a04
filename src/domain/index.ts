export type { LogEvent, RawRecord } from './event.js';
export type { Cluster, RefineReport } from './cluster.js';
export { UNKNOWN_COMPONENT } from './cluster.js';
export type { Label, Level, Triage, TriagedItem, TriageSummary } from './triage.js';
export { LABELS, LEVELS, levelRank } from './triage.js';
export type { FeedbackEntry, FeedbackDecision } from './feedback.js';
export type {
  AgentName,
  ReportSection,
  TicketDraftsAction,
  FilterSuggestionsAction,
  ReportDraftAction,
  PlanAction,
  PlanStrategy,
  GlobalPolicy,
  ActionPlan,
} from './plan.js';
export { AGENT_NAMES, REPORT_SECTIONS } from './plan.js';
export type {
  SkippedItem,
  TicketContent,
  TicketDraft,
  TicketDraftSet,
  FilterSuggestion,
  FilterSuggestionSet,
  ReportDraft,
  SubmittedTicket,
} from './drafts.js';
export type {
  UsageSnapshot,
  RunTiming,
  AgentError,
  ReviewOutcome,
  AgentResults,
  StopReason,
  RunResult,
} from './run.js';
