export type {
  OracleErrorKind,
  OracleResult,
  OracleRequest,
  JudgmentOracle,
  LogSource,
  TicketSink,
  ReportSink,
  Decision,
  DecisionPort,
  ArtifactMap,
  ArtifactName,
  ArtifactStore,
  FeedbackStore,
} from './ports.js';
export { UsageContext } from './usage.js';
export { normalizeRecord, normalizeRecords, stackExcerpt, FIELD_ALIASES } from './normalizer.js';
export { clusterEvents, clusterKey, seenRange } from './clusterer.js';
export { fingerprint } from './fingerprint.js';
export { refineClusters } from './cluster-refiner.js';
export type { RefineOptions, RefineOutcome } from './cluster-refiner.js';
export { classifyClusters, parseClassificationItems } from './classifier.js';
export type { ClassifyOptions, ClassifyOutcome } from './classifier.js';
export { summarizeTriage } from './summarizer.js';
export { indexFeedback } from './feedback.js';
export type { FeedbackIndex } from './feedback.js';
export { normalizePlan, defaultPlan } from './plan-normalizer.js';
export {
  buildPolicyView,
  buildFallbackPlan,
  applyFeedbackSuppression,
  planWithPolicyOracle,
  planActions,
} from './planner.js';
export type { PlannerMode, FallbackOptions, PlanningRequest, PolicyClusterView } from './planner.js';
export { draftTickets, selectTicketCandidates } from './agents/ticket-drafts.js';
export { suggestFilters, selectFilterCandidates } from './agents/filter-suggestions.js';
export { draftReport, renderLocalReport } from './agents/report-draft.js';
export type { ReportInput } from './agents/report-draft.js';
export { reviewDrafts, submitApproved, deferredReview } from './approval.js';
export type { ReviewResult } from './approval.js';
export { executePlan } from './executor.js';
export type { ExecutionContext, ExecutionOutcome } from './executor.js';
export {
  runPipeline,
  runPreprocess,
  runRefine,
  runTriage,
  runSummary,
  runPlan,
  runExecute,
  runReview,
  DEFAULT_PIPELINE_OPTIONS,
} from './pipeline.js';
export type { PipelineDeps, PipelineOptions } from './pipeline.js';
