import type { Logger } from 'pino';
import type {
  ActionPlan,
  Cluster,
  LogEvent,
  RunResult,
  RunTiming,
  StopReason,
  SubmittedTicket,
  TriagedItem,
  TriageSummary,
} from '../domain/index.js';
import type {
  ArtifactMap,
  ArtifactName,
  ArtifactStore,
  DecisionPort,
  FeedbackStore,
  JudgmentOracle,
  LogSource,
  ReportSink,
  TicketSink,
} from './ports.js';
import { UsageContext } from './usage.js';
import { normalizeRecords } from './normalizer.js';
import { clusterEvents } from './clusterer.js';
import { refineClusters } from './cluster-refiner.js';
import { classifyClusters } from './classifier.js';
import { summarizeTriage } from './summarizer.js';
import type { FallbackOptions, PlannerMode } from './planner.js';
import { planActions } from './planner.js';
import type { ExecutionOutcome } from './executor.js';
import { executePlan } from './executor.js';
import type { ReviewResult } from './approval.js';
import { reviewDrafts, submitApproved } from './approval.js';

export interface PipelineDeps {
  readonly source: LogSource;
  readonly oracle: JudgmentOracle;
  readonly artifacts: ArtifactStore;
  readonly feedback: FeedbackStore;
  readonly decisions: DecisionPort;
  readonly ticketSink: TicketSink;
  readonly reportSink: ReportSink;
  readonly clock?: () => Date;
  readonly log: Logger;
}

export interface PipelineOptions {
  readonly planner: PlannerMode;
  /** Read the feedback ledger while planning. */
  readonly useFeedback: boolean;
  readonly refine: boolean;
  readonly refineChunkSize: number | null;
  /** Clusters per classification and ticket-drafting call. */
  readonly batchSize: number;
  readonly excerptLines: number;
  readonly fallback?: FallbackOptions;
}

export const DEFAULT_PIPELINE_OPTIONS: PipelineOptions = {
  planner: 'oracle',
  useFeedback: true,
  refine: true,
  refineChunkSize: null,
  batchSize: 10,
  excerptLines: 15,
};

const systemClock = (): Date => new Date();

async function requireArtifact<K extends ArtifactName>(
  store: ArtifactStore,
  name: K,
  producer: string,
): Promise<ArtifactMap[K]> {
  const value = await store.load(name);
  if (value === null) {
    throw new Error(`Artifact "${name}" not found; run "${producer}" first`);
  }
  return value;
}

// ─── Stages ──────────────────────────────────────────────────

/**
 * Fetches, normalizes and clusters the logs. An empty batch is saved as
 * such and stops here, leaving the previous clusters untouched. New
 * clusters invalidate any refinement of the previous ones.
 */
export async function runPreprocess(
  deps: PipelineDeps,
): Promise<{ events: LogEvent[]; clusters: Cluster[] | null }> {
  const records = await deps.source.fetch();
  const events = normalizeRecords(records);
  await deps.artifacts.save('events', { count: events.length, items: events });
  deps.log.info({ source: deps.source.name, count: events.length }, 'Logs normalized');

  if (events.length === 0) return { events, clusters: null };

  const clusters = clusterEvents(events);
  await deps.artifacts.save('clusters', {
    cluster_count: clusters.length,
    log_count: events.length,
    clusters,
  });
  await deps.artifacts.remove('clusters_refined');
  deps.log.info({ clusters: clusters.length }, 'Logs clustered');
  return { events, clusters };
}

export async function runRefine(
  deps: PipelineDeps,
  options: PipelineOptions,
  usage = new UsageContext(),
  input?: readonly Cluster[],
): Promise<Cluster[]> {
  const clusters = input ?? (await requireArtifact(deps.artifacts, 'clusters', 'preprocess')).clusters;
  const outcome = await refineClusters(clusters, deps.oracle, usage, { chunkSize: options.refineChunkSize }, deps.log);
  await deps.artifacts.save('clusters_refined', outcome);
  return outcome.clusters;
}

/** Classifies the refined clusters, or the raw ones when no refinement was saved. */
export async function runTriage(
  deps: PipelineDeps,
  options: PipelineOptions,
  usage = new UsageContext(),
  input?: readonly Cluster[],
): Promise<TriagedItem[]> {
  let clusters = input;
  if (clusters === undefined) {
    const refined = await deps.artifacts.load('clusters_refined');
    clusters = refined?.clusters ?? (await requireArtifact(deps.artifacts, 'clusters', 'preprocess')).clusters;
  }

  const outcome = await classifyClusters(
    clusters,
    deps.oracle,
    usage,
    { batchSize: options.batchSize, excerptLines: options.excerptLines },
    deps.log,
  );
  await deps.artifacts.save('triaged', outcome);
  return outcome.items;
}

export async function runSummary(
  deps: PipelineDeps,
  input?: { readonly items: readonly TriagedItem[]; readonly logCount: number },
): Promise<TriageSummary> {
  const items = input?.items ?? (await requireArtifact(deps.artifacts, 'triaged', 'triage')).items;
  const logCount = input?.logCount ?? (await requireArtifact(deps.artifacts, 'clusters', 'preprocess')).log_count;

  const summary = summarizeTriage(items, logCount);
  await deps.artifacts.save('summary', summary);
  deps.log.info({ summary }, 'Summary built');
  return summary;
}

export async function runPlan(
  deps: PipelineDeps,
  options: PipelineOptions,
  usage = new UsageContext(),
  input?: { readonly summary: TriageSummary; readonly items: readonly TriagedItem[] },
): Promise<ActionPlan> {
  const summary = input?.summary ?? (await requireArtifact(deps.artifacts, 'summary', 'summarize'));
  const items = input?.items ?? (await requireArtifact(deps.artifacts, 'triaged', 'triage')).items;
  const feedback = options.useFeedback ? await deps.feedback.load() : null;

  const plan = await planActions(
    { summary, items, feedback, mode: options.planner, fallback: options.fallback },
    deps.oracle,
    usage,
    deps.log,
  );
  await deps.artifacts.save('plan', plan);
  deps.log.info({ strategy: plan.strategy, actions: plan.actions.map((a) => `${a.agent}:${a.run}`) }, 'Plan ready');
  return plan;
}

export async function runExecute(
  deps: PipelineDeps,
  options: PipelineOptions,
  usage = new UsageContext(),
  input?: { readonly plan: ActionPlan; readonly summary: TriageSummary; readonly items: readonly TriagedItem[] },
): Promise<ExecutionOutcome> {
  const plan = input?.plan ?? (await requireArtifact(deps.artifacts, 'plan', 'plan'));
  const summary = input?.summary ?? (await requireArtifact(deps.artifacts, 'summary', 'summarize'));
  const items = input?.items ?? (await requireArtifact(deps.artifacts, 'triaged', 'triage')).items;

  return executePlan(plan, {
    summary,
    items,
    oracle: deps.oracle,
    usage,
    artifacts: deps.artifacts,
    feedback: deps.feedback,
    decisions: deps.decisions,
    ticketSink: deps.ticketSink,
    reportSink: deps.reportSink,
    clock: deps.clock ?? systemClock,
    ticketBatchSize: options.batchSize,
    log: deps.log,
  });
}

/** Reviews the saved ticket drafts and submits the approved ones. */
export async function runReview(
  deps: PipelineDeps,
): Promise<ReviewResult & { readonly submitted: readonly SubmittedTicket[] }> {
  const set = await requireArtifact(deps.artifacts, 'ticket_drafts', 'execute');
  const review = await reviewDrafts(set.drafts, deps.decisions, deps.feedback, deps.clock ?? systemClock, deps.log);
  const submitted = await submitApproved(review.approved, deps.ticketSink, deps.log);
  return { ...review, submitted };
}

// ─── Full run ────────────────────────────────────────────────

function timing(started: Date, finished: Date): RunTiming {
  return {
    started_at: started.toISOString(),
    finished_at: finished.toISOString(),
    duration_ms: finished.getTime() - started.getTime(),
  };
}

/**
 * One end-to-end run: every stage in order, each artifact saved as it
 * is produced, and a `run_result` saved last, including for runs that
 * stop early.
 */
export async function runPipeline(
  deps: PipelineDeps,
  options: PipelineOptions = DEFAULT_PIPELINE_OPTIONS,
): Promise<RunResult> {
  const clock = deps.clock ?? systemClock;
  const started = clock();
  const usage = new UsageContext();
  const { log } = deps;

  const stop = async (stopped: StopReason, logCount: number, errors: string[]): Promise<RunResult> => {
    const result: RunResult = {
      status: 'stopped',
      stopped,
      log_count: logCount,
      timing: timing(started, clock()),
      usage: usage.snapshot(),
      errors,
    };
    await deps.artifacts.save('run_result', result);
    log.warn({ stopped, log_count: logCount }, 'Run stopped early');
    return result;
  };

  let preprocessed: Awaited<ReturnType<typeof runPreprocess>>;
  try {
    preprocessed = await runPreprocess(deps);
  } catch (err: unknown) {
    log.error({ err, source: deps.source.name }, 'Log source failed');
    return stop('log_source_failed', 0, [err instanceof Error ? err.message : String(err)]);
  }

  const { events, clusters: rawClusters } = preprocessed;
  if (rawClusters === null) return stop('no_logs', 0, []);

  const clusters = options.refine ? await runRefine(deps, options, usage, rawClusters) : rawClusters;
  const items = await runTriage(deps, options, usage, clusters);
  const summary = await runSummary(deps, { items, logCount: events.length });
  const plan = await runPlan(deps, options, usage, { summary, items });
  const outcome = await runExecute(deps, options, usage, { plan, summary, items });

  const result: RunResult = {
    status: 'completed',
    log_count: events.length,
    cluster_count: clusters.length,
    timing: timing(started, clock()),
    usage: usage.snapshot(),
    summary,
    plan,
    results: outcome.results,
    skipped_agents: outcome.skipped_agents,
    submitted_tickets: outcome.submitted_tickets,
    errors: outcome.errors,
  };
  await deps.artifacts.save('run_result', result);
  log.info(
    { log_count: result.log_count, cluster_count: result.cluster_count, usage: result.usage },
    'Run completed',
  );
  return result;
}
