import { join } from 'node:path';
import type { Writable } from 'node:stream';
import type { Logger } from 'pino';
import type {
  DecisionPort,
  JudgmentOracle,
  LogSource,
  PipelineDeps,
  PipelineOptions,
  PlannerMode,
} from '../application/index.js';
import {
  deferredReview,
  runExecute,
  runPipeline,
  runPlan,
  runPreprocess,
  runRefine,
  runReview,
  runSummary,
  runTriage,
  UsageContext,
} from '../application/index.js';
import type { AppConfig, SinkMode } from '../infrastructure/index.js';
import {
  ConsoleDecisionPort,
  createBedrockTransport,
  createJudgmentOracle,
  createReportSink,
  createTicketSink,
  disabledOracle,
  FileArtifactStore,
  FileFeedbackStore,
  FileLogSource,
  SearchIndexLogSource,
} from '../infrastructure/index.js';
import { startServer } from './http/index.js';

export const COMMANDS = [
  'preprocess',
  'refine',
  'triage',
  'summarize',
  'plan',
  'execute',
  'review',
  'run',
  'serve',
] as const;
export type Command = (typeof COMMANDS)[number];

export interface CliOptions {
  readonly source: 'file' | 'search';
  readonly planner: PlannerMode;
  readonly feedback: boolean;
  readonly tickets: SinkMode;
  readonly report: SinkMode;
  readonly refine: boolean;
  readonly review: boolean;
}

export const DEFAULT_CLI_OPTIONS: CliOptions = {
  source: 'file',
  planner: 'oracle',
  feedback: true,
  tickets: 'mock',
  report: 'mock',
  refine: true,
  review: true,
};

export const USAGE = `Usage: triage-loop <command> [flags]

Commands:
  preprocess   fetch, normalize and cluster logs
  refine       merge near-duplicate clusters
  triage       classify clusters
  summarize    aggregate triage results
  plan         choose which agents to run
  execute      run the planned agents
  review       approve or reject saved ticket drafts
  run          all of the above, in order
  serve        start the read-only review API

Flags:
  --source file|search      log source (default: file)
  --planner oracle|fallback planning strategy (default: oracle)
  --no-feedback             ignore the feedback ledger while planning
  --tickets mock|real       ticket sink (default: mock)
  --report mock|real        report sink (default: mock)
  --no-refine               skip cluster refinement
  --no-review               do not prompt for approval; drafts stay unreviewed
`;

export type ParsedArgs =
  | { readonly ok: true; readonly command: Command; readonly options: CliOptions }
  | { readonly ok: false; readonly error: string };

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((command) => command === value);
}

function choiceError(flag: string, value: string | undefined, allowed: readonly string[]): string {
  return `${flag} expects one of ${allowed.join(', ')}, got ${value === undefined ? 'nothing' : `"${value}"`}`;
}

/** Parses `<command> [flags]`; flag values may follow a space or `=`. */
export function parseCliArgs(argv: readonly string[]): ParsedArgs {
  const [command, ...rest] = argv;
  if (!isCommand(command)) {
    return { ok: false, error: command === undefined ? 'No command given' : `Unknown command "${command}"` };
  }

  let options: CliOptions = DEFAULT_CLI_OPTIONS;

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i] ?? '';
    const eq = arg.indexOf('=');
    const flag = eq >= 0 ? arg.slice(0, eq) : arg;
    const inline = eq >= 0 ? arg.slice(eq + 1) : undefined;
    const value = (): string | undefined => inline ?? rest[++i];

    switch (flag) {
      case '--no-feedback':
        options = { ...options, feedback: false };
        break;
      case '--no-refine':
        options = { ...options, refine: false };
        break;
      case '--no-review':
        options = { ...options, review: false };
        break;
      case '--source': {
        const v = value();
        const source = v === 'file' || v === 'search' ? v : null;
        if (source === null) return { ok: false, error: choiceError(flag, v, ['file', 'search']) };
        options = { ...options, source };
        break;
      }
      case '--planner': {
        const v = value();
        const planner = v === 'oracle' || v === 'fallback' ? v : null;
        if (planner === null) return { ok: false, error: choiceError(flag, v, ['oracle', 'fallback']) };
        options = { ...options, planner };
        break;
      }
      case '--tickets':
      case '--report': {
        const v = value();
        const mode = v === 'mock' || v === 'real' ? v : null;
        if (mode === null) return { ok: false, error: choiceError(flag, v, ['mock', 'real']) };
        options = flag === '--tickets' ? { ...options, tickets: mode } : { ...options, report: mode };
        break;
      }
      default:
        return { ok: false, error: `Unknown flag "${arg}"` };
    }
  }

  return { ok: true, command, options };
}

// ─── Composition ─────────────────────────────────────────────

export function createOracle(config: AppConfig, log: Logger): JudgmentOracle {
  if (!config.oracle.enabled) {
    log.info('Judgment oracle disabled; stages fall back to their deterministic paths');
    return disabledOracle;
  }
  return createJudgmentOracle(
    createBedrockTransport(config.oracle),
    { maxAttempts: config.oracle.maxAttempts, baseDelayMs: config.oracle.baseDelayMs },
    log,
  );
}

export function createDeps(
  config: AppConfig,
  options: CliOptions,
  log: Logger,
  overrides: { readonly oracle?: JudgmentOracle; readonly decisions?: DecisionPort } = {},
): PipelineDeps {
  const source: LogSource = options.source === 'search'
    ? new SearchIndexLogSource(config.search, log)
    : new FileLogSource(config.logFile);

  return {
    source,
    oracle: overrides.oracle ?? createOracle(config, log),
    artifacts: new FileArtifactStore(config.outputDir, log),
    feedback: new FileFeedbackStore(join(config.outputDir, 'feedback.json'), log),
    decisions: overrides.decisions ?? (options.review ? new ConsoleDecisionPort() : deferredReview),
    ticketSink: createTicketSink(options.tickets, config.tickets, log),
    reportSink: createReportSink(options.report, config.report, log),
    log,
  };
}

export function pipelineOptions(config: AppConfig, options: CliOptions): PipelineOptions {
  return {
    planner: options.planner,
    useFeedback: options.feedback,
    refine: options.refine,
    refineChunkSize: config.pipeline.refineChunkSize,
    batchSize: config.pipeline.batchSize,
    excerptLines: config.pipeline.excerptLines,
    fallback: config.pipeline.fallback,
  };
}

function print(out: Writable, value: unknown): void {
  out.write(`${JSON.stringify(value, null, 2)}\n`);
}

/**
 * Runs one command and prints its result as JSON. Resolves to the
 * process exit code; `serve` resolves once the server is listening.
 */
export async function runCommand(
  command: Command,
  options: CliOptions,
  config: AppConfig,
  log: Logger,
  out: Writable = process.stdout,
  deps: PipelineDeps = createDeps(config, options, log),
): Promise<number> {
  const pipeline = pipelineOptions(config, options);
  const usage = new UsageContext();

  switch (command) {
    case 'preprocess': {
      const { events, clusters } = await runPreprocess(deps);
      print(out, { log_count: events.length, cluster_count: clusters?.length ?? 0 });
      return 0;
    }
    case 'refine': {
      const clusters = await runRefine(deps, pipeline, usage);
      print(out, { cluster_count: clusters.length, usage: usage.snapshot() });
      return 0;
    }
    case 'triage': {
      const items = await runTriage(deps, pipeline, usage);
      print(out, {
        triaged_cluster_count: items.length,
        unclassified_count: items.filter((i) => !i.triage.classified).length,
        usage: usage.snapshot(),
      });
      return 0;
    }
    case 'summarize':
      print(out, await runSummary(deps));
      return 0;
    case 'plan':
      print(out, await runPlan(deps, pipeline, usage));
      return 0;
    case 'execute': {
      const outcome = await runExecute(deps, pipeline, usage);
      print(out, { ...outcome, usage: usage.snapshot() });
      return outcome.errors.length > 0 ? 1 : 0;
    }
    case 'review': {
      const { outcome, submitted } = await runReview(deps);
      print(out, { ...outcome, submitted_tickets: submitted.map((s) => s.ticket_id) });
      return 0;
    }
    case 'run': {
      const result = await runPipeline(deps, pipeline);
      print(out, result);
      return result.status === 'stopped' && result.stopped === 'log_source_failed' ? 1 : 0;
    }
    case 'serve':
      await startServer(
        { artifacts: deps.artifacts, feedback: deps.feedback },
        { host: config.server.host, port: config.server.port, logLevel: config.logLevel },
      );
      return 0;
  }
}
