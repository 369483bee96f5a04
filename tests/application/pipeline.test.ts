import { describe, it, expect } from 'vitest';
import {
  DEFAULT_PIPELINE_OPTIONS,
  runPipeline,
  runReview,
  runTriage,
} from '../../src/application/pipeline.js';
import type { PipelineDeps } from '../../src/application/pipeline.js';
import type { Decision, LogSource, OracleRequest } from '../../src/application/ports.js';
import type { RawRecord } from '../../src/domain/index.js';
import { MemoryArtifactStore } from '../../src/infrastructure/store/memory-artifact-store.js';
import { MemoryFeedbackStore } from '../../src/infrastructure/store/memory-feedback-store.js';
import { createMockTicketSink } from '../../src/infrastructure/sinks/ticket-sink.js';
import { createMockReportSink } from '../../src/infrastructure/sinks/report-sink.js';
import { fakeLogger, failed, makeDraft, ok, ScriptedDecisions, ScriptedOracle } from '../helpers.js';

const npe = (ts: string): RawRecord => ({
  '@timestamp': ts,
  level: 'ERROR',
  service: 'order-service',
  logger: 'com.example.orders.OrderService',
  message: 'NullPointerException while finalizing order',
});

const records: RawRecord[] = [
  npe('2025-03-02T08:00:00Z'),
  { '@timestamp': '2025-03-02T08:01:00Z', level: 'DEBUG', service: 'inventory-service', logger: 'com.example.Cache', message: 'Cache refresh completed' },
  npe('2025-03-02T08:02:00Z'),
  npe('2025-03-02T08:03:00Z'),
];

const source = (fetched: RawRecord[] | Error): LogSource => ({
  name: 'test',
  fetch: () => (fetched instanceof Error ? Promise.reject(fetched) : Promise.resolve(fetched)),
});

function answer(request: OracleRequest) {
  switch (request.purpose) {
    case 'refine':
      return ok({ groups: [{ canonical_idx: 0, member_idxs: [0] }, { canonical_idx: 1, member_idxs: [1] }] });
    case 'classify':
      return ok({
        items: [
          { idx: 0, triage: { label: 'internal_error', priority: 'high', severity: 'high', confidence: 0.9, reason: 'npe' } },
          { idx: 1, label: 'noise', priority: 'low', severity: 'low', confidence: 0.8, reason: 'debug' },
        ],
      });
    case 'ticket_drafts':
      return ok({ items: [{ idx: 0, summary: 'NPE while finalizing order' }] });
    case 'filter_suggestions':
      return ok({ items: [{ idx: 1, filter_clause: { match_phrase: { log: 'Cache refresh completed' } } }] });
    default:
      return failed();
  }
}

function deps(overrides: Partial<PipelineDeps> = {}, script: Decision[] = [{ kind: 'approve' }]) {
  const artifacts = new MemoryArtifactStore();
  const feedback = new MemoryFeedbackStore();
  const oracle = new ScriptedOracle(answer);
  const log = fakeLogger();
  const built: PipelineDeps = {
    source: source(records),
    oracle,
    artifacts,
    feedback,
    decisions: new ScriptedDecisions(script),
    ticketSink: createMockTicketSink(log),
    reportSink: createMockReportSink(null, log),
    clock: () => new Date('2025-03-02T12:00:00Z'),
    log,
    ...overrides,
  };
  return { deps: built, artifacts, feedback, oracle };
}

describe('runPipeline', () => {
  it('runs every stage and saves each artifact', async () => {
    const { deps: d, artifacts, oracle } = deps();

    const result = await runPipeline(d);

    expect(oracle.purposes()).toEqual([
      'refine',
      'classify',
      'plan',
      'ticket_drafts',
      'filter_suggestions',
      'report_draft',
    ]);
    expect(result).toMatchObject({
      status: 'completed',
      log_count: 4,
      cluster_count: 2,
      submitted_tickets: ['MOCK-1'],
      errors: [],
      plan: { strategy: 'fallback' },
      summary: { internal_high_count: 1, by_label: { internal_error: 1, noise: 1 } },
      usage: { calls: 6, prompt_tokens: 60, completion_tokens: 30, total_tokens: 90 },
      timing: { started_at: '2025-03-02T12:00:00.000Z', duration_ms: 0 },
    });
    for (const name of [
      'events',
      'clusters',
      'clusters_refined',
      'triaged',
      'summary',
      'plan',
      'ticket_drafts',
      'filter_suggestions',
      'report',
      'run_result',
    ] as const) {
      expect(artifacts.has(name)).toBe(true);
    }
    expect((await artifacts.load('report'))?.generated_by).toBe('local');
  });

  it('skips refinement when switched off', async () => {
    const { deps: d, artifacts, oracle } = deps();

    await runPipeline(d, { ...DEFAULT_PIPELINE_OPTIONS, refine: false, planner: 'fallback' });

    expect(oracle.purposes()).not.toContain('refine');
    expect(oracle.purposes()).not.toContain('plan');
    expect(artifacts.has('clusters_refined')).toBe(false);
  });

  it('stops with no_logs on an empty batch', async () => {
    const { deps: d, artifacts, oracle } = deps({ source: source([]) });

    const result = await runPipeline(d);

    expect(result).toMatchObject({ status: 'stopped', stopped: 'no_logs', log_count: 0, errors: [] });
    expect(oracle.requests).toHaveLength(0);
    expect(artifacts.has('clusters')).toBe(false);
    expect(await artifacts.load('run_result')).toEqual(result);
  });

  it('stops with log_source_failed when fetching throws', async () => {
    const { deps: d, artifacts } = deps({ source: source(new Error('connection refused')) });

    const result = await runPipeline(d);

    expect(result).toMatchObject({ status: 'stopped', stopped: 'log_source_failed', errors: ['connection refused'] });
    expect(artifacts.has('run_result')).toBe(true);
  });

  it('does not draft a ticket for a cluster reviewed in an earlier run', async () => {
    const first = deps();
    await runPipeline(first.deps);

    const second = deps({ feedback: first.feedback });
    const result = await runPipeline(second.deps);

    expect(second.oracle.purposes()).not.toContain('ticket_drafts');
    expect(result.status === 'completed' && result.results.ticket_drafts).toEqual({
      draft_count: 0,
      skipped_count: 1,
      review: null,
      submitted: [],
    });
    expect(await first.feedback.load()).toHaveLength(1);
  });
});

describe('standalone stages', () => {
  it('require the artifact of the previous stage', async () => {
    const { deps: d } = deps();
    await expect(runTriage(d, DEFAULT_PIPELINE_OPTIONS)).rejects.toThrow(
      'Artifact "clusters" not found; run "preprocess" first',
    );
  });

  it('reviews saved drafts', async () => {
    const { deps: d, artifacts, feedback } = deps({}, [{ kind: 'reject', reason: 'flaky test env' }]);
    await artifacts.save('ticket_drafts', { draft_count: 1, skipped_count: 0, drafts: [makeDraft(3)], skipped: [] });

    const review = await runReview(d);

    expect(review.outcome).toEqual({ reviewed: 1, approved: 0, rejected: 1, skipped_all: false });
    expect(review.submitted).toEqual([]);
    expect((await feedback.load())[0]).toMatchObject({ fingerprint: 'fp-3', reason: 'flaky test env' });
  });
});
