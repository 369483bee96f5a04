import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../../src/interfaces/http/server.js';
import { MemoryArtifactStore } from '../../src/infrastructure/store/memory-artifact-store.js';
import { MemoryFeedbackStore } from '../../src/infrastructure/store/memory-feedback-store.js';
import { classified, makeCluster, makeItem } from '../helpers.js';

describe('review API', () => {
  let artifacts: MemoryArtifactStore;
  let feedback: MemoryFeedbackStore;
  let app: FastifyInstance;

  beforeEach(async () => {
    artifacts = new MemoryArtifactStore();
    feedback = new MemoryFeedbackStore([
      { timestamp: '2025-03-01T10:00:00Z', fingerprint: 'fp-0', decision: 'rejected', reason: 'known issue' },
      { timestamp: '2025-03-01T11:00:00Z', fingerprint: 'fp-0', decision: 'approved', reason: null },
      { timestamp: '2025-03-01T12:00:00Z', fingerprint: 'fp-1', decision: 'rejected', reason: null },
    ]);
    app = await buildServer({ artifacts, feedback }, null);
  });

  afterEach(async () => {
    await app.close();
  });

  it('answers the health check', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok' });
  });

  it('returns 404 before any run', async () => {
    const urls = ['/api/v1/summary', '/api/v1/plan', '/api/v1/clusters', '/api/v1/triaged', '/api/v1/drafts', '/api/v1/runs/latest'];
    for (const url of urls) {
      const res = await app.inject({ method: 'GET', url });
      expect(res.statusCode).toBe(404);
    }
    const res = await app.inject({ method: 'GET', url: '/api/v1/runs/latest' });
    expect(res.json()).toEqual({ error: 'No run recorded' });
  });

  it('prefers refined clusters', async () => {
    await artifacts.save('clusters', { cluster_count: 2, log_count: 3, clusters: [makeCluster(0), makeCluster(1)] });

    const raw = await app.inject({ method: 'GET', url: '/api/v1/clusters' });
    expect(raw.json()).toMatchObject({ refined: false, cluster_count: 2 });

    await artifacts.save('clusters_refined', {
      clusters: [makeCluster(0, { count: 2, merged_member_idxs: [0, 1] })],
      report: {
        input_count: 2,
        output_count: 1,
        merged_groups: 1,
        skipped_groups: [],
        unreferenced_idxs: [],
        degraded: false,
      },
    });

    const refined = await app.inject({ method: 'GET', url: '/api/v1/clusters' });
    expect(refined.json()).toMatchObject({ refined: true, cluster_count: 1 });
  });

  it('filters triaged clusters by label and priority', async () => {
    await artifacts.save('triaged', {
      items: [
        makeItem(0, classified('internal_error', 'high')),
        makeItem(1, classified('noise', 'low')),
        makeItem(2, { classified: false, reason: 'not_classified' }),
      ],
      skipped: [],
    });

    const all = await app.inject({ method: 'GET', url: '/api/v1/triaged' });
    const noise = await app.inject({ method: 'GET', url: '/api/v1/triaged?label=noise' });
    const high = await app.inject({ method: 'GET', url: '/api/v1/triaged?priority=high' });

    expect(all.json().count).toBe(3);
    expect(noise.json().items.map((i: { idx: number }) => i.idx)).toEqual([1]);
    expect(high.json().items.map((i: { idx: number }) => i.idx)).toEqual([0]);
  });

  it('rejects an unknown label', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/triaged?label=bogus' });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: 'label must be one of timeout, external_service, internal_error, noise' });
  });

  it('lists feedback with the latest decision per fingerprint', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/feedback?fingerprint=fp-0' });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.count).toBe(2);
    expect(body.latest).toEqual({
      'fp-0': { timestamp: '2025-03-01T11:00:00Z', fingerprint: 'fp-0', decision: 'approved', reason: null },
    });
  });
});
