import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { Label, Level } from '../../domain/index.js';
import { LABELS, LEVELS } from '../../domain/index.js';
import { indexFeedback } from '../../application/index.js';

function asLabel(value: string): Label | undefined {
  return LABELS.find((label) => label === value);
}

function asLevel(value: string): Level | undefined {
  return LEVELS.find((level) => level === value);
}

/**
 * Read-only review API over the artifacts of the latest run.
 *
 * GET /health
 * GET /api/v1/summary
 * GET /api/v1/plan
 * GET /api/v1/clusters    refined clusters when available
 * GET /api/v1/triaged     ?label= &priority=
 * GET /api/v1/drafts
 * GET /api/v1/feedback    ?fingerprint=
 * GET /api/v1/runs/latest
 *
 * Feedback is recorded only by the approval loop; nothing here writes.
 */
async function reviewRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get('/health', async (_request, reply: FastifyReply) => reply.status(200).send({ status: 'ok' }));

  fastify.get('/api/v1/summary', async (_request, reply: FastifyReply) => {
    const summary = await fastify.artifacts.load('summary');
    if (summary === null) return reply.status(404).send({ error: 'Summary not found' });
    return reply.status(200).send(summary);
  });

  fastify.get('/api/v1/plan', async (_request, reply: FastifyReply) => {
    const plan = await fastify.artifacts.load('plan');
    if (plan === null) return reply.status(404).send({ error: 'Plan not found' });
    return reply.status(200).send(plan);
  });

  fastify.get('/api/v1/clusters', async (_request, reply: FastifyReply) => {
    const refined = await fastify.artifacts.load('clusters_refined');
    if (refined !== null) {
      return reply.status(200).send({ refined: true, cluster_count: refined.clusters.length, clusters: refined.clusters });
    }
    const raw = await fastify.artifacts.load('clusters');
    if (raw === null) return reply.status(404).send({ error: 'Clusters not found' });
    return reply.status(200).send({ refined: false, cluster_count: raw.cluster_count, clusters: raw.clusters });
  });

  /**
   * GET /api/v1/triaged
   *
   * Without filters every triaged cluster is returned; a label or
   * priority filter matches classified clusters only.
   */
  fastify.get(
    '/api/v1/triaged',
    async (
      request: FastifyRequest<{ Querystring: { label?: string; priority?: string } }>,
      reply: FastifyReply,
    ) => {
      const q = request.query;

      const label = q.label === undefined ? undefined : asLabel(q.label);
      if (q.label !== undefined && label === undefined) {
        return reply.status(400).send({ error: `label must be one of ${LABELS.join(', ')}` });
      }
      const priority = q.priority === undefined ? undefined : asLevel(q.priority);
      if (q.priority !== undefined && priority === undefined) {
        return reply.status(400).send({ error: `priority must be one of ${LEVELS.join(', ')}` });
      }

      const triaged = await fastify.artifacts.load('triaged');
      if (triaged === null) return reply.status(404).send({ error: 'Triage results not found' });

      const items = triaged.items.filter((item) => {
        if (label === undefined && priority === undefined) return true;
        const t = item.triage;
        return t.classified &&
          (label === undefined || t.label === label) &&
          (priority === undefined || t.priority === priority);
      });

      return reply.status(200).send({ count: items.length, items });
    },
  );

  fastify.get('/api/v1/drafts', async (_request, reply: FastifyReply) => {
    const drafts = await fastify.artifacts.load('ticket_drafts');
    if (drafts === null) return reply.status(404).send({ error: 'Ticket drafts not found' });
    return reply.status(200).send(drafts);
  });

  fastify.get(
    '/api/v1/feedback',
    async (request: FastifyRequest<{ Querystring: { fingerprint?: string } }>, reply: FastifyReply) => {
      const { fingerprint } = request.query;
      const all = await fastify.feedback.load();
      const entries = fingerprint === undefined ? all : all.filter((e) => e.fingerprint === fingerprint);

      return reply.status(200).send({
        count: entries.length,
        entries,
        latest: Object.fromEntries(indexFeedback(entries)),
      });
    },
  );

  fastify.get('/api/v1/runs/latest', async (_request, reply: FastifyReply) => {
    const run = await fastify.artifacts.load('run_result');
    if (run === null) return reply.status(404).send({ error: 'No run recorded' });
    return reply.status(200).send(run);
  });
}

export default fp(reviewRoutes, {
  name: 'review-routes',
  dependencies: ['stores'],
  fastify: '5.x',
});
