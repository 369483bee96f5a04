import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { ArtifactStore, FeedbackStore } from '../../application/index.js';

export interface StoresPluginOptions {
  readonly artifacts: ArtifactStore;
  readonly feedback: FeedbackStore;
}

/**
 * Decorates `fastify.artifacts` and `fastify.feedback` with the stores
 * the pipeline writes, so routes read exactly what the last run saved.
 */
async function storesPlugin(fastify: FastifyInstance, opts: StoresPluginOptions): Promise<void> {
  fastify.decorate('artifacts', opts.artifacts);
  fastify.decorate('feedback', opts.feedback);
}

export default fp(storesPlugin, {
  name: 'stores',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    artifacts: ArtifactStore;
    feedback: FeedbackStore;
  }
}
