import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import storesPlugin from './stores-plugin.js';
import type { StoresPluginOptions } from './stores-plugin.js';
import reviewRoutes from './review-routes.js';

/**
 * Builds the review API without listening, so tests can drive it
 * through `inject()`. Pass `logLevel: null` to disable logging.
 */
export async function buildServer(
  stores: StoresPluginOptions,
  logLevel: string | null = 'info',
): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: logLevel === null ? false : { level: logLevel },
  });

  await fastify.register(storesPlugin, stores);
  await fastify.register(reviewRoutes);

  return fastify;
}

/** Builds the review API and listens until SIGINT or SIGTERM. */
export async function startServer(
  stores: StoresPluginOptions,
  options: { readonly host: string; readonly port: number; readonly logLevel: string },
): Promise<FastifyInstance> {
  const fastify = await buildServer(stores, options.logLevel);

  const shutdown = (): void => {
    fastify.log.info('Shutting down review API...');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await fastify.listen({ host: options.host, port: options.port });
  return fastify;
}
