import { FastifyPluginAsync } from 'fastify';
import { RunState } from '../utils/validation';

export const SERVICE_NAME = 'hosting-renewal-bot';

export interface HealthRouteOptions {
  store: { load(): Promise<RunState | null> };
}

export const healthRoutes: FastifyPluginAsync<HealthRouteOptions> = async (fastify, options) => {
  // Basic health check
  fastify.get('/', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: SERVICE_NAME,
      version: process.env.npm_package_version || '1.0.0'
    };
  });

  // Liveness check
  fastify.get('/live', async () => {
    return { status: 'alive', timestamp: new Date().toISOString() };
  });

  // Outcome of the most recent renewal run
  fastify.get('/last-run', async (_, reply) => {
    try {
      const state = await options.store.load();
      if (!state) {
        return reply.status(404).send({ status: 'not_found', message: 'No renewal run has been recorded yet' });
      }
      return state;
    } catch (error) {
      fastify.log.error({ error }, 'Failed to read run state');
      return reply.status(503).send({ status: 'unavailable', error: 'Run state could not be read' });
    }
  });
};
