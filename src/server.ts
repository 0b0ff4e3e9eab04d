import Fastify, { FastifyInstance } from 'fastify';
import { healthRoutes } from './api/health';
import { RunStore } from './services/run-store';
import { AppConfig } from './types/config';

export async function buildServer(config: Readonly<AppConfig>): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: config.env !== 'test',
  });

  const store = new RunStore(config.stateFile, config.reportFile, config.siteTimeZone);
  await fastify.register(healthRoutes, { prefix: '/health', store });

  return fastify;
}
