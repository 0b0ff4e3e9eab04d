#!/usr/bin/env node
import dotenv from 'dotenv';
dotenv.config();

import { FastifyInstance } from 'fastify';
import { buildServer } from './server';
import { createRenewalRunner, exitCodeFor } from './services/renewal-runner';
import { AppConfig } from './types/config';
import { describeError } from './types/errors';
import { rootLogger } from './utils/logger';
import { loadConfig } from './utils/validation';

const logger = rootLogger.child({ module: 'Main' });

async function renew(config: Readonly<AppConfig>): Promise<void> {
  logger.info('='.repeat(60));
  logger.info(`🚀 VPS renewal for ${config.panel.resourceId}`);
  logger.info('='.repeat(60));

  const record = await createRenewalRunner(config).runOnce();

  logger.info(`✅ Finished with status ${record.status}`);
  process.exitCode = exitCodeFor(record.status);
}

async function serve(config: Readonly<AppConfig>): Promise<void> {
  const fastify: FastifyInstance = await buildServer(config);
  const host = config.env === 'production' ? '0.0.0.0' : 'localhost';

  await fastify.listen({ port: config.statusPort, host });
  logger.info(`📊 Status available at http://${host}:${config.statusPort}/health/last-run`);

  // Handle graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully`);
    try {
      await fastify.close();
      process.exit(0);
    } catch (error) {
      logger.error({ error: describeError(error) }, '❌ Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

async function main(): Promise<void> {
  const command = process.argv[2] ?? 'renew';

  let config: Readonly<AppConfig>;
  try {
    config = loadConfig(process.env);
    logger.info('✅ Environment variables validated');
  } catch (error) {
    logger.error({ error: describeError(error) }, '❌ Invalid environment variables');
    process.exitCode = 1;
    return;
  }

  switch (command) {
    case 'renew':
      await renew(config);
      break;
    case 'serve':
      await serve(config);
      break;
    default:
      logger.error(`Unknown command "${command}", expected "renew" or "serve"`);
      process.exitCode = 2;
  }
}

main().catch(error => {
  logger.error({ error: describeError(error) }, '❌ Unexpected failure');
  process.exitCode = 1;
});
