import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { AppConfig } from './lib/config/simulation.js';
import { registerErrorHandler } from './lib/error-handler.js';
import { logger } from './lib/logger.js';
import { simulationsRoutes } from './routes/simulations.js';
import { SimulationService } from './services/simulation.service.js';

export async function buildApp(config: AppConfig): Promise<FastifyInstance> {
  logger.level = config.logLevel;

  const fastify = Fastify({
    logger: { level: config.logLevel },
  });

  await fastify.register(cors, {
    origin: config.frontendUrl,
  });

  registerErrorHandler(fastify);

  fastify.get('/health', async () => {
    return { status: 'ok' };
  });

  await fastify.register(simulationsRoutes, {
    service: new SimulationService(() => config),
  });

  return fastify;
}
