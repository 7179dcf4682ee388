import 'dotenv/config';
import { buildApp } from './app.js';
import { getAppConfig } from './lib/config/simulation.js';
import { logger } from './lib/logger.js';

const start = async () => {
  try {
    const config = getAppConfig();
    const fastify = await buildApp(config);
    await fastify.listen({ port: config.port, host: config.host });
  } catch (err) {
    logger.fatal({ err }, 'Server failed to start');
    process.exit(1);
  }
};

await start();
