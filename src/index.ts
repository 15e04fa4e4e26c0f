import Fastify from 'fastify';
import 'dotenv/config';
import { registerErrorHandler } from './lib/error-handler.js';
import { getPlannerConfig } from './lib/config/planner.js';
import { provisioningRoutes } from './routes/provisioning.js';

const config = getPlannerConfig();

const fastify = Fastify({
  logger: { level: config.logLevel },
});

registerErrorHandler(fastify);

fastify.log.info(
  {
    solverTimeLimitMs: config.solverTimeLimitMs,
    defaultHorizonDays: config.defaultHorizonDays,
    defaultCommitmentTermDays: config.defaultCommitmentTermDays,
  },
  'Planner configuration loaded'
);

fastify.get('/health', async () => {
  return { status: 'ok' };
});

// Register API routes
await fastify.register(provisioningRoutes);

const start = async () => {
  try {
    await fastify.listen({ port: config.port, host: config.host });
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

await start();
