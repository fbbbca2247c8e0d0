// ============================================================================
// tracesift — Fastify application
// Built separately from the entry point so tests can inject requests.
// ============================================================================

import Fastify, { type FastifyInstance } from 'fastify';
import rateLimit from '@fastify/rate-limit';
import type { Config } from './config.js';
import analyzePlugin from './plugins/analyze.js';
import healthPlugin from './plugins/health.js';

export async function buildApp(config: Config): Promise<FastifyInstance> {
  const app = Fastify({
    trustProxy: true,
    logger: false, // We use our own structured logger
  });

  app.addHook('onSend', async (_request, reply, payload) => {
    reply.header('X-Content-Type-Options', 'nosniff');
    return payload;
  });

  // Rate limiting
  await app.register(rateLimit, {
    global: false, // Apply per-route, not globally
  });

  await app.register(healthPlugin);
  await app.register(analyzePlugin, { config });

  return app;
}
