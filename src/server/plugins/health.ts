// ============================================================================
// tracesift — Health Plugin
// ============================================================================

import type { FastifyInstance } from 'fastify';
import type { HealthStatus } from '../../shared/types.js';
import { DYNAMIC_PRIORITY } from '../services/traces/grammars/index.js';

// --- Server start time ---

const startedAt = Date.now();

// --- Plugin ---

export default async function healthPlugin(fastify: FastifyInstance): Promise<void> {

  // GET /health — public health check
  fastify.get('/health', async (_request, reply) => {
    const health: HealthStatus = {
      status: 'ok',
      uptime: Math.floor((Date.now() - startedAt) / 1000),
      grammars: [...DYNAMIC_PRIORITY],
    };

    return reply.status(200).send(health);
  });
}
