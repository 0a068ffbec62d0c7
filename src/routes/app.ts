import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { EngineClient } from '../engine/base.js';
import { errorMessage } from '../errors.js';

export interface AppRoutesOptions {
  engine: EngineClient;
}

const HEALTH_TIMEOUT_MS = 2000;

export async function appRoutes(fastify: FastifyInstance, opts: AppRoutesOptions): Promise<void> {
  // Health check: the service answers even when the engine does not
  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    try {
      const { version } = await opts.engine.getVersion({ timeoutMs: HEALTH_TIMEOUT_MS });
      return reply.send({ status: 'ok', engine: { name: opts.engine.name, reachable: true, version } });
    } catch (error: unknown) {
      return reply.send({
        status: 'ok',
        engine: { name: opts.engine.name, reachable: false, error: errorMessage(error) },
      });
    }
  });
}
