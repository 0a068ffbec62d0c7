import Fastify, { FastifyInstance } from 'fastify';
import fastifyFormbody from '@fastify/formbody';
import fastifyMultipart from '@fastify/multipart';
import { isOrchestratorError } from './errors.js';
import { registerRoutes, type RouteDependencies } from './routes/index.js';

export interface ServerOptions extends RouteDependencies {
  maxTorrentSize: number;
}

export async function buildServer(options: ServerOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: false,
  });

  // Register plugins
  await fastify.register(fastifyFormbody);
  await fastify.register(fastifyMultipart, {
    limits: {
      fileSize: options.maxTorrentSize,
      files: 1,
    },
  });

  fastify.setErrorHandler(async (error, request, reply) => {
    if (isOrchestratorError(error)) {
      return reply.status(error.statusCode).send({
        error: error.kind,
        message: error.message,
        ...(error.taskId ? { taskId: error.taskId } : {}),
      });
    }

    // Fastify / plugin client errors (body too large, bad content type...)
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ error: error.code || 'BadRequest', message: error.message });
    }

    console.error(`[Server] ${request.method} ${request.url} failed:`, error);
    return reply.status(500).send({ error: 'Internal', message: 'Internal server error' });
  });

  await registerRoutes(fastify, options);

  fastify.setNotFoundHandler(async (_request, reply) => {
    return reply.status(404).send({ error: 'NotFound', message: 'Not found' });
  });

  return fastify;
}
