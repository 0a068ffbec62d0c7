import { FastifyInstance } from 'fastify';
import type { EngineClient } from '../engine/base.js';
import type { StatusService } from '../services/status.js';
import type { TaskController } from '../services/task-controller.js';
import { appRoutes } from './app.js';
import { tasksRoutes } from './tasks.js';

export interface RouteDependencies {
  engine: EngineClient;
  controller: TaskController;
  status: StatusService;
}

export async function registerRoutes(fastify: FastifyInstance, deps: RouteDependencies): Promise<void> {
  await fastify.register(appRoutes, { engine: deps.engine });
  await fastify.register(tasksRoutes, { controller: deps.controller, status: deps.status });
}
