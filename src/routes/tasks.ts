import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { ValidationError } from '../errors.js';
import type { StatusService } from '../services/status.js';
import type { AddTaskInput, TaskController } from '../services/task-controller.js';
import { toSnapshot } from '../services/status.js';

export interface TaskRoutesOptions {
  controller: TaskController;
  status: StatusService;
}

interface TaskParams {
  id: string;
}

// JSON and urlencoded add payloads; the form field name matches the old web form
const zAddBody = z.object({
  magnet: z.string().optional(),
  magnet_link: z.string().optional(),
  name: z.string().optional(),
  paused: z.union([z.boolean(), z.enum(['true', 'false'])]).optional(),
});

function parseFlag(value: boolean | 'true' | 'false' | undefined): boolean {
  return value === true || value === 'true';
}

async function readMultipartInput(request: FastifyRequest): Promise<AddTaskInput> {
  const input: AddTaskInput = {};

  for await (const part of request.parts()) {
    if (part.type === 'file') {
      if (part.fieldname === 'torrent' || part.fieldname === 'torrent_file') {
        input.torrent = await part.toBuffer();
      } else {
        // Drain unexpected files so the stream can continue
        await part.toBuffer();
      }
      continue;
    }

    const value = typeof part.value === 'string' ? part.value : '';
    switch (part.fieldname) {
      case 'magnet':
      case 'magnet_link':
        if (value.trim()) input.magnet = value;
        break;
      case 'name':
        input.name = value;
        break;
      case 'paused':
        input.paused = value === 'true';
        break;
    }
  }

  return input;
}

function readBodyInput(body: unknown): AddTaskInput {
  const parsed = zAddBody.safeParse(body ?? {});
  if (!parsed.success) {
    throw new ValidationError('Expected { magnet, name?, paused? }');
  }
  return {
    magnet: parsed.data.magnet ?? parsed.data.magnet_link,
    name: parsed.data.name,
    paused: parseFlag(parsed.data.paused),
  };
}

export async function tasksRoutes(fastify: FastifyInstance, opts: TaskRoutesOptions): Promise<void> {
  const { controller, status } = opts;

  // Task list, oldest first
  fastify.get<{ Querystring: { all?: string } }>('/api/tasks', async (request, reply) => {
    const includeRemoved = request.query.all === 'true';
    return reply.send(status.snapshot({ includeRemoved }));
  });

  // Polling endpoint kept in the shape the dashboard script reads
  fastify.get('/api/status', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.send({ tasks: status.snapshot() });
  });

  fastify.get<{ Params: TaskParams }>('/api/tasks/:id', async (request, reply) => {
    return reply.send(status.get(request.params.id));
  });

  // Add torrent file (multipart) or magnet URI (JSON / form)
  fastify.post('/api/tasks', async (request: FastifyRequest, reply: FastifyReply) => {
    const input = request.isMultipart()
      ? await readMultipartInput(request)
      : readBodyInput(request.body);

    const { task, created } = await controller.add(input);
    return reply.status(created ? 201 : 200).send(toSnapshot(task));
  });

  fastify.post<{ Params: TaskParams }>('/api/tasks/:id/pause', async (request, reply) => {
    const task = await controller.pause(request.params.id);
    return reply.send(toSnapshot(task));
  });

  fastify.post<{ Params: TaskParams }>('/api/tasks/:id/resume', async (request, reply) => {
    const task = await controller.resume(request.params.id);
    return reply.send(toSnapshot(task));
  });

  fastify.delete<{ Params: TaskParams }>('/api/tasks/:id', async (request, reply) => {
    const task = await controller.delete(request.params.id);
    return reply.send(toSnapshot(task));
  });
}
