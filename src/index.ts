import { getConfig } from './config.js';
import { openDatabase } from './db/schema.js';
import { TaskRepository } from './db/repository.js';
import { Aria2Client } from './engine/aria2.js';
import { errorMessage } from './errors.js';
import { Reconciler } from './services/reconciler.js';
import { StatusService } from './services/status.js';
import { TaskController } from './services/task-controller.js';
import { buildServer } from './server.js';

async function main() {
  const config = getConfig();

  console.log('=================================');
  console.log('  Torrent Orchestrator');
  console.log('=================================');
  console.log(`Port: ${config.port}`);
  console.log(`Data path: ${config.dataPath}`);
  console.log(`Engine: aria2 at ${config.engine.host}:${config.engine.port}`);
  console.log(`Reconcile interval: ${config.reconcileIntervalMs}ms`);
  console.log('');

  const db = openDatabase(config.dataPath);
  const store = new TaskRepository(db);
  const engine = new Aria2Client(config.engine);
  const reconciler = new Reconciler(store, engine, {
    intervalMs: config.reconcileIntervalMs,
    timeoutMs: config.engine.timeoutMs,
  });
  const controller = new TaskController(store, engine, reconciler, {
    maxTorrentSize: config.maxTorrentSize,
    timeoutMs: config.engine.timeoutMs,
  });
  const status = new StatusService(store);

  const fastify = await buildServer({
    engine,
    controller,
    status,
    maxTorrentSize: config.maxTorrentSize,
  });

  // Tasks added while the engine was down, or before a restart
  try {
    await controller.submitPending();
  } catch (error: unknown) {
    console.error(`[Startup] Submitting pending tasks failed: ${errorMessage(error)}`);
  }
  reconciler.start();

  const shutdown = async (signal: string) => {
    console.log(`Received ${signal}, shutting down`);
    reconciler.stop();
    await fastify.close();
    db.close();
    process.exit(0);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        console.error('Error during shutdown:', error);
        process.exit(1);
      });
    });
  }

  // Start server
  try {
    await fastify.listen({ port: config.port, host: config.host });
    console.log(`Server listening on http://${config.host}:${config.port}`);
  } catch (err) {
    console.error('Error starting server:', err);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal:', error);
  process.exit(1);
});
