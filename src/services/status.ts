import type { TaskRepository } from '../db/repository.js';
import type { Task, TaskSnapshot } from '../types/task.js';

export interface SnapshotOptions {
  includeRemoved?: boolean;
}

// Rates and ETA only mean something while the engine is moving data
function isMoving(task: Task): boolean {
  return task.status === 'downloading' || task.status === 'queued';
}

export function toSnapshot(task: Task): TaskSnapshot {
  const moving = isMoving(task);
  return {
    id: task.id,
    name: task.name,
    status: task.status,
    progress: Math.round(task.progress * 100) / 100,
    download_speed: moving ? Math.round(task.downloadSpeed) : 0,
    upload_speed: moving ? Math.round(task.uploadSpeed) : 0,
    eta: task.status === 'downloading' ? task.eta : null,
    total_size: task.totalSize,
    error_message: task.errorMessage,
    created_at: task.createdAt,
  };
}

/**
 * Read-only projection of the store for pollers. Never calls the engine.
 */
export class StatusService {
  constructor(private readonly store: TaskRepository) {}

  snapshot(options: SnapshotOptions = {}): TaskSnapshot[] {
    const tasks = this.store.list();
    return tasks
      .filter((task) => options.includeRemoved || task.status !== 'removed')
      .map(toSnapshot);
  }

  get(id: string): TaskSnapshot {
    return toSnapshot(this.store.require(id));
  }
}
