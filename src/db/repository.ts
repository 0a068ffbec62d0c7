import type Database from 'better-sqlite3';
import { NotFound } from '../errors.js';
import { TaskLock } from '../utils/task-lock.js';
import {
  TASK_PATCH_KEYS,
  type DesiredState,
  type NewTask,
  type Task,
  type TaskMutation,
  type TaskPatch,
  type TaskStatus,
} from '../types/task.js';

interface TaskRow {
  id: string;
  engine_job_id: string | null;
  name: string;
  source_kind: 'torrent' | 'magnet';
  source_uri: string | null;
  source_data: Buffer | null;
  info_hash: string | null;
  status: TaskStatus;
  desired_state: DesiredState;
  progress: number;
  total_size: number;
  completed_size: number;
  download_speed: number;
  upload_speed: number;
  eta: number | null;
  error_message: string | null;
  created_at: number;
  updated_at: number;
  completed_at: number | null;
  version: number;
}

const TASK_COLUMNS = `
  id, engine_job_id, name, source_kind, source_uri, source_data, info_hash,
  status, desired_state, progress, total_size, completed_size,
  download_speed, upload_speed, eta, error_message,
  created_at, updated_at, completed_at, version
`;

// Patch field -> column
const PATCH_COLUMNS: { [K in keyof Required<TaskPatch>]: string } = {
  engineJobId: 'engine_job_id',
  name: 'name',
  infoHash: 'info_hash',
  status: 'status',
  desiredState: 'desired_state',
  progress: 'progress',
  totalSize: 'total_size',
  completedSize: 'completed_size',
  downloadSpeed: 'download_speed',
  uploadSpeed: 'upload_speed',
  eta: 'eta',
  errorMessage: 'error_message',
  completedAt: 'completed_at',
};

function mapRowToTask(row: TaskRow): Task {
  return {
    id: row.id,
    engineJobId: row.engine_job_id,
    name: row.name,
    source: row.source_kind === 'torrent'
      ? { kind: 'torrent', data: row.source_data ?? Buffer.alloc(0) }
      : { kind: 'magnet', uri: row.source_uri ?? '' },
    infoHash: row.info_hash,
    status: row.status,
    desiredState: row.desired_state,
    progress: row.progress,
    totalSize: row.total_size,
    completedSize: row.completed_size,
    downloadSpeed: row.download_speed,
    uploadSpeed: row.upload_speed,
    eta: row.eta,
    errorMessage: row.error_message,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    completedAt: row.completed_at,
    version: row.version,
  };
}

/**
 * Durable record of every task. Every statement is synchronous, so a reader
 * always sees a whole row; multi-step sections (read, engine call, write) go
 * through withTaskLock so writers on the same task never interleave.
 */
export class TaskRepository {
  private readonly lock = new TaskLock();
  private lastCreatedAt = 0;

  constructor(
    private readonly db: Database.Database,
    private readonly now: () => number = Date.now
  ) {}

  create(input: NewTask): Task {
    // Strictly increasing so list() order is stable even within one millisecond
    const createdAt = Math.max(this.now(), this.lastCreatedAt + 1);
    this.lastCreatedAt = createdAt;

    this.db.prepare(`
      INSERT INTO tasks (id, name, source_kind, source_uri, source_data, info_hash,
                         status, desired_state, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      input.id,
      input.name,
      input.source.kind,
      input.source.kind === 'magnet' ? input.source.uri : null,
      input.source.kind === 'torrent' ? input.source.data : null,
      input.infoHash,
      input.status ?? 'queued',
      input.desiredState ?? 'active',
      createdAt,
      createdAt
    );

    return this.require(input.id);
  }

  get(id: string): Task | null {
    const row = this.db.prepare<[string], TaskRow>(`SELECT ${TASK_COLUMNS} FROM tasks WHERE id = ?`)
      .get(id);
    return row ? mapRowToTask(row) : null;
  }

  require(id: string): Task {
    const task = this.get(id);
    if (!task) {
      throw new NotFound(id);
    }
    return task;
  }

  list(): Task[] {
    const rows = this.db.prepare<[], TaskRow>(`
      SELECT ${TASK_COLUMNS} FROM tasks
      ORDER BY created_at ASC, rowid ASC
    `).all();
    return rows.map(mapRowToTask);
  }

  listByStatus(status: TaskStatus): Task[] {
    const rows = this.db.prepare<[TaskStatus], TaskRow>(`
      SELECT ${TASK_COLUMNS} FROM tasks
      WHERE status = ?
      ORDER BY created_at ASC, rowid ASC
    `).all(status);
    return rows.map(mapRowToTask);
  }

  /**
   * Tasks the reconciler follows: registered with the engine and not terminal.
   */
  listTracked(): Task[] {
    const rows = this.db.prepare<[], TaskRow>(`
      SELECT ${TASK_COLUMNS} FROM tasks
      WHERE engine_job_id IS NOT NULL
        AND status NOT IN ('completed', 'error', 'removed')
      ORDER BY created_at ASC, rowid ASC
    `).all();
    return rows.map(mapRowToTask);
  }

  findByEngineJobId(engineJobId: string): Task | null {
    const row = this.db.prepare<[string], TaskRow>(`SELECT ${TASK_COLUMNS} FROM tasks WHERE engine_job_id = ?`)
      .get(engineJobId);
    return row ? mapRowToTask(row) : null;
  }

  /**
   * Oldest live task for a torrent. Removed tasks do not count, so a deleted
   * torrent can be added again.
   */
  findByInfoHash(infoHash: string): Task | null {
    const row = this.db.prepare<[string], TaskRow>(`
      SELECT ${TASK_COLUMNS} FROM tasks
      WHERE info_hash = ? AND status != 'removed'
      ORDER BY created_at ASC, rowid ASC
      LIMIT 1
    `).get(infoHash);
    return row ? mapRowToTask(row) : null;
  }

  /**
   * Apply a mutation as one transaction. A function mutation sees the row as
   * it is inside the transaction.
   */
  update(id: string, mutation: TaskMutation): Task {
    const apply = this.db.transaction((): Task => {
      const current = this.require(id);
      const patch = typeof mutation === 'function' ? mutation(current) : mutation;

      const assignments: string[] = [];
      const values: (string | number | null)[] = [];
      for (const key of TASK_PATCH_KEYS) {
        const value = patch[key];
        if (value === undefined) continue;
        assignments.push(`${PATCH_COLUMNS[key]} = ?`);
        values.push(value);
      }

      assignments.push('updated_at = ?', 'version = version + 1');
      values.push(Math.max(this.now(), current.updatedAt));

      this.db.prepare(`UPDATE tasks SET ${assignments.join(', ')} WHERE id = ?`)
        .run(...values, id);

      return this.require(id);
    });

    return apply();
  }

  /**
   * Soft delete: the row is kept with status removed so its id is never reused.
   */
  delete(id: string): Task {
    return this.update(id, {
      status: 'removed',
      desiredState: 'removed',
      engineJobId: null,
    });
  }

  /**
   * Run a critical section that owns the task until it settles.
   */
  withTaskLock<T>(id: string, fn: () => Promise<T> | T): Promise<T> {
    return this.lock.run(id, fn);
  }
}
