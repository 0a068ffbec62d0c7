import type { TaskRepository } from '../db/repository.js';
import type { EngineClient } from '../engine/base.js';
import { EngineRejected, EngineUnreachable, InvalidTransition } from '../errors.js';
import { isTerminalStatus, type Task } from '../types/task.js';
import { fallbackTaskName, generateTaskId } from '../utils/hash.js';
import { parseSource } from '../utils/torrent.js';
import type { TaskRefresher } from './reconciler.js';

export interface AddTaskInput {
  torrent?: Buffer;
  magnet?: string;
  name?: string;
  paused?: boolean;
}

export interface AddTaskResult {
  task: Task;
  created: boolean;        // false when the torrent was already tracked
}

export interface TaskControllerOptions {
  maxTorrentSize: number;
  timeoutMs?: number;
}

// aria2: "Active Download not found for GID#..."
const JOB_GONE_PATTERN = /not found/i;

/**
 * Executes user intents against the engine and the store. Every intent runs
 * inside the task's lock, so at most one engine call per task is in flight.
 */
export class TaskController {
  constructor(
    private readonly store: TaskRepository,
    private readonly engine: EngineClient,
    private readonly refresher: TaskRefresher | null,
    private readonly options: TaskControllerOptions
  ) {}

  /**
   * Add a torrent file or magnet URI. An engine rejection leaves the task in
   * error; an unreachable engine leaves it queued and is rethrown.
   *
   * A torrent that already has a live task returns that task. If it never
   * reached the engine its submission is retried.
   */
  async add(input: AddTaskInput): Promise<AddTaskResult> {
    const parsed = parseSource(input, this.options.maxTorrentSize);

    const existing = parsed.infoHash ? this.store.findByInfoHash(parsed.infoHash) : null;
    if (existing) {
      console.log(`[TaskController] Already tracked: ${existing.name} (${existing.id})`);
      const task = await this.store.withTaskLock(existing.id, () => this.submitLocked(existing.id));
      return { task, created: false };
    }

    const id = generateTaskId(parsed.source.kind === 'magnet' ? parsed.source.uri : parsed.name ?? 'torrent');
    const name = input.name?.trim() || parsed.name || fallbackTaskName(id);

    this.store.create({
      id,
      name,
      source: parsed.source,
      infoHash: parsed.infoHash,
      desiredState: input.paused ? 'paused' : 'active',
    });
    console.log(`[TaskController] Added ${parsed.source.kind}: ${name} (${id})`);

    const task = await this.store.withTaskLock(id, () => this.submitLocked(id));
    return { task, created: true };
  }

  async pause(id: string): Promise<Task> {
    return this.store.withTaskLock(id, async () => {
      const task = this.store.require(id);
      if (isTerminalStatus(task.status)) {
        throw new InvalidTransition(`Cannot pause a ${task.status} task`, id);
      }
      if (task.status === 'paused') {
        throw new InvalidTransition('Task is already paused', id);
      }
      if (!task.engineJobId) {
        throw new InvalidTransition('Task has not been submitted to the engine', id);
      }

      const gid = task.engineJobId;
      await this.engineCall(id, () => this.engine.pause(gid, this.callOptions()));

      const updated = this.store.update(id, { status: 'paused', desiredState: 'paused' });
      console.log(`[TaskController] Paused: ${task.name} (${id})`);
      this.refresher?.requestTask(id);
      return updated;
    });
  }

  async resume(id: string): Promise<Task> {
    return this.store.withTaskLock(id, async () => {
      const task = this.store.require(id);
      if (task.status !== 'paused') {
        throw new InvalidTransition(`Cannot resume a ${task.status} task`, id);
      }
      if (!task.engineJobId) {
        throw new InvalidTransition('Task has not been submitted to the engine', id);
      }

      const gid = task.engineJobId;
      await this.engineCall(id, () => this.engine.resume(gid, this.callOptions()));

      const updated = this.store.update(id, { status: 'downloading', desiredState: 'active' });
      console.log(`[TaskController] Resumed: ${task.name} (${id})`);
      this.refresher?.requestTask(id);
      return updated;
    });
  }

  /**
   * Remove the engine job and mark the task removed. Deleting a removed task
   * is a no-op.
   */
  async delete(id: string): Promise<Task> {
    return this.store.withTaskLock(id, async () => {
      const task = this.store.require(id);
      if (task.status === 'removed') {
        return task;
      }

      if (task.engineJobId) {
        const gid = task.engineJobId;
        if (task.status === 'completed' || task.status === 'error') {
          await this.forgetJob(id, gid);
        } else {
          await this.removeJob(id, gid);
        }
      }

      const removed = this.store.delete(id);
      console.log(`[TaskController] Deleted: ${task.name} (${id})`);
      this.refresher?.requestTask(id);
      return removed;
    });
  }

  /**
   * Submit every queued task that never reached the engine (startup, or after
   * the engine was down during add). Stops at the first transport failure.
   */
  async submitPending(): Promise<number> {
    const pending = this.store.listByStatus('queued').filter((task) => !task.engineJobId);
    let submitted = 0;

    for (const task of pending) {
      try {
        const result = await this.store.withTaskLock(task.id, () => this.submitLocked(task.id));
        if (result.engineJobId) submitted++;
      } catch (error: unknown) {
        if (error instanceof EngineUnreachable) {
          console.warn(`[TaskController] Engine unreachable, ${pending.length - submitted} task(s) left queued`);
          break;
        }
        throw error;
      }
    }

    if (pending.length > 0) {
      console.log(`[TaskController] Submitted ${submitted}/${pending.length} pending task(s)`);
    }
    return submitted;
  }

  private async submitLocked(id: string): Promise<Task> {
    const task = this.store.require(id);
    // Submitted or deleted while waiting for the lock
    if (task.status !== 'queued' || task.engineJobId) {
      return task;
    }

    const paused = task.desiredState === 'paused';
    let gid: string;
    try {
      gid = await this.engine.submit(task.source, { ...this.callOptions(), paused });
    } catch (error: unknown) {
      if (error instanceof EngineRejected) {
        console.error(`[TaskController] Engine rejected ${task.name}: ${error.message}`);
        return this.store.update(id, { status: 'error', errorMessage: error.message });
      }
      if (error instanceof EngineUnreachable) {
        console.warn(`[TaskController] Engine unreachable, ${task.name} stays queued`);
        throw error.withTask(id);
      }
      throw error;
    }

    const updated = this.store.update(id, {
      engineJobId: gid,
      status: paused ? 'paused' : 'downloading',
      errorMessage: null,
    });
    console.log(`[TaskController] Submitted ${task.name} as engine job ${gid}`);
    this.refresher?.requestTask(id);
    return updated;
  }

  private async removeJob(id: string, gid: string): Promise<void> {
    try {
      await this.engine.remove(gid, this.callOptions());
    } catch (error: unknown) {
      if (error instanceof EngineRejected && JOB_GONE_PATTERN.test(error.message)) {
        // Already stopped on the engine side, drop its stored result instead
        console.log(`[TaskController] Engine job ${gid} no longer active`);
        await this.forgetJob(id, gid);
        return;
      }
      throw this.attachTask(error, id);
    }
  }

  private async forgetJob(id: string, gid: string): Promise<void> {
    try {
      await this.engine.forgetResult(gid, this.callOptions());
    } catch (error: unknown) {
      if (error instanceof EngineRejected) {
        console.log(`[TaskController] Engine job ${gid} already gone: ${error.message}`);
        return;
      }
      throw this.attachTask(error, id);
    }
  }

  private async engineCall(id: string, call: () => Promise<void>): Promise<void> {
    try {
      await call();
    } catch (error: unknown) {
      throw this.attachTask(error, id);
    }
  }

  private attachTask(error: unknown, id: string): unknown {
    if (error instanceof EngineUnreachable || error instanceof EngineRejected) {
      return error.withTask(id);
    }
    return error;
  }

  private callOptions(): { timeoutMs?: number } {
    return { timeoutMs: this.options.timeoutMs };
  }
}
