import type { TaskRepository } from '../db/repository.js';
import type { EngineClient, EngineJobMetrics } from '../engine/base.js';
import { EngineRejected, EngineUnreachable, errorMessage } from '../errors.js';
import { isTerminalStatus, TASK_PATCH_KEYS, type Task, type TaskPatch, type TaskStatus } from '../types/task.js';
import { isFallbackTaskName } from '../utils/hash.js';

export interface ReconcilerOptions {
  intervalMs: number;
  timeoutMs?: number;        // Per engine call, engine client default otherwise
  now?: () => number;
}

export type TaskOutcome = 'updated' | 'unchanged' | 'skipped' | 'failed';

export interface CycleReport {
  skipped: boolean;          // Engine unreachable, or a cycle was already running
  updated: number;
  unchanged: number;
  failed: number;            // Per-task engine or store failures
  unknownJobs: string[];     // Engine jobs this orchestrator did not create
}

/**
 * Anything that can be asked to refresh a task out of cycle.
 */
export interface TaskRefresher {
  requestTask(id: string): void;
}

// aria2: "GID 2089b05ecca3d829 is not found"
const LOST_JOB_PATTERN = /not found/i;

/**
 * Derive a task update from an engine report. Returns null when the report
 * changes nothing.
 */
export function mergeReport(task: Task, report: EngineJobMetrics, now: number): TaskPatch | null {
  const patch: TaskPatch = {};

  if (task.name && isFallbackTaskName(task.name) && report.name) {
    patch.name = report.name;
  }
  if (!task.infoHash && report.infoHash) {
    patch.infoHash = report.infoHash;
  }

  switch (report.status) {
    case 'complete': {
      if (report.followedBy.length > 0) {
        // Magnet metadata fetched, the engine continues under a new job
        patch.engineJobId = report.followedBy[0];
        patch.status = task.desiredState === 'paused' ? 'paused' : 'downloading';
        patch.progress = 0;
        patch.completedSize = 0;
        patch.totalSize = 0;
        patch.downloadSpeed = 0;
        patch.uploadSpeed = 0;
        patch.eta = null;
        break;
      }
      patch.status = 'completed';
      patch.progress = 100;
      patch.totalSize = report.totalLength;
      patch.completedSize = report.totalLength;
      patch.downloadSpeed = 0;
      patch.uploadSpeed = 0;
      patch.eta = null;
      patch.completedAt = now;
      break;
    }
    case 'error': {
      patch.status = 'error';
      patch.errorMessage = report.errorMessage
        ?? (report.errorCode ? `Engine error code ${report.errorCode}` : 'Engine reported an error');
      patch.downloadSpeed = 0;
      patch.uploadSpeed = 0;
      patch.eta = null;
      break;
    }
    case 'removed': {
      patch.status = 'removed';
      patch.desiredState = 'removed';
      patch.engineJobId = null;
      patch.downloadSpeed = 0;
      patch.uploadSpeed = 0;
      patch.eta = null;
      break;
    }
    case 'active':
    case 'waiting':
    case 'paused': {
      let status: TaskStatus;
      if (task.desiredState === 'paused') {
        // A pause is settling while the engine still reports the job running
        status = 'paused';
      } else if (report.status === 'paused') {
        // A resume is settling while the engine still reports the job paused
        status = 'queued';
      } else {
        status = report.status === 'active' ? 'downloading' : 'queued';
      }

      const sameJob = task.engineJobId === report.gid;
      const stillDownloading = task.status === 'downloading' && status === 'downloading';
      patch.status = status;
      patch.progress = sameJob && stillDownloading
        ? Math.max(task.progress, report.progress)
        : report.progress;
      patch.totalSize = report.totalLength;
      patch.completedSize = report.completedLength;
      patch.downloadSpeed = status === 'paused' ? 0 : report.downloadSpeed;
      patch.uploadSpeed = status === 'paused' ? 0 : report.uploadSpeed;
      patch.eta = status === 'downloading' ? report.eta : null;
      break;
    }
  }

  return hasChanges(task, patch) ? patch : null;
}

function hasChanges(task: Task, patch: TaskPatch): boolean {
  return TASK_PATCH_KEYS.some((key) => patch[key] !== undefined && patch[key] !== task[key]);
}

/**
 * Brings stored tasks in line with what the engine reports, on a fixed
 * cadence and on demand after every user intent.
 */
export class Reconciler implements TaskRefresher {
  private timer: NodeJS.Timeout | null = null;
  private cycleRunning = false;
  private readonly loggedUnknown: Set<string> = new Set();
  private readonly now: () => number;

  constructor(
    private readonly store: TaskRepository,
    private readonly engine: EngineClient,
    private readonly options: ReconcilerOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  start(): void {
    if (this.timer) return;
    console.log(`[Reconciler] Polling ${this.engine.name} every ${this.options.intervalMs}ms`);
    this.timer = setInterval(() => {
      this.runCycle().catch((error: unknown) => {
        console.error(`[Reconciler] Cycle failed: ${errorMessage(error)}`);
      });
    }, this.options.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      console.log('[Reconciler] Stopped');
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  async runCycle(): Promise<CycleReport> {
    const report: CycleReport = { skipped: false, updated: 0, unchanged: 0, failed: 0, unknownJobs: [] };
    if (this.cycleRunning) {
      return { ...report, skipped: true };
    }
    this.cycleRunning = true;

    try {
      // Versions are taken before the engine is asked, so any write that lands
      // in between forces a fresh per-task status call
      const tracked = this.store.listTracked();
      const versions = new Map(tracked.map((task) => [task.id, task.version]));

      let jobs: EngineJobMetrics[];
      try {
        const callOptions = { timeoutMs: this.options.timeoutMs };
        const [active, waiting, stopped] = await Promise.all([
          this.engine.listActive(callOptions),
          this.engine.listWaiting(callOptions),
          this.engine.listStopped(callOptions),
        ]);
        jobs = [...active, ...waiting, ...stopped];
      } catch (error: unknown) {
        if (error instanceof EngineUnreachable) {
          console.warn(`[Reconciler] Engine unreachable, keeping stale data: ${error.message}`);
        } else {
          console.error(`[Reconciler] Listing engine jobs failed: ${errorMessage(error)}`);
        }
        return { ...report, skipped: true };
      }

      const byGid = new Map(jobs.map((job) => [job.gid, job]));
      report.unknownJobs = this.findUnknownJobs(jobs);

      const outcomes = await Promise.all(
        tracked.map((task) => this.reconcileTracked(task.id, versions.get(task.id), byGid))
      );
      for (const outcome of outcomes) {
        if (outcome === 'updated') report.updated++;
        else if (outcome === 'unchanged') report.unchanged++;
        else if (outcome === 'failed') report.failed++;
      }

      if (report.updated > 0 || report.failed > 0) {
        console.log(`[Reconciler] Cycle: ${report.updated} updated, ${report.failed} failed, ${tracked.length} tracked`);
      }
      return report;
    } finally {
      this.cycleRunning = false;
    }
  }

  /**
   * Refresh one task with an explicit status call.
   */
  reconcileTask(id: string): Promise<TaskOutcome> {
    return this.reconcileTracked(id, undefined, new Map());
  }

  requestTask(id: string): void {
    void this.reconcileTask(id).catch((error: unknown) => {
      console.error(`[Reconciler] Refresh of ${id} failed: ${errorMessage(error)}`);
    });
  }

  private findUnknownJobs(jobs: EngineJobMetrics[]): string[] {
    const followTargets = new Set(jobs.flatMap((job) => job.followedBy));
    const listed = new Set(jobs.map((job) => job.gid));
    const unknown: string[] = [];

    for (const job of jobs) {
      if (followTargets.has(job.gid)) continue;
      if (this.store.findByEngineJobId(job.gid)) continue;
      // Metadata job of a magnet whose task already moved on
      if (job.followedBy.some((next) => this.store.findByEngineJobId(next))) continue;
      unknown.push(job.gid);
      if (!this.loggedUnknown.has(job.gid)) {
        this.loggedUnknown.add(job.gid);
        console.log(`[Reconciler] Ignoring engine job ${job.gid} (${job.status}): not created here`);
      }
    }

    for (const gid of this.loggedUnknown) {
      if (!listed.has(gid)) this.loggedUnknown.delete(gid);
    }
    return unknown;
  }

  /**
   * Drop the stopped result of a magnet's metadata job once its task follows
   * the real download.
   */
  private async forgetMetadataJob(gid: string): Promise<void> {
    try {
      await this.engine.forgetResult(gid, { timeoutMs: this.options.timeoutMs });
    } catch (error: unknown) {
      console.warn(`[Reconciler] Could not drop metadata job ${gid}: ${errorMessage(error)}`);
    }
  }

  private async reconcileTracked(
    id: string,
    snapshotVersion: number | undefined,
    byGid: Map<string, EngineJobMetrics>
  ): Promise<TaskOutcome> {
    try {
      return await this.store.withTaskLock(id, async () => {
        const task = this.store.get(id);
        if (!task || !task.engineJobId || isTerminalStatus(task.status)) {
          return 'unchanged';
        }
        const gid = task.engineJobId;

        let job = byGid.get(gid);
        if (!job || snapshotVersion === undefined || task.version !== snapshotVersion) {
          try {
            job = await this.engine.status(gid, { timeoutMs: this.options.timeoutMs });
          } catch (error: unknown) {
            if (error instanceof EngineUnreachable) {
              console.warn(`[Reconciler] Status of ${gid} unavailable: ${error.message}`);
              return 'skipped';
            }
            if (error instanceof EngineRejected && LOST_JOB_PATTERN.test(error.message)) {
              this.store.update(id, {
                status: 'error',
                errorMessage: `Engine job ${gid} is no longer known to the engine`,
                downloadSpeed: 0,
                uploadSpeed: 0,
                eta: null,
              });
              console.warn(`[Reconciler] Task ${id} lost its engine job ${gid}`);
              return 'updated';
            }
            throw error;
          }
        }

        const patch = mergeReport(task, job, this.now());
        if (!patch) {
          return 'unchanged';
        }
        this.store.update(id, patch);
        if (patch.status && patch.status !== task.status) {
          console.log(`[Reconciler] ${task.name}: ${task.status} -> ${patch.status}`);
        }
        if (patch.engineJobId && patch.engineJobId !== gid) {
          console.log(`[Reconciler] ${task.name}: engine job ${gid} -> ${patch.engineJobId}`);
          await this.forgetMetadataJob(gid);
        }
        return 'updated';
      });
    } catch (error: unknown) {
      console.error(`[Reconciler] Task ${id} not reconciled: ${errorMessage(error)}`);
      return 'failed';
    }
  }
}
