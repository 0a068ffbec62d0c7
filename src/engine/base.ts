import type { TaskSource } from '../types/task.js';

export type EngineJobStatus = 'active' | 'waiting' | 'paused' | 'error' | 'complete' | 'removed';

export interface EngineJobMetrics {
  gid: string;
  status: EngineJobStatus;
  totalLength: number;
  completedLength: number;
  downloadSpeed: number;   // bytes/sec
  uploadSpeed: number;     // bytes/sec
  progress: number;        // 0-100
  eta: number | null;      // seconds, null when unknown
  errorCode: string | null;
  errorMessage: string | null;
  infoHash: string | null;
  name: string | null;
  followedBy: string[];    // Jobs the engine spawned from this one (magnet metadata -> torrent)
}

export interface EngineVersion {
  version: string;
  enabledFeatures: string[];
}

export interface EngineCallOptions {
  timeoutMs?: number;
}

export interface EngineSubmitOptions extends EngineCallOptions {
  paused?: boolean;  // Register the job without starting it
}

/**
 * Typed view of the download engine. Implementations hold no job state,
 * do not retry and throw EngineUnreachable / EngineRejected.
 */
export interface EngineClient {
  readonly name: string;
  submit(source: TaskSource, options?: EngineSubmitOptions): Promise<string>;
  pause(gid: string, options?: EngineCallOptions): Promise<void>;
  resume(gid: string, options?: EngineCallOptions): Promise<void>;
  remove(gid: string, options?: EngineCallOptions): Promise<void>;
  forgetResult(gid: string, options?: EngineCallOptions): Promise<void>;
  status(gid: string, options?: EngineCallOptions): Promise<EngineJobMetrics>;
  listActive(options?: EngineCallOptions): Promise<EngineJobMetrics[]>;
  listWaiting(options?: EngineCallOptions): Promise<EngineJobMetrics[]>;
  listStopped(options?: EngineCallOptions): Promise<EngineJobMetrics[]>;
  getVersion(options?: EngineCallOptions): Promise<EngineVersion>;
}
