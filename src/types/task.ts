export type TaskStatus =
  | 'queued'      // Created, or waiting in the engine queue
  | 'downloading' // Engine job active
  | 'paused'      // User paused
  | 'completed'   // All pieces downloaded
  | 'error'       // Engine reported a job-level failure
  | 'removed';    // Deleted by the user, engine job gone

// Last user intent, kept apart from the engine-derived status
export type DesiredState = 'active' | 'paused' | 'removed';

export type TaskSource =
  | { kind: 'torrent'; data: Buffer }
  | { kind: 'magnet'; uri: string };

export interface Task {
  id: string;
  engineJobId: string | null;
  name: string;
  source: TaskSource;
  infoHash: string | null;
  status: TaskStatus;
  desiredState: DesiredState;
  progress: number;        // 0-100
  totalSize: number;
  completedSize: number;
  downloadSpeed: number;   // bytes/sec
  uploadSpeed: number;     // bytes/sec
  eta: number | null;      // seconds remaining
  errorMessage: string | null;
  createdAt: number;
  updatedAt: number;
  completedAt: number | null;
  version: number;
}

export type NewTask = Pick<Task, 'id' | 'name' | 'source' | 'infoHash'> & {
  status?: TaskStatus;
  desiredState?: DesiredState;
};

// Fields a writer may touch; id, source and bookkeeping are owned by the store
export type TaskPatch = Partial<Omit<Task, 'id' | 'source' | 'createdAt' | 'updatedAt' | 'version'>>;

export const TASK_PATCH_KEYS = [
  'engineJobId',
  'name',
  'infoHash',
  'status',
  'desiredState',
  'progress',
  'totalSize',
  'completedSize',
  'downloadSpeed',
  'uploadSpeed',
  'eta',
  'errorMessage',
  'completedAt',
] as const satisfies readonly (keyof TaskPatch)[];

export type TaskMutation = TaskPatch | ((current: Task) => TaskPatch);

/**
 * Read-only projection served to pollers.
 */
export interface TaskSnapshot {
  id: string;
  name: string;
  status: TaskStatus;
  progress: number;
  download_speed: number;
  upload_speed: number;
  eta: number | null;
  total_size: number;
  error_message: string | null;
  created_at: number;
}

export function isTerminalStatus(status: TaskStatus): boolean {
  return status === 'completed' || status === 'error' || status === 'removed';
}
