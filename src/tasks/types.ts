/** Task states */
export type TaskStatus = 'pending' | 'running' | 'completed' | 'failed';

/** Allowed transitions; terminal states have none */
export const VALID_TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ['running', 'failed'],
  running: ['completed', 'failed'],
  completed: [],
  failed: [],
};

/** On-disk shape of task.json */
export interface TaskSnapshot {
  id: string;
  description: string;
  status: TaskStatus;
  slot: number;
  repo_path: string;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
  pid: number | null;
  exit_code: number | null;
  error: string | null;
}

/** result.json as written by the task runner inside the VM */
export interface TaskResultPayload {
  success?: boolean;
  [key: string]: unknown;
}
