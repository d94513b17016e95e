export type MergeMethod = 'fast-forward' | 'rebase' | 'none';

export type MergeFailureReason = 'conflicts' | 'fetch_failed';

/** merge-result.json */
export interface MergeResultData {
  merged: boolean;
  method: MergeMethod | null;
  commits: number;
  conflicts: string[];
  reason: MergeFailureReason | null;
  task_ref: string | null;
}
