/**
 * Git isolation for tasks.
 *
 * Each task works in its own repository, seeded from the original one. When
 * the task ends, its branch is fetched back into the original repository and
 * applied by fast-forward when HEAD has not moved, otherwise by a single
 * rebase attempt. Conflicts are reported, never resolved.
 */

import { mkdir } from 'fs/promises';
import { execa } from 'execa';
import { GitRepository, runGit, runGitChecked } from './repository.js';
import { logger } from '../utils/logger.js';
import type { MergeFailureReason, MergeMethod, MergeResultData } from './types.js';

export function taskBranchName(taskId: string): string {
  return `task-${taskId}`;
}

export function taskRefName(taskId: string): string {
  return `refs/tasks/${taskId}`;
}

export function rebaseBranchName(taskId: string): string {
  return `rebase-${taskId}`;
}

export class MergeResult {
  constructor(
    readonly merged: boolean,
    readonly method: MergeMethod | null = null,
    readonly commits: number = 0,
    readonly conflicts: string[] = [],
    readonly reason: MergeFailureReason | null = null,
    readonly taskRef: string | null = null
  ) {}

  toDict(): MergeResultData {
    return {
      merged: this.merged,
      method: this.method,
      commits: this.commits,
      conflicts: [...this.conflicts],
      reason: this.reason,
      task_ref: this.taskRef,
    };
  }
}

/**
 * Create the task's repository at `taskRepoDir` and check out `task-<id>` at
 * the original repository's HEAD. When the original cannot be fetched from,
 * its HEAD tree is copied in as a single commit instead.
 *
 * @returns the original HEAD commit, the base for merging back
 */
export async function setupIsolatedRepo(originalRepo: string, taskRepoDir: string, taskId: string): Promise<string> {
  await mkdir(taskRepoDir, { recursive: true });

  const startRef = await new GitRepository(originalRepo).getHead();
  const branch = taskBranchName(taskId);

  await runGitChecked(['init', '--quiet'], taskRepoDir);
  await runGitChecked(['remote', 'add', 'origin', originalRepo], taskRepoDir);

  const fetched = await runGit(['fetch', 'origin', '--quiet'], taskRepoDir);
  const checkedOut = fetched.exitCode === 0 && (await runGit(['checkout', '-b', branch, startRef, '--quiet'], taskRepoDir)).exitCode === 0;

  if (!checkedOut) {
    logger.warn(`Task ${taskId}: fetch from original repository failed, copying HEAD tree instead`, {
      originalRepo,
      stderr: fetched.stderr.trim(),
    });

    const archive = await execa('git', ['archive', 'HEAD'], { cwd: originalRepo, encoding: 'buffer' });
    await execa('tar', ['-x'], { cwd: taskRepoDir, input: archive.stdout });

    await runGitChecked(['add', '-A'], taskRepoDir);
    await runGitChecked(
      ['-c', `user.name=${authorName(taskId)}`, '-c', `user.email=${authorEmail(taskId)}`, 'commit', '-m', `Initial copy from ${startRef}`, '--quiet'],
      taskRepoDir
    );
    await runGitChecked(['checkout', '-b', branch, '--quiet'], taskRepoDir);
  }

  await runGitChecked(['config', 'user.email', authorEmail(taskId)], taskRepoDir);
  await runGitChecked(['config', 'user.name', authorName(taskId)], taskRepoDir);

  logger.info(`Task ${taskId}: isolated repository ready`, { taskRepoDir, startRef, copied: !checkedOut });

  return startRef;
}

/**
 * Bring the task's commits into the original repository.
 *
 * Expected outcomes (nothing to merge, conflicts, fetch failure) come back as
 * a MergeResult; only failing to run git at all throws.
 */
export async function mergeTaskCommits(
  originalRepo: string,
  taskRepo: string,
  taskId: string,
  startRef: string
): Promise<MergeResult> {
  const taskRef = taskRefName(taskId);
  const original = new GitRepository(originalRepo);

  const fetched = await runGit(['fetch', taskRepo, `${taskBranchName(taskId)}:${taskRef}`], originalRepo);
  if (fetched.exitCode !== 0) {
    logger.warn(`Task ${taskId}: could not fetch task branch`, { stderr: fetched.stderr.trim() });
    return new MergeResult(false, null, 0, [], 'fetch_failed', taskRef);
  }

  const counted = await runGit(['rev-list', '--count', `${startRef}..${taskRef}`], originalRepo);
  const commitCount = counted.exitCode === 0 ? Number.parseInt(counted.stdout.trim(), 10) || 0 : 0;

  if (commitCount === 0) {
    return new MergeResult(true, 'none', 0);
  }

  const currentHead = await original.getHead();
  const currentBranch = await original.getCurrentBranch();

  if (currentHead === startRef) {
    const ff = await runGit(['merge', '--ff-only', taskRef], originalRepo);
    if (ff.exitCode === 0) {
      await runGit(['update-ref', '-d', taskRef], originalRepo);
      logger.info(`Task ${taskId}: fast-forwarded ${commitCount} commit(s)`, { originalRepo });
      return new MergeResult(true, 'fast-forward', commitCount);
    }
  }

  // HEAD moved (or the fast-forward was refused): replay onto current HEAD once
  const rebaseBranch = rebaseBranchName(taskId);
  const restoreTarget = currentBranch ?? currentHead;

  const switched = await runGit(['checkout', '-b', rebaseBranch, taskRef, '--quiet'], originalRepo);
  if (switched.exitCode !== 0) {
    // Usually untracked or modified files in the way of the task's changes
    await runGit(['checkout', restoreTarget, '--quiet'], originalRepo);
    await runGit(['branch', '-D', rebaseBranch], originalRepo);
    logger.warn(`Task ${taskId}: could not check out task commits, leaving ${taskRef} for inspection`, {
      stderr: switched.stderr.trim(),
    });
    return new MergeResult(false, null, commitCount, [], 'conflicts', taskRef);
  }

  const rebased = await runGit(['rebase', currentHead], originalRepo);

  if (rebased.exitCode === 0) {
    await runGitChecked(['checkout', restoreTarget, '--quiet'], originalRepo);
    const merged = await runGit(['merge', '--ff-only', rebaseBranch], originalRepo);
    await runGit(['branch', '-D', rebaseBranch], originalRepo);

    if (merged.exitCode !== 0) {
      logger.warn(`Task ${taskId}: rebased commits could not be fast-forwarded, leaving ${taskRef} for inspection`, {
        stderr: merged.stderr.trim(),
      });
      return new MergeResult(false, null, commitCount, [], 'conflicts', taskRef);
    }

    await runGit(['update-ref', '-d', taskRef], originalRepo);
    logger.info(`Task ${taskId}: rebased and merged ${commitCount} commit(s)`, { originalRepo });
    return new MergeResult(true, 'rebase', commitCount);
  }

  const diff = await runGit(['diff', '--name-only', '--diff-filter=U'], originalRepo);
  const conflicts = diff.stdout
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  await runGit(['rebase', '--abort'], originalRepo);
  await runGit(['checkout', restoreTarget, '--quiet'], originalRepo);
  await runGit(['branch', '-D', rebaseBranch], originalRepo);

  logger.warn(`Task ${taskId}: rebase hit conflicts, leaving ${taskRef} for inspection`, { conflicts });

  return new MergeResult(false, null, commitCount, conflicts, 'conflicts', taskRef);
}

/**
 * Delete refs/tasks/<id>.
 * @returns whether the ref existed and was removed
 */
export async function cleanupTaskRef(originalRepo: string, taskId: string): Promise<boolean> {
  const taskRef = taskRefName(taskId);
  const exists = await runGit(['show-ref', '--verify', '--quiet', taskRef], originalRepo);
  if (exists.exitCode !== 0) {
    return false;
  }
  const deleted = await runGit(['update-ref', '-d', taskRef], originalRepo);
  return deleted.exitCode === 0;
}

function authorName(taskId: string): string {
  return `Claude Task (${taskId})`;
}

function authorEmail(taskId: string): string {
  return `claude-task-${taskId}@microvm.local`;
}
