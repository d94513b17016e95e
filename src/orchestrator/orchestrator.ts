/**
 * Orchestrator
 *
 * Starts delegated tasks in microVMs, one slot per task, and turns VM exits
 * into merge attempts and completion events.
 *
 * Lifecycle of a task:
 *   runTask -> slot acquired -> isolated repo -> VM started (running)
 *   VM exit -> result read -> merge (exit 0 + success) -> slot released -> event
 *   cleanupTask -> VM stopped -> task dir removed -> optional ref deletion
 *
 * Collaborators are injected so tests can swap the VM runner and the
 * credential lookup for in-process fakes.
 */

import { randomUUID } from 'crypto';
import { existsSync } from 'fs';
import { readdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import type { OrchestratorConfig } from '../config/schema.js';
import type { ApiKeyResolver } from '../credentials.js';
import { errorMessage, LogNotFoundError, TaskStartError, UnknownTaskError } from '../errors.js';
import { createCompletedEvent, createFailedEvent, type EventQueue, type TaskEventDict } from '../events/event-queue.js';
import { cleanupTaskRef, mergeTaskCommits, setupIsolatedRepo } from '../git/isolation.js';
import { GitOperationQueue } from '../git/operation-queue.js';
import type { MergeResultData } from '../git/types.js';
import type { RepoEntry, RepoRegistry } from '../registry/repo-registry.js';
import type { SlotManager } from '../slots/slot-manager.js';
import { Task, TASKS_SUBDIR, taskDirFor } from '../tasks/task.js';
import type { TaskResultPayload, TaskStatus } from '../tasks/types.js';
import { logger } from '../utils/logger.js';
import { prepareVmEnvironment } from '../vm/environment.js';
import { writeTaskFiles } from '../vm/task-files.js';
import type { Runner, RunnerFactory } from '../vm/types.js';

/** Descriptions longer than this are cut in listTasks() */
const LIST_DESCRIPTION_LENGTH = 50;

const TASK_ID_PATTERN = /^[A-Za-z0-9-]+$/;

export interface OrchestratorDeps {
  config: OrchestratorConfig;
  registry: RepoRegistry;
  slotManager: SlotManager;
  eventQueue: EventQueue;
  runnerFactory: RunnerFactory;
  resolveApiKey: ApiKeyResolver;
  gitQueue?: GitOperationQueue;
}

export interface TaskInfo {
  task_id: string;
  description: string;
  status: TaskStatus;
  slot: number;
  repo_path: string;
  isolated_repo_path: string;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
  pid: number | null;
  exit_code: number | null;
  error: string | null;
  result?: TaskResultPayload;
  merge_result?: MergeResultData;
}

export type WaitResult = TaskEventDict | { no_running_tasks: true } | { timeout: true };

export interface TaskListEntry {
  task_id: string;
  status: TaskStatus;
  description: string;
  repo: string;
}

export interface SlotsInfo {
  max_slots: number;
  active: Array<{ slot: number; task_id: string }>;
  available: number[];
}

export class Orchestrator {
  private readonly config: OrchestratorConfig;
  private readonly registry: RepoRegistry;
  private readonly slotManager: SlotManager;
  private readonly eventQueue: EventQueue;
  private readonly runnerFactory: RunnerFactory;
  private readonly resolveApiKey: ApiKeyResolver;
  private readonly gitQueue: GitOperationQueue;

  /** task id -> runner, for tasks whose VM has not exited yet */
  private processes = new Map<string, Runner>();
  private tasks = new Map<string, Task>();

  constructor(deps: OrchestratorDeps) {
    this.config = deps.config;
    this.registry = deps.registry;
    this.slotManager = deps.slotManager;
    this.eventQueue = deps.eventQueue;
    this.runnerFactory = deps.runnerFactory;
    this.resolveApiKey = deps.resolveApiKey;
    this.gitQueue = deps.gitQueue ?? new GitOperationQueue();
  }

  /**
   * Start `description` as a task against the repository registered as
   * `repoAlias`.
   *
   * @throws CredentialsNotFoundError, UnknownRepoError or AllSlotsBusyError
   *   before anything is allocated; TaskStartError once a slot was taken
   */
  async runTask(description: string, repoAlias: string): Promise<{ task_id: string }> {
    const apiKey = await this.resolveApiKey();
    const repoPath = this.registry.resolve(repoAlias);

    const taskId = randomUUID();
    const slot = this.slotManager.acquireSlot(repoPath, taskId);

    const task = Task.create(description, slot, repoPath, taskId);
    this.tasks.set(task.id, task);

    try {
      task.save();

      const startRef = await setupIsolatedRepo(repoPath, task.isolatedRepoPath, task.id);
      await writeTaskFiles(task, apiKey, startRef);

      const env = await prepareVmEnvironment(task, {
        slotsDir: this.config.slotsDir,
        packageName: this.config.vmPackage,
        configFile: this.config.vmConfigFile,
      });

      const runner = this.runnerFactory({
        task,
        env,
        onExit: (exitCode) => this.handleTaskExit(task, exitCode),
      });

      // Registered before start so a VM that exits immediately is still tracked
      this.processes.set(task.id, runner);
      const pid = await runner.start();
      if (!task.markRunning(pid)) {
        // Exit handling still owns the runner and the slot
        logger.warn(`Task ${task.id}: VM started but the task could not be marked running`, {
          status: task.status,
          pid,
        });
      }

      logger.info(`Task ${task.id} started`, { repo: repoAlias, slot, pid });
      return { task_id: task.id };
    } catch (err) {
      const message = errorMessage(err);
      logger.error(`Task ${task.id} failed to start`, { repo: repoAlias, slot, error: message });

      this.processes.delete(task.id);
      this.slotManager.releaseSlot(slot, task.id);

      try {
        task.markFailed(message);
      } catch (saveErr) {
        logger.error(`Task ${task.id}: could not persist failure`, saveErr);
      }

      this.eventQueue.emit(createFailedEvent(task.id, message));
      throw new TaskStartError(task.id, err);
    }
  }

  /**
   * Exit callback of a task's runner. Merges successful work back, releases
   * the slot and emits the completion event. Never throws.
   */
  async handleTaskExit(task: Task, exitCode: number): Promise<void> {
    const result = task.getResult();
    let mergeResult: MergeResultData | null = null;

    if (exitCode === 0 && result?.success) {
      const startRef = task.readStartRef();
      if (startRef) {
        try {
          const merged = await this.gitQueue.enqueue(
            task.repoPath,
            () => mergeTaskCommits(task.repoPath, task.isolatedRepoPath, task.id, startRef),
            { label: `merge ${task.id}` }
          );
          mergeResult = merged.toDict();
          await writeFile(task.mergeResultPath, JSON.stringify(mergeResult, null, 2));
        } catch (err) {
          logger.error(`Task ${task.id}: merge failed`, { error: errorMessage(err) });
        }
      }
    }

    try {
      task.markCompleted(exitCode);
    } catch (err) {
      logger.error(`Task ${task.id}: could not persist completion`, { error: errorMessage(err) });
    }

    this.slotManager.releaseSlot(task.slot, task.id);
    this.eventQueue.emit(createCompletedEvent(task.id, exitCode, result, mergeResult));
    this.processes.delete(task.id);

    logger.info(`Task ${task.id} finished`, {
      exitCode,
      merged: mergeResult?.merged ?? null,
      method: mergeResult?.method ?? null,
    });
  }

  /**
   * Current view of a task. While its VM runs the status is `running`;
   * afterwards it is `completed` only if the task reported success.
   */
  getTaskInfo(taskId: string): TaskInfo {
    const task = this.getTask(taskId);
    const result = task.getResult();
    const mergeResult = task.getMergeResult();

    let status: TaskStatus;
    if (this.processes.has(task.id)) {
      status = 'running';
    } else {
      status = result?.success ? 'completed' : 'failed';
    }

    const snapshot = task.toSnapshot();
    const info: TaskInfo = {
      task_id: task.id,
      description: task.description,
      status,
      slot: task.slot,
      repo_path: task.repoPath,
      isolated_repo_path: task.isolatedRepoPath,
      created_at: snapshot.created_at,
      started_at: snapshot.started_at,
      completed_at: snapshot.completed_at,
      pid: task.pid,
      exit_code: task.exitCode,
      error: task.error,
    };

    if (result) {
      info.result = result;
    }
    if (mergeResult) {
      info.merge_result = mergeResult;
    }

    return info;
  }

  getTaskLogs(taskId: string): { log_path: string } {
    const task = this.getTask(taskId);
    if (!existsSync(task.logPath)) {
      throw new LogNotFoundError(task.logPath);
    }
    return { log_path: task.logPath };
  }

  /**
   * Next completion event. A queued event is returned even when nothing is
   * running any more; with neither, returns `no_running_tasks` at once.
   * Rejects with the signal's reason when `signal` aborts.
   */
  async waitNextEvent(timeoutMs: number = 30000, signal?: AbortSignal): Promise<WaitResult> {
    if (this.processes.size === 0) {
      const queued = this.eventQueue.tryPop();
      return queued ? queued.toDict() : { no_running_tasks: true };
    }

    const event = await this.eventQueue.waitAsync(timeoutMs, signal);
    return event ? event.toDict() : { timeout: true };
  }

  /**
   * Stop the task's VM if still running and delete its directory.
   * `deleteRef` also removes refs/tasks/<id> from the original repository.
   */
  async cleanupTask(taskId: string, deleteRef: boolean = false): Promise<{ success: true }> {
    const task = this.getTask(taskId);

    const runner = this.processes.get(task.id);
    if (runner) {
      await runner.stop();
      this.processes.delete(task.id);
    }

    // The exit callback normally frees it; only release what this task still holds
    if (this.slotManager.getSlotForTask(task.id) === task.slot) {
      this.slotManager.releaseSlot(task.slot, task.id);
    }

    if (existsSync(task.taskDir)) {
      await rm(task.taskDir, { recursive: true, force: true });
    }

    if (deleteRef) {
      const deleted = await this.gitQueue.enqueue(task.repoPath, () => cleanupTaskRef(task.repoPath, task.id), {
        label: `delete ref ${task.id}`,
      });
      logger.debug(`Task ${task.id}: task ref ${deleted ? 'deleted' : 'not present'}`);
    }

    this.tasks.delete(task.id);
    logger.info(`Task ${task.id} cleaned up`, { deleteRef });

    return { success: true };
  }

  /** Every task found on disk in the registered repositories. */
  async listTasks(): Promise<TaskListEntry[]> {
    const entries: TaskListEntry[] = [];

    for (const [alias, repo] of Object.entries(this.registry.list())) {
      for (const taskDir of await listTaskDirs(repo.path)) {
        if (!existsSync(join(taskDir, 'task.json'))) {
          continue;
        }

        try {
          const task = Task.load(taskDir);
          entries.push({
            task_id: task.id,
            status: task.status,
            description: truncate(task.description, LIST_DESCRIPTION_LENGTH),
            repo: alias,
          });
        } catch (err) {
          logger.debug(`Skipping unreadable task in ${taskDir}`, { error: errorMessage(err) });
        }
      }
    }

    return entries;
  }

  listSlots(): SlotsInfo {
    const active = Object.entries(this.slotManager.getActiveTasks())
      .map(([slot, taskId]) => ({ slot: Number(slot), task_id: taskId }))
      .sort((a, b) => a.slot - b.slot);

    return {
      max_slots: this.slotManager.maxSlots,
      active,
      available: this.slotManager.getAvailableSlots(),
    };
  }

  listRepos(): Record<string, RepoEntry> {
    return this.registry.list();
  }

  /**
   * Remove task directories left behind by an earlier process. Their VMs
   * are gone, so nothing can complete them any more.
   * @returns number of directories removed
   */
  async cleanupStaleTasks(): Promise<number> {
    let removed = 0;

    for (const repo of Object.values(this.registry.list())) {
      for (const taskDir of await listTaskDirs(repo.path)) {
        try {
          await rm(taskDir, { recursive: true, force: true });
          removed++;
          logger.info(`Cleaned up stale task directory: ${taskDir}`);
        } catch (err) {
          logger.warn(`Failed to clean up task directory: ${taskDir}`, { error: errorMessage(err) });
        }
      }
    }

    return removed;
  }

  /** Stop every running VM, e.g. on shutdown. */
  async stopAll(): Promise<void> {
    const running = [...this.processes.entries()];
    await Promise.all(
      running.map(async ([taskId, runner]) => {
        try {
          await runner.stop();
        } catch (err) {
          logger.error(`Task ${taskId}: failed to stop VM`, { error: errorMessage(err) });
        }
      })
    );
  }

  get runningCount(): number {
    return this.processes.size;
  }

  private getTask(taskId: string): Task {
    const known = this.tasks.get(taskId);
    if (known) {
      return known;
    }

    if (!TASK_ID_PATTERN.test(taskId)) {
      throw new UnknownTaskError(taskId);
    }

    for (const repo of Object.values(this.registry.list())) {
      const taskDir = taskDirFor(repo.path, taskId);
      if (existsSync(join(taskDir, 'task.json'))) {
        const task = Task.load(taskDir);
        this.tasks.set(taskId, task);
        return task;
      }
    }

    throw new UnknownTaskError(taskId);
  }
}

async function listTaskDirs(repoPath: string): Promise<string[]> {
  const tasksDir = join(repoPath, TASKS_SUBDIR);
  if (!existsSync(tasksDir)) {
    return [];
  }

  const entries = await readdir(tasksDir, { withFileTypes: true });
  return entries.filter((entry) => entry.isDirectory()).map((entry) => join(tasksDir, entry.name));
}

function truncate(text: string, length: number): string {
  return text.length > length ? `${text.slice(0, length)}...` : text;
}
