/**
 * Task - one delegated unit of work running in a microVM.
 *
 * State machine:
 *   pending -> running    (VM started)
 *   pending -> failed     (VM failed to start)
 *   running -> completed  (exit code 0)
 *   running -> failed     (non-zero exit code or error)
 *
 * completed and failed are terminal. Every transition checks and sets the
 * status in one synchronous block and persists task.json before returning,
 * so of several concurrent callers exactly one observes success.
 */

import { randomUUID } from 'crypto';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { VALID_TRANSITIONS } from './types.js';
import type { TaskResultPayload, TaskSnapshot, TaskStatus } from './types.js';
import type { MergeResultData } from '../git/types.js';

/** Directory under a repository that holds per-task directories */
export const TASKS_SUBDIR = join('.microvm', 'tasks');

const TaskSnapshotSchema = z.object({
  id: z.string().min(1),
  description: z.string(),
  status: z.enum(['pending', 'running', 'completed', 'failed']),
  slot: z.number().int(),
  repo_path: z.string().min(1),
  created_at: z.string(),
  started_at: z.string().nullable().default(null),
  completed_at: z.string().nullable().default(null),
  pid: z.number().int().nullable().default(null),
  exit_code: z.number().int().nullable().default(null),
  error: z.string().nullable().default(null),
});

const TaskResultSchema = z.object({ success: z.boolean().optional() }).passthrough();

const MergeResultSchema = z.object({
  merged: z.boolean(),
  method: z.enum(['fast-forward', 'rebase', 'none']).nullable().default(null),
  commits: z.number().int().default(0),
  conflicts: z.array(z.string()).default([]),
  reason: z.enum(['conflicts', 'fetch_failed']).nullable().default(null),
  task_ref: z.string().nullable().default(null),
});

/** Directory of a task; depends only on the repository and the task id */
export function taskDirFor(repoPath: string, taskId: string): string {
  return join(repoPath, TASKS_SUBDIR, taskId);
}

interface TaskFields {
  id: string;
  description: string;
  status: TaskStatus;
  slot: number;
  repoPath: string;
  createdAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  pid: number | null;
  exitCode: number | null;
  error: string | null;
}

export class Task {
  readonly id: string;
  readonly description: string;
  readonly slot: number;
  readonly repoPath: string;
  readonly createdAt: Date;
  private _status: TaskStatus;
  private _startedAt: Date | null;
  private _completedAt: Date | null;
  private _pid: number | null;
  private _exitCode: number | null;
  private _error: string | null;

  private constructor(fields: TaskFields) {
    this.id = fields.id;
    this.description = fields.description;
    this.slot = fields.slot;
    this.repoPath = fields.repoPath;
    this.createdAt = fields.createdAt;
    this._status = fields.status;
    this._startedAt = fields.startedAt;
    this._completedAt = fields.completedAt;
    this._pid = fields.pid;
    this._exitCode = fields.exitCode;
    this._error = fields.error;
  }

  /**
   * Create a pending task. The id may be pre-allocated by the caller, e.g.
   * when the slot was reserved under that id before the task existed.
   */
  static create(description: string, slot: number, repoPath: string, id: string = randomUUID()): Task {
    return new Task({
      id,
      description,
      status: 'pending',
      slot,
      repoPath,
      createdAt: new Date(),
      startedAt: null,
      completedAt: null,
      pid: null,
      exitCode: null,
      error: null,
    });
  }

  /**
   * Load a task from its directory.
   * @throws if task.json is missing or malformed
   */
  static load(taskDir: string): Task {
    const raw: unknown = JSON.parse(readFileSync(join(taskDir, 'task.json'), 'utf-8'));
    const data = TaskSnapshotSchema.parse(raw);
    return new Task({
      id: data.id,
      description: data.description,
      status: data.status,
      slot: data.slot,
      repoPath: data.repo_path,
      createdAt: new Date(data.created_at),
      startedAt: data.started_at ? new Date(data.started_at) : null,
      completedAt: data.completed_at ? new Date(data.completed_at) : null,
      pid: data.pid,
      exitCode: data.exit_code,
      error: data.error,
    });
  }

  get status(): TaskStatus {
    return this._status;
  }

  get startedAt(): Date | null {
    return this._startedAt;
  }

  get completedAt(): Date | null {
    return this._completedAt;
  }

  get pid(): number | null {
    return this._pid;
  }

  get exitCode(): number | null {
    return this._exitCode;
  }

  get error(): string | null {
    return this._error;
  }

  get taskDir(): string {
    return taskDirFor(this.repoPath, this.id);
  }

  get isolatedRepoPath(): string {
    return join(this.taskDir, 'repo');
  }

  /** Serial console log of the VM */
  get logPath(): string {
    return join(this.taskDir, 'serial.log');
  }

  get resultPath(): string {
    return join(this.taskDir, 'result.json');
  }

  get mergeResultPath(): string {
    return join(this.taskDir, 'merge-result.json');
  }

  get taskJsonPath(): string {
    return join(this.taskDir, 'task.json');
  }

  get startRefPath(): string {
    return join(this.taskDir, 'start-ref');
  }

  get taskIdPath(): string {
    return join(this.taskDir, 'task-id');
  }

  get descriptionPath(): string {
    return join(this.taskDir, 'task.md');
  }

  get apiKeyPath(): string {
    return join(this.taskDir, '.api-key');
  }

  isTerminal(): boolean {
    return this._status === 'completed' || this._status === 'failed';
  }

  markRunning(pid: number): boolean {
    if (!this.canTransitionTo('running')) {
      logger.warn(`Task ${this.id}: cannot mark as running, current status is ${this._status}`);
      return false;
    }

    this._status = 'running';
    this._startedAt = new Date();
    this._pid = pid;
    this.save();
    return true;
  }

  /** completed for exit code 0, failed otherwise; only from running */
  markCompleted(exitCode: number): boolean {
    const newStatus: TaskStatus = exitCode === 0 ? 'completed' : 'failed';

    if (this._status !== 'running' || !this.canTransitionTo(newStatus)) {
      logger.warn(`Task ${this.id}: cannot mark as ${newStatus}, current status is ${this._status}`);
      return false;
    }

    this._status = newStatus;
    this._completedAt = new Date();
    this._exitCode = exitCode;
    this.save();
    return true;
  }

  markFailed(error: string): boolean {
    if (!this.canTransitionTo('failed')) {
      logger.warn(`Task ${this.id}: cannot mark as failed, current status is ${this._status}`);
      return false;
    }

    this._status = 'failed';
    this._completedAt = new Date();
    this._error = error;
    this.save();
    return true;
  }

  toSnapshot(): TaskSnapshot {
    return {
      id: this.id,
      description: this.description,
      status: this._status,
      slot: this.slot,
      repo_path: this.repoPath,
      created_at: this.createdAt.toISOString(),
      started_at: this._startedAt?.toISOString() ?? null,
      completed_at: this._completedAt?.toISOString() ?? null,
      pid: this._pid,
      exit_code: this._exitCode,
      error: this._error,
    };
  }

  save(): void {
    mkdirSync(this.taskDir, { recursive: true });
    writeFileSync(this.taskJsonPath, JSON.stringify(this.toSnapshot(), null, 2));
  }

  getResult(): TaskResultPayload | null {
    return this.readJson(this.resultPath, (raw) => TaskResultSchema.parse(raw));
  }

  getMergeResult(): MergeResultData | null {
    return this.readJson(this.mergeResultPath, (raw) => MergeResultSchema.parse(raw));
  }

  readStartRef(): string | null {
    if (!existsSync(this.startRefPath)) {
      return null;
    }
    const ref = readFileSync(this.startRefPath, 'utf-8').trim();
    return ref.length > 0 ? ref : null;
  }

  private canTransitionTo(next: TaskStatus): boolean {
    return VALID_TRANSITIONS[this._status].includes(next);
  }

  private readJson<T>(path: string, parse: (raw: unknown) => T): T | null {
    if (!existsSync(path)) {
      return null;
    }
    try {
      return parse(JSON.parse(readFileSync(path, 'utf-8')));
    } catch (err) {
      logger.warn(`Task ${this.id}: ignoring unreadable ${path}`, { error: err instanceof Error ? err.message : String(err) });
      return null;
    }
  }
}
