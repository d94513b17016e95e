import type { Task } from '../tasks/task.js';
import type { VmEnvironment } from './environment.js';

/**
 * A launched task process. `onExit` of its options fires exactly once with
 * the exit code, after `start()` has resolved.
 */
export interface Runner {
  /** @returns the process id */
  start(): Promise<number>;
  /** SIGTERM, then SIGKILL after the grace period; resolves once exit handling is done */
  stop(): Promise<void>;
  readonly isRunning: boolean;
  readonly exitCode: number | null;
}

export interface RunnerOptions {
  task: Task;
  env: VmEnvironment;
  onExit: (exitCode: number) => Promise<void>;
}

export type RunnerFactory = (options: RunnerOptions) => Runner;
