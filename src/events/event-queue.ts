/**
 * EventQueue - FIFO of task completion notifications.
 *
 * Producers are runner exit callbacks; consumers are protocol requests
 * waiting for the next event. Every event is delivered to exactly one
 * consumer, in emission order.
 */

import { logger } from '../utils/logger.js';
import type { MergeResultData } from '../git/types.js';
import type { TaskResultPayload } from '../tasks/types.js';

export type TaskEventType = 'completed' | 'failed';

/** Polling interval of wait() */
const POLL_INTERVAL_MS = 10;

/** Upper bound of a single sleep in waitAsync() between queue re-checks */
const MAX_WAKE_INTERVAL_MS = 1000;

export interface TaskEventDict {
  task_id: string;
  event: TaskEventType;
  timestamp: string;
  exit_code: number | null;
  error: string | null;
  result: TaskResultPayload | null;
  merge_result: MergeResultData | null;
}

export class TaskEvent {
  constructor(
    readonly taskId: string,
    readonly type: TaskEventType,
    readonly timestamp: Date,
    readonly exitCode: number | null = null,
    readonly error: string | null = null,
    readonly result: TaskResultPayload | null = null,
    readonly mergeResult: MergeResultData | null = null
  ) {}

  toDict(): TaskEventDict {
    return {
      task_id: this.taskId,
      event: this.type,
      timestamp: this.timestamp.toISOString(),
      exit_code: this.exitCode,
      error: this.error,
      result: this.result,
      merge_result: this.mergeResult,
    };
  }
}

export function createCompletedEvent(
  taskId: string,
  exitCode: number,
  result: TaskResultPayload | null = null,
  mergeResult: MergeResultData | null = null
): TaskEvent {
  return new TaskEvent(taskId, exitCode === 0 ? 'completed' : 'failed', new Date(), exitCode, null, result, mergeResult);
}

export function createFailedEvent(taskId: string, error: string): TaskEvent {
  return new TaskEvent(taskId, 'failed', new Date(), null, error);
}

export class EventQueue {
  private queue: TaskEvent[] = [];
  private wakers = new Set<() => void>();

  emit(event: TaskEvent): void {
    this.queue.push(event);

    logger.debug('Task event emitted', {
      taskId: event.taskId,
      event: event.type,
      queueLength: this.queue.length,
      waiters: this.wakers.size,
    });

    // Snapshot: a woken waiter unregisters itself while we iterate
    for (const wake of [...this.wakers]) {
      wake();
    }
  }

  tryPop(): TaskEvent | null {
    return this.queue.shift() ?? null;
  }

  get size(): number {
    return this.queue.length;
  }

  /**
   * Wait for the next event by polling the queue.
   * Resolves null once `timeoutMs` has elapsed without an event.
   */
  async wait(timeoutMs: number = 30000): Promise<TaskEvent | null> {
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      const event = this.tryPop();
      if (event) {
        return event;
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        return null;
      }

      await delay(Math.min(POLL_INTERVAL_MS, remaining));
    }
  }

  /**
   * Wait for the next event, woken by emit() and re-checking at least once
   * per second until `timeoutMs` elapses. Rejects with the abort reason when
   * `signal` is aborted; nothing is left registered afterwards.
   */
  async waitAsync(timeoutMs: number = 30000, signal?: AbortSignal): Promise<TaskEvent | null> {
    signal?.throwIfAborted();

    const first = this.tryPop();
    if (first) {
      return first;
    }

    const deadline = Date.now() + timeoutMs;

    for (;;) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        return null;
      }

      await this.sleepUntilWoken(Math.min(remaining, MAX_WAKE_INTERVAL_MS), signal);

      // Woken, timed out or spuriously: the queue is the source of truth
      const event = this.tryPop();
      if (event) {
        return event;
      }
    }
  }

  private sleepUntilWoken(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const finish = (): void => {
        clearTimeout(timer);
        this.wakers.delete(finish);
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };

      const onAbort = (): void => {
        clearTimeout(timer);
        this.wakers.delete(finish);
        reject(signal?.reason);
      };

      const timer = setTimeout(finish, ms);
      this.wakers.add(finish);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
