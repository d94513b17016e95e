import { logger } from '../utils/logger.js';

interface QueuedGitOperation {
  id: string;
  repoPath: string;
  label?: string;
  createdAt: number;
  /** Runs the operation and settles the caller's promise; never rejects */
  run: () => Promise<void>;
}

/**
 * Serializes git operations per repository.
 *
 * Two tasks of the same repository can finish at the same moment; their
 * merges both check out, rebase and move refs in the original repository,
 * so they must not overlap. Operations on different repositories run
 * concurrently. Failed operations are not retried.
 */
export class GitOperationQueue {
  private queues = new Map<string, QueuedGitOperation[]>();
  private processing = new Set<string>();
  private operationId = 0;

  /**
   * Queue `operation` behind every earlier operation on `repoPath`.
   * Settles with the operation's own result or error.
   */
  enqueue<T>(repoPath: string, operation: () => Promise<T>, options: { label?: string } = {}): Promise<T> {
    const id = `git-op-${++this.operationId}`;

    return new Promise<T>((resolve, reject) => {
      const queuedOp: QueuedGitOperation = {
        id,
        repoPath,
        label: options.label,
        createdAt: Date.now(),
        run: async () => {
          try {
            resolve(await operation());
          } catch (err) {
            logger.error('Git operation failed', {
              id,
              repoPath,
              label: options.label,
              error: err instanceof Error ? err.message : String(err),
            });
            reject(err);
          }
        },
      };

      const queue = this.queues.get(repoPath) ?? [];
      queue.push(queuedOp);
      this.queues.set(repoPath, queue);

      logger.debug('Git operation queued', {
        id,
        repoPath,
        label: options.label,
        queueLength: queue.length,
      });

      void this.processQueue(repoPath);
    });
  }

  private async processQueue(repoPath: string): Promise<void> {
    if (this.processing.has(repoPath)) {
      return;
    }

    this.processing.add(repoPath);

    try {
      let op = this.queues.get(repoPath)?.shift();
      while (op) {
        const startTime = Date.now();
        logger.debug('Processing git operation', {
          id: op.id,
          repoPath,
          label: op.label,
          waitMs: startTime - op.createdAt,
        });

        await op.run();
        logger.debug('Git operation finished', { id: op.id, durationMs: Date.now() - startTime });

        op = this.queues.get(repoPath)?.shift();
      }
    } finally {
      this.queues.delete(repoPath);
      this.processing.delete(repoPath);
    }
  }
}
