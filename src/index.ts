export { Orchestrator } from './orchestrator/orchestrator.js';
export type { OrchestratorDeps, TaskInfo, TaskListEntry, SlotsInfo, WaitResult } from './orchestrator/orchestrator.js';
export { Task, taskDirFor, TASKS_SUBDIR } from './tasks/task.js';
export type { TaskStatus, TaskSnapshot, TaskResultPayload } from './tasks/types.js';
export { EventQueue, TaskEvent, createCompletedEvent, createFailedEvent } from './events/event-queue.js';
export type { TaskEventType, TaskEventDict } from './events/event-queue.js';
export { SlotManager, hashRepoPath, DEFAULT_MAX_SLOTS } from './slots/slot-manager.js';
export { MergeResult, setupIsolatedRepo, mergeTaskCommits, cleanupTaskRef } from './git/isolation.js';
export type { MergeResultData, MergeMethod, MergeFailureReason } from './git/types.js';
export { GitOperationQueue } from './git/operation-queue.js';
export { RepoRegistry } from './registry/repo-registry.js';
export type { RepoEntry } from './registry/repo-registry.js';
export { VmRunner, createVmRunnerFactory } from './vm/runner.js';
export type { Runner, RunnerFactory, RunnerOptions } from './vm/types.js';
export type { VmEnvironment } from './vm/environment.js';
export { resolveApiKey } from './credentials.js';
export { McpHttpServer } from './server.js';
export { ConfigLoader } from './config/loader.js';
export { buildConfig, OrchestratorConfigSchema } from './config/schema.js';
export type { OrchestratorConfig, OrchestratorConfigInput } from './config/schema.js';
export * from './errors.js';
export { logger, configureLogDirectory } from './utils/logger.js';
