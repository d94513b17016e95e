/**
 * Typed failure conditions raised to callers of the orchestrator.
 *
 * Invalid task transitions are not errors (the transition methods return
 * `false`), and expected git outcomes such as conflicts are returned as
 * `MergeResult` data. Everything here is a condition a caller must handle.
 */

export type OrchestratorErrorCode =
  | 'UNKNOWN_REPO'
  | 'REPO_NOT_GIT'
  | 'ALIAS_COLLISION'
  | 'UNKNOWN_TASK'
  | 'ALL_SLOTS_BUSY'
  | 'LOG_NOT_FOUND'
  | 'CREDENTIALS_NOT_FOUND'
  | 'TASK_START_FAILED'
  | 'VM_BUILD_FAILED'
  | 'CONFIG_INVALID';

export class OrchestratorError extends Error {
  readonly code: OrchestratorErrorCode;

  constructor(code: OrchestratorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UnknownRepoError extends OrchestratorError {
  constructor(readonly alias: string) {
    super('UNKNOWN_REPO', `Repo '${alias}' not registered. Run: microvm-orchestrator allow`);
  }
}

export class RepoNotGitError extends OrchestratorError {
  constructor(readonly path: string) {
    super('REPO_NOT_GIT', `Not a git repository: ${path}`);
  }
}

export class AliasCollisionError extends OrchestratorError {
  constructor(
    readonly alias: string,
    readonly existingPath: string,
    readonly newPath: string
  ) {
    super(
      'ALIAS_COLLISION',
      `Alias '${alias}' already exists for ${existingPath}. Use --alias to specify a different alias.`
    );
  }
}

export class UnknownTaskError extends OrchestratorError {
  constructor(readonly taskId: string) {
    super('UNKNOWN_TASK', `Task not found: ${taskId}`);
  }
}

export class AllSlotsBusyError extends OrchestratorError {
  constructor(
    readonly maxSlots: number,
    readonly activeTasks: Record<number, string>
  ) {
    super(
      'ALL_SLOTS_BUSY',
      `All ${maxSlots} slots are busy. Active tasks: ${Object.values(activeTasks).join(', ')}`
    );
  }
}

export class LogNotFoundError extends OrchestratorError {
  constructor(readonly logPath: string) {
    super('LOG_NOT_FOUND', `Log file not found: ${logPath}`);
  }
}

export class CredentialsNotFoundError extends OrchestratorError {
  constructor() {
    super(
      'CREDENTIALS_NOT_FOUND',
      "No API key found. Set ANTHROPIC_API_KEY or CLAUDE_CODE_OAUTH_TOKEN, or login with 'claude /login'"
    );
  }
}

export class TaskStartError extends OrchestratorError {
  constructor(readonly taskId: string, cause: unknown) {
    super('TASK_START_FAILED', `Failed to start task: ${errorMessage(cause)}`, { cause });
  }
}

export class VmBuildError extends OrchestratorError {
  constructor(readonly stdout: string, readonly stderr: string) {
    super('VM_BUILD_FAILED', `nix-build failed:\nstdout: ${stdout}\nstderr: ${stderr}`);
  }
}

export class ConfigError extends OrchestratorError {
  constructor(message: string) {
    super('CONFIG_INVALID', message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
