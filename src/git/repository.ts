import { simpleGit, SimpleGit, SimpleGitOptions, CheckRepoActions } from 'simple-git';
import { execa } from 'execa';
import { logger } from '../utils/logger.js';

export interface GitCommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Run a git command in `cwd`. Non-zero exits are returned, not thrown, so
 * callers can branch on expected failures (no fast-forward, conflicts).
 * Failing to launch git at all still throws.
 */
export async function runGit(args: string[], cwd: string): Promise<GitCommandResult> {
  const result = await execa('git', args, { cwd, reject: false, stdin: 'ignore' });

  if (result.failed && result.exitCode === undefined) {
    throw new Error(`git ${args.join(' ')} could not be run in ${cwd}${result.signal ? ` (${result.signal})` : ''}`);
  }

  const exitCode = result.exitCode ?? 1;
  if (exitCode !== 0) {
    logger.debug(`git ${args.join(' ')} exited with ${exitCode}`, { cwd, stderr: result.stderr });
  }

  return { exitCode, stdout: result.stdout, stderr: result.stderr };
}

/** Like runGit, but a non-zero exit throws with git's stderr. */
export async function runGitChecked(args: string[], cwd: string): Promise<string> {
  const result = await runGit(args, cwd);
  if (result.exitCode !== 0) {
    throw new Error(`git ${args.join(' ')} failed in ${cwd} (exit ${result.exitCode}): ${result.stderr.trim()}`);
  }
  return result.stdout;
}

/**
 * Read-side view of a repository: HEAD, the checked-out branch and whether a
 * directory is a repository root.
 */
export class GitRepository {
  private git: SimpleGit;
  private baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = baseDir;

    const options: Partial<SimpleGitOptions> = {
      baseDir,
      binary: 'git',
      maxConcurrentProcesses: 6,
    };

    this.git = simpleGit(options);
  }

  /** Commit hash of HEAD. */
  async getHead(): Promise<string> {
    const head = await this.git.revparse(['HEAD']);
    return head.trim();
  }

  /**
   * Name of the checked-out branch, or null when HEAD is detached.
   */
  async getCurrentBranch(): Promise<string | null> {
    const result = await this.git.branch();
    return result.detached ? null : result.current;
  }

  async isRepoRoot(): Promise<boolean> {
    try {
      return await this.git.checkIsRepo(CheckRepoActions.IS_REPO_ROOT);
    } catch (err) {
      logger.debug(`Repository check failed for ${this.baseDir}`, err);
      return false;
    }
  }
}
