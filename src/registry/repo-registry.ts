/**
 * Allowlist of repositories tasks may run against, keyed by alias.
 * Persisted as `{<alias>: {path, added}}`. The CLI edits the file while the
 * server runs, so reads pick up a file that changed on disk.
 */

import { existsSync, mkdirSync, readFileSync, realpathSync, statSync, writeFileSync } from 'fs';
import { basename, dirname, resolve } from 'path';
import { z } from 'zod';
import { GitRepository } from '../git/repository.js';
import { AliasCollisionError, RepoNotGitError, UnknownRepoError } from '../errors.js';
import { logger } from '../utils/logger.js';

const RepoEntrySchema = z.object({
  path: z.string().min(1),
  added: z.string(),
});

const RegistryFileSchema = z.record(RepoEntrySchema);

export type RepoEntry = z.infer<typeof RepoEntrySchema>;

export class RepoRegistry {
  private repos: Record<string, RepoEntry> = {};
  private loadedMtimeMs: number | null = null;

  constructor(private readonly registryPath: string) {
    this.load();
  }

  /**
   * Register a repository root. Without `alias` the directory name is used,
   * suffixed with -2, -3, ... when another path already holds it.
   *
   * @returns the alias the repository is registered under
   * @throws RepoNotGitError when `path` is not the root of a git repository
   * @throws AliasCollisionError when an explicit `alias` belongs to another path
   */
  async allow(path: string, alias?: string): Promise<string> {
    const repoPath = canonicalize(path);

    if (!existsSync(repoPath) || !(await new GitRepository(repoPath).isRepoRoot())) {
      throw new RepoNotGitError(repoPath);
    }

    this.refresh();
    const requested = alias ?? basename(repoPath);
    const existing = this.repos[requested];

    if (existing && existing.path === repoPath) {
      existing.added = new Date().toISOString();
      this.persist();
      return requested;
    }

    if (existing && alias !== undefined) {
      throw new AliasCollisionError(alias, existing.path, repoPath);
    }

    let chosen = requested;
    if (existing) {
      for (let counter = 2; ; counter++) {
        const candidate = `${requested}-${counter}`;
        const entry = this.repos[candidate];
        if (!entry) {
          chosen = candidate;
          break;
        }
        if (entry.path === repoPath) {
          return candidate;
        }
      }
    }

    this.repos[chosen] = { path: repoPath, added: new Date().toISOString() };
    this.persist();
    logger.info(`Registered repo '${chosen}' at ${repoPath}`);
    return chosen;
  }

  /** @throws UnknownRepoError */
  resolve(alias: string): string {
    this.refresh();
    const entry = this.repos[alias];
    if (!entry) {
      throw new UnknownRepoError(alias);
    }
    return entry.path;
  }

  list(): Record<string, RepoEntry> {
    this.refresh();
    const copy: Record<string, RepoEntry> = {};
    for (const [alias, entry] of Object.entries(this.repos)) {
      copy[alias] = { ...entry };
    }
    return copy;
  }

  /** @throws UnknownRepoError */
  remove(alias: string): void {
    this.refresh();
    if (!this.repos[alias]) {
      throw new UnknownRepoError(alias);
    }
    delete this.repos[alias];
    this.persist();
    logger.info(`Removed repo '${alias}' from registry`);
  }

  private refresh(): void {
    if (fileMtime(this.registryPath) !== this.loadedMtimeMs) {
      this.load();
    }
  }

  private load(): void {
    this.loadedMtimeMs = fileMtime(this.registryPath);
    if (this.loadedMtimeMs === null) {
      this.repos = {};
      return;
    }

    try {
      const raw: unknown = JSON.parse(readFileSync(this.registryPath, 'utf-8'));
      this.repos = RegistryFileSchema.parse(raw);
      logger.debug(`Loaded ${Object.keys(this.repos).length} repos from registry`);
    } catch (err) {
      logger.warn(`Failed to load registry ${this.registryPath}`, {
        error: err instanceof Error ? err.message : String(err),
      });
      this.repos = {};
    }
  }

  private persist(): void {
    mkdirSync(dirname(this.registryPath), { recursive: true });
    writeFileSync(this.registryPath, JSON.stringify(this.repos, null, 2));
    this.loadedMtimeMs = fileMtime(this.registryPath);
    logger.debug(`Persisted ${Object.keys(this.repos).length} repos to registry`);
  }
}

function canonicalize(path: string): string {
  try {
    return realpathSync(path);
  } catch {
    return resolve(path);
  }
}

function fileMtime(path: string): number | null {
  return existsSync(path) ? statSync(path).mtimeMs : null;
}
