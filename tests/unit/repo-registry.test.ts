import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { RepoRegistry } from '../../src/registry/repo-registry.js';
import { AliasCollisionError, RepoNotGitError, UnknownRepoError } from '../../src/errors.js';
import { initRepo, makeTempDir } from '../helpers/git.js';

describe('RepoRegistry', () => {
  let testDir: string;
  let registryPath: string;

  beforeEach(async () => {
    testDir = await makeTempDir('registry-test');
    registryPath = join(testDir, 'state', 'allowed-repos.json');
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('allow', () => {
    it('should register a repo under its directory name', async () => {
      const repo = await initRepo(join(testDir, 'project'));
      const registry = new RepoRegistry(registryPath);

      const alias = await registry.allow(repo);

      expect(alias).toBe('project');
      expect(registry.resolve('project')).toBe(repo);
    });

    it('should use an explicit alias', async () => {
      const repo = await initRepo(join(testDir, 'project'));
      const registry = new RepoRegistry(registryPath);

      expect(await registry.allow(repo, 'main-app')).toBe('main-app');
      expect(registry.resolve('main-app')).toBe(repo);
    });

    it('should reject a directory that is not a repository root', async () => {
      const plain = join(testDir, 'plain');
      await mkdir(plain);
      const registry = new RepoRegistry(registryPath);

      await expect(registry.allow(plain)).rejects.toBeInstanceOf(RepoNotGitError);
    });

    it('should reject a subdirectory of a repository', async () => {
      const repo = await initRepo(join(testDir, 'project'));
      await mkdir(join(repo, 'src'));
      const registry = new RepoRegistry(registryPath);

      await expect(registry.allow(join(repo, 'src'))).rejects.toBeInstanceOf(RepoNotGitError);
    });

    it('should reject a missing path', async () => {
      const registry = new RepoRegistry(registryPath);

      await expect(registry.allow(join(testDir, 'nope'))).rejects.toBeInstanceOf(RepoNotGitError);
    });

    it('should keep the alias when the same repo is allowed again', async () => {
      const repo = await initRepo(join(testDir, 'project'));
      const registry = new RepoRegistry(registryPath);

      await registry.allow(repo);
      expect(await registry.allow(repo)).toBe('project');
      expect(Object.keys(registry.list())).toEqual(['project']);
    });

    it('should suffix the default alias when another path holds it', async () => {
      const first = await initRepo(join(testDir, 'a', 'project'));
      const second = await initRepo(join(testDir, 'b', 'project'));
      const third = await initRepo(join(testDir, 'c', 'project'));
      const registry = new RepoRegistry(registryPath);

      expect(await registry.allow(first)).toBe('project');
      expect(await registry.allow(second)).toBe('project-2');
      expect(await registry.allow(third)).toBe('project-3');
      expect(await registry.allow(second)).toBe('project-2');
    });

    it('should refuse an explicit alias that belongs to another path', async () => {
      const first = await initRepo(join(testDir, 'a', 'project'));
      const second = await initRepo(join(testDir, 'b', 'other'));
      const registry = new RepoRegistry(registryPath);
      await registry.allow(first, 'app');

      await expect(registry.allow(second, 'app')).rejects.toBeInstanceOf(AliasCollisionError);
      expect(registry.resolve('app')).toBe(first);
    });
  });

  describe('resolve', () => {
    it('should throw UnknownRepoError for an unknown alias', () => {
      const registry = new RepoRegistry(registryPath);

      expect(() => registry.resolve('ghost')).toThrow(UnknownRepoError);
      expect(() => registry.resolve('ghost')).toThrow("Repo 'ghost' not registered. Run: microvm-orchestrator allow");
    });
  });

  describe('remove', () => {
    it('should remove a registered alias', async () => {
      const repo = await initRepo(join(testDir, 'project'));
      const registry = new RepoRegistry(registryPath);
      await registry.allow(repo);

      registry.remove('project');

      expect(registry.list()).toEqual({});
    });

    it('should throw for an unknown alias', () => {
      const registry = new RepoRegistry(registryPath);

      expect(() => registry.remove('ghost')).toThrow(UnknownRepoError);
    });
  });

  describe('persistence', () => {
    it('should write {alias: {path, added}}', async () => {
      const repo = await initRepo(join(testDir, 'project'));
      const registry = new RepoRegistry(registryPath);
      await registry.allow(repo);

      const saved = JSON.parse(await readFile(registryPath, 'utf-8'));

      expect(Object.keys(saved)).toEqual(['project']);
      expect(saved.project.path).toBe(repo);
      expect(typeof saved.project.added).toBe('string');
    });

    it('should see repos registered by another instance', async () => {
      const repo = await initRepo(join(testDir, 'project'));
      const server = new RepoRegistry(registryPath);
      expect(server.list()).toEqual({});

      await new RepoRegistry(registryPath).allow(repo);

      expect(server.resolve('project')).toBe(repo);
    });

    it('should start empty from a malformed file', async () => {
      await mkdir(join(testDir, 'state'), { recursive: true });
      await writeFile(registryPath, 'not json');

      expect(new RepoRegistry(registryPath).list()).toEqual({});
    });

    it('should return a copy from list()', async () => {
      const repo = await initRepo(join(testDir, 'project'));
      const registry = new RepoRegistry(registryPath);
      await registry.allow(repo);

      const listed = registry.list();
      const entry = listed.project;
      if (entry) {
        entry.path = '/elsewhere';
      }

      expect(registry.resolve('project')).toBe(repo);
    });
  });
});
