import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, rm, writeFile } from 'fs/promises';
import { existsSync, statSync } from 'fs';
import { join } from 'path';
import { buildConfig, type OrchestratorConfig } from '../../src/config/schema.js';
import { EventQueue } from '../../src/events/event-queue.js';
import { Orchestrator, type WaitResult } from '../../src/orchestrator/orchestrator.js';
import { RepoRegistry } from '../../src/registry/repo-registry.js';
import { SlotManager } from '../../src/slots/slot-manager.js';
import {
  AllSlotsBusyError,
  CredentialsNotFoundError,
  LogNotFoundError,
  TaskStartError,
  UnknownRepoError,
  UnknownTaskError,
} from '../../src/errors.js';
import type { TaskEventDict } from '../../src/events/event-queue.js';
import { commitFile, git, initRepo, makeTempDir } from '../helpers/git.js';
import { createFakeRunnerFactory, type FakeRunnerBehaviour } from '../helpers/mocks.js';

function asEvent(result: WaitResult): TaskEventDict {
  if (!('task_id' in result)) {
    throw new Error(`Expected an event, got ${JSON.stringify(result)}`);
  }
  return result;
}

describe('Orchestrator', () => {
  let testDir: string;
  let repo: string;
  let config: OrchestratorConfig;
  let registry: RepoRegistry;
  let slotManager: SlotManager;
  let runners: ReturnType<typeof createFakeRunnerFactory>;
  let orchestrator: Orchestrator;

  function createOrchestrator(
    behaviour: FakeRunnerBehaviour = {},
    resolveApiKey: () => Promise<string> = async () => 'test-secret'
  ): Orchestrator {
    runners = createFakeRunnerFactory(behaviour);
    return new Orchestrator({
      config,
      registry,
      slotManager,
      eventQueue: new EventQueue(),
      runnerFactory: runners.factory,
      resolveApiKey,
    });
  }

  beforeEach(async () => {
    testDir = await makeTempDir('orchestrator-test');
    repo = await initRepo(join(testDir, 'project'));
    config = buildConfig({ stateDir: join(testDir, 'state'), maxSlots: 2 });
    registry = new RepoRegistry(config.registryPath);
    await registry.allow(repo);
    slotManager = new SlotManager({ maxSlots: config.maxSlots, assignmentsPath: config.slotAssignmentsPath });
    orchestrator = createOrchestrator();
  });

  afterEach(async () => {
    await orchestrator.stopAll();
    await rm(testDir, { recursive: true, force: true });
  });

  describe('runTask', () => {
    it('should start a task in a slot with its files in place', async () => {
      const head = await git(repo, 'rev-parse', 'HEAD');

      const { task_id } = await orchestrator.runTask('Add a feature', 'project');

      const taskDir = join(repo, '.microvm', 'tasks', task_id);
      expect(await readFile(join(taskDir, 'task.md'), 'utf-8')).toBe('Add a feature');
      expect(await readFile(join(taskDir, 'start-ref'), 'utf-8')).toBe(head);
      expect(await readFile(join(taskDir, 'task-id'), 'utf-8')).toBe(task_id);
      expect(await readFile(join(taskDir, '.api-key'), 'utf-8')).toBe('test-secret');
      expect(statSync(join(taskDir, '.api-key')).mode & 0o777).toBe(0o600);
      expect(await git(join(taskDir, 'repo'), 'rev-parse', 'HEAD')).toBe(head);

      const info = orchestrator.getTaskInfo(task_id);
      expect(info.status).toBe('running');
      expect(info.slot).toBe(1);
      expect(info.pid).toBe(runners.runnerFor(task_id).pid);
      expect(orchestrator.listSlots()).toEqual({
        max_slots: 2,
        active: [{ slot: 1, task_id }],
        available: [2],
      });
    });

    it('should hand the runner the slot environment', async () => {
      const { task_id } = await orchestrator.runTask('Env check', 'project');

      const { env } = runners.runnerFor(task_id).options;
      expect(env.slot).toBe(1);
      expect(env.varDir).toBe(join(config.slotsDir, '1', 'var'));
      expect(env.packageName).toBe('claude-microvm');
      expect(existsSync(join(config.slotsDir, '1', 'container-storage'))).toBe(true);
    });

    it('should give concurrent tasks distinct ids and slots', async () => {
      const [a, b] = await Promise.all([
        orchestrator.runTask('Task A', 'project'),
        orchestrator.runTask('Task B', 'project'),
      ]);

      expect(a.task_id).not.toBe(b.task_id);
      const slots = [orchestrator.getTaskInfo(a.task_id).slot, orchestrator.getTaskInfo(b.task_id).slot];
      expect(slots.sort()).toEqual([1, 2]);
    });

    it('should fail fast when every slot is busy', async () => {
      await orchestrator.runTask('one', 'project');
      await orchestrator.runTask('two', 'project');

      await expect(orchestrator.runTask('three', 'project')).rejects.toBeInstanceOf(AllSlotsBusyError);
      expect(runners.runners).toHaveLength(2);
    });

    it('should reject an unknown repo before taking a slot', async () => {
      await expect(orchestrator.runTask('x', 'ghost')).rejects.toBeInstanceOf(UnknownRepoError);
      expect(orchestrator.listSlots().available).toEqual([1, 2]);
    });

    it('should reject when no credentials are found', async () => {
      orchestrator = createOrchestrator({}, async () => {
        throw new CredentialsNotFoundError();
      });

      await expect(orchestrator.runTask('x', 'project')).rejects.toBeInstanceOf(CredentialsNotFoundError);
      expect(orchestrator.listSlots().available).toEqual([1, 2]);
    });

    it('should release the slot and emit a failed event when the VM cannot start', async () => {
      orchestrator = createOrchestrator({ failStart: 'nix-build failed' });

      const error = await orchestrator.runTask('x', 'project').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(TaskStartError);
      expect(error instanceof Error ? error.message : '').toBe('Failed to start task: nix-build failed');
      expect(orchestrator.listSlots().available).toEqual([1, 2]);

      const event = asEvent(await orchestrator.waitNextEvent(100));
      expect(event.event).toBe('failed');
      expect(event.error).toBe('nix-build failed');
      expect(event.exit_code).toBeNull();

      const [task] = await orchestrator.listTasks();
      expect(task?.status).toBe('failed');
    });

    it('should keep tracking a VM whose task was finished while it was starting', async () => {
      orchestrator = createOrchestrator({ beforeStart: ({ task }) => task.markFailed('stopped during start') });

      const { task_id } = await orchestrator.runTask('x', 'project');

      expect(orchestrator.runningCount).toBe(1);
      expect(await orchestrator.listTasks()).toEqual([
        expect.objectContaining({ task_id, status: 'failed' }),
      ]);

      await runners.runnerFor(task_id).exit(0);

      expect(orchestrator.runningCount).toBe(0);
      expect(orchestrator.listSlots().available).toEqual([1, 2]);
      expect(asEvent(await orchestrator.waitNextEvent(100)).event).toBe('completed');
    });
  });

  describe('task exit', () => {
    it('should fast-forward the work of a successful task and emit completed', async () => {
      const { task_id } = await orchestrator.runTask('Add feature', 'project');
      const runner = runners.runnerFor(task_id);
      const taskHead = await commitFile(runner.task.isolatedRepoPath, 'feature.txt', 'done\n', 'Add feature');
      await runner.writeResult({ success: true, summary: 'added' });

      await runner.exit(0);

      const event = asEvent(await orchestrator.waitNextEvent(1000));
      expect(event.task_id).toBe(task_id);
      expect(event.event).toBe('completed');
      expect(event.exit_code).toBe(0);
      expect(event.result).toEqual({ success: true, summary: 'added' });
      expect(event.merge_result).toEqual({
        merged: true,
        method: 'fast-forward',
        commits: 1,
        conflicts: [],
        reason: null,
        task_ref: null,
      });

      expect(await git(repo, 'rev-parse', 'HEAD')).toBe(taskHead);
      expect(orchestrator.listSlots().active).toEqual([]);

      const info = orchestrator.getTaskInfo(task_id);
      expect(info.status).toBe('completed');
      expect(info.exit_code).toBe(0);
      expect(info.merge_result?.method).toBe('fast-forward');
      expect(JSON.parse(await readFile(runner.task.mergeResultPath, 'utf-8')).merged).toBe(true);
    });

    it('should merge two concurrent tasks one after the other', async () => {
      const a = await orchestrator.runTask('Task A', 'project');
      const b = await orchestrator.runTask('Task B', 'project');
      const runnerA = runners.runnerFor(a.task_id);
      const runnerB = runners.runnerFor(b.task_id);

      await commitFile(runnerA.task.isolatedRepoPath, 'a.txt', 'a\n', 'Work A');
      await commitFile(runnerB.task.isolatedRepoPath, 'b.txt', 'b\n', 'Work B');
      await runnerA.writeResult({ success: true });
      await runnerB.writeResult({ success: true });

      await Promise.all([runnerA.exit(0), runnerB.exit(0)]);

      const first = asEvent(await orchestrator.waitNextEvent(1000));
      const second = asEvent(await orchestrator.waitNextEvent(1000));

      expect([first.task_id, second.task_id].sort()).toEqual([a.task_id, b.task_id].sort());
      expect(first.merge_result?.merged).toBe(true);
      expect(second.merge_result?.merged).toBe(true);
      expect([first.merge_result?.method, second.merge_result?.method].sort()).toEqual(['fast-forward', 'rebase']);
      expect(existsSync(join(repo, 'a.txt'))).toBe(true);
      expect(existsSync(join(repo, 'b.txt'))).toBe(true);
      expect(await git(repo, 'rev-list', '--count', 'HEAD')).toBe('3');
    });

    it('should not merge when the VM exits non-zero', async () => {
      const head = await git(repo, 'rev-parse', 'HEAD');
      const { task_id } = await orchestrator.runTask('Break things', 'project');
      const runner = runners.runnerFor(task_id);
      await commitFile(runner.task.isolatedRepoPath, 'half.txt', 'half\n', 'Half done');
      await runner.writeResult({ success: true });

      await runner.exit(1);

      const event = asEvent(await orchestrator.waitNextEvent(1000));
      expect(event.event).toBe('failed');
      expect(event.exit_code).toBe(1);
      expect(event.merge_result).toBeNull();
      expect(await git(repo, 'rev-parse', 'HEAD')).toBe(head);

      const [listed] = await orchestrator.listTasks();
      expect(listed?.status).toBe('failed');
      expect(orchestrator.getTaskInfo(task_id).exit_code).toBe(1);
    });

    it('should not merge when the task reports failure', async () => {
      const head = await git(repo, 'rev-parse', 'HEAD');
      const { task_id } = await orchestrator.runTask('Try', 'project');
      const runner = runners.runnerFor(task_id);
      await commitFile(runner.task.isolatedRepoPath, 'try.txt', 'try\n', 'Attempt');
      await runner.writeResult({ success: false, error: 'tests failed' });

      await runner.exit(0);

      const event = asEvent(await orchestrator.waitNextEvent(1000));
      expect(event.event).toBe('completed');
      expect(event.merge_result).toBeNull();
      expect(await git(repo, 'rev-parse', 'HEAD')).toBe(head);

      const info = orchestrator.getTaskInfo(task_id);
      expect(info.status).toBe('failed');
      expect(info.result).toEqual({ success: false, error: 'tests failed' });
      expect(info.merge_result).toBeUndefined();
    });

    it('should report conflicts without touching the original branch', async () => {
      const { task_id } = await orchestrator.runTask('Edit README', 'project');
      const runner = runners.runnerFor(task_id);
      await commitFile(runner.task.isolatedRepoPath, 'README.md', '# From task\n', 'Task edit');
      const userHead = await commitFile(repo, 'README.md', '# From user\n', 'User edit');
      await runner.writeResult({ success: true });

      await runner.exit(0);

      const event = asEvent(await orchestrator.waitNextEvent(1000));
      expect(event.merge_result).toEqual({
        merged: false,
        method: null,
        commits: 1,
        conflicts: ['README.md'],
        reason: 'conflicts',
        task_ref: `refs/tasks/${task_id}`,
      });
      expect(await git(repo, 'rev-parse', 'HEAD')).toBe(userHead);
    });
  });

  describe('waitNextEvent', () => {
    it('should return no_running_tasks when idle', async () => {
      expect(await orchestrator.waitNextEvent(1000)).toEqual({ no_running_tasks: true });
    });

    it('should time out while a task is still running', async () => {
      await orchestrator.runTask('Long job', 'project');

      expect(await orchestrator.waitNextEvent(50)).toEqual({ timeout: true });
    });

    it('should wake up when a task finishes', async () => {
      const { task_id } = await orchestrator.runTask('Quick job', 'project');
      const runner = runners.runnerFor(task_id);

      const waiting = orchestrator.waitNextEvent(5000);
      setTimeout(() => {
        void runner.exit(3);
      }, 20);

      const event = asEvent(await waiting);
      expect(event.task_id).toBe(task_id);
      expect(event.exit_code).toBe(3);
    });

    it('should reject when the caller aborts', async () => {
      await orchestrator.runTask('Long job', 'project');
      const controller = new AbortController();

      const waiting = orchestrator.waitNextEvent(5000, controller.signal);
      controller.abort(new Error('client went away'));

      await expect(waiting).rejects.toThrow('client went away');
    });
  });

  describe('cleanupTask', () => {
    it('should stop a running task, free its slot and remove its directory', async () => {
      const { task_id } = await orchestrator.runTask('Doomed', 'project');
      const runner = runners.runnerFor(task_id);
      const taskDir = runner.task.taskDir;

      expect(await orchestrator.cleanupTask(task_id)).toEqual({ success: true });

      expect(runner.isRunning).toBe(false);
      expect(runner.exitCode).toBe(-15);
      expect(existsSync(taskDir)).toBe(false);
      expect(orchestrator.listSlots().available).toEqual([1, 2]);
      expect(() => orchestrator.getTaskInfo(task_id)).toThrow(UnknownTaskError);
    });

    it('should delete the task ref on request', async () => {
      const { task_id } = await orchestrator.runTask('Conflicting', 'project');
      const runner = runners.runnerFor(task_id);
      await commitFile(runner.task.isolatedRepoPath, 'README.md', '# From task\n', 'Task edit');
      await commitFile(repo, 'README.md', '# From user\n', 'User edit');
      await runner.writeResult({ success: true });
      await runner.exit(0);

      expect(await git(repo, 'for-each-ref', '--format=%(refname)', 'refs/tasks/')).toBe(`refs/tasks/${task_id}`);

      await orchestrator.cleanupTask(task_id, true);

      expect(await git(repo, 'for-each-ref', 'refs/tasks/')).toBe('');
    });

    it('should throw for an unknown task', async () => {
      await expect(orchestrator.cleanupTask('no-such-task')).rejects.toBeInstanceOf(UnknownTaskError);
    });
  });

  describe('getTaskLogs', () => {
    it('should return the serial log path once it exists', async () => {
      const { task_id } = await orchestrator.runTask('Logs', 'project');
      const logPath = runners.runnerFor(task_id).task.logPath;

      expect(() => orchestrator.getTaskLogs(task_id)).toThrow(LogNotFoundError);

      await writeFile(logPath, 'booting\n');
      expect(orchestrator.getTaskLogs(task_id)).toEqual({ log_path: logPath });
    });
  });

  describe('task lookup', () => {
    it('should load tasks from disk for a fresh orchestrator', async () => {
      const { task_id } = await orchestrator.runTask('Persisted', 'project');
      const runner = runners.runnerFor(task_id);
      await runner.writeResult({ success: true });
      await runner.exit(0);

      const fresh = createOrchestrator();
      const info = fresh.getTaskInfo(task_id);

      expect(info.task_id).toBe(task_id);
      expect(info.description).toBe('Persisted');
      expect(info.status).toBe('completed');
      expect(info.merge_result?.method).toBe('none');
    });

    it('should reject ids that are not plain identifiers', () => {
      expect(() => orchestrator.getTaskInfo('../../etc')).toThrow(UnknownTaskError);
    });
  });

  describe('listTasks', () => {
    it('should list tasks with truncated descriptions and repo aliases', async () => {
      const long = 'Refactor the configuration loader so that every key is validated up front';
      const { task_id } = await orchestrator.runTask(long, 'project');

      expect(await orchestrator.listTasks()).toEqual([
        {
          task_id,
          status: 'running',
          description: `${long.slice(0, 50)}...`,
          repo: 'project',
        },
      ]);
    });
  });

  describe('listRepos', () => {
    it('should list registered repositories', () => {
      const repos = orchestrator.listRepos();

      expect(Object.keys(repos)).toEqual(['project']);
      expect(repos.project?.path).toBe(repo);
    });
  });

  describe('cleanupStaleTasks', () => {
    it('should remove task directories left by an earlier process', async () => {
      const stale = join(repo, '.microvm', 'tasks', 'stale-task');
      await mkdir(join(stale, 'repo'), { recursive: true });

      expect(await orchestrator.cleanupStaleTasks()).toBe(1);
      expect(existsSync(stale)).toBe(false);
    });
  });
});
