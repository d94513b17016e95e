/**
 * VmRunner - builds the task's microVM with nix-build and runs it.
 *
 * The VM's serial console is appended to the task's serial.log. The process
 * runs in its own session so it outlives neither more nor less than we ask:
 * stop() sends SIGTERM and execa follows up with SIGKILL after the grace
 * period.
 */

import { execa, type ResultPromise } from 'execa';
import { existsSync } from 'fs';
import { mkdir, open, readFile } from 'fs/promises';
import { constants } from 'os';
import { dirname, join } from 'path';
import { ConfigError, VmBuildError } from '../errors.js';
import { logger } from '../utils/logger.js';
import { toEnvVars, toNixArgs, type VmEnvironment } from './environment.js';
import type { Runner, RunnerFactory, RunnerOptions } from './types.js';

export interface VmRunnerConfig {
  /** Directory holding default.nix */
  nixDir?: string;
  /** Grace period between SIGTERM and SIGKILL */
  stopTimeoutMs: number;
}

/**
 * Build the VM and return its store path.
 * @throws VmBuildError when nix-build fails
 */
export async function buildVm(nixDir: string, env: VmEnvironment): Promise<string> {
  const resultLink = `result-mcp-${env.slot}`;
  const args = ['default.nix', '-A', env.packageName, '-o', resultLink, ...toNixArgs(env)];

  logger.info(`Building VM for slot ${env.slot}`, { nixDir, package: env.packageName });

  const result = await execa('nix-build', args, { cwd: nixDir, reject: false, stdin: 'ignore' });
  if (result.exitCode !== 0) {
    throw new VmBuildError(result.stdout, result.stderr || (result.failed ? 'nix-build could not be started' : ''));
  }

  const storePath = result.stdout.trim().split('\n').pop();
  if (storePath && existsSync(storePath)) {
    return storePath;
  }

  // Each slot has its own result link so parallel builds do not clobber each other
  return join(nixDir, resultLink);
}

export function findRunner(buildPath: string): string {
  const runner = join(buildPath, 'bin', 'microvm-run');
  if (!existsSync(runner)) {
    throw new Error(`Runner not found at: ${runner}`);
  }
  return runner;
}

/** Point the serial console at a log file instead of stdio. */
export function patchRunnerForLogFile(script: string, logPath: string): string {
  return script.replaceAll('virtio-serial,stdio', `virtio-serial,logFilePath=${logPath}`);
}

/** Exit status as an integer; signals map to their negated number. */
export function exitCodeOf(result: { exitCode?: number; signal?: string }): number {
  if (typeof result.exitCode === 'number') {
    return result.exitCode;
  }
  const signalNumber = Object.entries(constants.signals).find(([name]) => name === result.signal)?.[1];
  return signalNumber !== undefined ? -signalNumber : 1;
}

export class VmRunner implements Runner {
  private subprocess: ResultPromise | null = null;
  private exited: Promise<void> | null = null;
  private running = false;
  private _exitCode: number | null = null;

  constructor(
    private readonly options: RunnerOptions,
    private readonly config: VmRunnerConfig
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  get exitCode(): number | null {
    return this._exitCode;
  }

  async start(): Promise<number> {
    const { task, env } = this.options;
    const nixDir = this.config.nixDir;
    if (!nixDir) {
      throw new ConfigError('nixDir is not configured; set it in config.json');
    }

    const buildPath = await buildVm(nixDir, env);
    const script = patchRunnerForLogFile(await readFile(findRunner(buildPath), 'utf-8'), task.logPath);

    await mkdir(dirname(task.logPath), { recursive: true });
    const log = await open(task.logPath, 'a');

    let subprocess: ResultPromise;
    try {
      subprocess = execa('bash', ['-c', script], {
        cwd: nixDir,
        env: toEnvVars(env),
        stdin: 'ignore',
        stdout: log.fd,
        stderr: log.fd,
        detached: true,
        reject: false,
        forceKillAfterDelay: this.config.stopTimeoutMs,
      });
    } finally {
      // The child holds its own copy of the descriptor
      await log.close();
    }

    const pid = subprocess.pid;
    if (pid === undefined) {
      const result = await subprocess;
      throw new Error(`Failed to launch VM for task ${task.id}: ${result.stderr || 'spawn failed'}`);
    }

    this.subprocess = subprocess;
    this.running = true;
    this.exited = this.monitor(subprocess);

    logger.info(`Task ${task.id}: VM started`, { pid, slot: env.slot });
    return pid;
  }

  async stop(): Promise<void> {
    if (this.subprocess && this.running) {
      logger.info(`Task ${this.options.task.id}: stopping VM`, { pid: this.subprocess.pid });
      this.subprocess.kill('SIGTERM');
    }
    await this.exited;
  }

  private async monitor(subprocess: ResultPromise): Promise<void> {
    const result = await subprocess;
    this.running = false;
    this._exitCode = exitCodeOf(result);

    logger.info(`Task ${this.options.task.id}: VM exited`, { exitCode: this._exitCode, durationMs: result.durationMs });

    try {
      await this.options.onExit(this._exitCode);
    } catch (err) {
      logger.error(`Task ${this.options.task.id}: exit handler failed`, err);
    }
  }
}

export function createVmRunnerFactory(config: VmRunnerConfig): RunnerFactory {
  return (options) => new VmRunner(options, config);
}
