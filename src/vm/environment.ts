/**
 * Everything a VM build and run is parameterised with, as one explicit
 * structure instead of a loose map of environment variables.
 */

import { mkdir } from 'fs/promises';
import { join } from 'path';
import type { Task } from '../tasks/task.js';

export interface VmEnvironment {
  /** Per-task directory shared with the VM as /workspace */
  taskDir: string;
  /** Slot-local persistent /var */
  varDir: string;
  /** Slot-local container image storage */
  containerDir: string;
  /** Slot-local writable nix store overlay image */
  nixStoreImage: string;
  /** Control socket of the VM */
  socketPath: string;
  slot: number;
  /** Extra VM configuration handed to the build */
  configFile?: string;
  gitDir: string;
  gitRoot: string;
  originalRepo: string;
  /** Nix attribute that builds the VM */
  packageName: string;
}

/** Field, environment variable and nix-build argument carrying it */
const NIX_ARGSTR_MAPPING: ReadonlyArray<[keyof VmEnvironment, string, string]> = [
  ['taskDir', 'DELEGATE_TASK_DIR', 'taskDir'],
  ['varDir', 'DELEGATE_VAR_DIR', 'varDir'],
  ['containerDir', 'MICROVM_CONTAINER_DIR', 'containerDir'],
  ['nixStoreImage', 'MICROVM_NIX_STORE_IMAGE', 'nixStoreImage'],
  ['socketPath', 'DELEGATE_SOCKET', 'socketPath'],
  ['slot', 'MICROVM_SLOT', 'slot'],
  ['configFile', 'MICROVM_CONFIG_FILE', 'configFile'],
];

export function slotDir(slotsDir: string, slot: number): string {
  return join(slotsDir, String(slot));
}

/** Create the slot's var/ and container-storage/ directories if missing. */
export async function ensureSlotInitialized(slotsDir: string, slot: number): Promise<string> {
  const dir = slotDir(slotsDir, slot);
  await mkdir(join(dir, 'var'), { recursive: true });
  await mkdir(join(dir, 'container-storage'), { recursive: true });
  return dir;
}

export async function prepareVmEnvironment(
  task: Task,
  options: { slotsDir: string; packageName: string; configFile?: string }
): Promise<VmEnvironment> {
  const dir = await ensureSlotInitialized(options.slotsDir, task.slot);

  return {
    taskDir: task.taskDir,
    varDir: join(dir, 'var'),
    containerDir: join(dir, 'container-storage'),
    nixStoreImage: join(dir, 'nix-store.img'),
    socketPath: join(task.taskDir, 'socket'),
    slot: task.slot,
    configFile: options.configFile,
    gitDir: join(task.repoPath, '.git'),
    gitRoot: task.repoPath,
    originalRepo: task.repoPath,
    packageName: options.packageName,
  };
}

export function toEnvVars(env: VmEnvironment): Record<string, string> {
  const vars: Record<string, string> = {
    DELEGATE_GIT_DIR: env.gitDir,
    DELEGATE_GIT_ROOT: env.gitRoot,
    DELEGATE_ORIGINAL_REPO: env.originalRepo,
    MICROVM_PACKAGE: env.packageName,
  };

  for (const [key, variable] of NIX_ARGSTR_MAPPING) {
    const value = env[key];
    if (value !== undefined && value !== '') {
      vars[variable] = String(value);
    }
  }

  return vars;
}

/** `--argstr name value` pairs for every configured build input. */
export function toNixArgs(env: VmEnvironment): string[] {
  const args: string[] = [];

  for (const [key, , argName] of NIX_ARGSTR_MAPPING) {
    const value = env[key];
    if (value !== undefined && value !== '') {
      args.push('--argstr', argName, String(value));
    }
  }

  return args;
}
