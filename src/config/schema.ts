import { z } from 'zod';
import { homedir } from 'os';
import { join } from 'path';

export const DEFAULT_STATE_DIR = join(homedir(), '.microvm-orchestrator');

const portSchema = z.number().int().min(1024).max(65535);

export const OrchestratorConfigSchema = z
  .object({
    stateDir: z.string().min(1).default(DEFAULT_STATE_DIR), // affinity map, allowlist, slot storage
    maxSlots: z.number().int().min(1).max(64).default(10),
    nixDir: z.string().min(1).optional(), // directory holding default.nix for the VM
    vmPackage: z.string().min(1).default('claude-microvm'),
    vmConfigFile: z.string().min(1).optional(), // passed to the VM build as configFile
    host: z.string().min(1).default('127.0.0.1'),
    port: portSchema.default(8765),
    logDirectory: z.string().min(1).optional(),
    stopTimeoutMs: z.number().int().min(100).default(10000),
  })
  .strict()
  .transform((config) => ({
    ...config,
    slotAssignmentsPath: join(config.stateDir, 'slot-assignments.json'),
    registryPath: join(config.stateDir, 'allowed-repos.json'),
    slotsDir: join(config.stateDir, 'slots'),
  }));

export type OrchestratorConfigInput = z.input<typeof OrchestratorConfigSchema>;
export type OrchestratorConfig = z.infer<typeof OrchestratorConfigSchema>;

export function buildConfig(input: OrchestratorConfigInput = {}): OrchestratorConfig {
  return OrchestratorConfigSchema.parse(input);
}
