import chalk from 'chalk';
import { ConfigLoader } from '../../config/loader.js';
import { errorMessage, OrchestratorError } from '../../errors.js';
import { RepoRegistry } from '../../registry/repo-registry.js';

export interface StateDirOptions {
  stateDir?: string;
}

interface AllowOptions extends StateDirOptions {
  alias?: string;
}

async function openRegistry(options: StateDirOptions): Promise<RepoRegistry> {
  const config = await new ConfigLoader(options.stateDir).load();
  return new RepoRegistry(config.registryPath);
}

function fail(err: unknown): void {
  if (!(err instanceof OrchestratorError)) {
    throw err;
  }
  console.error(chalk.red(`Error: ${errorMessage(err)}`));
  process.exitCode = 1;
}

/**
 * Register a repository for use with tasks
 */
export async function allowCommand(path: string, options: AllowOptions): Promise<void> {
  try {
    const registry = await openRegistry(options);
    const alias = await registry.allow(path, options.alias);
    console.log(chalk.green(`Registered: ${alias}`));
  } catch (err) {
    fail(err);
  }
}

export async function listCommand(options: StateDirOptions): Promise<void> {
  const registry = await openRegistry(options);
  const repos = Object.entries(registry.list());

  if (repos.length === 0) {
    console.log('No repositories registered.');
    console.log(chalk.gray("Use 'microvm-orchestrator allow' to register a repo."));
    return;
  }

  for (const [alias, entry] of repos) {
    console.log(`  ${chalk.cyan(alias)}: ${entry.path}`);
  }
}

export async function removeCommand(alias: string, options: StateDirOptions): Promise<void> {
  try {
    const registry = await openRegistry(options);
    registry.remove(alias);
    console.log(chalk.green(`Removed: ${alias}`));
  } catch (err) {
    fail(err);
  }
}
