#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { allowCommand, listCommand, removeCommand } from './commands/repos.js';
import { serveCommand } from './commands/serve.js';

function createProgram(): Command {
  const program = new Command();

  program
    .name('microvm-orchestrator')
    .description(chalk.cyan('microvm-orchestrator') + ' - run delegated tasks in isolated microVMs')
    .version('0.3.0')
    .option('-s, --state-dir <path>', 'State directory (default: ~/.microvm-orchestrator or $MICROVM_STATE_DIR)');

  program
    .command('allow')
    .description('Register a repository for use with microvm tasks')
    .argument('[path]', 'Repository root', '.')
    .option('-a, --alias <alias>', 'Custom alias for the repo')
    .action(async (path: string, options: { alias?: string }) => {
      await allowCommand(path, { ...program.opts<{ stateDir?: string }>(), ...options });
    });

  program
    .command('list')
    .description('List registered repositories')
    .action(async () => {
      await listCommand(program.opts<{ stateDir?: string }>());
    });

  program
    .command('remove')
    .description('Remove a repository from the allowlist')
    .argument('<alias>', 'Repository alias')
    .action(async (alias: string) => {
      await removeCommand(alias, program.opts<{ stateDir?: string }>());
    });

  program
    .command('serve')
    .description('Start the MCP server')
    .option('--host <host>', 'Address to bind')
    .option('-p, --port <port>', 'Port to listen on')
    .action(async (options: { host?: string; port?: string }) => {
      await serveCommand({ ...program.opts<{ stateDir?: string }>(), ...options });
    });

  return program;
}

createProgram()
  .parseAsync()
  .catch((err: unknown) => {
    console.error(chalk.red(err instanceof Error ? err.message : String(err)));
    process.exit(1);
  });
