import chalk from 'chalk';
import { ConfigLoader } from '../../config/loader.js';
import type { OrchestratorConfig } from '../../config/schema.js';
import { resolveApiKey } from '../../credentials.js';
import { EventQueue } from '../../events/event-queue.js';
import { Orchestrator } from '../../orchestrator/orchestrator.js';
import { RepoRegistry } from '../../registry/repo-registry.js';
import { McpHttpServer } from '../../server.js';
import { SlotManager } from '../../slots/slot-manager.js';
import { configureLogDirectory, logger } from '../../utils/logger.js';
import { createVmRunnerFactory } from '../../vm/runner.js';

interface ServeOptions {
  stateDir?: string;
  host?: string;
  port?: string;
}

export function createOrchestrator(config: OrchestratorConfig): Orchestrator {
  return new Orchestrator({
    config,
    registry: new RepoRegistry(config.registryPath),
    slotManager: new SlotManager({ maxSlots: config.maxSlots, assignmentsPath: config.slotAssignmentsPath }),
    eventQueue: new EventQueue(),
    runnerFactory: createVmRunnerFactory({ nixDir: config.nixDir, stopTimeoutMs: config.stopTimeoutMs }),
    resolveApiKey: () => resolveApiKey(),
  });
}

/**
 * Serve command handler
 *
 * Starts the MCP server and keeps running until SIGINT/SIGTERM, then stops
 * every running VM before exiting.
 */
export async function serveCommand(options: ServeOptions): Promise<void> {
  const overrides: Record<string, unknown> = {};
  if (options.host) {
    overrides.host = options.host;
  }
  if (options.port) {
    overrides.port = Number.parseInt(options.port, 10);
  }

  const config = await new ConfigLoader(options.stateDir).load(overrides);
  if (config.logDirectory) {
    configureLogDirectory(config.logDirectory);
  }
  if (!config.nixDir) {
    logger.warn('nixDir is not configured; tasks will fail to start until it is set in config.json');
  }

  const orchestrator = createOrchestrator(config);
  const removed = await orchestrator.cleanupStaleTasks();
  if (removed > 0) {
    logger.info(`Removed ${removed} stale task director${removed === 1 ? 'y' : 'ies'}`);
  }

  const server = new McpHttpServer(orchestrator, { host: config.host, port: config.port });
  await server.start();

  console.error(chalk.cyan(`microvm-orchestrator listening on http://${config.host}:${server.getPort()}/mcp`));

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down`);

    await orchestrator.stopAll();
    await server.stop();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error('Shutdown failed', err);
        process.exit(1);
      });
    });
  }
}
