import { defineTool } from './registry.js';

export const listReposTool = defineTool({
  name: 'list_repos',
  description: 'List registered repositories that can be used with run_task.',
  inputSchema: {},
  execute: async (_args, { orchestrator }) => ({
    repos: Object.entries(orchestrator.listRepos()).map(([alias, entry]) => ({
      alias,
      path: entry.path,
      added: entry.added,
    })),
  }),
});

export const listTasksTool = defineTool({
  name: 'list_tasks',
  description: 'List all tasks across all registered repositories.',
  inputSchema: {},
  execute: async (_args, { orchestrator }) => ({ tasks: await orchestrator.listTasks() }),
});

export const listSlotsTool = defineTool({
  name: 'list_slots',
  description: 'Show which slots are occupied and which are available.',
  inputSchema: {},
  execute: async (_args, { orchestrator }) => orchestrator.listSlots(),
});
