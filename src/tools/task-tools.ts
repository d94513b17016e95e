import { z } from 'zod';
import { defineTool } from './registry.js';

/** Long enough for most tasks; callers loop on `timeout` */
export const DEFAULT_WAIT_TIMEOUT_MS = 1_800_000;

export const runTaskTool = defineTool({
  name: 'run_task',
  description: `Start a new task in an isolated microVM.

INPUTS:
- description (required): instructions for Claude in the VM. If the task runs Docker containers, tell it to use --network=host.
- repo (required): repository alias registered with the CLI 'allow' command. Use list_repos to see them. The alias is the repository name, not its path.

RETURNS: { task_id }`,
  inputSchema: {
    description: z.string().min(1).describe('Task instructions'),
    repo: z.string().min(1).describe('Repository alias'),
  },
  execute: (args, { orchestrator }) => orchestrator.runTask(args.description, args.repo),
});

export const getTaskInfoTool = defineTool({
  name: 'get_task_info',
  description: 'Get information about a task including status, result and merge result.',
  inputSchema: {
    task_id: z.string().min(1).describe('Task ID returned by run_task'),
  },
  execute: async (args, { orchestrator }) => orchestrator.getTaskInfo(args.task_id),
});

export const getTaskLogsTool = defineTool({
  name: 'get_task_logs',
  description: "Get the path of a task's serial console log. Read it with shell tools (tail -f, cat).",
  inputSchema: {
    task_id: z.string().min(1).describe('Task ID'),
  },
  execute: async (args, { orchestrator }) => orchestrator.getTaskLogs(args.task_id),
});

export const waitNextEventTool = defineTool({
  name: 'wait_next_event',
  description:
    'Block until any task completes or fails. Returns the event with result and merge info, ' +
    '{ no_running_tasks: true } when nothing is running, or { timeout: true }. Use a long timeout for long-running tasks.',
  inputSchema: {
    timeout_ms: z.number().int().min(0).default(DEFAULT_WAIT_TIMEOUT_MS).describe('Timeout in milliseconds'),
  },
  execute: (args, { orchestrator, signal }) => orchestrator.waitNextEvent(args.timeout_ms, signal),
});

export const cleanupTaskTool = defineTool({
  name: 'cleanup_task',
  description: 'Stop a task if it is still running, delete its directory and optionally its git ref.',
  inputSchema: {
    task_id: z.string().min(1).describe('Task ID'),
    delete_ref: z.boolean().default(false).describe('Also delete refs/tasks/<task_id>'),
  },
  execute: (args, { orchestrator }) => orchestrator.cleanupTask(args.task_id, args.delete_ref),
});
