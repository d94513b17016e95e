/**
 * Tool registry types and the error envelope shared by every tool.
 */

import { z } from 'zod';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { Orchestrator } from '../orchestrator/orchestrator.js';
import { errorMessage } from '../errors.js';
import { logger } from '../utils/logger.js';

export interface ToolContext {
  orchestrator: Orchestrator;
  /** Aborted when the client cancels the call or goes away */
  signal: AbortSignal;
}

export type ToolPayload = object;

/** A tool's JSON payload, tagged with whether the call failed */
export interface ToolOutcome {
  isError: boolean;
  payload: ToolPayload;
}

export interface ToolDefinition<Shape extends z.ZodRawShape = z.ZodRawShape> {
  name: string;
  description: string;
  inputSchema: Shape;
  execute(args: z.objectOutputType<Shape, z.ZodTypeAny>, context: ToolContext): Promise<ToolPayload>;
}

export function defineTool<Shape extends z.ZodRawShape>(tool: ToolDefinition<Shape>): ToolDefinition<Shape> {
  return tool;
}

function failure(message: string): ToolOutcome {
  return { isError: true, payload: { error: message } };
}

/**
 * Validate `rawArgs` and run the tool. Failures come back flagged with an
 * `{error}` payload and a cancelled call as `{cancelled: true}`; nothing is
 * thrown. Payloads of successful calls may carry their own `error` field
 * (a failed task's message) without the call being a failure.
 */
export async function runTool(tool: ToolDefinition, rawArgs: unknown, context: ToolContext): Promise<ToolOutcome> {
  const parsed = z.object(tool.inputSchema).safeParse(rawArgs ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`);
    return failure(`Invalid arguments for ${tool.name}: ${issues.join('; ')}`);
  }

  try {
    return { isError: false, payload: await tool.execute(parsed.data, context) };
  } catch (err) {
    if (context.signal.aborted) {
      logger.info(`Tool ${tool.name} cancelled`);
      return { isError: false, payload: { cancelled: true } };
    }
    logger.warn(`Tool ${tool.name} failed`, { error: errorMessage(err) });
    return failure(errorMessage(err));
  }
}

export function toCallToolResult({ isError, payload }: ToolOutcome): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
    isError,
  };
}
