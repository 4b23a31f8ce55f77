import type { z } from 'zod';

export type RiskLevel = 'read_only' | 'side_effecting';

export type ToolCategory = 'research' | 'market' | 'execution' | 'system';

export interface ToolContext {
  sessionId: string;
  toolCallId: string;
}

/** Handlers return plain text; structured results are JSON-encoded by the registry. */
export type ToolOutput = string | Record<string, unknown>;

export interface ToolDefinition<TInput extends Record<string, unknown> = Record<string, unknown>> {
  name: string;
  description: string;
  category: ToolCategory;
  riskLevel: RiskLevel;
  /** Source of truth for argument validation and the schema sent to the model. */
  schema: z.ZodType<TInput, z.ZodTypeDef, unknown>;
  execute(input: TInput, ctx: ToolContext): Promise<ToolOutput>;
}

export interface ToolSchema {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export type ToolDispatchOutcome = 'ok' | 'unknown_tool' | 'invalid_arguments' | 'handler_failed';

export interface ToolDispatchResult {
  toolCallId: string;
  toolName: string;
  outcome: ToolDispatchOutcome;
  /** Text recorded as the tool result message. */
  content: string;
  durationMs: number;
}

/**
 * Identity helper that lets TypeScript infer the handler input from the schema.
 */
export function defineTool<TInput extends Record<string, unknown>>(
  definition: ToolDefinition<TInput>
): ToolDefinition<TInput> {
  return definition;
}
