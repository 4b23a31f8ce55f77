import { z } from 'zod';

import { GuardrailCheckpoint } from '../../src/agent/guardrails/checkpoint.js';
import type { GuardrailCheck, GuardrailCheckContext, GuardrailStage, GuardrailVerdict } from '../../src/agent/guardrails/types.js';
import { defineTool, type RiskLevel, type ToolDefinition, type ToolOutput } from '../../src/agent/tools/types.js';

export interface RecordingTool {
  definition: ToolDefinition<{ ticker: string }>;
  calls: Array<{ ticker: string }>;
}

/** Tool taking a `ticker` that records every invocation. */
export function recordingTool(
  name: string,
  riskLevel: RiskLevel,
  respond: (input: { ticker: string }) => ToolOutput = () => 'ok'
): RecordingTool {
  const calls: Array<{ ticker: string }> = [];
  const definition = defineTool({
    name,
    description: `test tool ${name}`,
    category: 'system',
    riskLevel,
    schema: z.object({ ticker: z.string() }),
    execute: async (input) => {
      calls.push(input);
      return respond(input);
    },
  });
  return { definition, calls };
}

/** Check with a fixed stage list whose verdict comes from a callback. */
export function staticCheck(
  name: string,
  stages: readonly GuardrailStage[],
  decide: (ctx: GuardrailCheckContext) => GuardrailVerdict
): GuardrailCheck {
  return { name, stages, evaluate: decide };
}

export function noGuardrails(): GuardrailCheckpoint {
  return new GuardrailCheckpoint([]);
}

export function toolCallReply(name: string, args: Record<string, unknown>, id?: string): unknown {
  return { toolCalls: [{ ...(id ? { id } : {}), name, arguments: args }] };
}

export function textReply(content: string): unknown {
  return { content };
}
