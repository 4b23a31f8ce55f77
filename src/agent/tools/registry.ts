/**
 * Tool Registry
 *
 * Maps tool names to schema-validated handlers. Dispatch never throws for
 * in-loop problems: unknown tools, bad arguments and handler failures all come
 * back as tool-result text for the reasoning oracle to observe.
 */

import type { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

import {
  DuplicateToolError,
  InvalidArgumentsError,
  ToolHandlerError,
  UnknownToolError,
} from '../../core/errors.js';
import type { ToolCallRequest } from '../types.js';
import type {
  RiskLevel,
  ToolCategory,
  ToolContext,
  ToolDefinition,
  ToolDispatchResult,
  ToolOutput,
  ToolSchema,
} from './types.js';

export interface ToolInfo {
  name: string;
  description: string;
  category: ToolCategory;
  riskLevel: RiskLevel;
}

type PreparedCall =
  | { ok: true; run: (ctx: ToolContext) => Promise<ToolOutput> }
  | { ok: false; error: z.ZodError };

interface RegisteredTool extends ToolInfo {
  schema: z.ZodTypeAny;
  prepare(raw: unknown): PreparedCall;
}

function formatOutput(output: ToolOutput): string {
  return typeof output === 'string' ? output : JSON.stringify(output);
}

function issueField(issue: z.ZodIssue): string {
  if (issue.code === 'unrecognized_keys') return issue.keys.join(', ');
  return issue.path.length > 0 ? issue.path.join('.') : '(arguments)';
}

export function toInvalidArgumentsError(toolName: string, error: z.ZodError): InvalidArgumentsError {
  const fields = Array.from(new Set(error.issues.map(issueField)));
  const details = error.issues.map((issue) => `${issueField(issue)}: ${issue.message}`);
  return new InvalidArgumentsError(toolName, fields, details);
}

export function formatToolError(err: Error): string {
  return `ERROR (${err.name}): ${err.message}`;
}

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  register<TInput extends Record<string, unknown>>(definition: ToolDefinition<TInput>): this {
    if (this.tools.has(definition.name)) {
      throw new DuplicateToolError(definition.name);
    }
    this.tools.set(definition.name, {
      name: definition.name,
      description: definition.description,
      category: definition.category,
      riskLevel: definition.riskLevel,
      schema: definition.schema,
      prepare: (raw) => {
        const parsed = definition.schema.safeParse(raw);
        if (!parsed.success) return { ok: false, error: parsed.error };
        const input = parsed.data;
        return { ok: true, run: (ctx) => definition.execute(input, ctx) };
      },
    });
    return this;
  }

  registerAll(definitions: ReadonlyArray<ToolDefinition<Record<string, unknown>>>): this {
    for (const definition of definitions) this.register(definition);
    return this;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get(name: string): ToolInfo | undefined {
    const tool = this.tools.get(name);
    if (!tool) return undefined;
    return {
      name: tool.name,
      description: tool.description,
      category: tool.category,
      riskLevel: tool.riskLevel,
    };
  }

  listNames(): string[] {
    return Array.from(this.tools.keys());
  }

  /**
   * JSON Schema for every tool, compiled from the zod definitions.
   */
  getLlmSchemas(): ToolSchema[] {
    return Array.from(this.tools.values()).map((tool) => {
      const { $schema: _dialect, ...parameters } = zodToJsonSchema(tool.schema, {
        $refStrategy: 'none',
      });
      return { name: tool.name, description: tool.description, parameters };
    });
  }

  /**
   * Validate and run one tool call. Failures are folded into the result text.
   */
  async dispatch(request: ToolCallRequest, ctx: Omit<ToolContext, 'toolCallId'>): Promise<ToolDispatchResult> {
    const started = Date.now();
    const finish = (outcome: ToolDispatchResult['outcome'], content: string): ToolDispatchResult => ({
      toolCallId: request.id,
      toolName: request.toolName,
      outcome,
      content,
      durationMs: Date.now() - started,
    });

    const tool = this.tools.get(request.toolName);
    if (!tool) {
      return finish(
        'unknown_tool',
        formatToolError(new UnknownToolError(request.toolName, this.listNames()))
      );
    }

    const prepared = tool.prepare(request.arguments);
    if (!prepared.ok) {
      return finish(
        'invalid_arguments',
        formatToolError(toInvalidArgumentsError(tool.name, prepared.error))
      );
    }

    try {
      const output = await prepared.run({ ...ctx, toolCallId: request.id });
      return finish('ok', formatOutput(output));
    } catch (err) {
      return finish('handler_failed', formatToolError(new ToolHandlerError(tool.name, err)));
    }
  }
}
