/**
 * Turns raw backend output into an OracleDecision.
 *
 * Accepts native tool calls and tool calls written as (optionally fenced)
 * JSON in the text body. Anything tool-call-shaped that does not validate is
 * rejected with MalformedDecisionError instead of being passed downstream.
 */

import { z } from 'zod';

import { MalformedDecisionError } from '../../core/errors.js';
import { assistantMessage } from '../messages.js';
import type { HistorySnapshot, ToolCallRequest } from '../types.js';
import type { OracleDecision } from './types.js';

const ReplySchema = z.object({
  content: z.string().nullish(),
  toolCalls: z.array(z.unknown()).nullish(),
});

const ArgumentsSchema = z.union([z.string(), z.record(z.unknown())]).nullish();

const FlatCallSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1),
  arguments: ArgumentsSchema,
});

// OpenAI wire shape: { id, type: 'function', function: { name, arguments } }
const NestedCallSchema = z.object({
  id: z.string().min(1).optional(),
  function: z.object({
    name: z.string().min(1),
    arguments: ArgumentsSchema,
  }),
});

type EmbeddedCalls =
  | { kind: 'none' }
  | { kind: 'calls'; calls: unknown[] }
  | { kind: 'invalid'; reason: string };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function stripJsonFence(text: string): string {
  let body = text.trim();
  if (body.startsWith('```json')) body = body.slice(7);
  else if (body.startsWith('```')) body = body.slice(3);
  if (body.endsWith('```')) body = body.slice(0, -3);
  return body.trim();
}

function extractEmbeddedCalls(text: string): EmbeddedCalls {
  const body = stripJsonFence(text);
  if (!body.startsWith('{')) return { kind: 'none' };

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return /"tool_calls"\s*:/.test(body)
      ? { kind: 'invalid', reason: 'tool call payload is not valid JSON' }
      : { kind: 'none' };
  }

  if (!isPlainObject(parsed)) return { kind: 'none' };
  if ('tool_calls' in parsed) {
    return Array.isArray(parsed.tool_calls)
      ? { kind: 'calls', calls: parsed.tool_calls }
      : { kind: 'invalid', reason: 'tool_calls must be an array' };
  }
  if (typeof parsed.name === 'string' && 'arguments' in parsed) {
    return { kind: 'calls', calls: [parsed] };
  }
  return { kind: 'none' };
}

function parseArguments(name: string, raw: z.infer<typeof ArgumentsSchema>): Record<string, unknown> {
  if (raw === undefined || raw === null) return {};
  if (typeof raw !== 'string') return raw;
  if (raw.trim() === '') return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new MalformedDecisionError(`arguments for "${name}" are not valid JSON`, { cause: err });
  }
  if (!isPlainObject(parsed)) {
    throw new MalformedDecisionError(`arguments for "${name}" must be a JSON object`);
  }
  return parsed;
}

function toRequest(raw: unknown, index: number): { id?: string; name: string; arguments: Record<string, unknown> } {
  const flat = FlatCallSchema.safeParse(raw);
  if (flat.success) {
    return { id: flat.data.id, name: flat.data.name, arguments: parseArguments(flat.data.name, flat.data.arguments) };
  }
  const nested = NestedCallSchema.safeParse(raw);
  if (nested.success) {
    const { name, arguments: args } = nested.data.function;
    return { id: nested.data.id, name, arguments: parseArguments(name, args) };
  }
  throw new MalformedDecisionError(`tool call #${index + 1} has no tool name`);
}

function countToolCalls(history: HistorySnapshot): number {
  return history.reduce((sum, message) => sum + message.toolCalls.length, 0);
}

export function normalizeBackendReply(raw: unknown, history: HistorySnapshot): OracleDecision {
  const reply = ReplySchema.safeParse(raw);
  if (!reply.success) {
    throw new MalformedDecisionError('backend reply is not an object with content or tool calls');
  }

  const content = reply.data.content ?? '';
  let rawCalls = reply.data.toolCalls ?? [];
  let text = content;

  if (rawCalls.length === 0) {
    const embedded = extractEmbeddedCalls(content);
    if (embedded.kind === 'invalid') throw new MalformedDecisionError(embedded.reason);
    if (embedded.kind === 'calls') {
      rawCalls = embedded.calls;
      text = '';
    }
  }

  if (rawCalls.length === 0) {
    if (!text.trim()) {
      throw new MalformedDecisionError('backend returned neither tool calls nor text');
    }
    return { kind: 'final', message: assistantMessage(text) };
  }

  const usedIds = new Set(
    history.flatMap((message) => message.toolCalls.map((call) => call.id))
  );
  let nextOrdinal = countToolCalls(history) + 1;
  const requests: ToolCallRequest[] = rawCalls.map((rawCall, index) => {
    const parsed = toRequest(rawCall, index);
    let id = parsed.id;
    if (!id) {
      do {
        id = `call_${nextOrdinal}`;
        nextOrdinal += 1;
      } while (usedIds.has(id));
    }
    if (usedIds.has(id)) {
      throw new MalformedDecisionError(`tool call id "${id}" was already used in this session`);
    }
    usedIds.add(id);
    return { id, toolName: parsed.name, arguments: parsed.arguments };
  });

  return { kind: 'tool_calls', message: assistantMessage(text, requests) };
}
