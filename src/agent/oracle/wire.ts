// Wire types for the OpenAI-compatible Chat Completions API (snake_case).
// Ollama, Gemini's compatibility endpoint and most local servers accept this shape.

import { z } from 'zod';

import type { ToolSchema } from '../tools/types.js';
import type { HistorySnapshot, Message } from '../types.js';

export interface WireToolDef {
  type: 'function';
  function: { name: string; description: string; parameters: Record<string, unknown> };
}

export interface WireToolCall {
  id: string;
  type: 'function';
  function: { name: string; arguments: string };
}

export type WireMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string | null; tool_calls?: WireToolCall[] }
  | { role: 'tool'; tool_call_id: string; content: string };

export interface WireRequest {
  model: string;
  messages: WireMessage[];
  tools?: WireToolDef[];
  temperature?: number;
  max_tokens?: number;
}

export const WireResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z.array(z.unknown()).nullish(),
        }),
        finish_reason: z.string().nullish(),
      })
    )
    .min(1),
});

export type WireResponse = z.infer<typeof WireResponseSchema>;

function toWireMessage(message: Message): WireMessage {
  switch (message.role) {
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      if (message.toolCalls.length === 0) {
        return { role: 'assistant', content: message.content };
      }
      return {
        role: 'assistant',
        content: message.content || null,
        tool_calls: message.toolCalls.map((call) => ({
          id: call.id,
          type: 'function' as const,
          function: { name: call.toolName, arguments: JSON.stringify(call.arguments) },
        })),
      };
    case 'tool_result':
      return { role: 'tool', tool_call_id: message.toolCallId ?? '', content: message.content };
    case 'system_notice':
      // Not every compatible server accepts system messages after the first turn.
      return { role: 'user', content: `[notice] ${message.content}` };
  }
}

export function toWireMessages(systemPrompt: string | undefined, history: HistorySnapshot): WireMessage[] {
  const messages: WireMessage[] = [];
  if (systemPrompt) messages.push({ role: 'system', content: systemPrompt });
  for (const message of history) messages.push(toWireMessage(message));
  return messages;
}

export function toWireTools(tools: readonly ToolSchema[]): WireToolDef[] {
  return tools.map((tool) => ({
    type: 'function' as const,
    function: { name: tool.name, description: tool.description, parameters: tool.parameters },
  }));
}
