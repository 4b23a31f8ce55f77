/**
 * Message constructors and transcript integrity checks.
 */

import type { HistorySnapshot, Message, ToolCallRequest } from './types.js';

function freezeRequest(request: ToolCallRequest): ToolCallRequest {
  return Object.freeze({
    id: request.id,
    toolName: request.toolName,
    arguments: Object.freeze({ ...request.arguments }),
  });
}

function seal(message: Message): Message {
  return Object.freeze(message);
}

export function userMessage(content: string): Message {
  return seal({ role: 'user', content, toolCalls: [] });
}

export function assistantMessage(content: string, toolCalls: readonly ToolCallRequest[] = []): Message {
  return seal({
    role: 'assistant',
    content,
    toolCalls: Object.freeze(toolCalls.map(freezeRequest)),
  });
}

export function toolResultMessage(toolCallId: string, content: string): Message {
  return seal({ role: 'tool_result', content, toolCalls: [], toolCallId });
}

export function systemNotice(content: string): Message {
  return seal({ role: 'system_notice', content, toolCalls: [] });
}

/** Copy of an assistant draft tagged as withheld from the caller. */
export function markUnreleased(message: Message): Message {
  return seal({ ...message, released: false });
}

export function snapshotHistory(history: readonly Message[]): HistorySnapshot {
  return Object.freeze([...history]);
}

export interface TranscriptIssue {
  index: number;
  problem: string;
}

/**
 * Check that every tool result answers exactly one earlier tool call.
 * Returns an empty list for a well-formed transcript.
 */
export function validateTranscript(history: HistorySnapshot): TranscriptIssue[] {
  const issues: TranscriptIssue[] = [];
  const requested = new Set<string>();
  const answered = new Set<string>();

  history.forEach((message, index) => {
    if (message.role !== 'assistant' && message.toolCalls.length > 0) {
      issues.push({ index, problem: `${message.role} message carries tool calls` });
    }

    if (message.role === 'assistant') {
      for (const call of message.toolCalls) {
        if (requested.has(call.id)) {
          issues.push({ index, problem: `tool call id ${call.id} reused` });
        }
        requested.add(call.id);
      }
      return;
    }

    if (message.role === 'tool_result') {
      const id = message.toolCallId;
      if (!id) {
        issues.push({ index, problem: 'tool result without tool call id' });
      } else if (!requested.has(id)) {
        issues.push({ index, problem: `tool result ${id} has no earlier request` });
      } else if (answered.has(id)) {
        issues.push({ index, problem: `tool call ${id} answered more than once` });
      } else {
        answered.add(id);
      }
      return;
    }

    if (message.toolCallId !== undefined) {
      issues.push({ index, problem: `${message.role} message carries a tool call id` });
    }
  });

  return issues;
}

/** Find the tool call a tool result answers. */
export function findToolCall(history: HistorySnapshot, toolCallId: string): ToolCallRequest | undefined {
  for (const message of history) {
    if (message.role !== 'assistant') continue;
    const match = message.toolCalls.find((call) => call.id === toolCallId);
    if (match) return match;
  }
  return undefined;
}
