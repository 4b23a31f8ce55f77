/**
 * Core data model for the guarded agent loop.
 */

export type MessageRole = 'user' | 'assistant' | 'tool_result' | 'system_notice';

export interface ToolCallRequest {
  readonly id: string;
  readonly toolName: string;
  readonly arguments: Readonly<Record<string, unknown>>;
}

export interface Message {
  readonly role: MessageRole;
  /** May be empty when an assistant turn carries only tool calls. */
  readonly content: string;
  /** Empty unless role is 'assistant'. */
  readonly toolCalls: readonly ToolCallRequest[];
  /** Present only on 'tool_result' messages. */
  readonly toolCallId?: string;
  /** False on an assistant draft the output checkpoint refused to release. */
  readonly released?: boolean;
}

export type SessionStatus = 'running' | 'completed' | 'blocked' | 'iteration_limit_exceeded';

export type TerminalStatus = Exclude<SessionStatus, 'running'>;

export interface AgentSession {
  readonly id: string;
  readonly goal: string;
  history: Message[];
  iterationCount: number;
  status: SessionStatus;
  /** Human-readable cause for blocked / limit outcomes. */
  statusReason?: string;
  /** Text released to the caller on completion. */
  finalOutput?: string;
}

/** Read-only view handed to guardrails and the oracle. */
export type HistorySnapshot = readonly Message[];
