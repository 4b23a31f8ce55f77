import type { ToolSchema } from '../tools/types.js';
import type { HistorySnapshot, Message } from '../types.js';

/**
 * Closed result of one reasoning step. Nothing else crosses into the state machine.
 */
export type OracleDecision =
  | { kind: 'tool_calls'; message: Message }
  | { kind: 'final'; message: Message };

export interface ReasoningOracle {
  /**
   * Throws MalformedDecisionError when the backend output cannot be
   * normalized or the backend cannot be reached.
   */
  decide(
    history: HistorySnapshot,
    tools: readonly ToolSchema[],
    signal?: AbortSignal
  ): Promise<OracleDecision>;
}

/** Loosely-shaped backend output before normalization. */
export interface BackendReply {
  content?: string | null;
  toolCalls?: unknown[] | null;
}
