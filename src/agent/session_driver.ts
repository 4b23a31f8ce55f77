/**
 * Session Driver
 *
 * Entry point for one run: seed a session from the goal, register the tools,
 * drive the state machine to a terminal status and hand back the transcript.
 * Only configuration errors are thrown, and only before the session starts.
 */

import type { GuardrailCheckpoint } from './guardrails/checkpoint.js';
import type { ReasoningOracle } from './oracle/types.js';
import { createSession } from './orchestrator/session.js';
import { AgentStateMachine, type StateMachineObserver } from './orchestrator/state_machine.js';
import { ToolRegistry } from './tools/registry.js';
import type { ToolDefinition } from './tools/types.js';
import type { AgentSession, HistorySnapshot, TerminalStatus } from './types.js';

export const DEFAULT_MAX_ITERATIONS = 10;

export interface RunSessionOptions {
  goal: string;
  /** Tool definitions, or a registry that already holds them. */
  tools: ReadonlyArray<ToolDefinition<Record<string, unknown>>> | ToolRegistry;
  guardrails: GuardrailCheckpoint;
  oracle: ReasoningOracle;
  maxIterations?: number;
  skipReadOnlyPreAction?: boolean;
  haltOnBlockedSideEffect?: boolean;
  observers?: readonly StateMachineObserver[];
  signal?: AbortSignal;
  sessionId?: string;
}

export interface SessionResult {
  session: AgentSession;
  history: HistorySnapshot;
  status: TerminalStatus;
  reason?: string;
  finalOutput?: string;
}

function toRegistry(tools: RunSessionOptions['tools']): ToolRegistry {
  if (tools instanceof ToolRegistry) return tools;
  return new ToolRegistry().registerAll(tools);
}

export async function runSession(options: RunSessionOptions): Promise<SessionResult> {
  const registry = toRegistry(options.tools);
  const session = createSession(options.goal, { id: options.sessionId });
  const machine = new AgentStateMachine(session, {
    registry,
    guardrails: options.guardrails,
    oracle: options.oracle,
    maxIterations: options.maxIterations ?? DEFAULT_MAX_ITERATIONS,
    skipReadOnlyPreAction: options.skipReadOnlyPreAction,
    haltOnBlockedSideEffect: options.haltOnBlockedSideEffect,
    observers: options.observers,
    signal: options.signal,
  });

  const finished = await machine.run();
  return {
    session: finished,
    history: finished.history,
    status: finished.status,
    reason: finished.statusReason,
    finalOutput: finished.finalOutput,
  };
}
