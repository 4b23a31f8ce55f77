/**
 * Agent State Machine
 *
 * Drives one session through an enumerated set of states:
 *
 *   init -> awaiting_input_clearance -> reasoning
 *        -> (awaiting_action_clearance -> acting)* -> awaiting_output_clearance -> terminal
 *
 * Only this class appends to a session's history. Every in-loop problem
 * (bad oracle output, tool failures, guardrail blocks, cancellation) ends in
 * another state, never in a thrown error.
 */

import { ConfigurationError, describeError } from '../../core/errors.js';
import { block } from '../guardrails/verdicts.js';
import type { GuardrailCheckpoint } from '../guardrails/checkpoint.js';
import type { GuardrailCandidate, GuardrailStage, GuardrailVerdict } from '../guardrails/types.js';
import {
  assistantMessage,
  markUnreleased,
  snapshotHistory,
  systemNotice,
  toolResultMessage,
  userMessage,
} from '../messages.js';
import type { OracleDecision, ReasoningOracle } from '../oracle/types.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { RiskLevel, ToolDispatchResult, ToolSchema } from '../tools/types.js';
import type { AgentSession, Message, TerminalStatus, ToolCallRequest } from '../types.js';
import { closeSession, isClosed, type ClosedSession } from './session.js';

export type AgentState =
  | 'init'
  | 'awaiting_input_clearance'
  | 'reasoning'
  | 'awaiting_action_clearance'
  | 'acting'
  | 'awaiting_output_clearance'
  | 'terminal';

const ALLOWED_TRANSITIONS: Record<AgentState, readonly AgentState[]> = {
  init: ['awaiting_input_clearance'],
  awaiting_input_clearance: ['reasoning', 'terminal'],
  reasoning: ['reasoning', 'awaiting_action_clearance', 'awaiting_output_clearance', 'terminal'],
  awaiting_action_clearance: ['awaiting_action_clearance', 'acting', 'reasoning', 'terminal'],
  acting: ['awaiting_action_clearance'],
  awaiting_output_clearance: ['terminal'],
  terminal: [],
};

export const CANCELLED_REASON = 'cancelled';

export function blockedToolResultText(reason: string): string {
  return `BLOCKED: action not executed. Guardrail reason: ${reason}`;
}

export interface TransitionEvent {
  sessionId: string;
  from: AgentState;
  to: AgentState;
  iteration: number;
}

export interface VerdictEvent {
  sessionId: string;
  stage: GuardrailStage;
  verdict: GuardrailVerdict;
  toolCall?: ToolCallRequest;
}

/**
 * Passive listeners. They see every transition and appended message but
 * cannot change the session.
 */
export interface StateMachineObserver {
  onTransition?(event: TransitionEvent): void;
  onMessage?(message: Message, session: Readonly<AgentSession>): void;
  onVerdict?(event: VerdictEvent): void;
  onDispatch?(result: ToolDispatchResult, sessionId: string): void;
}

export interface StateMachineOptions {
  registry: ToolRegistry;
  guardrails: GuardrailCheckpoint;
  oracle: ReasoningOracle;
  maxIterations: number;
  /** Let read-only tools bypass the pre-action checkpoint. */
  skipReadOnlyPreAction?: boolean;
  /** End the session once a batch containing a blocked side-effecting call has been processed. */
  haltOnBlockedSideEffect?: boolean;
  observers?: readonly StateMachineObserver[];
  signal?: AbortSignal;
}

interface ClearedCall {
  request: ToolCallRequest;
}

export class AgentStateMachine {
  private current: AgentState = 'init';
  private started = false;
  private tools: ToolSchema[] = [];
  private pendingCalls: ToolCallRequest[] = [];
  private clearedCall: ClearedCall | null = null;
  private draft: Message | null = null;
  private batchBlockReason: string | null = null;

  private readonly maxIterations: number;
  private readonly skipReadOnlyPreAction: boolean;
  private readonly haltOnBlockedSideEffect: boolean;
  private readonly observers: readonly StateMachineObserver[];

  constructor(
    private readonly session: AgentSession,
    private readonly options: StateMachineOptions
  ) {
    if (!Number.isInteger(options.maxIterations) || options.maxIterations < 1) {
      throw new ConfigurationError(
        `maxIterations must be a positive integer (got ${options.maxIterations})`
      );
    }
    this.maxIterations = options.maxIterations;
    this.skipReadOnlyPreAction = options.skipReadOnlyPreAction ?? false;
    this.haltOnBlockedSideEffect = options.haltOnBlockedSideEffect ?? false;
    this.observers = options.observers ?? [];
  }

  get state(): AgentState {
    return this.current;
  }

  async run(): Promise<ClosedSession> {
    if (this.started) {
      throw new Error(`Session ${this.session.id} has already been run`);
    }
    this.started = true;
    this.tools = this.options.registry.getLlmSchemas();

    while (this.current !== 'terminal') {
      const next = await this.step(this.current);
      this.transition(next);
    }
    if (!isClosed(this.session)) {
      throw new Error(`Session ${this.session.id} reached terminal state while still running`);
    }
    return this.session;
  }

  private async step(state: AgentState): Promise<AgentState> {
    switch (state) {
      case 'init':
        return 'awaiting_input_clearance';
      case 'awaiting_input_clearance':
        return this.clearInput();
      case 'reasoning':
        return this.reason();
      case 'awaiting_action_clearance':
        return this.clearNextAction();
      case 'acting':
        return this.act();
      case 'awaiting_output_clearance':
        return this.clearOutput();
      case 'terminal':
        return 'terminal';
    }
  }

  private transition(to: AgentState): void {
    const from = this.current;
    if (!ALLOWED_TRANSITIONS[from].includes(to)) {
      throw new Error(`Invalid transition: ${from} -> ${to}`);
    }
    this.current = to;
    for (const observer of this.observers) {
      observer.onTransition?.({
        sessionId: this.session.id,
        from,
        to,
        iteration: this.session.iterationCount,
      });
    }
  }

  private append(message: Message): void {
    this.session.history.push(message);
    for (const observer of this.observers) observer.onMessage?.(message, this.session);
  }

  private cancelled(): boolean {
    return this.options.signal?.aborted === true;
  }

  private finish(
    status: TerminalStatus,
    details: { reason?: string; finalOutput?: string } = {}
  ): AgentState {
    closeSession(this.session, status, details);
    return 'terminal';
  }

  private cancel(): AgentState {
    return this.finish('blocked', { reason: CANCELLED_REASON });
  }

  /** A check that throws counts as a block. */
  private async clear(
    stage: GuardrailStage,
    candidate: GuardrailCandidate
  ): Promise<GuardrailVerdict> {
    let verdict: GuardrailVerdict;
    try {
      verdict = await this.options.guardrails.evaluate(
        stage,
        this.session.history,
        candidate,
        this.options.signal
      );
    } catch (err) {
      verdict = block(`guardrail evaluation failed: ${describeError(err)}`);
    }
    const toolCall = candidate.kind === 'tool_call' ? candidate.request : undefined;
    for (const observer of this.observers) {
      observer.onVerdict?.({ sessionId: this.session.id, stage, verdict, toolCall });
    }
    return verdict;
  }

  private async clearInput(): Promise<AgentState> {
    if (this.cancelled()) return this.cancel();

    const seed = this.session.history[0];
    const verdict = await this.clear('input', { kind: 'text', text: seed.content });

    if (verdict.decision === 'block') {
      this.append(systemNotice(`Input blocked by guardrail: ${verdict.reason}`));
      return this.finish('blocked', { reason: verdict.reason });
    }
    if (verdict.decision === 'modify' && verdict.replacementContent !== undefined) {
      // The seed is the one message that may be rewritten, and only before reasoning starts.
      this.session.history[0] = userMessage(verdict.replacementContent);
    }
    return 'reasoning';
  }

  private async reason(): Promise<AgentState> {
    if (this.cancelled()) return this.cancel();

    if (this.session.iterationCount >= this.maxIterations) {
      return this.finish('iteration_limit_exceeded', {
        reason: `reached the limit of ${this.maxIterations} reasoning iteration(s) without a final answer`,
      });
    }
    this.session.iterationCount += 1;

    let decision: OracleDecision;
    try {
      decision = await this.options.oracle.decide(
        snapshotHistory(this.session.history),
        this.tools,
        this.options.signal
      );
    } catch (err) {
      this.append(systemNotice(`Malformed decision: ${describeError(err)}`));
      return 'reasoning';
    }

    if (decision.kind === 'final') {
      this.draft = decision.message;
      return 'awaiting_output_clearance';
    }

    this.append(decision.message);
    this.pendingCalls = [...decision.message.toolCalls];
    this.batchBlockReason = null;
    return 'awaiting_action_clearance';
  }

  private riskOf(request: ToolCallRequest): RiskLevel | undefined {
    return this.options.registry.get(request.toolName)?.riskLevel;
  }

  private async clearNextAction(): Promise<AgentState> {
    if (this.cancelled()) return this.cancel();

    const request = this.pendingCalls.shift();
    if (!request) {
      if (this.haltOnBlockedSideEffect && this.batchBlockReason !== null) {
        this.append(systemNotice(`Session halted after blocked action: ${this.batchBlockReason}`));
        return this.finish('blocked', { reason: this.batchBlockReason });
      }
      return 'reasoning';
    }

    const riskLevel = this.riskOf(request);
    if (riskLevel === 'read_only' && this.skipReadOnlyPreAction) {
      this.clearedCall = { request };
      return 'acting';
    }

    const verdict = await this.clear('pre_action', { kind: 'tool_call', request, riskLevel });

    if (verdict.decision === 'block') {
      this.append(toolResultMessage(request.id, blockedToolResultText(verdict.reason)));
      if (riskLevel === 'side_effecting' && this.batchBlockReason === null) {
        this.batchBlockReason = verdict.reason;
      }
      return 'awaiting_action_clearance';
    }

    const args =
      verdict.decision === 'modify' && verdict.replacementArguments !== undefined
        ? verdict.replacementArguments
        : request.arguments;
    this.clearedCall = { request: { id: request.id, toolName: request.toolName, arguments: args } };
    return 'acting';
  }

  private async act(): Promise<AgentState> {
    const cleared = this.clearedCall;
    this.clearedCall = null;
    if (cleared) {
      // Runs to completion even if cancellation was requested meanwhile.
      const result = await this.options.registry.dispatch(cleared.request, {
        sessionId: this.session.id,
      });
      for (const observer of this.observers) observer.onDispatch?.(result, this.session.id);
      this.append(toolResultMessage(result.toolCallId, result.content));
    }
    return 'awaiting_action_clearance';
  }

  private async clearOutput(): Promise<AgentState> {
    const draft = this.draft ?? assistantMessage('');
    this.draft = null;

    if (this.cancelled()) {
      this.append(markUnreleased(draft));
      return this.cancel();
    }

    const verdict = await this.clear('output', { kind: 'text', text: draft.content });

    if (verdict.decision === 'block') {
      this.append(markUnreleased(draft));
      this.append(systemNotice(`Output blocked by guardrail: ${verdict.reason}`));
      return this.finish('blocked', { reason: verdict.reason });
    }

    if (verdict.decision === 'modify' && verdict.replacementContent !== undefined) {
      this.append(markUnreleased(draft));
      this.append(assistantMessage(verdict.replacementContent));
      return this.finish('completed', { finalOutput: verdict.replacementContent });
    }

    this.append(draft);
    return this.finish('completed', { finalOutput: draft.content });
  }
}
