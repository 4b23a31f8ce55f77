import type { RiskLevel } from '../tools/types.js';
import type { HistorySnapshot, ToolCallRequest } from '../types.js';

export type GuardrailStage = 'input' | 'pre_action' | 'output';

export type GuardrailDecision = 'allow' | 'block' | 'modify';

export interface GuardrailVerdict {
  decision: GuardrailDecision;
  /** Always non-empty for block and modify. */
  reason: string;
  /** Rewritten text (input/output stages). */
  replacementContent?: string;
  /** Adjusted tool arguments (pre_action stage). */
  replacementArguments?: Readonly<Record<string, unknown>>;
  /** Name of the sub-check that produced a block. */
  checkName?: string;
}

export type GuardrailCandidate =
  | { kind: 'text'; text: string }
  | { kind: 'tool_call'; request: ToolCallRequest; riskLevel: RiskLevel | undefined };

export interface GuardrailCheckContext {
  stage: GuardrailStage;
  history: HistorySnapshot;
  candidate: GuardrailCandidate;
  signal?: AbortSignal;
}

/**
 * One pluggable policy layer. Checks must not mutate the history they are given.
 */
export interface GuardrailCheck {
  readonly name: string;
  readonly stages: readonly GuardrailStage[];
  evaluate(ctx: GuardrailCheckContext): GuardrailVerdict | Promise<GuardrailVerdict>;
}

export interface TextClassification {
  safe: boolean;
  categories: string[];
}

/** Guard-model boundary used by the safety classifier check. */
export interface TextClassifier {
  classify(text: string, signal?: AbortSignal): Promise<TextClassification>;
}
