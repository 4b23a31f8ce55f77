/**
 * Guardrail Checkpoint
 *
 * Runs ordered sub-checks for one stage. The first block wins; a modify feeds
 * its replacement into the checks after it; nothing firing means allow.
 */

import { VerdictError } from '../../core/errors.js';
import { snapshotHistory } from '../messages.js';
import type { HistorySnapshot, ToolCallRequest } from '../types.js';
import type {
  GuardrailCandidate,
  GuardrailCheck,
  GuardrailStage,
  GuardrailVerdict,
} from './types.js';
import { allow, modifyArguments, modifyText } from './verdicts.js';

/** Block and modify verdicts need a reason, however they were built. */
function requireReason(check: GuardrailCheck, verdict: GuardrailVerdict): GuardrailVerdict {
  if (verdict.decision === 'allow') return verdict;
  const reason = typeof verdict.reason === 'string' ? verdict.reason.trim() : '';
  if (!reason) {
    throw new VerdictError(`check "${check.name}" returned a ${verdict.decision} verdict without a reason`);
  }
  return { ...verdict, reason };
}

function withArguments(request: ToolCallRequest, args: Readonly<Record<string, unknown>>): ToolCallRequest {
  return { id: request.id, toolName: request.toolName, arguments: args };
}

export class GuardrailCheckpoint {
  private readonly checks: readonly GuardrailCheck[];

  constructor(checks: readonly GuardrailCheck[] = []) {
    this.checks = Object.freeze([...checks]);
  }

  checksFor(stage: GuardrailStage): GuardrailCheck[] {
    return this.checks.filter((check) => check.stages.includes(stage));
  }

  async evaluate(
    stage: GuardrailStage,
    history: HistorySnapshot,
    candidate: GuardrailCandidate,
    signal?: AbortSignal
  ): Promise<GuardrailVerdict> {
    // Checks get their own frozen copy so none can reach the live history.
    const snapshot = snapshotHistory(history);
    const reasons: string[] = [];
    let current = candidate;

    for (const check of this.checksFor(stage)) {
      const verdict = requireReason(
        check,
        await check.evaluate({ stage, history: snapshot, candidate: current, signal })
      );

      if (verdict.decision === 'block') {
        return { ...verdict, checkName: check.name };
      }
      if (verdict.decision !== 'modify') continue;

      reasons.push(verdict.reason);
      if (current.kind === 'text' && verdict.replacementContent !== undefined) {
        current = { kind: 'text', text: verdict.replacementContent };
      } else if (current.kind === 'tool_call' && verdict.replacementArguments !== undefined) {
        current = {
          kind: 'tool_call',
          request: withArguments(current.request, verdict.replacementArguments),
          riskLevel: current.riskLevel,
        };
      }
    }

    if (reasons.length === 0) return allow();

    const reason = reasons.join('; ');
    if (current.kind === 'text') {
      const changed = candidate.kind !== 'text' || current.text !== candidate.text;
      return changed ? modifyText(reason, current.text) : { decision: 'modify', reason };
    }
    const originalArguments = candidate.kind === 'tool_call' ? candidate.request.arguments : undefined;
    return current.request.arguments !== originalArguments
      ? modifyArguments(reason, current.request.arguments)
      : { decision: 'modify', reason };
  }
}

/**
 * View of a check limited to the stages it was configured for.
 */
export function bindStages(check: GuardrailCheck, stages: readonly GuardrailStage[]): GuardrailCheck {
  const allowed = stages.filter((stage) => check.stages.includes(stage));
  return {
    name: check.name,
    stages: allowed,
    evaluate: (ctx) => check.evaluate(ctx),
  };
}
