import { VerdictError } from '../../core/errors.js';
import type { GuardrailVerdict } from './types.js';

function requireReason(decision: string, reason: string): string {
  const trimmed = reason.trim();
  if (!trimmed) {
    throw new VerdictError(`A ${decision} verdict requires a reason`);
  }
  return trimmed;
}

export function allow(reason = 'no guardrail fired'): GuardrailVerdict {
  return { decision: 'allow', reason };
}

export function block(reason: string): GuardrailVerdict {
  return { decision: 'block', reason: requireReason('block', reason) };
}

export function modifyText(reason: string, replacementContent: string): GuardrailVerdict {
  return { decision: 'modify', reason: requireReason('modify', reason), replacementContent };
}

export function modifyArguments(
  reason: string,
  replacementArguments: Readonly<Record<string, unknown>>
): GuardrailVerdict {
  return {
    decision: 'modify',
    reason: requireReason('modify', reason),
    replacementArguments: Object.freeze({ ...replacementArguments }),
  };
}
