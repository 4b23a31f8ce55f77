import { describeError } from '../../../core/errors.js';
import type { GuardrailCandidate, GuardrailCheck, GuardrailStage, TextClassifier } from '../types.js';
import { allow, block } from '../verdicts.js';

function candidateText(candidate: GuardrailCandidate): string {
  if (candidate.kind === 'text') return candidate.text;
  return `${candidate.request.toolName} ${JSON.stringify(candidate.request.arguments)}`;
}

/**
 * Delegates to an external guard model. An unreachable classifier does not
 * block; an explicit "unsafe" always does.
 */
export function createSafetyClassifierCheck(
  classifier: TextClassifier,
  stages: readonly GuardrailStage[] = ['input', 'pre_action', 'output']
): GuardrailCheck {
  return {
    name: 'safety_classifier',
    stages,
    evaluate: async ({ candidate, signal }) => {
      try {
        const result = await classifier.classify(candidateText(candidate), signal);
        if (result.safe) return allow();
        const categories = result.categories.length > 0 ? ` (${result.categories.join(', ')})` : '';
        return block(`safety classifier flagged content${categories}`);
      } catch (err) {
        return allow(`safety classifier unavailable: ${describeError(err)}`);
      }
    },
  };
}
