import { FOUND_PREFIX } from '../../../research/document_search.js';
import { findToolCall } from '../../messages.js';
import type { GuardrailCheck } from '../types.js';
import { allow, modifyText } from '../verdicts.js';

const CITATION_PATTERN = /\b(10-?K|annual report|form 10-?k)\b/i;

export const UNGROUNDED_NOTICE =
  '[Notice: the references to the annual report above were not verified by a document search in this session.]';

/**
 * Answers that cite the annual report must be backed by at least one
 * successful document search; otherwise a notice is appended.
 */
export function createCitationGroundednessCheck(options: { researchTool: string }): GuardrailCheck {
  return {
    name: 'citation_groundedness',
    stages: ['output'],
    evaluate: ({ candidate, history }) => {
      if (candidate.kind !== 'text' || !CITATION_PATTERN.test(candidate.text)) return allow();

      const grounded = history.some((message) => {
        if (message.role !== 'tool_result' || !message.toolCallId) return false;
        const call = findToolCall(history, message.toolCallId);
        return call?.toolName === options.researchTool && message.content.startsWith(FOUND_PREFIX);
      });
      if (grounded) return allow();

      return modifyText(
        'answer cites the annual report without a supporting document search',
        `${candidate.text}\n\n${UNGROUNDED_NOTICE}`
      );
    },
  };
}
