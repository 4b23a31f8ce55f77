import type { GuardrailCheck } from '../types.js';
import { allow, block } from '../verdicts.js';

export interface TopicRule {
  label: string;
  pattern: RegExp;
}

export const DEFAULT_BLOCKED_TOPICS: readonly TopicRule[] = [
  { label: 'guaranteed returns', pattern: /\bguarantee[sd]?\s+(returns?|profits?|gains?)\b/i },
  {
    label: 'market manipulation',
    pattern: /\b(pump\s+and\s+dump|spoof(ing)?|wash\s+trad(e|es|ing)|front[-\s]?run(ning)?|corner the market)\b/i,
  },
  { label: 'tax evasion', pattern: /\b(evade|evading|evasion of|hide .* from)\b.*\b(tax|taxes|irs)\b/i },
];

function compileRules(patterns: readonly string[] | undefined): readonly TopicRule[] {
  if (!patterns || patterns.length === 0) return DEFAULT_BLOCKED_TOPICS;
  return patterns.map((source) => ({ label: source, pattern: new RegExp(source, 'i') }));
}

/**
 * Refuse goals that fall into prohibited topics before any reasoning happens.
 */
export function createTopicFilterCheck(options: { blockedPatterns?: readonly string[] } = {}): GuardrailCheck {
  const rules = compileRules(options.blockedPatterns);
  return {
    name: 'topic_filter',
    stages: ['input'],
    evaluate: ({ candidate }) => {
      if (candidate.kind !== 'text') return allow();
      const hit = rules.find((rule) => rule.pattern.test(candidate.text));
      return hit ? block(`goal matches blocked topic: ${hit.label}`) : allow();
    },
  };
}
