import type { GuardrailCheck } from '../types.js';
import { allow, block, modifyText } from '../verdicts.js';

const MNPI_PATTERNS = [
  /\bmaterial\s+non-?public\b/i,
  /\b(insider|non-?public)\s+(information|info|tips?|knowledge)\b/i,
  /\bbefore (it is|it's|they are) (announced|made public|public)\b/i,
];

interface Redaction {
  label: string;
  pattern: RegExp;
  token: string;
}

// SSN before phone so that nine-digit identifiers are not half-matched.
const REDACTIONS: readonly Redaction[] = [
  { label: 'email', pattern: /[\w.+-]+@[\w-]+(\.[\w-]+)+/g, token: '[REDACTED_EMAIL]' },
  { label: 'ssn', pattern: /\b\d{3}-\d{2}-\d{4}\b/g, token: '[REDACTED_SSN]' },
  {
    label: 'phone',
    pattern: /(?:\+?1[-.\s]?)?\(?\b\d{3}\)?[-.\s]\d{3}[-.\s]\d{4}\b/g,
    token: '[REDACTED_PHONE]',
  },
];

export function redactPersonalData(text: string): { text: string; labels: string[] } {
  let result = text;
  const labels: string[] = [];
  for (const redaction of REDACTIONS) {
    const next = result.replace(redaction.pattern, redaction.token);
    if (next !== result) labels.push(redaction.label);
    result = next;
  }
  return { text: result, labels };
}

/**
 * Blocks requests built on material non-public information and redacts
 * personal identifiers from goals and answers.
 */
export function createSensitiveDataCheck(): GuardrailCheck {
  return {
    name: 'sensitive_data',
    stages: ['input', 'output'],
    evaluate: ({ candidate }) => {
      if (candidate.kind !== 'text') return allow();

      if (MNPI_PATTERNS.some((pattern) => pattern.test(candidate.text))) {
        return block('text relies on material non-public information');
      }

      const redacted = redactPersonalData(candidate.text);
      if (redacted.labels.length === 0) return allow();
      return modifyText(`redacted personal data: ${redacted.labels.join(', ')}`, redacted.text);
    },
  };
}
