import type { GuardrailCheck } from '../types.js';
import { allow, block, modifyText } from '../verdicts.js';

const DEFAULT_MAX_CHARS = 8000;

const SUSPICIOUS_PATTERNS = [
  /ignore (all|any|previous|prior) (instructions|rules|guardrails)/i,
  /disregard (the )?(system|previous) (prompt|instructions)/i,
  /system prompt/i,
  /\byou are (now )?(chatgpt|claude|gpt|gemini|an? unrestricted)\b/i,
  /\bdeveloper (message|mode)\b/i,
  /\bjailbreak\b/i,
  /begin system prompt/i,
  /end system prompt/i,
];

export interface InjectionScan {
  text: string;
  removedLines: number;
  truncated: boolean;
}

/**
 * Drop instruction-override lines (including inside fenced blocks) and cap length.
 */
export function stripInstructionOverrides(text: string, maxChars = DEFAULT_MAX_CHARS): InjectionScan {
  const kept: string[] = [];
  let removedLines = 0;

  for (const line of text.split('\n')) {
    if (line.includes('```')) continue;
    if (SUSPICIOUS_PATTERNS.some((pattern) => pattern.test(line))) {
      removedLines += 1;
      continue;
    }
    kept.push(line);
  }

  const joined = kept.join('\n').trim();
  if (joined.length <= maxChars) {
    return { text: joined, removedLines, truncated: false };
  }
  return { text: `${joined.slice(0, maxChars)}\n\n[TRUNCATED]`, removedLines, truncated: true };
}

export function createPromptInjectionCheck(options: { maxChars?: number } = {}): GuardrailCheck {
  return {
    name: 'prompt_injection',
    stages: ['input'],
    evaluate: ({ candidate }) => {
      if (candidate.kind !== 'text') return allow();
      const scan = stripInstructionOverrides(candidate.text, options.maxChars);
      if (scan.removedLines === 0 && !scan.truncated) return allow();
      if (!scan.text) {
        return block('goal contains only instruction-override text');
      }

      const notes: string[] = [];
      if (scan.removedLines > 0) notes.push(`removed ${scan.removedLines} instruction-override line(s)`);
      if (scan.truncated) notes.push('goal truncated');
      return modifyText(notes.join(', '), scan.text);
    },
  };
}
