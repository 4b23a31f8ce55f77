/**
 * Rumor-reliance guard for side-effecting actions.
 *
 * If the session has observed unverified news about the ticker being traded
 * (or the goal itself leans on a rumor), the action is only cleared once a
 * document search has returned a matching passage on the same subject.
 */

import { z } from 'zod';

import { FOUND_PREFIX } from '../../../research/document_search.js';
import { findToolCall } from '../../messages.js';
import type { HistorySnapshot } from '../../types.js';
import type { GuardrailCheck } from '../types.js';
import { allow, block } from '../verdicts.js';

export const RUMOR_BLOCK_REASON = 'no 10-K corroboration for rumor';

const DEFAULT_RUMOR_PATTERNS = [
  /\brumou?rs?\b/i,
  /\bunconfirmed\b/i,
  /\bunverified\b/i,
  /\balleged(ly)?\b/i,
  /\bspeculation\b/i,
];

const IGNORED_TERMS = new Set([
  'rumor', 'rumors', 'rumour', 'rumours', 'unconfirmed', 'unverified', 'alleged', 'allegedly',
  'speculation', 'social', 'media', 'circulates', 'circulating', 'remains', 'official', 'sources',
  'about', 'that', 'this', 'there', 'these', 'with', 'from', 'have', 'been', 'will', 'into', 'over',
  // Trade instructions say what to do, not what the rumor is about.
  'sell', 'selling', 'sells', 'buying', 'buys', 'shares', 'share', 'stock', 'position', 'based',
  'trade', 'order', 'place', 'execute', 'decide', 'whether', 'should',
]);

const MarketSnapshotSchema = z.object({
  ticker: z.string(),
  newsItems: z.array(z.string()).default([]),
});

export interface RumorCorroborationOptions {
  researchTool: string;
  marketDataTool: string;
  rumorPatterns?: readonly string[];
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    // Error text from a failed tool call is not a snapshot.
    return undefined;
  }
}

function terms(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((term) => term.length >= 4 && !/^\d+$/.test(term) && !IGNORED_TERMS.has(term));
}

interface Observations {
  rumors: string[];
  passages: string[];
}

function observe(
  history: HistorySnapshot,
  ticker: string,
  patterns: readonly RegExp[],
  options: RumorCorroborationOptions
): Observations {
  const isRumor = (text: string) => patterns.some((pattern) => pattern.test(text));
  const result: Observations = { rumors: [], passages: [] };

  for (const message of history) {
    if (message.role === 'user' && isRumor(message.content)) {
      result.rumors.push(message.content);
      continue;
    }
    if (message.role !== 'tool_result' || !message.toolCallId) continue;

    const call = findToolCall(history, message.toolCallId);
    if (!call) continue;

    if (call.toolName === options.marketDataTool) {
      const parsed = MarketSnapshotSchema.safeParse(parseJson(message.content));
      if (parsed.success && parsed.data.ticker.toUpperCase() === ticker) {
        result.rumors.push(...parsed.data.newsItems.filter(isRumor));
      }
    } else if (call.toolName === options.researchTool && message.content.startsWith(FOUND_PREFIX)) {
      result.passages.push(message.content.slice(FOUND_PREFIX.length));
    }
  }

  return result;
}

/** Every subject term must show up in the passage; "product" also covers "products". */
function covers(passage: string, subject: readonly string[]): boolean {
  const words = terms(passage);
  return subject.every((term) => words.some((word) => word.startsWith(term)));
}

export function createRumorCorroborationCheck(options: RumorCorroborationOptions): GuardrailCheck {
  const patterns =
    options.rumorPatterns && options.rumorPatterns.length > 0
      ? options.rumorPatterns.map((source) => new RegExp(source, 'i'))
      : DEFAULT_RUMOR_PATTERNS;

  return {
    name: 'rumor_corroboration',
    stages: ['pre_action'],
    evaluate: ({ candidate, history }) => {
      if (candidate.kind !== 'tool_call' || candidate.riskLevel !== 'side_effecting') return allow();

      const rawTicker = candidate.request.arguments.ticker;
      const ticker = typeof rawTicker === 'string' ? rawTicker.toUpperCase() : '';
      const seen = observe(history, ticker, patterns, options);
      if (seen.rumors.length === 0) return allow();

      // The ticker alone says nothing about the subject of the rumor.
      const subjects = seen.rumors
        .map((rumor) => terms(rumor).filter((term) => term !== ticker.toLowerCase()))
        .filter((subject) => subject.length > 0);
      // A rumor with no nameable subject cannot be checked against anything.
      if (subjects.length === 0) return block(RUMOR_BLOCK_REASON);

      const corroborated = subjects.every((subject) =>
        seen.passages.some((passage) => covers(passage, subject))
      );
      return corroborated ? allow('rumor checked against the annual report') : block(RUMOR_BLOCK_REASON);
    },
  };
}
