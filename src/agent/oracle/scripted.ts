import { readFileSync } from 'node:fs';

import { z } from 'zod';

import { ConfigurationError, describeError, MalformedDecisionError } from '../../core/errors.js';
import type { ToolSchema } from '../tools/types.js';
import type { HistorySnapshot } from '../types.js';
import { normalizeBackendReply } from './normalize.js';
import type { OracleDecision, ReasoningOracle } from './types.js';

/**
 * One scripted step: a raw reply, a reply computed from the history so far,
 * or a simulated backend failure.
 */
export type ScriptStep =
  | { reply: unknown }
  | { respond: (history: HistorySnapshot) => unknown }
  | { fail: string };

export interface ScriptedOracleOptions {
  /** Keep replaying the final step once the script runs out. */
  repeatLast?: boolean;
}

/**
 * Deterministic oracle that replays a fixed sequence of backend replies.
 * Replies go through the same normalization as a live backend.
 */
export class ScriptedOracle implements ReasoningOracle {
  private cursor = 0;
  readonly calls: HistorySnapshot[] = [];

  constructor(
    private readonly steps: readonly ScriptStep[],
    private readonly options: ScriptedOracleOptions = {}
  ) {}

  static fromReplies(replies: readonly unknown[], options?: ScriptedOracleOptions): ScriptedOracle {
    return new ScriptedOracle(replies.map((reply) => ({ reply })), options);
  }

  get callCount(): number {
    return this.calls.length;
  }

  async decide(history: HistorySnapshot, _tools: readonly ToolSchema[]): Promise<OracleDecision> {
    this.calls.push(history);
    const step = this.nextStep();
    if (!step) {
      throw new MalformedDecisionError('scripted oracle has no more replies');
    }
    if ('fail' in step) {
      throw new MalformedDecisionError(step.fail);
    }
    const raw = 'reply' in step ? step.reply : step.respond(history);
    return normalizeBackendReply(raw, history);
  }

  private nextStep(): ScriptStep | undefined {
    if (this.cursor < this.steps.length) {
      const step = this.steps[this.cursor];
      this.cursor += 1;
      return step;
    }
    return this.options.repeatLast ? this.steps[this.steps.length - 1] : undefined;
  }
}

const ScriptFileSchema = z.union([
  z.array(z.unknown()),
  z.object({ replies: z.array(z.unknown()), repeatLast: z.boolean().optional() }),
]);

/**
 * Load a replay script: a JSON array of backend replies, or
 * `{ "replies": [...], "repeatLast": true }`.
 */
export function loadScriptedOracle(path: string): ScriptedOracle {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`Could not read script ${path}: ${describeError(err)}`);
  }
  const parsed = ScriptFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Script ${path} must be an array of replies or an object with "replies"`);
  }
  const script = parsed.data;
  return Array.isArray(script)
    ? ScriptedOracle.fromReplies(script)
    : ScriptedOracle.fromReplies(script.replies, { repeatLast: script.repeatLast });
}
