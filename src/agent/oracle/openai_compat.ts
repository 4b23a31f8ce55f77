/**
 * OpenAI-compatible reasoning backend.
 *
 * Every transport problem (HTTP error, timeout, unreadable body) is reported
 * as MalformedDecisionError so the state machine handles it on the same
 * recovery path as bad model output.
 */

import { describeError, MalformedDecisionError } from '../../core/errors.js';
import type { Logger } from '../../core/logger.js';
import { retryWithBackoff } from '../../core/retry.js';
import type { TextClassification, TextClassifier } from '../guardrails/types.js';
import type { ToolSchema } from '../tools/types.js';
import type { HistorySnapshot } from '../types.js';
import { normalizeBackendReply } from './normalize.js';
import type { OracleDecision, ReasoningOracle } from './types.js';
import {
  toWireMessages,
  toWireTools,
  WireResponseSchema,
  type WireRequest,
  type WireResponse,
} from './wire.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface ChatBackendOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
  maxRetries: number;
  fetchFn?: FetchLike;
  sleepFn?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export class BackendHttpError extends Error {
  constructor(
    readonly status: number,
    body: string
  ) {
    super(`backend responded ${status}${body ? `: ${body.slice(0, 200)}` : ''}`);
    this.name = 'BackendHttpError';
  }
}

export class BackendTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`backend did not respond within ${timeoutMs}ms`);
    this.name = 'BackendTimeoutError';
  }
}

function isTransient(err: unknown): boolean {
  if (err instanceof BackendHttpError) return err.status === 429 || err.status >= 500;
  if (err instanceof BackendTimeoutError) return true;
  // fetch() rejects with TypeError on connection failures.
  return err instanceof TypeError;
}

/**
 * Thin client for POST {baseUrl}/chat/completions with timeout and retries.
 */
export class ChatCompletionsClient {
  private readonly fetchFn: FetchLike;

  constructor(private readonly options: ChatBackendOptions) {
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
  }

  async complete(request: WireRequest, signal?: AbortSignal): Promise<WireResponse> {
    const outcome = await retryWithBackoff(() => this.postOnce(request, signal), {
      retries: signal?.aborted ? 0 : this.options.maxRetries,
      baseDelayMs: 500,
      maxDelayMs: 8000,
      jitterMs: 250,
      isRetryable: (err) => !signal?.aborted && isTransient(err),
      onRetry: ({ attempt, delayMs, error }) =>
        this.options.logger?.warn(
          `Reasoning backend attempt ${attempt} failed (${describeError(error)}); retrying in ${delayMs}ms`
        ),
      sleepFn: this.options.sleepFn,
    });

    if (!outcome.ok) {
      throw new MalformedDecisionError(
        `reasoning backend unavailable after ${outcome.attempts} attempt(s): ${describeError(outcome.error)}`,
        { cause: outcome.error }
      );
    }
    return outcome.value;
  }

  private async postOnce(request: WireRequest, signal?: AbortSignal): Promise<WireResponse> {
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.timeoutMs);

    try {
      const headers: Record<string, string> = { 'Content-Type': 'application/json' };
      if (this.options.apiKey) headers.Authorization = `Bearer ${this.options.apiKey}`;

      let response: Response;
      try {
        response = await this.fetchFn(`${this.options.baseUrl.replace(/\/+$/, '')}/chat/completions`, {
          method: 'POST',
          headers,
          body: JSON.stringify(request),
          signal: controller.signal,
        });
      } catch (err) {
        if (timedOut) throw new BackendTimeoutError(this.options.timeoutMs);
        throw err;
      }

      if (!response.ok) {
        throw new BackendHttpError(response.status, await response.text());
      }

      const parsed = WireResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new MalformedDecisionError('backend response has no choices[0].message');
      }
      return parsed.data;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

export interface OpenAICompatibleOracleOptions extends ChatBackendOptions {
  model: string;
  temperature: number;
  maxTokens: number;
  systemPrompt?: string;
}

export class OpenAICompatibleOracle implements ReasoningOracle {
  private readonly client: ChatCompletionsClient;

  constructor(private readonly options: OpenAICompatibleOracleOptions) {
    this.client = new ChatCompletionsClient(options);
  }

  async decide(
    history: HistorySnapshot,
    tools: readonly ToolSchema[],
    signal?: AbortSignal
  ): Promise<OracleDecision> {
    const request: WireRequest = {
      model: this.options.model,
      messages: toWireMessages(this.options.systemPrompt, history),
      temperature: this.options.temperature,
      max_tokens: this.options.maxTokens,
    };
    if (tools.length > 0) request.tools = toWireTools(tools);

    const response = await this.client.complete(request, signal);
    const message = response.choices[0].message;
    return normalizeBackendReply({ content: message.content, toolCalls: message.tool_calls }, history);
  }
}

/**
 * Parses Llama-Guard style replies: "safe", or "unsafe" followed by a line of
 * category codes such as "S1,S10".
 */
export function parseGuardReply(text: string): TextClassification {
  const lines = text
    .trim()
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean);
  const verdict = (lines[0] ?? '').toLowerCase();
  if (verdict === 'safe') return { safe: true, categories: [] };
  if (verdict === 'unsafe') {
    const categories = (lines[1] ?? '')
      .split(',')
      .map((code) => code.trim())
      .filter(Boolean);
    return { safe: false, categories };
  }
  throw new Error(`unrecognized guard model reply: ${text.slice(0, 80)}`);
}

export class OpenAICompatibleClassifier implements TextClassifier {
  private readonly client: ChatCompletionsClient;

  constructor(private readonly options: ChatBackendOptions & { model: string }) {
    this.client = new ChatCompletionsClient(options);
  }

  async classify(text: string, signal?: AbortSignal): Promise<TextClassification> {
    const response = await this.client.complete(
      {
        model: this.options.model,
        messages: [{ role: 'user', content: text }],
        temperature: 0,
      },
      signal
    );
    return parseGuardReply(response.choices[0].message.content ?? '');
  }
}
