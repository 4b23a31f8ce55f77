import type { AgentConfig } from './config.js';
import { Logger } from './logger.js';
import { buildGuardrails } from '../agent/guardrails/registry.js';
import type { GuardrailCheckpoint } from '../agent/guardrails/checkpoint.js';
import type { TextClassifier } from '../agent/guardrails/types.js';
import { OpenAICompatibleClassifier, OpenAICompatibleOracle, type FetchLike } from '../agent/oracle/openai_compat.js';
import type { ReasoningOracle } from '../agent/oracle/types.js';
import { createLoggingObserver } from '../agent/orchestrator/logging_observer.js';
import type { StateMachineObserver } from '../agent/orchestrator/state_machine.js';
import { runSession, type SessionResult } from '../agent/session_driver.js';
import { createDefaultTools } from '../agent/tools/adapters/index.js';
import { ToolRegistry } from '../agent/tools/registry.js';
import { PaperTradeExecutor } from '../execution/paper_trader.js';
import { MockMarketDataFeed } from '../market/market_data.js';
import { openDatabase } from '../memory/db.js';
import { saveTranscript } from '../memory/transcripts.js';
import { DocumentCorpus } from '../research/document_search.js';

export interface GuardedAgentOptions {
  logger?: Logger;
  /** Replaces the configured OpenAI-compatible backend (e.g. a scripted replay). */
  oracle?: ReasoningOracle;
  /** Guard model used by the safety_classifier check. */
  classifier?: TextClassifier;
  fetchFn?: FetchLike;
  executor?: PaperTradeExecutor;
}

export interface RunOptions {
  signal?: AbortSignal;
  sessionId?: string;
  observers?: readonly StateMachineObserver[];
  /** Overrides memory.persistTranscripts for this run. */
  persist?: boolean;
}

/**
 * Wires configuration into a runnable agent: collaborators, tools, guardrails
 * and the reasoning backend. Construction fails with ConfigurationError on
 * bad config, before any session runs.
 */
export class GuardedAgent {
  readonly registry: ToolRegistry;
  readonly guardrails: GuardrailCheckpoint;
  readonly executor: PaperTradeExecutor;
  private readonly oracle: ReasoningOracle;
  private readonly logger: Logger;

  constructor(
    private readonly config: AgentConfig,
    options: GuardedAgentOptions = {}
  ) {
    this.logger = options.logger ?? new Logger(config.logging.level, { filePath: config.logging.file });

    const backend = {
      baseUrl: config.oracle.baseUrl,
      apiKey: config.oracle.apiKey,
      timeoutMs: config.oracle.timeoutMs,
      maxRetries: config.oracle.maxRetries,
      fetchFn: options.fetchFn,
      logger: this.logger,
    };

    this.oracle =
      options.oracle ??
      new OpenAICompatibleOracle({
        ...backend,
        model: config.oracle.model,
        temperature: config.oracle.temperature,
        maxTokens: config.oracle.maxTokens,
        systemPrompt: config.agent.systemPrompt,
      });

    const usesClassifier = [
      ...config.guardrails.input,
      ...config.guardrails.preAction,
      ...config.guardrails.output,
    ].includes('safety_classifier');
    const classifier =
      options.classifier ??
      (usesClassifier
        ? new OpenAICompatibleClassifier({ ...backend, model: config.oracle.guardModel })
        : undefined);
    this.guardrails = buildGuardrails(config.guardrails, { classifier });

    this.executor = options.executor ?? new PaperTradeExecutor();
    this.registry = new ToolRegistry().registerAll(
      createDefaultTools({
        corpus: DocumentCorpus.fromFile(config.data.reportPath),
        marketData: MockMarketDataFeed.fromFile(config.data.marketDataPath),
        executor: this.executor,
      })
    );
    this.logger.debug('Agent ready', { tools: this.registry.listNames() });
  }

  async run(goal: string, options: RunOptions = {}): Promise<SessionResult> {
    const result = await runSession({
      goal,
      tools: this.registry,
      guardrails: this.guardrails,
      oracle: this.oracle,
      maxIterations: this.config.agent.maxIterations,
      skipReadOnlyPreAction: this.config.agent.skipReadOnlyPreAction,
      haltOnBlockedSideEffect: this.config.agent.haltOnBlockedSideEffect,
      observers: [createLoggingObserver(this.logger), ...(options.observers ?? [])],
      signal: options.signal,
      sessionId: options.sessionId,
    });

    this.logger.info(`Session ${result.session.id} finished: ${result.status}`, {
      iterations: result.session.iterationCount,
      reason: result.reason,
    });

    if (options.persist ?? this.config.memory.persistTranscripts) {
      saveTranscript(openDatabase(this.config.memory.dbPath), result.session);
      this.logger.debug(`Transcript saved to ${this.config.memory.dbPath}`);
    }
    return result;
  }
}
