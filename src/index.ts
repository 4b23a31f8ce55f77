export const VERSION = '0.1.0';

export * from './agent/types.js';
export {
  assistantMessage,
  findToolCall,
  systemNotice,
  toolResultMessage,
  userMessage,
  validateTranscript,
  type TranscriptIssue,
} from './agent/messages.js';
export { ToolRegistry, type ToolInfo } from './agent/tools/registry.js';
export * from './agent/tools/types.js';
export * from './agent/tools/adapters/index.js';
export { GuardrailCheckpoint, bindStages } from './agent/guardrails/checkpoint.js';
export { buildGuardrails, listGuardrailChecks, type GuardrailDependencies } from './agent/guardrails/registry.js';
export * from './agent/guardrails/types.js';
export * from './agent/guardrails/verdicts.js';
export type { OracleDecision, ReasoningOracle } from './agent/oracle/types.js';
export { normalizeBackendReply } from './agent/oracle/normalize.js';
export { ScriptedOracle, loadScriptedOracle, type ScriptStep } from './agent/oracle/scripted.js';
export {
  OpenAICompatibleClassifier,
  OpenAICompatibleOracle,
  type FetchLike,
} from './agent/oracle/openai_compat.js';
export {
  AgentStateMachine,
  CANCELLED_REASON,
  type AgentState,
  type StateMachineObserver,
  type StateMachineOptions,
} from './agent/orchestrator/state_machine.js';
export { createSession, type ClosedSession } from './agent/orchestrator/session.js';
export { runSession, type RunSessionOptions, type SessionResult } from './agent/session_driver.js';
export { GuardedAgent, type GuardedAgentOptions } from './core/agent.js';
export { loadConfig, parseConfig, redactConfig, type AgentConfig } from './core/config.js';
export * from './core/errors.js';
export { Logger, createSilentLogger, type LogLevel } from './core/logger.js';
export { DocumentCorpus, FOUND_PREFIX, NOT_FOUND_MESSAGE } from './research/document_search.js';
export { MockMarketDataFeed, type MarketSnapshot } from './market/market_data.js';
export { PaperTradeExecutor, type TradeConfirmation, type TradeDirection } from './execution/paper_trader.js';
