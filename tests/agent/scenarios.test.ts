import { describe, expect, it } from 'vitest';

import { RUMOR_BLOCK_REASON } from '../../src/agent/guardrails/checks/rumor_corroboration.js';
import { buildGuardrails } from '../../src/agent/guardrails/registry.js';
import { validateTranscript } from '../../src/agent/messages.js';
import { ScriptedOracle } from '../../src/agent/oracle/scripted.js';
import { blockedToolResultText } from '../../src/agent/orchestrator/state_machine.js';
import { runSession } from '../../src/agent/session_driver.js';
import { createDefaultTools } from '../../src/agent/tools/adapters/index.js';
import { DEFAULT_MARKET_DATA_PATH, DEFAULT_REPORT_PATH, parseConfig } from '../../src/core/config.js';
import { PaperTradeExecutor } from '../../src/execution/paper_trader.js';
import { MockMarketDataFeed } from '../../src/market/market_data.js';
import { DocumentCorpus } from '../../src/research/document_search.js';
import { textReply, toolCallReply } from './helpers.js';

const GOAL = 'Sell 1000 NVDA shares based on this rumor';
const FILLED_AT = new Date('2026-01-02T03:04:05Z');

const fetchNvda = toolCallReply('get_real_time_market_data', { ticker: 'NVDA' });
const sellNvda = toolCallReply('execute_trade', { ticker: 'NVDA', quantity: 1000, direction: 'SELL' });
const searchRecall = toolCallReply('query_10k_report', { query: 'product recall' });

function harness(replies: unknown[], options: { repeatLast?: boolean; maxIterations?: number; sessionId?: string } = {}) {
  const config = parseConfig({});
  const executor = new PaperTradeExecutor({ now: () => FILLED_AT });
  const oracle = ScriptedOracle.fromReplies(replies, { repeatLast: options.repeatLast });
  const tools = createDefaultTools({
    corpus: DocumentCorpus.fromFile(DEFAULT_REPORT_PATH),
    marketData: MockMarketDataFeed.fromFile(DEFAULT_MARKET_DATA_PATH),
    executor,
  });

  const run = () =>
    runSession({
      goal: GOAL,
      tools,
      guardrails: buildGuardrails(config.guardrails),
      oracle,
      maxIterations: options.maxIterations ?? config.agent.maxIterations,
      skipReadOnlyPreAction: config.agent.skipReadOnlyPreAction,
      haltOnBlockedSideEffect: config.agent.haltOnBlockedSideEffect,
      sessionId: options.sessionId,
    });
  return { run, executor, oracle };
}

describe('guarded trading scenarios', () => {
  it('blocks a trade driven by an uncorroborated rumor', async () => {
    const { run, executor, oracle } = harness([fetchNvda, sellNvda, textReply('unreachable')]);

    const result = await run();

    expect(result.status).toBe('blocked');
    expect(result.reason).toBe(RUMOR_BLOCK_REASON);
    expect(executor.orderCount).toBe(0);
    expect(oracle.callCount).toBe(2);
    expect(result.history).toHaveLength(6);
    expect(result.history[4]).toEqual({
      role: 'tool_result',
      content: blockedToolResultText('no 10-K corroboration for rumor'),
      toolCalls: [],
      toolCallId: 'call_2',
    });
    expect(result.history[5]).toEqual({
      role: 'system_notice',
      content: 'Session halted after blocked action: no 10-K corroboration for rumor',
      toolCalls: [],
    });
    expect(validateTranscript(result.history)).toEqual([]);
  });

  it('executes the trade once the rumor is checked against the annual report', async () => {
    const answer = 'Checked the annual report section on product recalls, then sold 1000 NVDA shares.';
    const { run, executor } = harness([fetchNvda, searchRecall, sellNvda, textReply(answer)]);

    const result = await run();

    expect(result.status).toBe('completed');
    expect(result.finalOutput).toBe(answer);
    expect(executor.listOrders()).toEqual([
      {
        confirmationId: `trade_${Date.UTC(2026, 0, 2, 3, 4, 5) / 1000}_1`,
        ticker: 'NVDA',
        quantity: 1000,
        direction: 'SELL',
        status: 'SUCCESS',
        executedAt: '2026-01-02T03:04:05.000Z',
      },
    ]);
    expect(result.history[4].content.startsWith('Found relevant section in 10-K report: ')).toBe(true);
    expect(JSON.parse(result.history[6].content)).toMatchObject({ status: 'SUCCESS', ticker: 'NVDA', quantity: 1000 });
    expect(validateTranscript(result.history)).toEqual([]);
  });

  it('does not count a search that misses the rumored subject as corroboration', async () => {
    const searchProduct = toolCallReply('query_10k_report', { query: 'product' });
    const { run, executor } = harness([fetchNvda, searchProduct, sellNvda, textReply('unreachable')]);

    const result = await run();

    expect(result.history[4].content.startsWith('Found relevant section in 10-K report: ')).toBe(true);
    expect(result.status).toBe('blocked');
    expect(result.reason).toBe(RUMOR_BLOCK_REASON);
    expect(executor.orderCount).toBe(0);
  });

  it('blocks a rumor-driven goal after an unrelated search', async () => {
    const searchRevenue = toolCallReply('query_10k_report', { query: 'revenue' });
    const { run, executor } = harness([searchRevenue, sellNvda, textReply('unreachable')]);

    const result = await run();

    expect(result.status).toBe('blocked');
    expect(result.reason).toBe(RUMOR_BLOCK_REASON);
    expect(executor.orderCount).toBe(0);
  });

  it('recovers from a call to a tool that does not exist', async () => {
    const { run } = harness([
      toolCallReply('get_stock_fundamentals', { ticker: 'NVDA' }),
      textReply('That tool is not available; NVDA last traded at 915.75.'),
    ]);

    const result = await run();

    expect(result.status).toBe('completed');
    expect(result.history[2].content).toBe(
      'ERROR (UnknownToolError): Unknown tool "get_stock_fundamentals". ' +
        'Available tools: query_10k_report, get_real_time_market_data, execute_trade'
    );
    expect(result.finalOutput).toBe('That tool is not available; NVDA last traded at 915.75.');
  });

  it('stops a model that never stops calling tools at exactly the limit', async () => {
    const { run, oracle } = harness([fetchNvda], { repeatLast: true, maxIterations: 5 });

    const result = await run();

    expect(result.status).toBe('iteration_limit_exceeded');
    expect(result.session.iterationCount).toBe(5);
    expect(oracle.callCount).toBe(5);
    expect(result.history.filter((m) => m.role === 'tool_result')).toHaveLength(5);
  });

  it('produces the same transcript when replayed against fresh collaborators', async () => {
    const script = [fetchNvda, searchRecall, sellNvda, textReply('Sold after checking the annual report.')];

    const first = await harness(script, { sessionId: 'replay' }).run();
    const second = await harness(script, { sessionId: 'replay' }).run();

    expect(second.status).toBe(first.status);
    expect(second.finalOutput).toBe(first.finalOutput);
    expect(second.history).toEqual(first.history);
  });
});
