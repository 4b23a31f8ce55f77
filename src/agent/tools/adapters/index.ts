import type { PaperTradeExecutor } from '../../../execution/paper_trader.js';
import type { MockMarketDataFeed } from '../../../market/market_data.js';
import type { DocumentCorpus } from '../../../research/document_search.js';
import type { ToolDefinition } from '../types.js';
import { createMarketDataTool } from './market-tools.js';
import { createQuery10kTool } from './research-tools.js';
import { createExecuteTradeTool } from './trade-tools.js';

export { MARKET_DATA_TOOL, createMarketDataTool } from './market-tools.js';
export { QUERY_10K_TOOL, createQuery10kTool } from './research-tools.js';
export { EXECUTE_TRADE_TOOL, createExecuteTradeTool, type ExecuteTradeInput } from './trade-tools.js';

export interface DefaultToolDependencies {
  corpus: DocumentCorpus;
  marketData: MockMarketDataFeed;
  executor: PaperTradeExecutor;
}

export function createDefaultTools(deps: DefaultToolDependencies): ToolDefinition<Record<string, unknown>>[] {
  return [
    createQuery10kTool(deps.corpus),
    createMarketDataTool(deps.marketData),
    createExecuteTradeTool(deps.executor),
  ];
}
