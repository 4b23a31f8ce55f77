import { z } from 'zod';

import type { MockMarketDataFeed } from '../../../market/market_data.js';
import { defineTool, type ToolDefinition } from '../types.js';

export const MARKET_DATA_TOOL = 'get_real_time_market_data';

/**
 * Quote and headline lookup. Headlines are passed through unfiltered; the
 * guardrails decide how much to trust them.
 */
export function createMarketDataTool(feed: MockMarketDataFeed): ToolDefinition<{ ticker: string }> {
  return defineTool({
    name: MARKET_DATA_TOOL,
    description: 'Latest price, percent change and news headlines for a stock ticker.',
    category: 'market',
    riskLevel: 'read_only',
    schema: z.object({
      ticker: z.string().min(1).max(10).describe('Stock ticker symbol, e.g. "NVDA"'),
    }),
    execute: async ({ ticker }) => {
      const snapshot = feed.fetch(ticker);
      return {
        ticker: snapshot.ticker,
        price: snapshot.price,
        percentChange: snapshot.percentChange,
        newsItems: snapshot.newsItems,
      };
    },
  });
}
