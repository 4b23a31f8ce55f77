/**
 * Trade Tools Adapter
 *
 * The only side-effecting tool. Every call is subject to pre-action clearance.
 */

import { z } from 'zod';

import type { PaperTradeExecutor } from '../../../execution/paper_trader.js';
import { defineTool, type ToolDefinition } from '../types.js';

export const EXECUTE_TRADE_TOOL = 'execute_trade';

const ExecuteTradeSchema = z.object({
  ticker: z.string().min(1).max(10).describe('Stock ticker symbol'),
  quantity: z.number().int().positive().describe('Number of shares'),
  direction: z.enum(['BUY', 'SELL']).describe('Order side'),
});

export type ExecuteTradeInput = z.infer<typeof ExecuteTradeSchema>;

export function createExecuteTradeTool(executor: PaperTradeExecutor): ToolDefinition<ExecuteTradeInput> {
  return defineTool({
    name: EXECUTE_TRADE_TOOL,
    description: 'Place a market order to BUY or SELL a number of shares. Irreversible once executed.',
    category: 'execution',
    riskLevel: 'side_effecting',
    schema: ExecuteTradeSchema,
    execute: async ({ ticker, quantity, direction }) => {
      const confirmation = await executor.execute(ticker, quantity, direction);
      return {
        status: confirmation.status,
        confirmationId: confirmation.confirmationId,
        ticker: confirmation.ticker,
        quantity: confirmation.quantity,
        direction: confirmation.direction,
        executedAt: confirmation.executedAt,
      };
    },
  });
}
