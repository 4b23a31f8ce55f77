import type { GuardrailCheck } from '../types.js';
import { allow, block, modifyArguments } from '../verdicts.js';

export interface TradeLimitOptions {
  maxShares: number;
  blockedTickers?: readonly string[];
}

/**
 * Per-order limits on side-effecting calls that carry `ticker` and `quantity`.
 * Oversized orders are clamped rather than refused.
 */
export function createTradeLimitsCheck(options: TradeLimitOptions): GuardrailCheck {
  const blocked = new Set((options.blockedTickers ?? []).map((ticker) => ticker.toUpperCase()));
  const maxShares = Math.max(1, Math.floor(options.maxShares));

  return {
    name: 'trade_limits',
    stages: ['pre_action'],
    evaluate: ({ candidate }) => {
      if (candidate.kind !== 'tool_call' || candidate.riskLevel !== 'side_effecting') return allow();

      const args = candidate.request.arguments;
      const ticker = typeof args.ticker === 'string' ? args.ticker.toUpperCase() : null;
      if (ticker && blocked.has(ticker)) {
        return block(`trading in ${ticker} is not permitted`);
      }

      const quantity = args.quantity;
      if (typeof quantity === 'number' && quantity > maxShares) {
        return modifyArguments(
          `quantity ${quantity} exceeds per-order limit of ${maxShares}; reduced to ${maxShares}`,
          { ...args, quantity: maxShares }
        );
      }
      return allow();
    },
  };
}
