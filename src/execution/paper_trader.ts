export type TradeDirection = 'BUY' | 'SELL';

export interface TradeConfirmation {
  confirmationId: string;
  ticker: string;
  quantity: number;
  direction: TradeDirection;
  status: 'SUCCESS';
  executedAt: string;
}

export interface PaperTradeExecutorOptions {
  /** Clock used for ids and timestamps; injectable for replayable runs. */
  now?: () => Date;
}

/**
 * Simulated execution venue. Orders always fill and are kept in memory;
 * nothing leaves the process.
 */
export class PaperTradeExecutor {
  private readonly orders: TradeConfirmation[] = [];
  private readonly now: () => Date;

  constructor(options: PaperTradeExecutorOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async execute(ticker: string, quantity: number, direction: TradeDirection): Promise<TradeConfirmation> {
    if (!Number.isInteger(quantity) || quantity <= 0) {
      throw new Error(`Invalid quantity ${quantity}: must be a positive whole number of shares`);
    }
    const executedAt = this.now();
    const confirmation: TradeConfirmation = {
      confirmationId: `trade_${Math.floor(executedAt.getTime() / 1000)}_${this.orders.length + 1}`,
      ticker: ticker.trim().toUpperCase(),
      quantity,
      direction,
      status: 'SUCCESS',
      executedAt: executedAt.toISOString(),
    };
    this.orders.push(confirmation);
    return { ...confirmation };
  }

  listOrders(): TradeConfirmation[] {
    return this.orders.map((order) => ({ ...order }));
  }

  get orderCount(): number {
    return this.orders.length;
  }
}
