import { existsSync, readFileSync } from 'node:fs';

import { z } from 'zod';

import { ConfigurationError } from '../core/errors.js';

export interface MarketSnapshot {
  ticker: string;
  price: number;
  percentChange: number;
  /** Headlines as delivered by the feed. May contain unverified claims. */
  newsItems: string[];
}

const SnapshotEntrySchema = z.object({
  price: z.number(),
  percentChange: z.number(),
  newsItems: z.array(z.string()).default([]),
});

const SnapshotFileSchema = z.record(SnapshotEntrySchema);

export type SnapshotEntry = z.infer<typeof SnapshotEntrySchema>;

export const GENERIC_NEWS_ITEM = 'Market data for this ticker is generic/mocked.';

/**
 * Offline stand-in for a real-time quote API, backed by a JSON fixture keyed
 * by ticker. Unknown tickers get a zero-priced generic snapshot.
 */
export class MockMarketDataFeed {
  private readonly snapshots = new Map<string, SnapshotEntry>();

  constructor(entries: Record<string, SnapshotEntry> = {}) {
    for (const [ticker, entry] of Object.entries(entries)) {
      this.snapshots.set(ticker.toUpperCase(), entry);
    }
  }

  static fromFile(path: string): MockMarketDataFeed {
    if (!existsSync(path)) {
      throw new ConfigurationError(`Market data fixture not found at ${path}`);
    }
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new ConfigurationError(`Could not parse market data fixture ${path}: ${detail}`);
    }
    const parsed = SnapshotFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigurationError(`Invalid market data fixture ${path}: ${issues.join('; ')}`);
    }
    return new MockMarketDataFeed(parsed.data);
  }

  tickers(): string[] {
    return Array.from(this.snapshots.keys());
  }

  fetch(ticker: string): MarketSnapshot {
    const symbol = ticker.trim().toUpperCase();
    const entry = this.snapshots.get(symbol);
    if (!entry) {
      return { ticker: symbol, price: 0, percentChange: 0, newsItems: [GENERIC_NEWS_ITEM] };
    }
    return {
      ticker: symbol,
      price: entry.price,
      percentChange: entry.percentChange,
      newsItems: [...entry.newsItems],
    };
  }
}
