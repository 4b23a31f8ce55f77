/**
 * Keyword search over a pre-loaded annual report (10-K).
 *
 * The corpus is an explicit handle passed to whatever needs it; there is no
 * process-wide "loaded document".
 */

import { existsSync, readFileSync } from 'node:fs';

import { ConfigurationError } from '../core/errors.js';

export const FOUND_PREFIX = 'Found relevant section in 10-K report: ';
export const NOT_FOUND_MESSAGE = 'No direct match found for the query in the 10-K report.';
export const EMPTY_CORPUS_MESSAGE = 'ERROR: 10-K report content is not available.';

/** Characters kept on each side of the first match. */
export const SNIPPET_RADIUS = 500;

export class DocumentCorpus {
  private readonly lowered: string;

  constructor(
    private readonly text: string,
    readonly source = 'inline'
  ) {
    this.lowered = text.toLowerCase();
  }

  static fromFile(path: string): DocumentCorpus {
    if (!existsSync(path)) {
      throw new ConfigurationError(`Annual report not found at ${path}`);
    }
    return new DocumentCorpus(readFileSync(path, 'utf-8'), path);
  }

  get length(): number {
    return this.text.length;
  }

  /** First case-insensitive match with its surrounding window, if any. */
  find(query: string): { index: number; snippet: string } | null {
    const needle = query.trim().toLowerCase();
    if (!needle) return null;
    const index = this.lowered.indexOf(needle);
    if (index === -1) return null;
    const start = Math.max(0, index - SNIPPET_RADIUS);
    const end = Math.min(this.text.length, index + SNIPPET_RADIUS);
    return { index, snippet: this.text.slice(start, end) };
  }

  search(query: string): string {
    if (this.text.length === 0) return EMPTY_CORPUS_MESSAGE;
    const hit = this.find(query);
    return hit ? `${FOUND_PREFIX}${hit.snippet}` : NOT_FOUND_MESSAGE;
  }
}
