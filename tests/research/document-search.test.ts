import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, expect, it } from 'vitest';

import { ConfigurationError } from '../../src/core/errors.js';
import {
  DocumentCorpus,
  EMPTY_CORPUS_MESSAGE,
  FOUND_PREFIX,
  NOT_FOUND_MESSAGE,
  SNIPPET_RADIUS,
} from '../../src/research/document_search.js';

describe('DocumentCorpus', () => {
  it('returns a window of text around the first case-insensitive match', () => {
    const text = `${'a'.repeat(600)}Product Recall${'b'.repeat(600)}`;
    const corpus = new DocumentCorpus(text);

    const hit = corpus.find('  product recall ');

    expect(hit?.index).toBe(600);
    expect(hit?.snippet).toBe(text.slice(600 - SNIPPET_RADIUS, 600 + SNIPPET_RADIUS));
    expect(hit?.snippet).toHaveLength(2 * SNIPPET_RADIUS);
  });

  it('clips the window at the document edges', () => {
    const corpus = new DocumentCorpus('Recall risk is low.');
    expect(corpus.find('recall')).toEqual({ index: 0, snippet: 'Recall risk is low.' });
  });

  it('formats search results for the oracle', () => {
    const corpus = new DocumentCorpus('Warranty reserves were stable.');

    expect(corpus.search('warranty')).toBe(`${FOUND_PREFIX}Warranty reserves were stable.`);
    expect(corpus.search('dividend')).toBe(NOT_FOUND_MESSAGE);
    expect(corpus.search('   ')).toBe(NOT_FOUND_MESSAGE);
    expect(new DocumentCorpus('').search('anything')).toBe(EMPTY_CORPUS_MESSAGE);
  });

  it('loads a report from disk', () => {
    const dir = mkdtempSync(join(tmpdir(), 'guarded-agent-report-'));
    try {
      const path = join(dir, 'report.txt');
      writeFileSync(path, 'Item 7. Revenue grew.', 'utf-8');

      const corpus = DocumentCorpus.fromFile(path);
      expect(corpus.source).toBe(path);
      expect(corpus.length).toBe(21);
      expect(() => DocumentCorpus.fromFile(join(dir, 'missing.txt'))).toThrow(ConfigurationError);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
