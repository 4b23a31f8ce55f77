/**
 * Research Tools Adapter
 *
 * Exposes the annual-report corpus to the reasoning oracle.
 */

import { z } from 'zod';

import type { DocumentCorpus } from '../../../research/document_search.js';
import { defineTool, type ToolDefinition } from '../types.js';

export const QUERY_10K_TOOL = 'query_10k_report';

export function createQuery10kTool(corpus: DocumentCorpus): ToolDefinition<{ query: string }> {
  return defineTool({
    name: QUERY_10K_TOOL,
    description:
      'Keyword search over the company annual report (10-K). Returns the passage around the first match. ' +
      'Use it to verify claims before acting on them.',
    category: 'research',
    riskLevel: 'read_only',
    schema: z.object({
      query: z.string().min(1).describe('Keyword or phrase to look for, e.g. "product recall"'),
    }),
    execute: async ({ query }) => corpus.search(query),
  });
}
