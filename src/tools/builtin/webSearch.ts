import { z } from 'zod';
import type { ToolDescriptor } from '../types.js';
import type { SearchHit, SearchProvider } from '../../providers/search/types.js';

const WebSearchArgsSchema = z.object({
  query: z.string().min(1),
});
export type WebSearchArgs = z.infer<typeof WebSearchArgsSchema>;

export interface WebSearchOutput {
  query: string;
  results: SearchHit[];
  totalResults: number;
  note?: string;
}

export const SIMULATED_SEARCH_NOTE = 'Using simulated results - set SERPER_API_KEY for real search';

export function createWebSearchTool(
  provider: SearchProvider,
  maxResults: number
): ToolDescriptor<WebSearchArgs, WebSearchOutput> {
  return {
    name: 'web_search',
    description: 'Search the web for information',
    parameters: WebSearchArgsSchema,
    handler: async ({ query }, { signal }) => {
      const results = await provider.search(query, { maxResults, signal });
      const output: WebSearchOutput = { query, results, totalResults: results.length };
      if (provider.simulated) {
        output.note = SIMULATED_SEARCH_NOTE;
      }
      return output;
    },
    fromQuery: (query) => ({ query }),
    formatOutput: (output) =>
      output.results.length === 0
        ? `No results for "${output.query}"`
        : `${output.totalResults} results for "${output.query}": ${output.results.map((hit) => hit.title).join('; ')}`,
  };
}
