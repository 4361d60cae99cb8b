import type { SearchHit, SearchOptions, SearchProvider } from './types.js';

export class SimulatedSearchProvider implements SearchProvider {
  readonly name = 'simulated';
  readonly simulated = true;

  async search(query: string, options: SearchOptions): Promise<SearchHit[]> {
    const hits: SearchHit[] = [
      {
        title: `Search result for: ${query}`,
        url: 'https://example.com',
        snippet: `Information about ${query}`,
      },
      {
        title: `Related to: ${query}`,
        url: 'https://example.org',
        snippet: `More details on ${query}`,
      },
    ];
    return hits.slice(0, options.maxResults);
  }
}
