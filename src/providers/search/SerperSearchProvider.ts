import { z } from 'zod';
import type { SearchHit, SearchOptions, SearchProvider } from './types.js';
import { ProviderError, ProviderUnavailableError } from '../../utils/errors.js';

const SERPER_ENDPOINT = 'https://google.serper.dev/search';

const SerperResponseSchema = z.object({
  organic: z
    .array(
      z.object({
        title: z.string().optional(),
        link: z.string().optional(),
        snippet: z.string().optional(),
      })
    )
    .optional(),
});

function normalizeText(value: string | undefined): string {
  return (value ?? '').trim();
}

export class SerperSearchProvider implements SearchProvider {
  readonly name = 'serper';
  readonly simulated = false;

  constructor(
    private apiKey: string,
    private endpoint: string = SERPER_ENDPOINT
  ) {}

  async search(query: string, options: SearchOptions): Promise<SearchHit[]> {
    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: 'POST',
        headers: {
          'X-API-KEY': this.apiKey,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ q: query }),
        signal: options.signal,
      });
    } catch (error) {
      throw new ProviderUnavailableError(this.name, error instanceof Error ? error.message : String(error));
    }

    if (!response.ok) {
      throw new ProviderError(`Serper search error (${response.status})`, this.name, {
        status: response.status,
      });
    }

    const parsed = SerperResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ProviderError('Serper returned an unexpected payload', this.name);
    }

    return (parsed.data.organic ?? [])
      .map((item) => ({
        title: normalizeText(item.title),
        url: normalizeText(item.link),
        snippet: normalizeText(item.snippet),
      }))
      .filter((hit) => hit.title && hit.url)
      .slice(0, options.maxResults);
  }
}
