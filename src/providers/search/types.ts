export interface SearchHit {
  title: string;
  url: string;
  snippet: string;
}

export interface SearchOptions {
  maxResults: number;
  signal?: AbortSignal;
}

export interface SearchProvider {
  readonly name: string;
  /** True when results are canned rather than fetched. */
  readonly simulated: boolean;
  search(query: string, options: SearchOptions): Promise<SearchHit[]>;
}
