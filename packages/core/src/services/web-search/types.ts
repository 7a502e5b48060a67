export interface WebSearchOptions {
  readonly systemContext?: string;
  readonly signal?: AbortSignal;
}

export interface WebSearchClient {
  search(query: string, options?: WebSearchOptions): Promise<WebSearchResult>;
}

export interface WebSearchResult {
  readonly query: string;
  readonly content: string;
  readonly sourceUrls: readonly string[];
}
