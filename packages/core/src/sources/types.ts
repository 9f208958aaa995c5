export interface ScrapedPage {
  readonly markdown: string;
  readonly title?: string;
}

export interface ScrapeClient {
  /**
   * Resolves to null when the page has no text body.
   * Rejects with SiteFetchError on transport or API failure.
   */
  scrape(url: string, timeoutMs: number): Promise<ScrapedPage | null>;
}

export interface SecondarySearchRequest {
  readonly query: string;
  readonly region: string;
  readonly category: string;
  readonly maxResults: number;
  readonly timeoutMs: number;
}

export interface SecondaryHit {
  readonly text: string;
  readonly url: string;
  readonly title: string;
}

export interface RegulationDatabaseClient {
  /** Rejects with SecondarySourceError when login or search fails. */
  search(request: SecondarySearchRequest): Promise<readonly SecondaryHit[]>;
  /** One regulation by its database id (e.g. `ATO-01`). Rejects with SecondarySourceError when unavailable. */
  getById(regulationId: string, timeoutMs: number): Promise<SecondaryHit>;
}
