export interface CrawlRequest {
  url: string;
  depth: number; // How deep to crawl. 0 = only the given URL.
  maxPages?: number; // Max fetch attempts to avoid runaway crawls on large sites.
}

export interface CrawlTask {
  url: string;
  depth: number;
}

export interface FetchedPage {
  url: string; // Final URL after redirects
  contentType?: string;
  body: string;
}

export interface PageFetcher {
  fetch(url: string): Promise<FetchedPage>;
}

export type LinkExtractor = (html: string, pageUrl: string) => string[];

export interface ExtractionCategory {
  id: string;
  name: string;
  pattern: string;
  flags?: string;
}

// Category id -> unique matches
export type ExtractionResult = Map<string, Set<string>>;

export interface CrawlStatistics {
  pagesFetched: number;
  pagesFailed: number;
  linksEnqueued: number;
  maxDepthReached: number;
  stoppedByPageCap: boolean;
}
