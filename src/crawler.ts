import { URL } from "url";
import { ConfigError, FetchError } from "./errors";
import { ExtractionEngine, mergeResults } from "./extractor";
import { extractLinks } from "./links";
import {
  CrawlRequest,
  CrawlStatistics,
  CrawlTask,
  ExtractionResult,
  FetchedPage,
  LinkExtractor,
  PageFetcher,
} from "./types";

/** Upper bound on fetch attempts per run unless the request sets `maxPages`. */
export const DEFAULT_MAX_PAGES = 500;

const SKIPPED_EXTENSIONS = [
  ".jpg", ".jpeg", ".png", ".gif", ".webp", ".svg", ".ico",
  ".css", ".js", ".pdf", ".zip", ".mp3", ".mp4", ".woff", ".woff2",
];

export interface CrawlerDependencies {
  fetcher: PageFetcher;
  engine: ExtractionEngine;
  linkExtractor?: LinkExtractor;
  logger?: Pick<Console, "log" | "warn">;
}

export class Crawler {
  private visitedUrls: Set<string> = new Set(); // fetched or enqueued
  private fetchedUrls: Set<string> = new Set();
  private results: ExtractionResult;
  private stats: CrawlStatistics = {
    pagesFetched: 0,
    pagesFailed: 0,
    linksEnqueued: 0,
    maxDepthReached: 0,
    stoppedByPageCap: false,
  };
  private request: CrawlRequest;
  private host: string;
  private fetcher: PageFetcher;
  private engine: ExtractionEngine;
  private linkExtractor: LinkExtractor;
  private logger: Pick<Console, "log" | "warn">;

  constructor(request: CrawlRequest, deps: CrawlerDependencies) {
    if (!URL.canParse(request.url)) {
      throw new ConfigError(`Invalid seed URL: ${request.url}`);
    }
    if (!Number.isInteger(request.depth) || request.depth < 0) {
      throw new ConfigError(`Depth must be a non-negative integer, got ${request.depth}`);
    }
    if (request.maxPages !== undefined && (!Number.isInteger(request.maxPages) || request.maxPages < 1)) {
      throw new ConfigError(`Max pages must be a positive integer, got ${request.maxPages}`);
    }

    this.request = request;
    this.host = new URL(request.url).hostname;
    this.fetcher = deps.fetcher;
    this.engine = deps.engine;
    this.linkExtractor = deps.linkExtractor ?? extractLinks;
    this.logger = deps.logger ?? console;
    this.results = this.engine.createResult();
  }

  normalizeUrl(url: string): string {
    if (!URL.canParse(url)) return "";
    const parsed = new URL(url);
    // Remove hash
    parsed.hash = "";
    // Remove trailing slash
    if (parsed.pathname.length > 1 && parsed.pathname.endsWith("/")) {
      parsed.pathname = parsed.pathname.slice(0, -1);
    }
    return parsed.toString();
  }

  isValidUrl(url: string): boolean {
    if (!URL.canParse(url)) return false;
    const parsed = new URL(url);
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") return false;
    // Only crawl the seed's host
    if (parsed.hostname !== this.host) return false;

    // Filter out non-html resources (basic check)
    const pathname = parsed.pathname.toLowerCase();
    return !SKIPPED_EXTENSIONS.some(ext => pathname.endsWith(ext));
  }

  /**
   * Breadth-first crawl from the seed. Resolves with the accumulated
   * matches once the frontier is empty or the page cap is reached.
   */
  async crawl(): Promise<ExtractionResult> {
    // Dequeue by advancing `head` so each step is O(1)
    const queue: CrawlTask[] = [];
    let head = 0;

    this.markVisited(this.request.url);
    queue.push({ url: this.request.url, depth: 0 });

    const maxPages = this.request.maxPages ?? DEFAULT_MAX_PAGES;
    let attempts = 0;

    while (head < queue.length) {
      const current = queue[head++];
      // Already reached through an earlier redirect
      if (this.fetchedUrls.has(this.normalizeUrl(current.url))) continue;

      if (attempts >= maxPages) {
        this.stats.stoppedByPageCap = true;
        this.logger.warn(`Page cap of ${maxPages} reached; ${queue.length - head + 1} URLs left unvisited.`);
        break;
      }
      attempts++;
      this.fetchedUrls.add(this.normalizeUrl(current.url));

      this.logger.log(`Crawling: ${current.url} (Depth: ${current.depth})`);

      let page: FetchedPage;
      try {
        page = await this.fetcher.fetch(current.url);
      } catch (error) {
        if (error instanceof FetchError) {
          this.stats.pagesFailed++;
          this.logger.warn(`Failed to crawl ${current.url}: ${error.message}`);
          continue;
        }
        throw error;
      }

      this.stats.pagesFetched++;
      this.stats.maxDepthReached = Math.max(this.stats.maxDepthReached, current.depth);
      // A redirect target counts as fetched too
      this.fetchedUrls.add(this.normalizeUrl(page.url));
      this.markVisited(page.url);

      // Update the allowed host if the seed redirected elsewhere
      if (attempts === 1 && URL.canParse(page.url)) {
        const landedHost = new URL(page.url).hostname;
        if (landedHost !== this.host) {
          this.logger.log(`Redirected from ${this.host} to ${landedHost}. Updating allowed host.`);
          this.host = landedHost;
        }
      }

      mergeResults(this.results, this.engine.extract(page.body));

      // Find new links if we haven't reached max depth
      if (current.depth < this.request.depth && isMarkup(page.contentType)) {
        for (const link of this.linkExtractor(page.body, page.url)) {
          if (this.isValidUrl(link) && this.markVisited(link)) {
            queue.push({ url: stripHash(link), depth: current.depth + 1 });
            this.stats.linksEnqueued++;
          }
        }
      }
    }

    this.logger.log(
      `Crawl completed. Fetched ${this.stats.pagesFetched} pages, ${this.stats.pagesFailed} failed.`
    );
    return this.results;
  }

  /** Partial results stay readable if `crawl()` rejects. */
  getResults(): ExtractionResult {
    return this.results;
  }

  getStatistics(): CrawlStatistics {
    return { ...this.stats };
  }

  /** Check-and-mark in one step. Returns false when the URL was already known. */
  private markVisited(url: string): boolean {
    const normalized = this.normalizeUrl(url);
    if (!normalized || this.visitedUrls.has(normalized)) return false;
    this.visitedUrls.add(normalized);
    return true;
  }
}

function stripHash(url: string): string {
  const parsed = new URL(url);
  parsed.hash = "";
  return parsed.toString();
}

// Pages without a content type are still scanned for links
function isMarkup(contentType?: string): boolean {
  if (!contentType) return true;
  const type = contentType.toLowerCase();
  return type.includes("html") || type.includes("xml");
}
