import axios, { AxiosInstance } from "axios";
import { FetchError } from "./errors";
import { FetchedPage, PageFetcher } from "./types";

export const DEFAULT_TIMEOUT_MS = 10000;
export const DEFAULT_USER_AGENT = "site-extractor/1.0";

/**
 * Cookies carried between requests of a single run. Values are passed
 * back verbatim; attributes such as Path or Expires are ignored.
 */
export class SessionCookies {
  private cookies = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [name, value] of Object.entries(initial)) {
      this.cookies.set(name, value);
    }
  }

  update(setCookieHeaders: string[]): void {
    for (const header of setCookieHeaders) {
      const pair = header.split(";")[0];
      const eq = pair.indexOf("=");
      if (eq <= 0) continue;
      this.cookies.set(pair.slice(0, eq).trim(), pair.slice(eq + 1).trim());
    }
  }

  get(name: string): string | undefined {
    return this.cookies.get(name);
  }

  get size(): number {
    return this.cookies.size;
  }

  toHeader(): string {
    return Array.from(this.cookies, ([name, value]) => `${name}=${value}`).join("; ");
  }
}

export interface HttpFetcherOptions {
  timeout?: number;
  userAgent?: string;
  cookies?: SessionCookies;
}

export class HttpFetcher implements PageFetcher {
  readonly cookies: SessionCookies;
  private client: AxiosInstance;
  private timeout: number;

  constructor(options: HttpFetcherOptions = {}) {
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
    this.cookies = options.cookies ?? new SessionCookies();
    this.client = axios.create({
      timeout: this.timeout,
      maxRedirects: 5,
      // Keep the body as text whatever the content type
      responseType: "text",
      transformResponse: [(data: unknown) => data],
      // Redirects are followed inside axios; every hop's cookies go into the jar
      beforeRedirect: (options, { headers }) => {
        this.cookies.update(toHeaderList(headers["set-cookie"]));
        const cookieHeader = this.cookies.toHeader();
        if (cookieHeader) options.headers = { ...options.headers, Cookie: cookieHeader };
      },
      headers: {
        "User-Agent": options.userAgent ?? DEFAULT_USER_AGENT,
        Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      },
    });
  }

  async fetch(url: string): Promise<FetchedPage> {
    try {
      const cookieHeader = this.cookies.toHeader();
      const response = await this.client.get<unknown>(url, {
        headers: cookieHeader ? { Cookie: cookieHeader } : undefined,
      });

      this.cookies.update(toHeaderList(response.headers["set-cookie"]));

      const finalUrl: unknown = response.request?.res?.responseUrl;
      const contentType = response.headers["content-type"];
      return {
        url: typeof finalUrl === "string" ? finalUrl : url,
        contentType: typeof contentType === "string" ? contentType : undefined,
        body: typeof response.data === "string" ? response.data : String(response.data ?? ""),
      };
    } catch (error) {
      if (axios.isAxiosError(error)) {
        if (error.response?.headers) {
          this.cookies.update(toHeaderList(error.response.headers["set-cookie"]));
        }
        if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
          throw new FetchError(url, `Timed out after ${this.timeout}ms`);
        }
        if (error.response) {
          throw new FetchError(url, `Request failed with status ${error.response.status}`, error.response.status);
        }
        throw new FetchError(url, error.code ? `${error.code}: ${error.message}` : error.message);
      }
      throw error;
    }
  }
}

function toHeaderList(value: unknown): string[] {
  if (Array.isArray(value)) return value.filter((v): v is string => typeof v === "string");
  return typeof value === "string" ? [value] : [];
}
