import * as cheerio from "cheerio";
import { URL } from "url";

const SKIPPED_SCHEMES = ["mailto:", "tel:", "javascript:", "data:"];

/**
 * Returns the absolute http(s) targets of every anchor on the page,
 * resolved against `pageUrl`, each listed once. Malformed markup is
 * tolerated by the parser; hrefs that do not resolve to a URL are dropped.
 */
export function extractLinks(html: string, pageUrl: string): string[] {
  const $ = cheerio.load(html);
  const links = new Set<string>();

  $("a[href]").each((_, el) => {
    const href = $(el).attr("href")?.trim();
    if (!href || href.startsWith("#")) return;
    if (SKIPPED_SCHEMES.some(scheme => href.toLowerCase().startsWith(scheme))) return;

    if (!URL.canParse(href, pageUrl)) return;
    const resolved = new URL(href, pageUrl);
    if (resolved.protocol === "http:" || resolved.protocol === "https:") {
      links.add(resolved.toString());
    }
  });

  return [...links];
}
