import * as fs from "fs";
import * as path from "path";
import { OutputPathError, describeError } from "./errors";
import { countMatches } from "./extractor";
import { CrawlStatistics, ExtractionCategory, ExtractionResult } from "./types";

/** A report file smaller than this is replaced by the fallback report. */
export const MIN_REPORT_BYTES = 100;

const ANSI = {
  header: "\x1b[95m",
  data: "\x1b[94m",
  ok: "\x1b[92m",
  warn: "\x1b[93m",
  fail: "\x1b[91m",
  bold: "\x1b[1m",
  reset: "\x1b[0m",
} as const;

export type Tone = Exclude<keyof typeof ANSI, "reset">;

export function paint(text: string, tone: Tone, color: boolean): string {
  return color ? `${ANSI[tone]}${text}${ANSI.reset}` : text;
}

export interface ReportMeta {
  startedAt: Date;
  url: string;
  depth: number;
  stats?: CrawlStatistics;
  error?: string;
}

/**
 * Resolves the report path and checks it can be written, creating the
 * file if needed. Throws before any crawling happens.
 */
export function validateOutputPath(output: string): string {
  const outputPath = path.resolve(output);
  const outputDir = path.dirname(outputPath);

  if (!fs.existsSync(outputDir)) {
    throw new OutputPathError(`Output directory does not exist: ${outputDir}`);
  }
  if (fs.existsSync(outputPath) && fs.statSync(outputPath).isDirectory()) {
    throw new OutputPathError(`Output path is a directory: ${outputPath}`);
  }

  try {
    fs.closeSync(fs.openSync(outputPath, "a"));
  } catch (e) {
    throw new OutputPathError(`Cannot write to output file ${outputPath}: ${describeError(e)}`);
  }
  return outputPath;
}

function sortedMatches(result: ExtractionResult, id: string): string[] {
  return Array.from(result.get(id) ?? []).sort();
}

export function formatReport(result: ExtractionResult, categories: ExtractionCategory[], meta: ReportMeta): string {
  const lines = [
    `Started analysis at: ${meta.startedAt.toUTCString()}`,
    `Target: ${meta.url} (Depth: ${meta.depth})`,
    "",
  ];

  for (const category of categories) {
    const matches = sortedMatches(result, category.id);
    lines.push(`== ${category.name} (${matches.length}) ==`);
    if (matches.length === 0) {
      lines.push(`No ${category.name} found.`);
    } else {
      lines.push(...matches);
    }
    lines.push("");
  }

  if (meta.stats) {
    lines.push(`Pages fetched: ${meta.stats.pagesFetched}`);
    lines.push(`Pages failed: ${meta.stats.pagesFailed}`);
    lines.push(`Links followed: ${meta.stats.linksEnqueued}`);
    lines.push(`Deepest level reached: ${meta.stats.maxDepthReached}`);
    if (meta.stats.stoppedByPageCap) lines.push("Stopped early: page cap reached");
  }
  if (meta.error) {
    lines.push(`Crawl aborted: ${meta.error}`);
  }

  return `${lines.join("\n")}\n`;
}

export function formatFallbackReport(url: string): string {
  return [
    "SITE EXTRACTOR REPORT",
    "",
    `The crawl finished with no substantial data acquired. Target URL: ${url}.`,
    "Check network connection or ensure the target is online.",
    "",
  ].join("\n");
}

export function printReport(
  result: ExtractionResult,
  categories: ExtractionCategory[],
  color: boolean,
  out: Pick<Console, "log"> = console
): void {
  out.log(paint("\n--- Extraction Results ---", "header", color));
  for (const category of categories) {
    const matches = sortedMatches(result, category.id);
    out.log(paint(`\n${category.name} (${matches.length})`, "bold", color));
    if (matches.length === 0) {
      out.log(paint(`  No ${category.name} found.`, "warn", color));
      continue;
    }
    for (const match of matches) {
      out.log(`  ${paint(match, "data", color)}`);
    }
  }
}

export function writeReport(outputPath: string, text: string): void {
  fs.writeFileSync(outputPath, text, "utf-8");
}

/**
 * Guarantees the artifact is never silently empty: replaces the file with
 * the fallback report when nothing matched or the file is too small.
 * Returns true when the fallback was written.
 */
export function ensureReport(outputPath: string, result: ExtractionResult, url: string): boolean {
  const size = fs.existsSync(outputPath) ? fs.statSync(outputPath).size : 0;
  if (countMatches(result) > 0 && size >= MIN_REPORT_BYTES) return false;

  writeReport(outputPath, formatFallbackReport(url));
  return true;
}
