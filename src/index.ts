#!/usr/bin/env node
import "dotenv/config";
import { hideBin } from "yargs/helpers";
import { AppConfig, loadConfig } from "./config";
import { Crawler } from "./crawler";
import { CrawlerError, ExitCode, ExitCodeValue, describeError } from "./errors";
import { ExtractionEngine } from "./extractor";
import { HttpFetcher, SessionCookies } from "./fetcher";
import {
  ensureReport,
  formatReport,
  paint,
  printReport,
  validateOutputPath,
  writeReport,
} from "./reporter";
import { PageFetcher } from "./types";

export interface RunOptions {
  env?: NodeJS.ProcessEnv;
  // Replaces the HTTP client, e.g. with an in-process stub
  fetcher?: PageFetcher;
  logger?: Pick<Console, "log" | "warn" | "error">;
}

/**
 * Runs one crawl end to end and resolves with the process exit code.
 * Configuration and output-path problems are reported before any request
 * is made; an unexpected failure mid-crawl still flushes what was found.
 */
export async function run(argv: string[] = hideBin(process.argv), options: RunOptions = {}): Promise<ExitCodeValue> {
  const logger = options.logger ?? console;
  const color = Boolean(process.stdout.isTTY);

  let config: AppConfig;
  let outputPath: string;
  let engine: ExtractionEngine;
  try {
    config = loadConfig(argv, options.env ?? process.env);
    engine = new ExtractionEngine(config.categories);
    outputPath = validateOutputPath(config.output);
  } catch (error) {
    if (error instanceof CrawlerError) {
      logger.error(paint(`ERROR: ${error.message}`, "fail", color));
      return error.exitCode;
    }
    throw error;
  }

  const useColor = color && config.color;
  logger.log(paint("Site Extractor", "header", useColor));
  logger.log(`${paint("Target:", "ok", useColor)} ${config.url}`);
  logger.log(`${paint("Depth:", "ok", useColor)} ${config.depth}`);
  logger.log(`${paint("Output:", "ok", useColor)} ${outputPath}\n`);

  const fetcher =
    options.fetcher ??
    new HttpFetcher({
      timeout: config.timeout,
      userAgent: config.userAgent,
      cookies: new SessionCookies(config.cookies),
    });
  const crawler = new Crawler(
    { url: config.url, depth: config.depth, maxPages: config.maxPages },
    { fetcher, engine, logger }
  );

  const startedAt = new Date();
  let exitCode: ExitCodeValue = ExitCode.OK;
  let failure: string | undefined;
  try {
    await crawler.crawl();
  } catch (error) {
    failure = describeError(error);
    exitCode = ExitCode.RUNTIME;
    logger.error(paint(`An unexpected runtime error occurred: ${failure}`, "fail", useColor));
  }

  // Whatever was gathered is flushed, including after a failed crawl
  const result = crawler.getResults();
  writeReport(
    outputPath,
    formatReport(result, engine.categories, {
      startedAt,
      url: config.url,
      depth: config.depth,
      stats: crawler.getStatistics(),
      error: failure,
    })
  );
  printReport(result, engine.categories, useColor, logger);

  if (ensureReport(outputPath, result, config.url)) {
    logger.warn(paint(`\nWarning: Crawl found no substantial data. Minimal report saved to ${outputPath}.`, "fail", useColor));
  } else {
    logger.log(paint(`\nResults saved to ${outputPath}.`, "ok", useColor));
  }

  return exitCode;
}

if (require.main === module) {
  run()
    .then(code => process.exit(code))
    .catch(error => {
      console.error(`An unexpected runtime error occurred: ${describeError(error)}`);
      process.exit(ExitCode.RUNTIME);
    });
}
