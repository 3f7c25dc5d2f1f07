import * as fs from "fs";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { z } from "zod";
import defaultCategories from "../config/categories.json";
import { DEFAULT_MAX_PAGES } from "./crawler";
import { ConfigError, describeError } from "./errors";
import { DEFAULT_TIMEOUT_MS, DEFAULT_USER_AGENT } from "./fetcher";
import { ExtractionCategory } from "./types";

export const DEFAULT_DEPTH = 5;
export const DEFAULT_OUTPUT = "extraction-report.txt";

const categorySchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  pattern: z.string().min(1),
  flags: z.string().regex(/^[dgimsuy]*$/, "unsupported regex flag").optional(),
});

const categoryTableSchema = z.array(categorySchema).min(1, "at least one category is required");

const schema = z.object({
  url: z
    .string({ required_error: "--url is required" })
    .url("--url must be an absolute URL")
    .refine(u => /^https?:\/\//i.test(u), "--url must use http or https"),
  depth: z.coerce.number().int().nonnegative().default(DEFAULT_DEPTH),
  output: z.string().min(1).default(DEFAULT_OUTPUT),
  maxPages: z.coerce.number().int().positive().default(DEFAULT_MAX_PAGES),
  timeout: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  categoriesFile: z.string().optional(),
  cookies: z.array(z.string()).default([]),
  color: z.boolean().default(true),
});

export interface AppConfig {
  url: string;
  depth: number;
  output: string;
  maxPages: number;
  timeout: number;
  userAgent: string;
  cookies: Record<string, string>;
  categories: ExtractionCategory[];
  color: boolean;
}

function parseCli(argv: string[]) {
  return yargs(argv)
    .scriptName("site-extractor")
    .usage("$0 --url <url> [--depth n] [--output file]")
    .options({
      url: { alias: "u", type: "string", describe: "Absolute starting URL (e.g. https://example.com)" },
      depth: { alias: "d", type: "number", describe: `Crawl depth limit, 0 for the seed page only (default ${DEFAULT_DEPTH})` },
      output: { alias: "o", type: "string", describe: `Report file path (default ${DEFAULT_OUTPUT})` },
      "max-pages": { type: "number", describe: `Stop after this many page fetches (default ${DEFAULT_MAX_PAGES})` },
      timeout: { type: "number", describe: "Per-request timeout in milliseconds" },
      "user-agent": { type: "string", describe: "User-Agent header sent with every request" },
      cookie: { type: "string", array: true, describe: "Cookie sent with every request, as name=value (repeatable)" },
      categories: { type: "string", describe: "JSON file with the extraction category table" },
      color: { type: "boolean", describe: "Colorize console output (use --no-color to disable)" },
    })
    .strict()
    .fail((msg, err) => {
      throw new ConfigError(msg || describeError(err));
    })
    .parseSync();
}

function parseCookies(pairs: string[]): Record<string, string> {
  const cookies: Record<string, string> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf("=");
    if (eq <= 0) {
      throw new ConfigError(`Invalid --cookie "${pair}", expected name=value`);
    }
    cookies[pair.slice(0, eq).trim()] = pair.slice(eq + 1).trim();
  }
  return cookies;
}

/**
 * Reads and validates a category table. Without a path the bundled
 * table from config/categories.json is used.
 */
export function loadCategories(file?: string): ExtractionCategory[] {
  let raw: unknown = defaultCategories;
  if (file) {
    try {
      raw = JSON.parse(fs.readFileSync(file, "utf-8"));
    } catch (e) {
      throw new ConfigError(`Cannot read category table ${file}: ${describeError(e)}`);
    }
  }

  const parsed = categoryTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid category table${file ? ` ${file}` : ""}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

// `KEY=` in a .env file means unset, not zero or an empty path
function envValue(value: string | undefined): string | undefined {
  return value?.trim() ? value : undefined;
}

/**
 * Builds the run configuration. Command-line flags win over environment
 * variables, which win over the defaults.
 */
export function loadConfig(argv: string[] = hideBin(process.argv), env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cli = parseCli(argv);

  const parsed = schema.safeParse({
    url: cli.url,
    depth: cli.depth ?? envValue(env.CRAWL_DEPTH),
    output: cli.output ?? envValue(env.REPORT_FILE),
    maxPages: cli["max-pages"] ?? envValue(env.MAX_PAGES),
    timeout: cli.timeout ?? envValue(env.REQUEST_TIMEOUT_MS),
    userAgent: cli["user-agent"] ?? envValue(env.USER_AGENT),
    categoriesFile: cli.categories ?? envValue(env.CATEGORIES_FILE),
    cookies: cli.cookie,
    color: cli.color,
  });
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }

  const { categoriesFile, cookies, ...rest } = parsed.data;
  return {
    ...rest,
    cookies: parseCookies(cookies),
    categories: loadCategories(categoriesFile),
  };
}
