export const ExitCode = {
  OK: 0,
  CONFIG: 1,
  OUTPUT_PATH: 3,
  RUNTIME: 4,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

export class CrawlerError extends Error {
  readonly exitCode: ExitCodeValue;

  constructor(message: string, exitCode: ExitCodeValue) {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

/** Invalid or missing arguments, or a broken category table. */
export class ConfigError extends CrawlerError {
  constructor(message: string) {
    super(message, ExitCode.CONFIG);
  }
}

/** The report file cannot be created where the user asked for it. */
export class OutputPathError extends CrawlerError {
  constructor(message: string) {
    super(message, ExitCode.OUTPUT_PATH);
  }
}

/** A single page could not be retrieved. Never fatal to the crawl. */
export class FetchError extends Error {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, status?: number) {
    super(message);
    this.name = "FetchError";
    this.url = url;
    this.status = status;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
