import { ConfigError, describeError } from "./errors";
import { ExtractionCategory, ExtractionResult } from "./types";

interface CompiledCategory {
  category: ExtractionCategory;
  regex: RegExp;
}

/**
 * Applies a fixed table of regex categories to raw page text.
 * The table comes from configuration so categories can be added
 * without touching the crawl loop.
 */
export class ExtractionEngine {
  private compiled: CompiledCategory[];

  constructor(categories: ExtractionCategory[]) {
    const seen = new Set<string>();
    this.compiled = categories.map(category => {
      if (seen.has(category.id)) {
        throw new ConfigError(`Duplicate extraction category id: ${category.id}`);
      }
      seen.add(category.id);
      return { category, regex: compile(category) };
    });
  }

  get categories(): ExtractionCategory[] {
    return this.compiled.map(c => c.category);
  }

  createResult(): ExtractionResult {
    const result: ExtractionResult = new Map();
    for (const { category } of this.compiled) {
      result.set(category.id, new Set());
    }
    return result;
  }

  extract(pageText: string): ExtractionResult {
    const result = this.createResult();
    for (const { category, regex } of this.compiled) {
      const matches = result.get(category.id) ?? new Set<string>();
      for (const match of pageText.matchAll(regex)) {
        // Patterns like `a*` can match the empty string at every position
        if (match[0]) matches.add(match[0]);
      }
      result.set(category.id, matches);
    }
    return result;
  }
}

function compile(category: ExtractionCategory): RegExp {
  const flags = category.flags ?? "";
  try {
    return new RegExp(category.pattern, flags.includes("g") ? flags : `${flags}g`);
  } catch (e) {
    throw new ConfigError(`Invalid pattern for category "${category.id}": ${describeError(e)}`);
  }
}

/** Folds `source` into `target`, keeping each category's values unique. */
export function mergeResults(target: ExtractionResult, source: ExtractionResult): ExtractionResult {
  for (const [id, values] of source) {
    let existing = target.get(id);
    if (!existing) {
      existing = new Set();
      target.set(id, existing);
    }
    for (const value of values) existing.add(value);
  }
  return target;
}

export function countMatches(result: ExtractionResult): number {
  let total = 0;
  for (const values of result.values()) total += values.size;
  return total;
}
