import { loadCategories } from "../src/config";
import { ConfigError } from "../src/errors";
import { ExtractionEngine, countMatches, mergeResults } from "../src/extractor";
import { ExtractionResult } from "../src/types";

describe("ExtractionEngine", () => {
  const engine = new ExtractionEngine(loadCategories());

  it("should report a repeated email once", () => {
    const result = engine.extract("contact: a@b.com and a@b.com");

    expect(Array.from(result.get("email") ?? [])).toEqual(["a@b.com"]);
  });

  it("should create an empty set for every category", () => {
    const result = engine.extract("");

    expect(Array.from(result.keys())).toEqual(["email", "phone", "ipv4", "url", "social"]);
    expect(countMatches(result)).toBe(0);
  });

  it("should match against raw markup, not just visible text", () => {
    const result = engine.extract('<a href="mailto:sales@shop.example">Write to us</a>');

    expect(Array.from(result.get("email") ?? [])).toEqual(["sales@shop.example"]);
  });

  it("should find phone numbers and IPv4 addresses", () => {
    const result = engine.extract("Call +1 555-123-4567 today. Server 192.168.0.1 is up.");

    expect(Array.from(result.get("phone") ?? [])).toEqual(["+1 555-123-4567"]);
    expect(Array.from(result.get("ipv4") ?? [])).toEqual(["192.168.0.1"]);
  });

  it("should honour category flags", () => {
    const custom = new ExtractionEngine([{ id: "word", name: "Words", pattern: "token", flags: "i" }]);

    expect(Array.from(custom.extract("Token TOKEN token").get("word") ?? [])).toEqual(["Token", "TOKEN", "token"]);
  });

  it("should ignore empty matches", () => {
    const custom = new ExtractionEngine([{ id: "x", name: "Xs", pattern: "x*" }]);

    expect(custom.extract("abc").get("x")?.size).toBe(0);
  });

  it("should reject duplicate category ids", () => {
    expect(
      () =>
        new ExtractionEngine([
          { id: "email", name: "A", pattern: "a" },
          { id: "email", name: "B", pattern: "b" },
        ])
    ).toThrow(ConfigError);
  });

  it("should reject an invalid pattern", () => {
    expect(() => new ExtractionEngine([{ id: "bad", name: "Bad", pattern: "(" }])).toThrow(
      /Invalid pattern for category "bad"/
    );
  });
});

describe("mergeResults", () => {
  it("should keep values unique per category across pages", () => {
    const total: ExtractionResult = new Map([["email", new Set(["a@b.com"])]]);

    mergeResults(total, new Map([["email", new Set(["a@b.com", "c@d.com"])]]));
    mergeResults(total, new Map([["phone", new Set(["555-123-4567"])]]));

    expect(Array.from(total.get("email") ?? [])).toEqual(["a@b.com", "c@d.com"]);
    expect(Array.from(total.get("phone") ?? [])).toEqual(["555-123-4567"]);
    expect(countMatches(total)).toBe(3);
  });
});
