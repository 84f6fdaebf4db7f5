import { describe, it, expect } from "vitest";
import {
  normalizeUrl,
  normalizeWhitespace,
  parseCompactNumber,
  sanitizeFilename,
} from "../../src/core/normalize";

describe("normalizeUrl", () => {
  it("should lower-case the host, drop default ports, tracking params and the fragment", () => {
    expect(normalizeUrl("HTTPS://Example.com:443/a/b/?utm_source=x&b=2&a=1#frag")).toBe(
      "https://example.com/a/b?a=1&b=2"
    );
  });

  it("should strip the root slash", () => {
    expect(normalizeUrl("https://www.example.com/")).toBe("https://www.example.com");
  });

  it("should remove click identifiers but keep real parameters", () => {
    expect(normalizeUrl("https://example.com/post?fbclid=abc&id=7")).toBe("https://example.com/post?id=7");
  });

  it("should keep non-default ports", () => {
    expect(normalizeUrl("http://example.com:8080/x")).toBe("http://example.com:8080/x");
  });

  it("should fall back to trimmed lower-case text for unparsable input", () => {
    expect(normalizeUrl(" Not A Url ")).toBe("not a url");
  });
});

describe("sanitizeFilename", () => {
  it("should drop punctuation and join words with underscores", () => {
    expect(sanitizeFilename("AI news: 2024!")).toBe("AI_news_2024");
    expect(sanitizeFilename("ocean  diversity -- report")).toBe("ocean_diversity_report");
  });

  it("should fall back to results when nothing is left", () => {
    expect(sanitizeFilename("???")).toBe("results");
  });

  it("should cap the length at 60 characters", () => {
    expect(sanitizeFilename("a".repeat(80))).toHaveLength(60);
  });
});

describe("parseCompactNumber", () => {
  it("should expand K, M and B suffixes", () => {
    expect(parseCompactNumber("1.2K")).toBe(1200);
    expect(parseCompactNumber("3M")).toBe(3_000_000);
    expect(parseCompactNumber("2b")).toBe(2_000_000_000);
  });

  it("should ignore thousands separators", () => {
    expect(parseCompactNumber("1,234")).toBe(1234);
  });

  it("should return null for anything else", () => {
    expect(parseCompactNumber("abc")).toBeNull();
    expect(parseCompactNumber(undefined)).toBeNull();
    expect(parseCompactNumber(Number.NaN)).toBeNull();
  });

  it("should round plain numbers", () => {
    expect(parseCompactNumber(7.6)).toBe(8);
  });
});

describe("normalizeWhitespace", () => {
  it("should collapse runs of whitespace and drop zero-width characters", () => {
    expect(normalizeWhitespace("  Hello\u200B \n world ")).toBe("Hello world");
  });
});
