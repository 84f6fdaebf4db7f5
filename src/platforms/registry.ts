import { logger } from "../core/logger";
import { NoPlatformsResolvedError } from "../core/errors";
import type { PlatformTarget } from "../domain/models";
import type { ResolvedPlatforms } from "../domain/scrape-types";

interface PlatformEntry extends PlatformTarget {
  aliases: string[];
}

function site(id: string, label: string, domain: string, aliases: string[] = []): PlatformEntry {
  return {
    id,
    label,
    strategy: "site_filter",
    engine: "duckduckgo",
    siteFilter: domain,
    sessionDomain: "duckduckgo.com",
    aliases: [domain, ...aliases],
  };
}

/** Declaration order is search priority. */
export const PLATFORM_TABLE: readonly PlatformEntry[] = [
  {
    id: "duckduckgo",
    label: "DuckDuckGo",
    strategy: "engine_web",
    engine: "duckduckgo",
    sessionDomain: "duckduckgo.com",
    aliases: ["ddg", "duck duck go"],
  },
  {
    id: "google",
    label: "Google News",
    strategy: "engine_news",
    engine: "google",
    sessionDomain: "google.com",
    aliases: ["google news"],
  },
  {
    id: "bing",
    label: "Bing News",
    strategy: "engine_news",
    engine: "bing",
    sessionDomain: "bing.com",
    aliases: ["bing news"],
  },
  site("reddit", "Reddit", "reddit.com"),
  site("x", "X", "x.com", ["twitter", "twitter.com"]),
  site("facebook", "Facebook", "facebook.com", ["fb"]),
  site("linkedin", "LinkedIn", "linkedin.com"),
  site("hackernews", "Hacker News", "news.ycombinator.com", ["hn", "ycombinator"]),
  site("medium", "Medium", "medium.com"),
  site("substack", "Substack", "substack.com"),
  site("wordpress", "WordPress", "wordpress.com"),
  site("blogger", "Blogger", "blogspot.com", ["blogspot"]),
  site("youtube", "YouTube", "youtube.com", ["yt"]),
  site("tiktok", "TikTok", "tiktok.com", ["tik tok"]),
];

const GROUPS: ReadonlyMap<string, string[]> = new Map([
  ["any", PLATFORM_TABLE.map((p) => p.id)],
  ["all", PLATFORM_TABLE.map((p) => p.id)],
  ["everything", PLATFORM_TABLE.map((p) => p.id)],
  ["search engines", ["duckduckgo", "google", "bing"]],
  ["search engine", ["duckduckgo", "google", "bing"]],
  ["search", ["duckduckgo", "google", "bing"]],
  ["web", ["duckduckgo", "google", "bing"]],
  ["news", ["google", "bing"]],
  ["social", ["reddit", "x", "facebook", "linkedin"]],
  ["social media", ["reddit", "x", "facebook", "linkedin"]],
  ["blogs", ["medium", "substack", "wordpress", "blogger"]],
  ["blog", ["medium", "substack", "wordpress", "blogger"]],
  ["video", ["youtube", "tiktok"]],
  ["videos", ["youtube", "tiktok"]],
  ["forums", ["reddit", "hackernews"]],
  ["forum", ["reddit", "hackernews"]],
  ["discussions", ["reddit", "hackernews"]],
]);

function buildSynonyms(): Map<string, string[]> {
  const synonyms = new Map<string, string[]>(GROUPS);
  for (const entry of PLATFORM_TABLE) {
    for (const name of [entry.id, entry.label, ...entry.aliases]) {
      synonyms.set(name.toLowerCase(), [entry.id]);
    }
  }
  return synonyms;
}

const SYNONYMS = buildSynonyms();

const SEPARATORS = /[,&\/+;|]|\band\b|\bor\b/i;

function toTarget(entry: PlatformEntry): PlatformTarget {
  const { aliases: _aliases, ...target } = entry;
  return target;
}

export function getPlatformTarget(id: string): PlatformTarget | undefined {
  const entry = PLATFORM_TABLE.find((p) => p.id === id);
  return entry ? toTarget(entry) : undefined;
}

function matchToken(token: string): string[] | undefined {
  const direct = SYNONYMS.get(token);
  if (direct) return direct;

  const words = token.split(" ");
  if (words.length < 2) return undefined;

  const ids = words.flatMap((word) => SYNONYMS.get(word) ?? []);
  return ids.length > 0 ? ids : undefined;
}

/**
 * Maps free text such as "blogs & social media" onto platform targets in
 * table order. Throws when nothing matches.
 */
export function resolvePlatforms(spec: string): ResolvedPlatforms {
  const selected = new Set<string>();
  const unmatched: string[] = [];

  for (const rawToken of spec.split(SEPARATORS)) {
    const token = rawToken.trim().toLowerCase().replace(/\s+/g, " ");
    if (!token) continue;

    const ids = matchToken(token);
    if (!ids) {
      unmatched.push(token);
      continue;
    }
    for (const id of ids) selected.add(id);
  }

  if (unmatched.length > 0) {
    logger.warn({ unmatched, spec }, "Ignoring unrecognized platform names");
  }

  const targets = PLATFORM_TABLE.filter((p) => selected.has(p.id)).map(toTarget);
  if (targets.length === 0) {
    throw new NoPlatformsResolvedError(spec, unmatched);
  }

  return { targets, unmatched };
}

/** Even split of `total` over `count` slots, remainder to the earliest. */
export function splitQuota(total: number, count: number): number[] {
  if (count <= 0) return [];
  const base = Math.floor(total / count);
  const remainder = total % count;
  return Array.from({ length: count }, (_, i) => (i < remainder ? base + 1 : base));
}
