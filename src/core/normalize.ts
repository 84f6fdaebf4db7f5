const TRACKING_PARAMS = new Set([
  "ref",
  "referral",
  "source",
  "fbclid",
  "gclid",
  "igshid",
  "mc_cid",
  "mc_eid",
  "si",
]);

const DEFAULT_PORTS: Record<string, string> = {
  "http:": "80",
  "https:": "443",
};

export function normalizeWhitespace(content: string): string {
  return content
    .replace(/[\u200B-\u200D\uFEFF]/g, "")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Canonical form used as a record's identity: scheme and host lower-cased,
 * default port, fragment and tracking parameters removed, remaining query
 * parameters sorted, trailing path slash stripped. Values that do not parse
 * as URLs are only trimmed and lower-cased.
 */
export function normalizeUrl(url: string): string {
  const trimmed = url.trim();
  let u: URL;
  try {
    u = new URL(trimmed);
  } catch {
    return trimmed.toLowerCase();
  }

  u.hash = "";
  if (u.port && DEFAULT_PORTS[u.protocol] === u.port) {
    u.port = "";
  }

  const kept = Array.from(u.searchParams.entries())
    .filter(([key]) => {
      const k = key.toLowerCase();
      return !k.startsWith("utm_") && !TRACKING_PARAMS.has(k);
    })
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  const query = new URLSearchParams(kept).toString();
  const path = u.pathname.length > 1 ? u.pathname.replace(/\/+$/, "") : "";

  // URL already lower-cases protocol and host
  return `${u.protocol}//${u.host}${path}${query ? `?${query}` : ""}`;
}

export function sanitizeFilename(text: string, maxLength = 60): string {
  const sanitized = text
    .replace(/[^\w\s-]/g, "")
    .replace(/[-\s]+/g, "_")
    .replace(/^_+|_+$/g, "");
  return sanitized ? sanitized.slice(0, maxLength) : "results";
}

export function parseCompactNumber(value: string | number | null | undefined): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.round(value) : null;
  }
  if (!value) return null;

  const normalized = value.replace(/\s+/g, "").replace(/,/g, "").trim();
  if (!normalized) return null;

  const match = normalized.match(/^(\d+(?:\.\d+)?)([KMB])?$/i);
  if (!match) return null;

  const base = Number.parseFloat(match[1] || "");
  if (!Number.isFinite(base)) return null;

  const suffix = (match[2] || "").toUpperCase();
  if (suffix === "K") return Math.round(base * 1_000);
  if (suffix === "M") return Math.round(base * 1_000_000);
  if (suffix === "B") return Math.round(base * 1_000_000_000);
  return Math.round(base);
}
