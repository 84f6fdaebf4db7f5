import { UsageError } from "../../core/errors";

export interface FacebookTarget {
  url: string;
  /** Hashtag or page name; names the CSV file. */
  tag: string;
}

const HASHTAG_BASE = "https://web.facebook.com/hashtag/";

/**
 * A bare word or `#word` becomes the hashtag feed. Anything that looks like
 * a URL must point at facebook.com.
 */
export function resolveFacebookTarget(input: string, usage?: string): FacebookTarget {
  const trimmed = input.trim();
  if (!trimmed) throw new UsageError("A hashtag or Facebook URL is required", usage);

  const looksLikeUrl = /^https?:\/\//i.test(trimmed) || /facebook\.com/i.test(trimmed) || trimmed.includes("/");
  if (!looksLikeUrl) {
    const tag = trimmed.replace(/^#+/, "");
    if (!/^[\p{L}\p{N}_]+$/u.test(tag)) {
      throw new UsageError(`Invalid hashtag '${input}'`, usage);
    }
    return { url: `${HASHTAG_BASE}${encodeURIComponent(tag)}`, tag };
  }

  let parsed: URL;
  try {
    parsed = new URL(/^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`);
  } catch {
    throw new UsageError(`Invalid URL '${input}'`, usage);
  }
  const host = parsed.hostname.toLowerCase();
  if (host !== "facebook.com" && !host.endsWith(".facebook.com")) {
    throw new UsageError(`Only facebook.com URLs are supported, got '${parsed.hostname}'`, usage);
  }

  const segments = parsed.pathname.split("/").filter(Boolean);
  const hashtagAt = segments.indexOf("hashtag");
  const tag = (hashtagAt !== -1 ? segments[hashtagAt + 1] : segments[0]) ?? "facebook_page";
  return { url: parsed.toString(), tag };
}
