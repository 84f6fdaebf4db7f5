import { env } from "../core/config";
import { logger } from "../core/logger";
import { ExtractionError, LLMError } from "../core/errors";
import { parseCompactNumber } from "../core/normalize";
import type { CommentMetadata, FeedComment, FeedPost, ListingEntry, PageSummary, PlatformTarget } from "../domain/models";
import type { RunContext } from "../domain/scrape-types";
import type { LLMClient } from "./contracts";
import { extractJsonPayload, isRecord, pickArray, pickBoolean, pickString } from "./json";
import { buildSearchResultsPrompt } from "./prompts/search-results";
import { buildPageSummaryPrompt } from "./prompts/page-summary";
import { buildCommentsPrompt } from "./prompts/comments";
import { buildCommentMetadataPrompt } from "./prompts/comment-metadata";
import { buildFeedPostsPrompt } from "./prompts/feed-posts";
import { buildPostCommentsPrompt } from "./prompts/post-comments";

type LedgerContext = Pick<RunContext, "ledger">;

export interface VisionExtractorOptions {
  model?: string;
  timeoutMs?: number;
}

export interface PageExtractor {
  extractSearchResults(image: Buffer, target: PlatformTarget, ctx: LedgerContext): Promise<ListingEntry[]>;
  extractPageSummary(image: Buffer, url: string, ctx: LedgerContext): Promise<PageSummary>;
  extractComments(image: Buffer, ctx: LedgerContext): Promise<string[]>;
  extractCommentMetadata(image: Buffer, comments: string[], ctx: LedgerContext): Promise<CommentMetadata[]>;
}

/** Social feed reading, used by fb-scrape. */
export interface PostExtractor {
  extractFeedPosts(image: Buffer, ctx: LedgerContext): Promise<FeedPost[]>;
  extractTopComments(image: Buffer, limit: number, ctx: LedgerContext): Promise<FeedComment[]>;
}

export class VisionExtractor implements PageExtractor, PostExtractor {
  private readonly model: string;
  private readonly timeoutMs: number;

  constructor(private readonly llm: LLMClient, options: VisionExtractorOptions = {}) {
    this.model = options.model ?? env.VISION_MODEL;
    this.timeoutMs = options.timeoutMs ?? env.LLM_TIMEOUT_MS;
  }

  async extractSearchResults(image: Buffer, target: PlatformTarget, ctx: LedgerContext): Promise<ListingEntry[]> {
    const raw = await this.ask(image, buildSearchResultsPrompt(target.engine, target.siteFilter), 2500, ctx, "search_results");
    return parseListing(raw);
  }

  async extractPageSummary(image: Buffer, url: string, ctx: LedgerContext): Promise<PageSummary> {
    const raw = await this.ask(image, buildPageSummaryPrompt(url), 1200, ctx, "page_summary");
    return parsePageSummary(raw);
  }

  async extractComments(image: Buffer, ctx: LedgerContext): Promise<string[]> {
    const raw = await this.ask(image, buildCommentsPrompt(), 2000, ctx, "comments");
    return parseComments(raw);
  }

  async extractCommentMetadata(image: Buffer, comments: string[], ctx: LedgerContext): Promise<CommentMetadata[]> {
    const raw = await this.ask(image, buildCommentMetadataPrompt(comments), 1500, ctx, "comment_metadata");
    return parseCommentMetadata(raw);
  }

  async extractFeedPosts(image: Buffer, ctx: LedgerContext): Promise<FeedPost[]> {
    const raw = await this.ask(image, buildFeedPostsPrompt(), 4000, ctx, "feed_posts");
    return parseFeedPosts(raw);
  }

  async extractTopComments(image: Buffer, limit: number, ctx: LedgerContext): Promise<FeedComment[]> {
    const raw = await this.ask(image, buildPostCommentsPrompt(limit), 2000, ctx, "post_comments");
    return parseFeedComments(extractJsonPayload(raw, "array") ?? extractJsonPayload(raw, "object")).slice(0, limit);
  }

  private async ask(image: Buffer, prompt: string, maxTokens: number, ctx: LedgerContext, stage: string): Promise<string> {
    try {
      const completion = await this.llm.complete(
        [
          { type: "text", text: prompt },
          { type: "image", dataUrl: `data:image/png;base64,${image.toString("base64")}` },
        ],
        { model: this.model, maxTokens, timeoutMs: this.timeoutMs }
      );
      ctx.ledger.record(completion.usage);
      logger.debug(
        { stage, ...completion.usage, totalCost: ctx.ledger.estimatedCost },
        "Vision extraction completed"
      );
      return completion.content;
    } catch (error) {
      if (error instanceof LLMError) {
        throw new ExtractionError(`${stage} extraction failed: ${error.message}`, error.code);
      }
      throw error;
    }
  }
}

export function parseListing(raw: string): ListingEntry[] {
  const items = pickArray(extractJsonPayload(raw, "array") ?? extractJsonPayload(raw, "object"), "results", "items");
  const entries: ListingEntry[] = [];

  for (const item of items) {
    if (!isRecord(item)) continue;
    const url = pickString(item, "url", "link", "href");
    if (!url || !/^https?:\/\//i.test(url)) continue;

    const entry: ListingEntry = { url };
    const title = pickString(item, "title", "headline");
    const excerpt = pickString(item, "excerpt", "snippet", "description");
    const publisher = pickString(item, "publisher", "source", "site");
    const date = pickString(item, "date", "published");
    const rank = parseCompactNumber(pickString(item, "rank"));
    if (title) entry.title = title;
    if (excerpt) entry.excerpt = excerpt;
    if (publisher) entry.publisher = publisher;
    if (date) entry.date = date;
    if (rank !== null) entry.rank = rank;
    entries.push(entry);
  }
  return entries;
}

export function parsePageSummary(raw: string): PageSummary {
  const payload = extractJsonPayload(raw, "object");
  if (!isRecord(payload)) {
    logger.warn({ raw: raw.slice(0, 200) }, "Page summary response held no JSON object");
    return { hasComments: false };
  }

  const summary: PageSummary = {
    hasComments: pickBoolean(payload, "has_comments", "hasComments") ?? false,
  };
  const title = pickString(payload, "title");
  const author = pickString(payload, "author", "name");
  const date = pickString(payload, "date");
  const publisher = pickString(payload, "publisher", "site");
  const text = pickString(payload, "summary");
  if (title) summary.title = title;
  if (author) summary.author = author;
  if (date) summary.date = date;
  if (publisher) summary.publisher = publisher;
  if (text) summary.summary = text;
  return summary;
}

export function parseComments(raw: string): string[] {
  const items = pickArray(extractJsonPayload(raw, "array") ?? extractJsonPayload(raw, "object"), "comments");
  const texts: string[] = [];
  for (const item of items) {
    if (typeof item === "string") {
      const trimmed = item.trim();
      if (trimmed) texts.push(trimmed);
    } else if (isRecord(item)) {
      const text = pickString(item, "text", "comment", "body");
      if (text) texts.push(text);
    }
  }
  return texts;
}

export function parseCommentMetadata(raw: string): CommentMetadata[] {
  const items = pickArray(extractJsonPayload(raw, "array") ?? extractJsonPayload(raw, "object"), "comments", "metadata");
  return items.map((item) => {
    if (!isRecord(item)) return {};
    const meta: CommentMetadata = {};
    const author = pickString(item, "author", "user");
    const postedAt = pickString(item, "time", "posted_at", "postedAt", "date");
    const likes = parseCompactNumber(pickString(item, "likes", "upvotes", "score"));
    if (author) meta.author = author;
    if (postedAt) meta.postedAt = postedAt;
    if (likes !== null) meta.likes = likes;
    return meta;
  });
}

/** Accepts an array, or an object holding one under `comments`; items without text are dropped. */
export function parseFeedComments(payload: unknown): FeedComment[] {
  const comments: FeedComment[] = [];
  for (const item of pickArray(payload, "comments", "top_comments")) {
    if (!isRecord(item)) continue;
    const text = pickString(item, "text", "comment");
    if (!text) continue;

    const comment: FeedComment = { text };
    const author = pickString(item, "author", "name");
    const likes = pickString(item, "likes", "reactions");
    const replies = pickString(item, "replies");
    const time = pickString(item, "time", "posted_at");
    if (author) comment.author = author;
    if (likes) comment.likes = likes;
    if (replies) comment.replies = replies;
    if (time) comment.time = time;
    comments.push(comment);
  }
  return comments;
}

export function parseFeedPosts(raw: string): FeedPost[] {
  const items = pickArray(extractJsonPayload(raw, "array") ?? extractJsonPayload(raw, "object"), "posts");
  const posts: FeedPost[] = [];

  for (const item of items) {
    if (!isRecord(item)) continue;
    const text = pickString(item, "post_text", "text") ?? "";
    const post: FeedPost = {
      text,
      hasTextContent: pickBoolean(item, "has_text_content") ?? text.length > 0,
      hasMedia: pickBoolean(item, "has_media") ?? false,
      mediaType: pickString(item, "media_type")?.toLowerCase() ?? "none",
      hasSeeMore: pickBoolean(item, "has_see_more") ?? false,
      isHashtagOnly: pickBoolean(item, "is_hashtag_only") ?? false,
      topComments: parseFeedComments(item["top_comments"]),
    };
    const postId = pickString(item, "post_id", "id");
    const author = pickString(item, "author_name", "author");
    const likesCount = pickString(item, "likes_count", "likes");
    const commentsCount = pickString(item, "comments_count");
    const imageText = pickString(item, "image_text");
    if (postId) post.postId = postId;
    if (author) post.author = author;
    if (likesCount) post.likesCount = likesCount;
    if (commentsCount) post.commentsCount = commentsCount;
    if (imageText) post.imageText = imageText;
    posts.push(post);
  }
  return posts;
}
