import { appendFile, mkdir, stat } from "fs/promises";
import { join, resolve } from "path";
import { env } from "../core/config";
import { logger } from "../core/logger";
import { sanitizeFilename } from "../core/normalize";
import type { FacebookPostRecord, ScrapedRecord } from "../domain/models";

export const DEEPSCRAPE_COLUMNS = [
  "search_term",
  "url",
  "title",
  "author",
  "date",
  "publisher",
  "rank",
  "excerpt",
  "summary",
  "has_comments",
  "comments",
  "scraped_at",
] as const;

export const WEBSCRAPE_COLUMNS = [
  "search_term",
  "engine",
  "rank",
  "title",
  "url",
  "excerpt",
  "publisher",
  "date",
  "scraped_at",
] as const;

export const FACEBOOK_COLUMNS = [
  "tag",
  "scraped_at",
  "post_id",
  "author_name",
  "post_text",
  "likes_count",
  "comments_count",
  "has_media",
  "media_type",
  "image_text",
  "has_see_more",
  "is_hashtag_only",
  "top_comments",
  "comment_authors",
  "comment_likes",
  "comment_replies",
  "comment_times",
] as const;

/** Joins per-comment values inside one Facebook CSV cell. */
export const COMMENT_SEPARATOR = " ||| ";

type CsvValue = string | number | boolean | undefined;
type Row<C extends readonly string[]> = Record<C[number], CsvValue>;

export interface RecordExporter {
  writeDeepScrape(term: string, records: ScrapedRecord[]): Promise<string>;
  writeWebScrape(engine: string, term: string, records: ScrapedRecord[]): Promise<string>;
  writeFacebookPosts(tag: string, records: FacebookPostRecord[]): Promise<string>;
}

export function escapeCsvField(value: CsvValue): string {
  if (value === undefined) return "";
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function formatCsvRow<K extends string>(columns: readonly K[], row: Record<K, CsvValue>): string {
  return columns.map((column) => escapeCsvField(row[column])).join(",");
}

export function toDeepScrapeRow(term: string, record: ScrapedRecord): Row<typeof DEEPSCRAPE_COLUMNS> {
  return {
    search_term: term,
    url: record.url,
    title: record.title,
    author: record.author,
    date: record.date,
    publisher: record.publisher,
    rank: record.rank,
    excerpt: record.excerpt,
    summary: record.summary,
    has_comments: record.hasComments,
    comments: JSON.stringify(record.comments),
    scraped_at: record.scrapedAt,
  };
}

export function toWebScrapeRow(engine: string, term: string, record: ScrapedRecord): Row<typeof WEBSCRAPE_COLUMNS> {
  return {
    search_term: term,
    engine,
    rank: record.rank,
    title: record.title,
    url: record.url,
    excerpt: record.excerpt,
    publisher: record.publisher,
    date: record.date,
    scraped_at: record.scrapedAt,
  };
}

export function toFacebookRow(record: FacebookPostRecord): Row<typeof FACEBOOK_COLUMNS> {
  const join = (values: Array<string | undefined>) => values.map((v) => v ?? "").join(COMMENT_SEPARATOR);
  const comments = record.topComments;
  return {
    tag: record.tag,
    scraped_at: record.scrapedAt,
    post_id: record.postId,
    author_name: record.author,
    post_text: record.text,
    likes_count: record.likesCount,
    comments_count: record.commentsCount,
    has_media: record.hasMedia,
    media_type: record.mediaType,
    image_text: record.imageText,
    has_see_more: record.hasSeeMore,
    is_hashtag_only: record.isHashtagOnly,
    top_comments: join(comments.map((c) => c.text)),
    comment_authors: join(comments.map((c) => c.author)),
    comment_likes: join(comments.map((c) => c.likes)),
    comment_replies: join(comments.map((c) => c.replies)),
    comment_times: join(comments.map((c) => c.time)),
  };
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Appends rows under DATA_DIR. The header is written only when the file is
 * created.
 */
export class CsvExporter implements RecordExporter {
  private readonly dataDir: string;

  constructor(dataDir: string = env.DATA_DIR) {
    this.dataDir = resolve(dataDir);
  }

  async writeDeepScrape(term: string, records: ScrapedRecord[]): Promise<string> {
    const path = join(this.dataDir, `deepscrape_${sanitizeFilename(term)}.csv`);
    const lines = records.map((r) => formatCsvRow(DEEPSCRAPE_COLUMNS, toDeepScrapeRow(term, r)));
    await this.append(path, DEEPSCRAPE_COLUMNS, lines);
    return path;
  }

  async writeWebScrape(engine: string, term: string, records: ScrapedRecord[]): Promise<string> {
    const path = join(this.dataDir, `webscrape_${sanitizeFilename(engine)}_${sanitizeFilename(term)}.csv`);
    const lines = records.map((r) => formatCsvRow(WEBSCRAPE_COLUMNS, toWebScrapeRow(engine, term, r)));
    await this.append(path, WEBSCRAPE_COLUMNS, lines);
    return path;
  }

  async writeFacebookPosts(tag: string, records: FacebookPostRecord[]): Promise<string> {
    const path = join(this.dataDir, `fb_${sanitizeFilename(tag)}_posts.csv`);
    const lines = records.map((r) => formatCsvRow(FACEBOOK_COLUMNS, toFacebookRow(r)));
    await this.append(path, FACEBOOK_COLUMNS, lines);
    return path;
  }

  private async append(path: string, columns: readonly string[], lines: string[]): Promise<void> {
    await mkdir(this.dataDir, { recursive: true });
    const isNew = !(await fileExists(path));
    const body = [...(isNew ? [columns.join(",")] : []), ...lines].map((line) => `${line}\r\n`).join("");
    await appendFile(path, body, "utf-8");
    logger.info({ path, rows: lines.length, isNew }, "Wrote CSV rows");
  }
}
