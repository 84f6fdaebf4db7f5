import { z } from "zod";

export const DepthSchema = z.union([z.literal(0), z.literal(1), z.literal(2), z.literal(3)]);
export type Depth = z.infer<typeof DepthSchema>;

export const SearchEngineSchema = z.enum(["duckduckgo", "google", "bing"]);
export type SearchEngine = z.infer<typeof SearchEngineSchema>;

export const SearchStrategySchema = z.enum(["engine_web", "engine_news", "site_filter"]);
export type SearchStrategy = z.infer<typeof SearchStrategySchema>;

export const PlatformTargetSchema = z.object({
  id: z.string(),
  label: z.string(),
  strategy: SearchStrategySchema,
  engine: SearchEngineSchema,
  siteFilter: z.string().optional(),
  sessionDomain: z.string(),
});
export type PlatformTarget = z.infer<typeof PlatformTargetSchema>;

export const ScrapeRequestSchema = z.object({
  rawInstruction: z.string(),
  searchTerm: z.string().min(1),
  targetResults: z.number().int().min(1),
  platformSpec: z.string(),
  depth: DepthSchema,
  timeoutSeconds: z.number().int().min(1),
  source: z.enum(["term", "inference"]),
});
export type ScrapeRequest = Readonly<z.infer<typeof ScrapeRequestSchema>>;

export const CommentSchema = z.object({
  text: z.string(),
  author: z.string().optional(),
  postedAt: z.string().optional(),
  likes: z.number().int().nonnegative().optional(),
});
export type Comment = z.infer<typeof CommentSchema>;

export const ScrapedRecordSchema = z.object({
  searchTerm: z.string(),
  url: z.string(),
  platform: z.string(),
  title: z.string().optional(),
  author: z.string().optional(),
  date: z.string().optional(),
  publisher: z.string().optional(),
  rank: z.number().int().min(1),
  excerpt: z.string().optional(),
  summary: z.string().optional(),
  hasComments: z.boolean(),
  comments: z.array(CommentSchema),
  scrapedAt: z.string(),
  completedStage: DepthSchema,
});
export type ScrapedRecord = z.infer<typeof ScrapedRecordSchema>;

/** One entry read off a search results screenshot. */
export interface ListingEntry {
  url: string;
  title?: string;
  excerpt?: string;
  publisher?: string;
  date?: string;
  rank?: number;
}

export interface PageSummary {
  title?: string;
  author?: string;
  date?: string;
  publisher?: string;
  summary?: string;
  hasComments: boolean;
}

export interface CommentMetadata {
  author?: string;
  postedAt?: string;
  likes?: number;
}

/** A comment as read off a feed post; counts stay as displayed ("1.2K"). */
export interface FeedComment {
  text: string;
  author?: string;
  likes?: string;
  replies?: string;
  time?: string;
}

export interface FeedPost {
  postId?: string;
  author?: string;
  text: string;
  likesCount?: string;
  commentsCount?: string;
  hasTextContent: boolean;
  hasMedia: boolean;
  mediaType: string;
  imageText?: string;
  hasSeeMore: boolean;
  isHashtagOnly: boolean;
  topComments: FeedComment[];
}

export interface FacebookPostRecord extends FeedPost {
  postId: string;
  tag: string;
  scrapedAt: string;
}

export const InstructionPlanSchema = z.object({
  search_term: z.string().trim().min(1),
  suggested_platforms: z
    .union([z.string(), z.array(z.string())])
    .nullish()
    .transform((v) => {
      const joined = Array.isArray(v) ? v.map((p) => p.trim()).filter(Boolean).join(", ") : v?.trim();
      return joined ? joined : undefined;
    }),
  suggested_depth: z.coerce.number().int().min(0).max(3).nullish(),
  suggested_results: z.coerce.number().int().min(1).nullish(),
});
export type InstructionPlan = z.infer<typeof InstructionPlanSchema>;

export function isDepth(value: number): value is Depth {
  return DepthSchema.safeParse(value).success;
}
