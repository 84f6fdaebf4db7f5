import { env } from "../../core/config";
import { logger } from "../../core/logger";
import { actionDelay } from "../../core/cooldown";
import { NavigationError } from "../../core/errors";
import { withTimeout } from "../../core/timeout";
import type { FacebookPostRecord, FeedComment, FeedPost } from "../../domain/models";
import type { BrowserPage, BrowserSession, RunContext } from "../../domain/scrape-types";
import type { PostExtractor } from "../../llm/vision-extractor";
import { ensureFacebookLogin } from "./auth";
import { MORE_COMMENTS, SEE_MORE, postContainerSelectors } from "./selectors";
import type { FacebookTarget } from "./target";

export const MAX_TOP_COMMENTS = 5;
export const MIN_POST_TEXT_LENGTH = 10;
const CONTAINER_CHECK_TIMEOUT_MS = 1500;

export interface FeedScraperLimits {
  stageTimeoutMs: number;
  maxScrollRounds: number;
  maxEmptyRounds: number;
}

export interface FacebookFeedScraperDeps {
  extractor: PostExtractor;
  confirmLogin: (question: string) => Promise<unknown>;
  pause?: () => Promise<void>;
  limits?: Partial<FeedScraperLimits>;
  now?: () => Date;
}

export type SkipReason = "hashtag_only" | "media_only" | "too_short";

/** Posts worth keeping carry their own text; hashtag strips and bare media are dropped. */
export function skipReason(post: FeedPost): SkipReason | null {
  if (post.isHashtagOnly) return "hashtag_only";
  if (!post.hasTextContent) return "media_only";
  if (post.text.length < MIN_POST_TEXT_LENGTH) return "too_short";
  return null;
}

export class FacebookFeedScraper {
  private readonly extractor: PostExtractor;
  private readonly confirmLogin: (question: string) => Promise<unknown>;
  private readonly pause: () => Promise<void>;
  private readonly limits: FeedScraperLimits;
  private readonly now: () => Date;

  constructor(deps: FacebookFeedScraperDeps) {
    this.extractor = deps.extractor;
    this.confirmLogin = deps.confirmLogin;
    this.pause = deps.pause ?? actionDelay;
    this.now = deps.now ?? (() => new Date());
    this.limits = {
      stageTimeoutMs: deps.limits?.stageTimeoutMs ?? env.SCRAPER_STAGE_TIMEOUT_MS,
      maxScrollRounds: deps.limits?.maxScrollRounds ?? env.FACEBOOK_MAX_SCROLL_ROUNDS,
      maxEmptyRounds: deps.limits?.maxEmptyRounds ?? env.FACEBOOK_MAX_EMPTY_ROUNDS,
    };
  }

  async run(
    target: FacebookTarget,
    maxPosts: number,
    session: BrowserSession,
    ctx: RunContext
  ): Promise<FacebookPostRecord[]> {
    const page = await this.timed(session.newPage(), "open_page");
    const collected: FacebookPostRecord[] = [];
    const seen = new Set<string>();

    try {
      await ensureFacebookLogin(session, page, this.confirmLogin);
      await this.timed(page.goto(target.url), "feed_navigation");

      let emptyRounds = 0;
      for (let round = 1; round <= this.limits.maxScrollRounds; round++) {
        if (ctx.deadline.expired()) {
          logger.warn({ tag: target.tag, collected: collected.length }, "Deadline reached, stopping feed scrape");
          break;
        }

        let posts: FeedPost[];
        try {
          posts = await this.readFeed(page, ctx);
        } catch (error) {
          if (round === 1) throw error;
          logger.warn({ tag: target.tag, round, error: String(error) }, "Feed extraction failed, scrolling on");
          posts = [];
        }

        let fresh = 0;
        for (const post of posts) {
          if (collected.length >= maxPosts) break;
          const postId = post.postId ?? `post_${collected.length + 1}`;
          if (seen.has(postId)) continue;
          seen.add(postId);

          const reason = skipReason(post);
          if (reason) {
            logger.debug({ postId, reason }, "Skipping post");
            continue;
          }

          fresh++;
          await this.pause();
          const topComments = post.postId ? await this.readTopComments(page, post, ctx) : post.topComments;
          collected.push({
            ...post,
            postId,
            tag: target.tag,
            scrapedAt: this.now().toISOString(),
            topComments: topComments.slice(0, MAX_TOP_COMMENTS),
          });
        }

        logger.debug({ tag: target.tag, round, fresh, collected: collected.length, maxPosts }, "Feed pass done");

        emptyRounds = fresh === 0 ? emptyRounds + 1 : 0;
        if (collected.length >= maxPosts || emptyRounds >= this.limits.maxEmptyRounds) break;
        if (round < this.limits.maxScrollRounds) {
          await this.pause();
          await this.timed(page.scrollDown(), "scroll").catch((error: unknown) =>
            logger.debug({ tag: target.tag, error: String(error) }, "Could not scroll feed")
          );
        }
      }
    } finally {
      await page.close().catch((error: unknown) => logger.debug({ error }, "Error closing feed page"));
    }

    logger.info({ tag: target.tag, collected: collected.length, maxPosts }, "Feed scrape finished");
    return collected;
  }

  private async readFeed(page: BrowserPage, ctx: RunContext): Promise<FeedPost[]> {
    await this.timed(page.clickFirstVisible(SEE_MORE), "see_more").catch((error: unknown) =>
      logger.debug({ error: String(error) }, "No See more control expanded")
    );
    const image = await this.timed(page.screenshot(), "feed_screenshot");
    return this.timed(this.extractor.extractFeedPosts(image, ctx), "feed_extraction");
  }

  /** Falls back to the comments read off the feed when the post cannot be isolated. */
  private async readTopComments(page: BrowserPage, post: FeedPost, ctx: RunContext): Promise<FeedComment[]> {
    const selectors = postContainerSelectors(post.postId ?? "");
    try {
      if (!(await page.hasVisible(selectors, CONTAINER_CHECK_TIMEOUT_MS))) return post.topComments;
      if (post.hasSeeMore) await this.timed(page.clickFirstVisible(SEE_MORE), "post_see_more");
      await this.timed(page.clickFirstVisible(MORE_COMMENTS), "more_comments");

      const image = await this.timed(page.screenshot({ containerSelectors: selectors }), "post_screenshot");
      const comments = await this.timed(this.extractor.extractTopComments(image, MAX_TOP_COMMENTS, ctx), "post_comments");
      return comments.length > 0 ? comments : post.topComments;
    } catch (error) {
      logger.warn({ postId: post.postId, error: String(error) }, "Top comment extraction failed, keeping feed comments");
      return post.topComments;
    }
  }

  private timed<T>(promise: Promise<T>, step: string): Promise<T> {
    return withTimeout(
      promise,
      this.limits.stageTimeoutMs,
      new NavigationError(`${step} timed out after ${this.limits.stageTimeoutMs}ms`, "step_timeout")
    );
  }
}
