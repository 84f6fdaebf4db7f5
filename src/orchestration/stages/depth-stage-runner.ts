import { env } from "../../core/config";
import { logger } from "../../core/logger";
import { ExtractionError } from "../../core/errors";
import { withTimeout } from "../../core/timeout";
import { applyDepthGate, STAGE_NAMES, stagesUpTo, validateTransition } from "../../domain/depth-state-machine";
import type { Comment, Depth, ListingEntry, ScrapedRecord } from "../../domain/models";
import type { BrowserPage, BrowserSession, RunContext } from "../../domain/scrape-types";
import type { PageExtractor } from "../../llm/vision-extractor";

/**
 * Walks one URL through METADATA, DISCUSSION and DISCUSSION_META up to the
 * requested depth. A failing stage ends the walk; the record keeps what the
 * last completed stage produced.
 */
interface WalkState {
  page: BrowserPage | null;
  threadImage: Buffer | null;
}

export class DepthStageRunner {
  constructor(
    private readonly extractor: PageExtractor,
    private readonly stageTimeoutMs: number = env.SCRAPER_STAGE_TIMEOUT_MS
  ) {}

  async run(
    seed: ScrapedRecord,
    listing: ListingEntry,
    depth: Depth,
    session: BrowserSession,
    ctx: RunContext
  ): Promise<ScrapedRecord> {
    const record: ScrapedRecord = { ...seed, comments: [] };
    const state: WalkState = { page: null, threadImage: null };
    let completed: Depth = 0;

    try {
      for (const stage of stagesUpTo(depth)) {
        if (stage === 0) continue;
        validateTransition(completed, stage);
        const proceed = await this.runStage(stage, record, listing, state, session, ctx);
        completed = stage;
        if (!proceed) break;
      }
    } catch (error) {
      logger.warn(
        {
          url: record.url,
          platform: record.platform,
          completedStage: STAGE_NAMES[completed],
          error: error instanceof Error ? error.message : String(error),
        },
        "Depth stage failed, keeping last completed stage"
      );
    } finally {
      if (state.page) {
        await state.page
          .close()
          .catch((error: unknown) => logger.debug({ error, url: record.url }, "Error closing page"));
      }
    }

    return applyDepthGate(record, completed);
  }

  /** Runs one stage in place on `record`; false ends the walk after it. */
  private async runStage(
    stage: Depth,
    record: ScrapedRecord,
    listing: ListingEntry,
    state: WalkState,
    session: BrowserSession,
    ctx: RunContext
  ): Promise<boolean> {
    switch (stage) {
      case 0:
        return true;

      case 1: {
        const page = await this.timed(session.newPage(), "open_page");
        state.page = page;
        await this.timed(page.goto(record.url), "page_navigation");
        const image = await this.timed(page.screenshot(), "page_screenshot");
        const summary = await this.timed(this.extractor.extractPageSummary(image, record.url, ctx), "page_summary");

        record.title = summary.title ?? listing.title;
        record.author = summary.author;
        record.date = summary.date ?? listing.date;
        record.publisher = summary.publisher ?? listing.publisher;
        record.summary = summary.summary;
        record.excerpt = listing.excerpt;
        return summary.hasComments;
      }

      case 2: {
        if (!state.page) throw new ExtractionError("Discussion stage reached without an open page", "no_page");
        const threadImage = await this.timed(state.page.screenshot({ fullPage: true }), "thread_screenshot");
        const texts = await this.timed(this.extractor.extractComments(threadImage, ctx), "comments");
        state.threadImage = threadImage;
        record.hasComments = true;
        record.comments = texts.map((text) => ({ text }));
        return texts.length > 0;
      }

      case 3: {
        if (!state.threadImage) throw new ExtractionError("Comment metadata requested without a thread capture", "no_thread");
        const texts = record.comments.map((c) => c.text);
        const metadata = await this.timed(
          this.extractor.extractCommentMetadata(state.threadImage, texts, ctx),
          "comment_metadata"
        );
        record.comments = record.comments.map((comment, i): Comment => ({ ...comment, ...metadata[i] }));
        return true;
      }
    }
  }

  private timed<T>(promise: Promise<T>, stage: string): Promise<T> {
    return withTimeout(
      promise,
      this.stageTimeoutMs,
      new ExtractionError(`${stage} timed out after ${this.stageTimeoutMs}ms`, "stage_timeout")
    );
  }
}
