import { env } from "../core/config";
import { logger } from "../core/logger";
import { actionDelay } from "../core/cooldown";
import { AllPlatformsFailedError, ExtractionError, NavigationError } from "../core/errors";
import { normalizeUrl } from "../core/normalize";
import { withTimeout } from "../core/timeout";
import { applyDepthGate } from "../domain/depth-state-machine";
import type { ListingEntry, PlatformTarget, ScrapeRequest, ScrapedRecord } from "../domain/models";
import type {
  BrowserPage,
  BrowserSession,
  PlatformOutcome,
  RunContext,
  ScrapeMode,
  ScrapeResult,
  SessionProvider,
} from "../domain/scrape-types";
import type { PageExtractor } from "../llm/vision-extractor";
import type { AdapterMap, PlatformAdapter } from "../platforms/adapter";
import { createAdapters } from "../platforms";
import { splitQuota } from "../platforms/registry";
import { DepthStageRunner } from "./stages/depth-stage-runner";

export interface OrchestratorLimits {
  stageTimeoutMs: number;
  maxScrollRounds: number;
  maxEmptyRounds: number;
}

export interface ScrapeOrchestratorDeps {
  extractor: PageExtractor;
  sessions: SessionProvider;
  adapters?: AdapterMap;
  stageRunner?: DepthStageRunner;
  pause?: () => Promise<void>;
  limits?: Partial<OrchestratorLimits>;
  now?: () => Date;
}

interface PlatformRun {
  outcome: PlatformOutcome;
  records: ScrapedRecord[];
  timedOut: boolean;
}

export class ScrapeOrchestrator {
  private readonly extractor: PageExtractor;
  private readonly sessions: SessionProvider;
  private readonly adapters: AdapterMap;
  private readonly stageRunner: DepthStageRunner;
  private readonly pause: () => Promise<void>;
  private readonly limits: OrchestratorLimits;
  private readonly now: () => Date;

  constructor(deps: ScrapeOrchestratorDeps) {
    this.limits = {
      stageTimeoutMs: deps.limits?.stageTimeoutMs ?? env.SCRAPER_STAGE_TIMEOUT_MS,
      maxScrollRounds: deps.limits?.maxScrollRounds ?? env.SCRAPER_MAX_SCROLL_ROUNDS,
      maxEmptyRounds: deps.limits?.maxEmptyRounds ?? env.SCRAPER_MAX_EMPTY_ROUNDS,
    };
    this.extractor = deps.extractor;
    this.sessions = deps.sessions;
    this.adapters = deps.adapters ?? createAdapters();
    this.stageRunner = deps.stageRunner ?? new DepthStageRunner(deps.extractor, this.limits.stageTimeoutMs);
    this.pause = deps.pause ?? actionDelay;
    this.now = deps.now ?? (() => new Date());
  }

  async run(
    request: ScrapeRequest,
    targets: PlatformTarget[],
    ctx: RunContext,
    options: { mode?: ScrapeMode } = {}
  ): Promise<ScrapeResult> {
    const mode = options.mode ?? "deep";
    const quotas = splitQuota(request.targetResults, targets.length);
    const records: ScrapedRecord[] = [];
    const outcomes: PlatformOutcome[] = [];
    let timedOut = false;

    logger.info(
      {
        runId: ctx.runId,
        searchTerm: request.searchTerm,
        depth: request.depth,
        mode,
        platforms: targets.map((t, i) => `${t.id}:${quotas[i] ?? 0}`),
      },
      "Starting scrape run"
    );

    try {
      for (const [index, target] of targets.entries()) {
        const quota = quotas[index] ?? 0;
        if (quota === 0) {
          logger.debug({ platform: target.id }, "Skipping platform with empty quota");
          continue;
        }
        if (ctx.deadline.expired()) {
          timedOut = true;
          break;
        }

        const platformRun = await this.runPlatform(target, quota, request, ctx, mode);
        outcomes.push(platformRun.outcome);
        records.push(...platformRun.records);
        if (platformRun.timedOut) {
          timedOut = true;
          break;
        }
      }
    } finally {
      await this.sessions.closeAll();
    }

    // A deadline stop leaves platforms unattempted, so the run is partial, not failed.
    const scheduled = quotas.filter((quota) => quota > 0).length;
    const failures = outcomes.filter((o) => o.error !== undefined);
    if (!timedOut && scheduled > 0 && failures.length === scheduled) {
      throw new AllPlatformsFailedError(
        failures.map((f) => ({ platform: f.platform, error: f.error?.message ?? "unknown error" }))
      );
    }

    if (timedOut) {
      logger.warn(
        { runId: ctx.runId, completed: records.length, requested: request.targetResults, timeoutSeconds: request.timeoutSeconds },
        "TimeoutExceeded: run deadline reached, returning partial results"
      );
    }

    logger.info(
      { runId: ctx.runId, records: records.length, requested: request.targetResults, cost: ctx.ledger.snapshot() },
      "Scrape run completed"
    );

    return { records, requested: request.targetResults, timedOut, platforms: outcomes };
  }

  private async runPlatform(
    target: PlatformTarget,
    quota: number,
    request: ScrapeRequest,
    ctx: RunContext,
    mode: ScrapeMode
  ): Promise<PlatformRun> {
    const adapter = this.adapters[target.strategy];
    const records: ScrapedRecord[] = [];
    const seen = new Set<string>();
    let timedOut = false;

    const failed = (error: unknown): PlatformRun => {
      const message = error instanceof Error ? error.message : String(error);
      const code = error instanceof NavigationError || error instanceof ExtractionError ? error.code : "platform_failed";
      logger.warn({ platform: target.id, code, error: message }, "Skipping platform");
      return {
        outcome: { platform: target.id, requested: quota, collected: 0, error: { code, message } },
        records: [],
        timedOut: false,
      };
    };

    let session: BrowserSession;
    let page: BrowserPage;
    try {
      session = await this.timed(this.sessions.acquire(target.sessionDomain), "open_session");
      page = await this.timed(session.newPage(), "open_page");
    } catch (error) {
      return failed(error);
    }

    try {
      try {
        await this.timed(page.goto(adapter.searchUrl(target, request.searchTerm)), "search_navigation");
      } catch (error) {
        return failed(error);
      }

      let rank = 0;
      let emptyRounds = 0;

      rounds: for (let round = 1; round <= this.limits.maxScrollRounds; round++) {
        let entries: ListingEntry[];
        try {
          entries = await this.readListing(page, adapter, target, ctx);
        } catch (error) {
          if (round === 1) return failed(error);
          logger.warn({ platform: target.id, round, error: String(error) }, "Listing extraction failed, trying next page");
          entries = [];
        }

        let fresh = 0;
        for (const entry of entries) {
          if (records.length >= quota) break;
          const key = normalizeUrl(entry.url);
          if (seen.has(key)) continue;
          seen.add(key);
          fresh++;

          if (ctx.deadline.expired()) {
            timedOut = true;
            break rounds;
          }

          rank++;
          const seed = this.seedRecord(request, target, entry, rank, mode);
          if (mode === "listing" || request.depth === 0) {
            records.push(seed);
          } else {
            records.push(await this.stageRunner.run(seed, entry, request.depth, session, ctx));
          }
        }

        logger.debug({ platform: target.id, round, fresh, collected: records.length, quota }, "Listing pass done");

        emptyRounds = fresh === 0 ? emptyRounds + 1 : 0;
        if (records.length >= quota || emptyRounds >= this.limits.maxEmptyRounds) break;
        if (round < this.limits.maxScrollRounds) {
          await this.pause();
          await this.advance(page, adapter, target);
        }
      }
    } finally {
      await page.close().catch((error: unknown) => logger.debug({ error, platform: target.id }, "Error closing page"));
    }

    logger.info({ platform: target.id, collected: records.length, quota }, "Platform scrape finished");
    return {
      outcome: { platform: target.id, requested: quota, collected: records.length },
      records,
      timedOut,
    };
  }

  private async readListing(
    page: BrowserPage,
    adapter: PlatformAdapter,
    target: PlatformTarget,
    ctx: RunContext
  ): Promise<ListingEntry[]> {
    const image = await this.timed(
      page.screenshot({ containerSelectors: adapter.resultContainerSelectors(target) }),
      "listing_screenshot"
    );
    return this.timed(this.extractor.extractSearchResults(image, target, ctx), "listing_extraction");
  }

  /** Load-more button, then pagination, then a plain scroll. */
  private async advance(page: BrowserPage, adapter: PlatformAdapter, target: PlatformTarget): Promise<void> {
    try {
      if (await this.timed(page.clickFirstVisible(adapter.loadMoreTarget(target)), "load_more")) return;
      if (await this.timed(page.clickFirstVisible(adapter.paginationTarget(target)), "pagination")) return;
      await this.timed(page.scrollDown(), "scroll");
    } catch (error) {
      logger.debug({ platform: target.id, error: String(error) }, "Could not advance listing");
    }
  }

  private seedRecord(
    request: ScrapeRequest,
    target: PlatformTarget,
    entry: ListingEntry,
    rank: number,
    mode: ScrapeMode
  ): ScrapedRecord {
    const record: ScrapedRecord = {
      searchTerm: request.searchTerm,
      url: entry.url,
      platform: target.id,
      rank,
      scrapedAt: this.now().toISOString(),
      hasComments: false,
      comments: [],
      completedStage: 0,
    };
    if (mode === "listing") {
      if (entry.title) record.title = entry.title;
      if (entry.excerpt) record.excerpt = entry.excerpt;
      if (entry.publisher) record.publisher = entry.publisher;
      if (entry.date) record.date = entry.date;
      return record;
    }
    return applyDepthGate(record, 0);
  }

  private timed<T>(promise: Promise<T>, step: string): Promise<T> {
    return withTimeout(
      promise,
      this.limits.stageTimeoutMs,
      new NavigationError(`${step} timed out after ${this.limits.stageTimeoutMs}ms`, "step_timeout")
    );
  }
}
