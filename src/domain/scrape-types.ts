import type { CostLedger } from "../llm/cost-tracker";
import type { Deadline } from "../core/timeout";
import type { PlatformTarget, ScrapedRecord } from "./models";

export interface RunContext {
  runId: string;
  ledger: CostLedger;
  deadline: Deadline;
}

export interface ScreenshotOptions {
  /** First visible match is captured; falls back to the viewport. */
  containerSelectors?: string[];
  fullPage?: boolean;
}

export interface ClickTarget {
  texts?: string[];
  selectors?: string[];
}

export interface BrowserPage {
  goto(url: string): Promise<void>;
  screenshot(options?: ScreenshotOptions): Promise<Buffer>;
  clickFirstVisible(target: ClickTarget): Promise<boolean>;
  scrollDown(): Promise<void>;
  /** True once any selector matches a visible element within `timeoutMs`. */
  hasVisible(selectors: string[], timeoutMs: number): Promise<boolean>;
  close(): Promise<void>;
}

export interface BrowserSession {
  readonly domain: string;
  readonly isNew: boolean;
  newPage(): Promise<BrowserPage>;
  close(): Promise<void>;
}

export interface SessionProvider {
  acquire(domain: string): Promise<BrowserSession>;
  closeAll(): Promise<void>;
}

export type ScrapeMode = "deep" | "listing";

export interface PlatformOutcome {
  platform: string;
  requested: number;
  collected: number;
  error?: { code: string; message: string };
}

export interface ScrapeResult {
  records: ScrapedRecord[];
  requested: number;
  timedOut: boolean;
  platforms: PlatformOutcome[];
}

export interface ResolvedPlatforms {
  targets: PlatformTarget[];
  unmatched: string[];
}
