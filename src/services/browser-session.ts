import { chromium, type BrowserContext } from "playwright-core";
import { mkdir, access } from "fs/promises";
import { join, resolve } from "path";
import { logger } from "../core/logger";
import { env } from "../core/config";
import type { BrowserPage, BrowserSession, SessionProvider } from "../domain/scrape-types";
import { PlaywrightPage } from "./playwright-page";

export function getSessionsDir(dataDir: string = env.DATA_DIR): string {
  return resolve(dataDir, "sessions");
}

export function getSessionProfileDir(domain: string, dataDir?: string): string {
  const safe = domain.toLowerCase().replace(/[^a-z0-9.-]/g, "_");
  return join(getSessionsDir(dataDir), safe);
}

export async function ensureProfileDir(dir: string): Promise<void> {
  try {
    await access(dir);
  } catch {
    await mkdir(dir, { recursive: true });
    logger.debug({ profileDir: dir }, "Created persistent browser profile directory");
  }
}

export async function profileExists(dir: string): Promise<boolean> {
  try {
    await access(dir);
    return true;
  } catch {
    return false;
  }
}

export interface PersistentContextResult {
  context: BrowserContext;
  profileDir: string;
  isNew: boolean;
}

export async function launchPersistentContext(
  domain: string,
  options?: { headless?: boolean; slowMo?: number; dataDir?: string }
): Promise<PersistentContextResult> {
  const profileDir = getSessionProfileDir(domain, options?.dataDir);
  const isNew = !(await profileExists(join(profileDir, "Default")));
  await ensureProfileDir(profileDir);

  const context = await chromium.launchPersistentContext(profileDir, {
    headless: options?.headless ?? env.PLAYWRIGHT_HEADLESS,
    slowMo: options?.slowMo ?? env.PLAYWRIGHT_SLOW_MO,
    executablePath: env.PLAYWRIGHT_EXECUTABLE_PATH,
    viewport: { width: 1280, height: 800 },
    locale: "en-US",
    args: ["--disable-blink-features=AutomationControlled"],
  });

  logger.info({ domain, profileDir, isNew }, "Launched persistent browser context");

  return { context, profileDir, isNew };
}

export async function closeContextSafely(context: BrowserContext | null): Promise<void> {
  if (!context) return;

  try {
    for (const page of context.pages()) {
      await page.close().catch((error: unknown) => logger.debug({ error }, "Error closing page"));
    }
    await context.close();
  } catch (error) {
    logger.debug({ error }, "Error closing browser context (non-fatal)");
  }
}

class PersistentBrowserSession implements BrowserSession {
  constructor(
    readonly domain: string,
    readonly isNew: boolean,
    private readonly context: BrowserContext
  ) {}

  async newPage(): Promise<BrowserPage> {
    return new PlaywrightPage(await this.context.newPage());
  }

  close(): Promise<void> {
    return closeContextSafely(this.context);
  }
}

/**
 * One persistent profile per scraping domain, opened on first use and kept
 * until `closeAll()`.
 */
export class PlaywrightSessionProvider implements SessionProvider {
  private sessions = new Map<string, Promise<BrowserSession>>();

  constructor(private readonly options: { headless?: boolean; slowMo?: number; dataDir?: string } = {}) {}

  acquire(domain: string): Promise<BrowserSession> {
    const existing = this.sessions.get(domain);
    if (existing) return existing;

    const opening = launchPersistentContext(domain, this.options).then(
      ({ context, isNew }) => new PersistentBrowserSession(domain, isNew, context)
    );
    this.sessions.set(domain, opening);
    opening.catch((error: unknown) => {
      this.sessions.delete(domain);
      logger.warn({ domain, error }, "Failed to open browser session");
    });
    return opening;
  }

  async closeAll(): Promise<void> {
    const pending = [...this.sessions.values()];
    this.sessions.clear();
    for (const opening of pending) {
      try {
        const session = await opening;
        await session.close();
      } catch (error) {
        logger.debug({ error }, "Skipping close of a session that never opened");
      }
    }
  }
}
