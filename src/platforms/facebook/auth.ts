import { logger } from "../../core/logger";
import { NavigationError } from "../../core/errors";
import type { BrowserPage, BrowserSession } from "../../domain/scrape-types";
import { FACEBOOK_HOME_URL, LOGIN_FORM_SELECTORS } from "./selectors";

export const LOGIN_PROMPT = "Log in to Facebook in the opened browser window, then press Enter here to continue.";

const LOGIN_CHECK_TIMEOUT_MS = 3000;

export async function isLoginFormVisible(page: BrowserPage): Promise<boolean> {
  return page.hasVisible(LOGIN_FORM_SELECTORS, LOGIN_CHECK_TIMEOUT_MS);
}

/**
 * Opens the home page and, on a fresh profile or when the login form shows,
 * waits for the user to log in by hand. The profile keeps the cookies.
 */
export async function ensureFacebookLogin(
  session: BrowserSession,
  page: BrowserPage,
  confirm: (question: string) => Promise<unknown>
): Promise<void> {
  await page.goto(FACEBOOK_HOME_URL);

  if (!session.isNew && !(await isLoginFormVisible(page))) {
    logger.debug("Facebook session already logged in");
    return;
  }

  logger.info({ isNew: session.isNew }, "Waiting for manual Facebook login");
  await confirm(LOGIN_PROMPT);
  await page.goto(FACEBOOK_HOME_URL);

  if (await isLoginFormVisible(page)) {
    throw new NavigationError("Facebook login was not completed: the login form is still visible", "login_required");
  }
  logger.info("Facebook login confirmed");
}
