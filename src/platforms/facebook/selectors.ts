import type { ClickTarget } from "../../domain/scrape-types";

export const FACEBOOK_HOME_URL = "https://www.facebook.com/";
export const FACEBOOK_SESSION_DOMAIN = "facebook.com";

export const LOGIN_FORM_SELECTORS = ['input[name="email"]', 'input[id="email"]', 'form[data-testid="royal_login_form"]'];

export const SEE_MORE: ClickTarget = {
  texts: ["See more"],
  selectors: ['[aria-label*="See more"]', '[data-testid*="see-more"]', 'div[role="button"]:has-text("See more")'],
};

export const MORE_COMMENTS: ClickTarget = {
  texts: ["View more comments", "View previous comments", "Most relevant"],
  selectors: ['[aria-label*="more comments"]', '[data-testid*="UFI2CommentsPagerRenderer"]'],
};

export function postContainerSelectors(postId: string): string[] {
  const id = postId.replace(/["\\]/g, "");
  return [`[data-ft*="${id}"]`, `[id*="${id}"]`, `[data-testid*="${id}"]`];
}
