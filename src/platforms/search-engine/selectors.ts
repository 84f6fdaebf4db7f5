import type { SearchEngine } from "../../domain/models";

export const SEARCH_ENGINE_SELECTORS: Record<
  SearchEngine,
  { RESULTS_CONTAINER: string[]; PAGINATION: string[] }
> = {
  google: {
    RESULTS_CONTAINER: ["#search", "#rso", "#main", "[data-async-context]"],
    PAGINATION: ["a#pnnext", 'a[aria-label="Next"]', 'a[aria-label*="Next page"]'],
  },
  bing: {
    RESULTS_CONTAINER: ["#b_results", "#b_content", ".b_results", "main"],
    PAGINATION: ['a[title="Next page"]', 'a[aria-label="Next"]', "a.sb_pagN", 'a[href*="first="]'],
  },
  duckduckgo: {
    RESULTS_CONTAINER: ["#links", ".results", "#web_content_wrapper", "main"],
    PAGINATION: ["a.result--more__btn", 'a[href*="next"]'],
  },
};

export const LOAD_MORE = {
  TEXTS: ["Load more", "Show more", "More results", "Load additional results"],
  SELECTORS: [
    'button[data-testid="load-more"]',
    'button[aria-label*="Load more"]',
    'button[aria-label*="Show more"]',
    "#more-results",
    'a[aria-label*="More"]',
  ],
};

export const PAGINATION_FALLBACK = {
  TEXTS: ["Next", "Next page"],
  SELECTORS: ['a[aria-label*="Next"]', 'button[aria-label*="Next"]', "a.pagination__next", "a.next"],
};
