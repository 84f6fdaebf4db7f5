import type { PlatformTarget, SearchEngine, SearchStrategy } from "../../domain/models";
import type { ClickTarget } from "../../domain/scrape-types";
import type { PlatformAdapter } from "../adapter";
import { LOAD_MORE, PAGINATION_FALLBACK, SEARCH_ENGINE_SELECTORS } from "./selectors";

export function buildSearchUrl(engine: SearchEngine, query: string): string {
  const q = encodeURIComponent(query.trim()).replace(/%20/g, "+");
  switch (engine) {
    case "google":
      return `https://www.google.com/search?q=${q}&tbm=nws`;
    case "bing":
      return `https://www.bing.com/news/search?q=${q}`;
    case "duckduckgo":
      return `https://duckduckgo.com/?q=${q}&t=h_&ia=web`;
  }
}

export class SearchEngineAdapter implements PlatformAdapter {
  constructor(readonly strategy: SearchStrategy = "engine_web") {}

  searchUrl(target: PlatformTarget, term: string): string {
    return buildSearchUrl(target.engine, term);
  }

  resultContainerSelectors(target: PlatformTarget): string[] {
    return SEARCH_ENGINE_SELECTORS[target.engine].RESULTS_CONTAINER;
  }

  loadMoreTarget(_target: PlatformTarget): ClickTarget {
    return { texts: LOAD_MORE.TEXTS, selectors: LOAD_MORE.SELECTORS };
  }

  paginationTarget(target: PlatformTarget): ClickTarget {
    return {
      texts: PAGINATION_FALLBACK.TEXTS,
      selectors: [...SEARCH_ENGINE_SELECTORS[target.engine].PAGINATION, ...PAGINATION_FALLBACK.SELECTORS],
    };
  }
}
