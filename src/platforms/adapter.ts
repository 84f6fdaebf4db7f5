import type { PlatformTarget, SearchStrategy } from "../domain/models";
import type { ClickTarget } from "../domain/scrape-types";

/**
 * How a platform's search page is reached and paged through. Adapters hold
 * no browser state; the orchestrator drives the page.
 */
export interface PlatformAdapter {
  readonly strategy: SearchStrategy;

  searchUrl(target: PlatformTarget, term: string): string;

  resultContainerSelectors(target: PlatformTarget): string[];

  loadMoreTarget(target: PlatformTarget): ClickTarget;

  paginationTarget(target: PlatformTarget): ClickTarget;
}

export type AdapterMap = Readonly<Record<SearchStrategy, PlatformAdapter>>;
