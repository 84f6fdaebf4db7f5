import type { PlatformTarget } from "../../domain/models";
import { SearchEngineAdapter, buildSearchUrl } from "../search-engine/search-engine.adapter";

/** Reaches a platform through its engine with a `site:` restriction. */
export class SiteSearchAdapter extends SearchEngineAdapter {
  constructor() {
    super("site_filter");
  }

  override searchUrl(target: PlatformTarget, term: string): string {
    const query = target.siteFilter ? `${term} site:${target.siteFilter}` : term;
    return buildSearchUrl(target.engine, query);
  }
}
