import type { AdapterMap } from "./adapter";
import { SearchEngineAdapter } from "./search-engine/search-engine.adapter";
import { SiteSearchAdapter } from "./site-search/site-search.adapter";

export function createAdapters(): AdapterMap {
  return {
    engine_web: new SearchEngineAdapter("engine_web"),
    engine_news: new SearchEngineAdapter("engine_news"),
    site_filter: new SiteSearchAdapter(),
  };
}

export type { PlatformAdapter, AdapterMap } from "./adapter";
export { resolvePlatforms, splitQuota, getPlatformTarget, PLATFORM_TABLE } from "./registry";
