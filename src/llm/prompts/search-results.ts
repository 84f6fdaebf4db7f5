import type { SearchEngine } from "../../domain/models";

const ENGINE_LABELS: Record<SearchEngine, string> = {
  duckduckgo: "DuckDuckGo",
  google: "Google",
  bing: "Bing",
};

export function buildSearchResultsPrompt(engine: SearchEngine, siteFilter?: string): string {
  const scope = siteFilter ? `\nThe query was restricted to ${siteFilter}; keep only results hosted there.` : "";

  return `Analyze this ${ENGINE_LABELS[engine]} search results page. Extract all visible search results and return a JSON array with this structure:

[
  {
    "title": "article headline",
    "url": "full URL if visible",
    "excerpt": "description/snippet text",
    "publisher": "publisher name if visible",
    "date": "publication date if visible",
    "rank": 1
  }
]

Focus on:
- Main search results (not ads or related searches)
- Full headlines and descriptions
- Publisher names and dates when shown
- Number results by rank (1, 2, 3, etc.)${scope}

Return only the JSON array, no other text.`;
}
