export function buildInstructionSystemPrompt(platformIds: string[]): string {
  return `You turn a research request into a web search plan.

Known platforms: ${platformIds.join(", ")}.
Platform groups: news, social media, blogs, videos, forums, search engines, any.

Depth levels:
0: just collect links
1: collect page title, author, date and a short summary
2: also collect comments and discussions where present
3: also collect comment metadata (author, time, likes)

Return a JSON object:
{
  "search_term": "the short search query to type into a search engine",
  "suggested_platforms": "comma separated platforms or groups",
  "suggested_depth": 0,
  "suggested_results": 10
}

Respond ONLY with valid JSON.`;
}

export function buildInstructionUserPrompt(instruction: string): string {
  return `## Request

${instruction}

## Plan

Provide your JSON response:`;
}
