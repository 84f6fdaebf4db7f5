export function buildPostCommentsPrompt(limit: number): string {
  return `This screenshot shows one Facebook post with its comment section expanded.
Return the ${limit} most engaged comments (most reactions first) as a JSON array:

[
  {
    "author": "commenter name",
    "text": "full comment text",
    "likes": "reaction count as shown, e.g. 5 or 1.2K",
    "replies": "reply count if visible",
    "time": "time posted as shown, e.g. 2h or 1d"
  }
]

Prefer substantial comments over emoji-only or single-word replies. Return only the JSON array, no other text.`;
}
