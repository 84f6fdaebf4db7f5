export function buildCommentsPrompt(): string {
  return `This screenshot shows a page with a comment section or discussion thread.
Extract the visible top-level comments in the order they appear and return a JSON array:

[
  { "text": "the comment text" }
]

Skip navigation, ads and the article body. Return only the JSON array, no other text.`;
}
