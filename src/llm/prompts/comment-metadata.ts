export function buildCommentMetadataPrompt(comments: string[]): string {
  const listed = comments.map((text, i) => `${i + 1}. ${text.slice(0, 200)}`).join("\n");

  return `This screenshot shows a discussion thread. For each of the comments below, in the same order, read its author, posting time and like/upvote count from the screenshot.

${listed}

Return a JSON array with one object per comment:

[
  { "author": "name", "time": "posting time as shown", "likes": 12 }
]

Use null for a value that is not visible. Return only the JSON array.`;
}
