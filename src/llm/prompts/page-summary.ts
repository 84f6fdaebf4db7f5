export function buildPageSummaryPrompt(url: string): string {
  return `Extract information from this page screenshot as a JSON object with keys:
"title", "author", "date", "publisher", "summary", "has_comments".

- title: the main headline of the page
- author: the author or poster name, if visible
- date: the publication date, if visible
- publisher: the site or outlet name, if visible
- summary: two or three sentences on what the page says
- has_comments: true if a comment section or discussion thread is visible or linked on the page

Leave a key out when the value is not visible. Return only the JSON object.
URL: ${url}`;
}
