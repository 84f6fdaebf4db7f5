export function buildFeedPostsPrompt(): string {
  return `This is a screenshot of a Facebook feed (hashtag, page or group). Identify every visible post and return a JSON array with one object per post:

[
  {
    "post_id": "an identifier visible in the post or its link, if any",
    "author_name": "author name if visible",
    "post_text": "the main text of the post",
    "has_text_content": true,
    "likes_count": "reaction count as shown, e.g. 12 or 1.2K",
    "comments_count": "comment count as shown",
    "has_media": false,
    "media_type": "image | video | none",
    "image_text": "text that appears inside attached images, if any",
    "has_see_more": false,
    "is_hashtag_only": false,
    "top_comments": [
      { "author": "commenter name", "text": "comment text", "likes": "count as shown" }
    ]
  }
]

Rules:
- Set has_see_more to true when the post text is cut off with a "See more" link.
- Set is_hashtag_only to true when the post text is nothing but hashtags.
- Set has_text_content to false for posts that are only an image or video.
- Copy image text verbatim into image_text; leave it empty when there is none.
Return only the JSON array, no other text.`;
}
