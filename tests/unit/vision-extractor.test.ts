import { describe, it, expect } from "vitest";
import { ExtractionError, LLMError } from "../../src/core/errors";
import { CostLedger } from "../../src/llm/cost-tracker";
import { extractJsonPayload } from "../../src/llm/json";
import {
  VisionExtractor,
  parseCommentMetadata,
  parseComments,
  parseFeedComments,
  parseFeedPosts,
  parseListing,
  parsePageSummary,
} from "../../src/llm/vision-extractor";
import { getPlatformTarget } from "../../src/platforms/registry";
import { FakeLLM } from "./helpers/fakes";

describe("extractJsonPayload", () => {
  it("should ignore braces inside strings", () => {
    expect(extractJsonPayload('note: {"a":"}{"} trailing', "object")).toEqual({ a: "}{" });
  });

  it("should return undefined when nothing parses", () => {
    expect(extractJsonPayload("[not json", "array")).toBeUndefined();
  });
});

describe("lenient parsers", () => {
  it("should keep listing entries with usable URLs and skip the rest", () => {
    const raw = [
      "Here you go:",
      "```json",
      '[{"title":"A","url":"https://a.example/1","rank":"1"},{"title":"no url"},{"url":"javascript:void(0)"},' +
        '{"url":"https://b.example","publisher":"B","date":"2024-05-01","rank":2}]',
      "```",
    ].join("\n");

    expect(parseListing(raw)).toEqual([
      { url: "https://a.example/1", title: "A", rank: 1 },
      { url: "https://b.example", publisher: "B", date: "2024-05-01", rank: 2 },
    ]);
  });

  it("should accept a listing wrapped in an object", () => {
    expect(parseListing('{"results":[{"url":"https://c.example"}]}')).toEqual([{ url: "https://c.example" }]);
  });

  it("should return nothing for prose", () => {
    expect(parseListing("sorry, I can't read this page")).toEqual([]);
  });

  it("should coerce has_comments and drop empty fields", () => {
    expect(parsePageSummary('{"title":"  Hello   world ","author":"","has_comments":"yes","summary":"Short."}')).toEqual({
      hasComments: true,
      title: "Hello world",
      summary: "Short.",
    });
    expect(parsePageSummary("nope")).toEqual({ hasComments: false });
  });

  it("should read comment texts from strings or objects", () => {
    expect(parseComments('["first", {"text":"second"}, {"body":"third"}, 42, ""]')).toEqual([
      "first",
      "second",
      "third",
    ]);
  });

  it("should keep one metadata slot per item so order lines up", () => {
    expect(
      parseCommentMetadata('[{"author":"ann","time":"2h","likes":"1.2K"},{"author":null,"likes":"n/a"},"junk"]')
    ).toEqual([{ author: "ann", postedAt: "2h", likes: 1200 }, {}, {}]);
  });
});

describe("parseFeedPosts", () => {
  it("should read posts with defaults for missing flags", () => {
    const raw =
      '```json\n[{"post_id":"p1","author_name":"Ann","post_text":"Reef  restoration update","likes_count":12,' +
      '"has_media":"yes","media_type":"Image","top_comments":[{"author":"Bo","text":"great","likes":3},{"author":"Cy"}]},' +
      '{"text":"second post"},"junk"]\n```';

    expect(parseFeedPosts(raw)).toEqual([
      {
        postId: "p1",
        author: "Ann",
        text: "Reef restoration update",
        likesCount: "12",
        hasTextContent: true,
        hasMedia: true,
        mediaType: "image",
        hasSeeMore: false,
        isHashtagOnly: false,
        topComments: [{ author: "Bo", text: "great", likes: "3" }],
      },
      {
        text: "second post",
        hasTextContent: true,
        hasMedia: false,
        mediaType: "none",
        hasSeeMore: false,
        isHashtagOnly: false,
        topComments: [],
      },
    ]);
  });

  it("should mark posts without text as lacking text content", () => {
    const [post] = parseFeedPosts('{"posts":[{"post_id":"p9","has_media":true,"media_type":"video"}]}');
    expect(post?.hasTextContent).toBe(false);
    expect(post?.text).toBe("");
  });
});

describe("parseFeedComments", () => {
  it("should accept a wrapped list and drop comments without text", () => {
    expect(parseFeedComments({ comments: [{ comment: "ok", time: "2h", replies: 1 }, { author: "nobody" }] })).toEqual([
      { text: "ok", time: "2h", replies: "1" },
    ]);
  });
});

describe("VisionExtractor", () => {
  const ddg = getPlatformTarget("duckduckgo");

  it("should send the screenshot as a PNG data URL and record usage", async () => {
    if (!ddg) throw new Error("duckduckgo target missing");
    const llm = new FakeLLM('[{"url":"https://a.example"}]');
    const ledger = new CostLedger(0.001);
    const extractor = new VisionExtractor(llm, { model: "vision-test", timeoutMs: 1000 });

    const entries = await extractor.extractSearchResults(Buffer.from("png"), ddg, { ledger });

    expect(entries).toEqual([{ url: "https://a.example" }]);
    expect(ledger.promptTokens).toBe(30);
    expect(ledger.callCount).toBe(1);
    const call = llm.calls[0];
    expect(call?.options?.model).toBe("vision-test");
    expect(call?.content[1]).toEqual({ type: "image", dataUrl: "data:image/png;base64,cG5n" });
    const prompt = call?.content[0];
    expect(prompt?.type === "text" && prompt.text.includes("DuckDuckGo")).toBe(true);
  });

  it("should cap top comments at the requested limit", async () => {
    const llm = new FakeLLM('[{"text":"a"},{"text":"b"},{"text":"c"}]');
    const extractor = new VisionExtractor(llm, { timeoutMs: 1000 });

    const comments = await extractor.extractTopComments(Buffer.from("png"), 2, { ledger: new CostLedger(0) });

    expect(comments).toEqual([{ text: "a" }, { text: "b" }]);
    expect(llm.calls[0]?.options?.maxTokens).toBe(2000);
  });

  it("should turn inference failures into ExtractionError", async () => {
    const extractor = new VisionExtractor(new FakeLLM(new LLMError("Authentication failed (401)", "auth_failed")));
    const ledger = new CostLedger(0);

    await expect(extractor.extractComments(Buffer.from("png"), { ledger })).rejects.toBeInstanceOf(ExtractionError);
    await expect(extractor.extractComments(Buffer.from("png"), { ledger })).rejects.toMatchObject({ code: "auth_failed" });
    expect(ledger.callCount).toBe(0);
  });
});
