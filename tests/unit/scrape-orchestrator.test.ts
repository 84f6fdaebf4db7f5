import { describe, it, expect } from "vitest";
import { AllPlatformsFailedError } from "../../src/core/errors";
import { Deadline } from "../../src/core/timeout";
import type { Depth, PlatformTarget, ScrapeRequest } from "../../src/domain/models";
import type { RunContext } from "../../src/domain/scrape-types";
import { CostLedger } from "../../src/llm/cost-tracker";
import { ScrapeOrchestrator } from "../../src/orchestration/scrape-orchestrator";
import { getPlatformTarget } from "../../src/platforms/registry";
import { FakeExtractor, FakeSessionProvider, ManualClock, type FakeExtractorOptions } from "./helpers/fakes";

function target(id: string): PlatformTarget {
  const found = getPlatformTarget(id);
  if (!found) throw new Error(`missing platform ${id}`);
  return found;
}

function request(depth: Depth, targetResults: number, searchTerm = "ocean diversity"): ScrapeRequest {
  return {
    rawInstruction: searchTerm,
    searchTerm,
    targetResults,
    platformSpec: "test",
    depth,
    timeoutSeconds: 900,
    source: "term",
  };
}

function context(deadline = new Deadline(900)): RunContext {
  return { runId: "test-run", ledger: new CostLedger(0.001), deadline };
}

function setup(options: FakeExtractorOptions = {}, failOn?: (url: string) => boolean, maxScrollRounds = 8) {
  const extractor = new FakeExtractor(options);
  const sessions = new FakeSessionProvider(failOn);
  const orchestrator = new ScrapeOrchestrator({
    extractor,
    sessions,
    pause: async () => undefined,
    limits: { stageTimeoutMs: 1000, maxScrollRounds, maxEmptyRounds: 3 },
    now: () => new Date("2024-01-01T00:00:00.000Z"),
  });
  return { extractor, sessions, orchestrator };
}

describe("ScrapeOrchestrator", () => {
  it("should page through listings until the quota is filled", async () => {
    const { extractor, sessions, orchestrator } = setup();

    const result = await orchestrator.run(request(0, 7), [target("duckduckgo")], context());

    expect(result.records.map((r) => r.rank)).toEqual([1, 2, 3, 4, 5, 6, 7]);
    expect(result.records.every((r) => r.completedStage === 0 && r.platform === "duckduckgo")).toBe(true);
    expect(result.records[0]?.title).toBeUndefined();
    expect(result.timedOut).toBe(false);
    expect(extractor.listingCalls.get("duckduckgo")).toBe(2);

    const page = sessions.sessions.get("duckduckgo.com")?.pages[0];
    expect(page?.visited).toEqual(["https://duckduckgo.com/?q=ocean+diversity&t=h_&ia=web"]);
    expect(page?.clicks).toBe(2);
    expect(page?.scrolls).toBe(1);
    expect(page?.closed).toBe(true);
    expect(sessions.closeAllCalls).toBe(1);
  });

  it("should deduplicate by normalized URL within a platform and stop after empty passes", async () => {
    const { extractor, orchestrator } = setup({
      listing: () => [
        { url: "https://a.example/x?utm_source=feed" },
        { url: "https://a.example/x" },
        { url: "https://b.example/" },
      ],
    });

    const result = await orchestrator.run(request(0, 10), [target("duckduckgo")], context());

    expect(result.records.map((r) => [r.rank, r.url])).toEqual([
      [1, "https://a.example/x?utm_source=feed"],
      [2, "https://b.example/"],
    ]);
    expect(extractor.listingCalls.get("duckduckgo")).toBe(4);
  });

  it("should stop after the maximum number of passes", async () => {
    const { extractor, orchestrator } = setup({
      listing: (t, call) => [{ url: `https://${t.id}.example/only-${call}` }],
    });

    const result = await orchestrator.run(request(0, 20), [target("duckduckgo")], context());

    expect(result.records).toHaveLength(8);
    expect(extractor.listingCalls.get("duckduckgo")).toBe(8);
  });

  it("should split the quota across platforms and rank each batch from 1", async () => {
    const { sessions, orchestrator } = setup();

    const result = await orchestrator.run(
      request(0, 5),
      [target("reddit"), target("x"), target("medium")],
      context()
    );

    const ranksFor = (platform: string) => result.records.filter((r) => r.platform === platform).map((r) => r.rank);
    expect(ranksFor("reddit")).toEqual([1, 2]);
    expect(ranksFor("x")).toEqual([1, 2]);
    expect(ranksFor("medium")).toEqual([1]);
    expect([...sessions.sessions.keys()]).toEqual(["duckduckgo.com"]);
    expect(result.platforms.map((p) => [p.platform, p.requested, p.collected])).toEqual([
      ["reddit", 2, 2],
      ["x", 2, 2],
      ["medium", 1, 1],
    ]);
  });

  it("should skip platforms whose quota is zero", async () => {
    const { orchestrator } = setup();

    const result = await orchestrator.run(
      request(0, 2),
      [target("reddit"), target("x"), target("medium")],
      context()
    );

    expect(result.platforms.map((p) => p.platform)).toEqual(["reddit", "x"]);
    expect(result.records).toHaveLength(2);
  });

  it("should return partial results when the deadline passes", async () => {
    const clock = new ManualClock();
    const { orchestrator } = setup({
      summary: (url) => {
        clock.advance(4000);
        return { title: `Title of ${url}`, hasComments: false };
      },
    });

    const result = await orchestrator.run(
      request(1, 10),
      [target("duckduckgo"), target("google")],
      context(new Deadline(10, clock.read))
    );

    expect(result.timedOut).toBe(true);
    expect(result.records.map((r) => r.rank)).toEqual([1, 2, 3]);
    expect(result.records.every((r) => r.completedStage === 1)).toBe(true);
    expect(result.platforms.map((p) => p.platform)).toEqual(["duckduckgo"]);
  });

  it("should skip a failing platform and keep the others", async () => {
    const { orchestrator } = setup(
      {
        listing: (t, call) => {
          if (t.id === "bing") throw new Error("vision service unavailable");
          return [{ url: `https://${t.id}.example/${call}` }];
        },
      },
      (url) => url.includes("google.com")
    );

    const result = await orchestrator.run(
      request(0, 3),
      [target("duckduckgo"), target("google"), target("bing")],
      context()
    );

    expect(result.records.map((r) => r.platform)).toEqual(["duckduckgo"]);
    expect(result.platforms.map((p) => [p.platform, p.error?.code])).toEqual([
      ["duckduckgo", undefined],
      ["google", "platform_failed"],
      ["bing", "platform_failed"],
    ]);
  });

  it("should fail when every platform fails", async () => {
    const { sessions, orchestrator } = setup({}, () => true);

    await expect(
      orchestrator.run(request(0, 4), [target("duckduckgo"), target("bing")], context())
    ).rejects.toBeInstanceOf(AllPlatformsFailedError);
    expect(sessions.closeAllCalls).toBe(1);
  });

  it("should report a timeout, not a failure, when the deadline stops the run after a failed platform", async () => {
    const clock = new ManualClock();
    const { sessions, orchestrator } = setup({}, (url) => {
      if (!url.includes("duckduckgo.com")) return false;
      clock.advance(20_000);
      return true;
    });

    const result = await orchestrator.run(
      request(0, 4),
      [target("duckduckgo"), target("bing")],
      context(new Deadline(10, clock.read))
    );

    expect(result.timedOut).toBe(true);
    expect(result.records).toEqual([]);
    expect(result.platforms.map((p) => [p.platform, p.error?.code])).toEqual([["duckduckgo", "platform_failed"]]);
    expect(sessions.sessions.has("bing.com")).toBe(false);
  });

  it("should keep listing fields in listing mode", async () => {
    const { extractor, orchestrator } = setup();

    const result = await orchestrator.run(request(0, 2, "AI news"), [target("duckduckgo")], context(), {
      mode: "listing",
    });

    expect(result.records[0]).toEqual({
      searchTerm: "AI news",
      url: "https://duckduckgo.example/1-1",
      platform: "duckduckgo",
      rank: 1,
      scrapedAt: "2024-01-01T00:00:00.000Z",
      hasComments: false,
      comments: [],
      completedStage: 0,
      title: "duckduckgo result 1-1",
      excerpt: "excerpt 1",
      publisher: "DuckDuckGo",
    });
    expect(extractor.summaryCalls).toEqual([]);
  });

  it("should never emit a record deeper than requested", async () => {
    for (const depth of [0, 1, 2, 3] as const) {
      const { orchestrator } = setup({
        summary: () => ({ title: "t", hasComments: true }),
        comments: ["c"],
        metadata: [{ author: "a" }],
      });

      const result = await orchestrator.run(request(depth, 2), [target("reddit")], context());

      for (const record of result.records) {
        expect(record.completedStage).toBe(depth);
        if (depth < 1) expect(record.title).toBeUndefined();
        if (depth < 2) expect(record.comments).toEqual([]);
        if (depth === 2) expect(record.comments).toEqual([{ text: "c" }]);
        if (depth === 3) expect(record.comments).toEqual([{ text: "c", author: "a" }]);
      }
    }
  });
});
