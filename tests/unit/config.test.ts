import { describe, it, expect } from "vitest";
import { loadEnv } from "../../src/core/config";
import { ConfigError } from "../../src/core/errors";

describe("loadEnv", () => {
  it("should apply defaults and coerce numbers", () => {
    const env = loadEnv({ OPENAI_API_KEY: "  test-secret  ", SCRAPER_MAX_SCROLL_ROUNDS: "4", LOG_PRETTY: "false" });

    expect(env.OPENAI_API_KEY).toBe("test-secret");
    expect(env.SCRAPER_MAX_SCROLL_ROUNDS).toBe(4);
    expect(env.LOG_PRETTY).toBe(false);
    expect(env.DEEPSCRAPE_DEFAULT_PLATFORMS).toBe("duckduckgo");
    expect(env.PLAYWRIGHT_EXECUTABLE_PATH).toBeUndefined();
  });

  it("should treat a blank key as missing", () => {
    expect(loadEnv({ OPENAI_API_KEY: "   " }).OPENAI_API_KEY).toBeUndefined();
  });

  it("should reject invalid values with a ConfigError", () => {
    expect(() => loadEnv({ SCRAPER_MAX_SCROLL_ROUNDS: "0" })).toThrow(ConfigError);
    expect(() => loadEnv({ LOG_LEVEL: "loud" })).toThrow(/LOG_LEVEL/);
  });
});
