import { Command } from "commander";
import { env } from "../../core/config";
import { UsageError } from "../../core/errors";
import { Deadline } from "../../core/timeout";
import type { FacebookPostRecord } from "../../domain/models";
import { CostLedger } from "../../llm/cost-tracker";
import { FacebookFeedScraper } from "../../platforms/facebook/facebook.scraper";
import { FACEBOOK_SESSION_DOMAIN } from "../../platforms/facebook/selectors";
import { resolveFacebookTarget } from "../../platforms/facebook/target";
import { parseCommandArgs, parseInteger } from "../args";
import type { CommandContext, PluginDescriptor } from "../types";

export const FB_SCRAPE_USAGE = "fb-scrape <TAG|URL> [max_posts]";

export async function fbScrape(args: string[], ctx: CommandContext): Promise<number> {
  const parsed = parseCommandArgs(
    new Command("fb-scrape")
      .argument("<target>", "hashtag, #hashtag or facebook.com URL")
      .argument("[max_posts]", "number of posts to keep", parseInteger),
    args,
    FB_SCRAPE_USAGE
  );
  // parseInteger has already rejected non-integers.
  const [input = "", maxArg] = parsed.args;
  const maxPosts = maxArg === undefined ? env.FACEBOOK_DEFAULT_MAX_POSTS : Number.parseInt(maxArg, 10);
  if (maxPosts < 1) throw new UsageError("max_posts must be at least 1", FB_SCRAPE_USAGE);

  const target = resolveFacebookTarget(input, FB_SCRAPE_USAGE);
  const { services, io } = ctx;

  io.print(`Facebook feed: ${target.url}`);
  io.print(`Tag:           ${target.tag}, max posts: ${maxPosts}`);

  const ledger = new CostLedger(services.pricePer1kTokens);
  const sessions = services.createSessionProvider({ headless: false });
  const scraper = new FacebookFeedScraper({
    extractor: services.createPostExtractor(services.createLLM()),
    confirmLogin: (question) => io.ask(question),
    pause: services.pause,
    now: () => new Date(services.clock()),
  });

  let records: FacebookPostRecord[] = [];
  try {
    const session = await sessions.acquire(FACEBOOK_SESSION_DOMAIN);
    records = await scraper.run(target, maxPosts, session, {
      runId: `fb-scrape-${services.clock()}`,
      ledger,
      deadline: new Deadline(env.DEEPSCRAPE_DEFAULT_TIMEOUT_SECONDS, services.clock),
    });
  } finally {
    await sessions.closeAll();
  }

  if (records.length === 0) {
    io.print("No posts collected.");
    return 0;
  }

  const path = await services.exporter.writeFacebookPosts(target.tag, records);
  io.print(`Collected ${records.length} post(s). CSV: ${path}`);
  io.print(`Tokens: ${ledger.totalTokens} over ${ledger.callCount} call(s), estimated cost $${ledger.estimatedCost.toFixed(4)}`);
  return 0;
}

export const facebookPlugin: PluginDescriptor = {
  name: "facebook",
  description: "Facebook hashtag and page feed collection",
  version: "1.0.0",
  commands: {
    "fb-scrape": {
      description: "Collect posts and top comments from a Facebook hashtag or page feed",
      usage: FB_SCRAPE_USAGE,
      requiresCredentials: true,
      handler: fbScrape,
    },
  },
};
