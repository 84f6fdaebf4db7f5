import { Command } from "commander";
import { UsageError } from "../../core/errors";
import { Deadline } from "../../core/timeout";
import { env } from "../../core/config";
import { ScrapeRequestSchema, SearchEngineSchema } from "../../domain/models";
import { CostLedger } from "../../llm/cost-tracker";
import { getPlatformTarget } from "../../platforms/registry";
import { ScrapeOrchestrator } from "../../orchestration/scrape-orchestrator";
import { mergeRecords } from "../../orchestration/record-merger";
import { parseCommandArgs } from "../args";
import type { CommandContext, PluginDescriptor } from "../types";

export const WEBSCRAPE_USAGE = 'webscrape "<SEARCH TERM>" <LIMIT> --location=<duckduckgo|google|bing>';
const DEFAULT_LIMIT = 10;

export async function webscrape(args: string[], ctx: CommandContext): Promise<number> {
  const parsed = parseCommandArgs(
    new Command("webscrape")
      .argument("<words...>", "search term, optionally followed by a result limit")
      .option("--location <engine>", "duckduckgo, google or bing", "duckduckgo"),
    args,
    WEBSCRAPE_USAGE
  );
  const { location } = parsed.opts<{ location: string }>();

  const terms: string[] = [];
  let limit = DEFAULT_LIMIT;
  for (const word of parsed.args) {
    if (/^\d+$/.test(word)) limit = Number.parseInt(word, 10);
    else terms.push(word);
  }
  const term = terms.join(" ").trim();
  if (!term) throw new UsageError("Search term is required", WEBSCRAPE_USAGE);
  if (limit < 1) throw new UsageError("Limit must be at least 1", WEBSCRAPE_USAGE);

  const engine = SearchEngineSchema.safeParse(location.toLowerCase());
  const target = engine.success ? getPlatformTarget(engine.data) : undefined;
  if (!engine.success || !target) {
    throw new UsageError(`Invalid search engine '${location}'`, WEBSCRAPE_USAGE);
  }

  const { services, io } = ctx;
  const request = Object.freeze(
    ScrapeRequestSchema.parse({
      rawInstruction: term,
      searchTerm: term,
      targetResults: limit,
      platformSpec: engine.data,
      depth: 0,
      timeoutSeconds: env.DEEPSCRAPE_DEFAULT_TIMEOUT_SECONDS,
      source: "term",
    })
  );

  io.print(`Searching ${target.label} for "${term}" (limit ${limit})`);

  const ledger = new CostLedger(services.pricePer1kTokens);
  const orchestrator = new ScrapeOrchestrator({
    extractor: services.createExtractor(services.createLLM()),
    sessions: services.createSessionProvider(),
    pause: services.pause,
    now: () => new Date(services.clock()),
  });
  const result = await orchestrator.run(
    request,
    [target],
    { runId: `webscrape-${services.clock()}`, ledger, deadline: new Deadline(request.timeoutSeconds, services.clock) },
    { mode: "listing" }
  );

  const records = mergeRecords(result.records);
  if (records.length === 0) {
    io.print("No results collected.");
    return 0;
  }

  for (const record of records) {
    io.print(`${String(record.rank).padStart(3)}. ${record.title ?? "(untitled)"}`);
    io.print(`     ${record.url}`);
  }

  const path = await services.exporter.writeWebScrape(engine.data, term, records);
  io.print(`Scraped ${records.length} result(s) from ${target.label}. CSV: ${path}`);
  io.print(`Tokens: ${ledger.totalTokens} over ${ledger.callCount} call(s), estimated cost $${ledger.estimatedCost.toFixed(4)}`);
  return 0;
}

export const webscrapePlugin: PluginDescriptor = {
  name: "webscrape",
  description: "Single-engine search result listing",
  version: "1.0.0",
  commands: {
    webscrape: {
      description: "Collect ranked search results from one engine",
      usage: WEBSCRAPE_USAGE,
      requiresCredentials: true,
      handler: webscrape,
    },
  },
};
