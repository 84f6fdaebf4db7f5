import { Command } from "commander";
import { Deadline } from "../../core/timeout";
import { STAGE_NAMES } from "../../domain/depth-state-machine";
import { CostLedger } from "../../llm/cost-tracker";
import { resolvePlatforms } from "../../platforms/registry";
import { ScrapeOrchestrator } from "../../orchestration/scrape-orchestrator";
import { mergeRecords } from "../../orchestration/record-merger";
import { parseCommandArgs, parseInteger } from "../args";
import type { CommandContext, PluginDescriptor } from "../types";

export const DEEPSCRAPE_USAGE =
  'deepscrape "<term|instruction>" [--results=N] [--platforms=STR] [--depth=0|1|2|3] [--timeout=SECONDS]';

type DeepscrapeOptions = {
  results?: number;
  platforms?: string;
  depth?: number;
  timeout?: number;
};

export async function deepscrape(args: string[], ctx: CommandContext): Promise<number> {
  const parsed = parseCommandArgs(
    new Command("deepscrape")
      .argument("<instruction...>", "search term or natural-language instruction")
      .option("--results <n>", "number of results to collect", parseInteger)
      .option("--platforms <spec>", "platforms or groups, e.g. \"news, reddit\"")
      .option("--depth <level>", "0 links, 1 metadata, 2 comments, 3 comment metadata", parseInteger)
      .option("--timeout <seconds>", "wall-clock budget for the whole run", parseInteger),
    args,
    DEEPSCRAPE_USAGE
  );
  const options = parsed.opts<DeepscrapeOptions>();
  const { services, io } = ctx;

  const ledger = new CostLedger(services.pricePer1kTokens);
  const llm = services.createLLM();
  const request = await services.createInterpreter(llm).interpret(parsed.args.join(" "), options, { ledger });
  const { targets, unmatched } = resolvePlatforms(request.platformSpec);

  io.print(`Search term: ${request.searchTerm}${request.source === "inference" ? " (from instruction)" : ""}`);
  io.print(`Platforms:   ${targets.map((t) => t.label).join(", ")}`);
  if (unmatched.length > 0) {
    io.print(`Ignored:     ${unmatched.join(", ")}`);
  }
  io.print(`Depth:       ${request.depth} (${STAGE_NAMES[request.depth]}), results: ${request.targetResults}`);

  const orchestrator = new ScrapeOrchestrator({
    extractor: services.createExtractor(llm),
    sessions: services.createSessionProvider(),
    pause: services.pause,
    now: () => new Date(services.clock()),
  });
  const deadline = new Deadline(request.timeoutSeconds, services.clock);
  const result = await orchestrator.run(request, targets, {
    runId: `deepscrape-${services.clock()}`,
    ledger,
    deadline,
  });

  const records = mergeRecords(result.records);
  if (result.timedOut) {
    io.print(`Timeout reached after ${request.timeoutSeconds}s: ${records.length}/${request.targetResults} results completed.`);
  }
  for (const outcome of result.platforms.filter((p) => p.error)) {
    io.print(`Skipped ${outcome.platform}: ${outcome.error?.message ?? "failed"}`);
  }

  if (records.length === 0) {
    io.print("No results collected.");
    return 0;
  }

  const path = await services.exporter.writeDeepScrape(request.searchTerm, records);
  io.print(`Collected ${records.length} result(s). CSV: ${path}`);
  io.print(
    `Tokens: ${ledger.promptTokens} prompt + ${ledger.completionTokens} completion over ${ledger.callCount} call(s). ` +
      `Estimated cost $${ledger.estimatedCost.toFixed(4)} ($${ledger.averagePerRecord(records.length).toFixed(5)} per result)`
  );
  return 0;
}

export const deepscrapePlugin: PluginDescriptor = {
  name: "deepscrape",
  description: "Depth-controlled multi-platform scraping",
  version: "1.0.0",
  commands: {
    deepscrape: {
      description: "Search platforms for a topic and extract results to the requested depth",
      usage: DEEPSCRAPE_USAGE,
      requiresCredentials: true,
      handler: deepscrape,
    },
  },
};
