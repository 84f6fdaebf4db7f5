import { env } from "../core/config";
import { logger } from "../core/logger";
import { InterpretationError, LLMError, UsageError } from "../core/errors";
import {
  InstructionPlanSchema,
  ScrapeRequestSchema,
  isDepth,
  type Depth,
  type InstructionPlan,
  type ScrapeRequest,
} from "../domain/models";
import type { RunContext } from "../domain/scrape-types";
import type { LLMClient } from "../llm/contracts";
import { parseAndValidate } from "../llm/json";
import { buildInstructionSystemPrompt, buildInstructionUserPrompt } from "../llm/prompts/instruction";
import { PLATFORM_TABLE } from "../platforms/registry";

export const BARE_TERM_MAX_WORDS = 6;
export const BARE_TERM_MAX_CHARS = 60;

const IMPERATIVE_VERBS = new Set([
  "find",
  "search",
  "scrape",
  "collect",
  "gather",
  "get",
  "fetch",
  "pull",
  "look",
  "show",
  "give",
  "list",
  "track",
  "monitor",
  "compile",
  "summarize",
  "research",
  "analyze",
]);

const QUESTION_WORDS = new Set(["what", "which", "who", "how", "why", "when", "where"]);

const REQUEST_PHRASES = [/\bplease\b/, /\bi want\b/, /\bi need\b/, /\bcan you\b/, /\bcould you\b/];

export type InstructionKind = "term" | "instruction";

/**
 * Short noun phrases are search terms; anything longer or phrased as a
 * command, question or request needs interpretation.
 */
export function classifyInstruction(text: string): InstructionKind {
  const trimmed = text.trim();
  const lowered = trimmed.toLowerCase();
  const words = lowered.split(/\s+/).filter(Boolean);
  const first = (words[0] ?? "").replace(/[^a-z]/g, "");

  if (words.length > BARE_TERM_MAX_WORDS || trimmed.length > BARE_TERM_MAX_CHARS) return "instruction";
  if (IMPERATIVE_VERBS.has(first) || QUESTION_WORDS.has(first)) return "instruction";
  if (REQUEST_PHRASES.some((pattern) => pattern.test(lowered))) return "instruction";
  if (trimmed.endsWith("?")) return "instruction";
  return "term";
}

export interface InterpretFlags {
  results?: number;
  platforms?: string;
  depth?: number;
  timeout?: number;
}

export interface InterpreterDefaults {
  results: number;
  platforms: string;
  depth: Depth;
  timeoutSeconds: number;
}

export interface InstructionInterpreter {
  interpret(raw: string, flags: InterpretFlags, ctx: Pick<RunContext, "ledger">): Promise<ScrapeRequest>;
}

export function defaultInterpreterSettings(): InterpreterDefaults {
  return {
    results: env.DEEPSCRAPE_DEFAULT_RESULTS,
    platforms: env.DEEPSCRAPE_DEFAULT_PLATFORMS,
    depth: 0,
    timeoutSeconds: env.DEEPSCRAPE_DEFAULT_TIMEOUT_SECONDS,
  };
}

export function validateFlags(flags: InterpretFlags): void {
  const positiveInt = (value: number | undefined) => value === undefined || (Number.isInteger(value) && value >= 1);

  if (!positiveInt(flags.results)) {
    throw new UsageError(`--results must be a positive integer, got ${flags.results}`);
  }
  if (!positiveInt(flags.timeout)) {
    throw new UsageError(`--timeout must be a positive integer number of seconds, got ${flags.timeout}`);
  }
  if (flags.depth !== undefined && !isDepth(flags.depth)) {
    throw new UsageError(`--depth must be one of 0, 1, 2, 3, got ${flags.depth}`);
  }
  if (flags.platforms !== undefined && flags.platforms.trim().length === 0) {
    throw new UsageError("--platforms must not be empty");
  }
}

export class LlmInstructionInterpreter implements InstructionInterpreter {
  constructor(
    private readonly llm: LLMClient | null,
    private readonly defaults: InterpreterDefaults = defaultInterpreterSettings(),
    private readonly model: string = env.INTERPRETER_MODEL
  ) {}

  async interpret(raw: string, flags: InterpretFlags, ctx: Pick<RunContext, "ledger">): Promise<ScrapeRequest> {
    validateFlags(flags);
    const text = raw.trim();
    if (!text) {
      throw new UsageError("A search term or instruction is required");
    }

    const kind = classifyInstruction(text);
    const plan = kind === "term" ? null : await this.plan(text, ctx);

    const depth = flags.depth ?? plan?.suggested_depth ?? this.defaults.depth;
    const request = ScrapeRequestSchema.parse({
      rawInstruction: text,
      searchTerm: plan?.search_term ?? text,
      targetResults: flags.results ?? plan?.suggested_results ?? this.defaults.results,
      platformSpec: flags.platforms ?? plan?.suggested_platforms ?? this.defaults.platforms,
      depth: isDepth(depth) ? depth : this.defaults.depth,
      timeoutSeconds: flags.timeout ?? this.defaults.timeoutSeconds,
      source: kind === "term" ? "term" : "inference",
    });

    logger.info(
      {
        source: request.source,
        searchTerm: request.searchTerm,
        platforms: request.platformSpec,
        depth: request.depth,
        results: request.targetResults,
      },
      "Interpreted scrape request"
    );

    return Object.freeze(request);
  }

  private async plan(instruction: string, ctx: Pick<RunContext, "ledger">): Promise<InstructionPlan> {
    if (!this.llm) {
      throw new InterpretationError("An inference client is required to interpret instructions", "no_client");
    }

    try {
      const completion = await this.llm.complete([{ type: "text", text: buildInstructionUserPrompt(instruction) }], {
        model: this.model,
        systemPrompt: buildInstructionSystemPrompt(PLATFORM_TABLE.map((p) => p.id)),
        temperature: 0,
        maxTokens: 400,
      });
      ctx.ledger.record(completion.usage);
      return parseAndValidate(completion.content, InstructionPlanSchema);
    } catch (error) {
      if (error instanceof LLMError) {
        throw new InterpretationError(`Could not interpret instruction: ${error.message}`, error.code);
      }
      throw error;
    }
  }
}
