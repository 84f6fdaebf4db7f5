import type { Clock } from "../core/timeout";
import type { SessionProvider } from "../domain/scrape-types";
import type { LLMClient, ModelCatalog } from "../llm/contracts";
import type { PageExtractor, PostExtractor } from "../llm/vision-extractor";
import type { InstructionInterpreter } from "../orchestration/instruction-interpreter";
import type { RecordExporter } from "../services/csv-exporter";

export interface CommandIO {
  print(line: string): void;
  error(line: string): void;
  /** Prints `question` and resolves with the next input line. */
  ask(question: string): Promise<string>;
}

export interface SessionOptions {
  headless?: boolean;
}

/** Collaborators a command builds its run from. Tests swap in fakes. */
export interface CommandServices {
  hasCredentials(): boolean;
  createLLM(): LLMClient;
  createModelCatalog(): ModelCatalog;
  createInterpreter(llm: LLMClient): InstructionInterpreter;
  createExtractor(llm: LLMClient): PageExtractor;
  createPostExtractor(llm: LLMClient): PostExtractor;
  createSessionProvider(options?: SessionOptions): SessionProvider;
  exporter: RecordExporter;
  clock: Clock;
  pause: () => Promise<void>;
  pricePer1kTokens: number;
}

export interface CommandContext {
  interactive: boolean;
  io: CommandIO;
  services: CommandServices;
}

/** Resolves to an exit code; undefined means 0. */
export type CommandHandler = (args: string[], ctx: CommandContext) => Promise<number | void>;

export interface CommandSpec {
  description: string;
  usage: string;
  requiresCredentials: boolean;
  handler: CommandHandler;
}

export interface PluginDescriptor {
  name: string;
  description: string;
  version: string;
  commands: Record<string, CommandSpec>;
}
