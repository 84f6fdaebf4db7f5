import { createInterface, type Interface } from "readline";
import { env } from "../core/config";
import { actionDelay } from "../core/cooldown";
import { createOpenAIClient } from "../llm/openai-client";
import { VisionExtractor } from "../llm/vision-extractor";
import { LlmInstructionInterpreter } from "../orchestration/instruction-interpreter";
import { PlaywrightSessionProvider } from "../services/browser-session";
import { CsvExporter } from "../services/csv-exporter";
import type { CommandIO, CommandServices } from "./types";

export function createDefaultServices(): CommandServices {
  return {
    hasCredentials: () => Boolean(env.OPENAI_API_KEY),
    createLLM: () => createOpenAIClient(),
    createModelCatalog: () => createOpenAIClient(),
    createInterpreter: (llm) => new LlmInstructionInterpreter(llm),
    createExtractor: (llm) => new VisionExtractor(llm),
    createPostExtractor: (llm) => new VisionExtractor(llm),
    createSessionProvider: (options = {}) => new PlaywrightSessionProvider(options),
    exporter: new CsvExporter(),
    clock: Date.now,
    pause: actionDelay,
    pricePer1kTokens: env.LLM_PRICE_PER_1K_TOKENS,
  };
}

function question(rl: Interface, text: string): Promise<string> {
  return new Promise((resolve) => rl.question(`${text} `, resolve));
}

/**
 * Console output plus line input. The interactive shell passes its own
 * readline so prompts and commands share stdin.
 */
export function createConsoleIO(rl?: Interface): CommandIO {
  return {
    print: (line) => process.stdout.write(`${line}\n`),
    error: (line) => process.stderr.write(`${line}\n`),
    ask: async (text) => {
      if (rl) return question(rl, text);
      const once = createInterface({ input: process.stdin, output: process.stdout });
      try {
        return await question(once, text);
      } finally {
        once.close();
      }
    },
  };
}
