import { logger } from "../core/logger";
import { CommandNotFoundError, MissingCredentialsError, UsageError, isFatalCommandError } from "../core/errors";
import type { PluginRegistry } from "./registry";
import type { CommandContext } from "./types";

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_USAGE = 2;

/** Splits a shell line on whitespace; single or double quotes group words. */
export function tokenizeCommandLine(line: string): string[] {
  const tokens: string[] = [];
  let current = "";
  let quote: '"' | "'" | null = null;
  let inToken = false;

  for (const ch of line) {
    if (quote) {
      if (ch === quote) quote = null;
      else current += ch;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
      inToken = true;
    } else if (/\s/.test(ch)) {
      if (inToken) tokens.push(current);
      current = "";
      inToken = false;
    } else {
      current += ch;
      inToken = true;
    }
  }
  if (inToken) tokens.push(current);
  return tokens;
}

export class Dispatcher {
  private busy = false;

  constructor(
    private readonly registry: PluginRegistry,
    private readonly ctx: CommandContext
  ) {}

  get isBusy(): boolean {
    return this.busy;
  }

  async dispatch(input: string | string[]): Promise<number> {
    const tokens = typeof input === "string" ? tokenizeCommandLine(input) : [...input];
    if (tokens.length === 0) return EXIT_OK;

    if (this.busy) {
      this.ctx.io.error("Another command is still running; wait for it to finish.");
      return EXIT_FATAL;
    }

    this.busy = true;
    try {
      return await this.execute(tokens);
    } finally {
      this.busy = false;
    }
  }

  private async execute([name = "", ...args]: string[]): Promise<number> {
    if (name.toLowerCase() === "help") {
      this.printHelp();
      return EXIT_OK;
    }

    try {
      const command = this.registry.resolve(name);
      if (command.spec.requiresCredentials && !this.ctx.services.hasCredentials()) {
        throw new MissingCredentialsError("OPENAI_API_KEY");
      }

      logger.debug({ command: command.name, args }, "Dispatching command");
      const code = await command.spec.handler(args, this.ctx);
      return code ?? EXIT_OK;
    } catch (error) {
      return this.report(error);
    }
  }

  private report(error: unknown): number {
    const { io } = this.ctx;

    if (error instanceof CommandNotFoundError) {
      io.error(`${error.message}. Type "help" to list commands.`);
      return EXIT_USAGE;
    }
    if (error instanceof UsageError) {
      io.error(`Error: ${error.message}`);
      if (error.usage) io.error(`Usage: ${error.usage}`);
      return EXIT_USAGE;
    }

    const message = error instanceof Error ? error.message : String(error);
    if (isFatalCommandError(error)) {
      logger.debug({ error }, "Command ended with a fatal error");
    } else {
      logger.error({ error }, "Command failed");
    }
    io.error(`Error: ${message}`);
    return EXIT_FATAL;
  }

  private printHelp(): void {
    const { io, interactive } = this.ctx;
    const commands = this.registry.list();
    const width = Math.max(4, ...commands.map((c) => c.name.length));

    io.print("Commands:");
    for (const command of commands) {
      io.print(`  ${command.name.padEnd(width)}  ${command.spec.description}`);
      io.print(`  ${" ".repeat(width)}  usage: ${command.spec.usage}`);
    }
    io.print(`  ${"help".padEnd(width)}  Show this list`);
    if (interactive) {
      io.print(`  ${"exit".padEnd(width)}  Leave the shell (also: quit)`);
    }
  }
}
