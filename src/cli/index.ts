#!/usr/bin/env node
import { Command } from "commander";
import { createInterface } from "readline";
import { logger } from "../core/logger";
import { getVersionInfo } from "./plugins/version";
import { createRegistry } from "./plugins";
import { Dispatcher } from "./dispatcher";
import { createConsoleIO, createDefaultServices } from "./services";
import { runShell } from "./shell";

async function main(argv: string[]): Promise<void> {
  const info = getVersionInfo();
  const program = new Command();

  program
    .name(info.name)
    .description("Depth-configurable, vision-assisted web intelligence collector")
    .version(info.version)
    .enablePositionalOptions()
    .passThroughOptions()
    .allowUnknownOption()
    .argument("[command...]", "command to run once; starts the interactive shell when omitted")
    .action(async (tokens: string[]) => {
      const registry = createRegistry();
      const interactive = tokens.length === 0;
      const rl = interactive
        ? createInterface({ input: process.stdin, output: process.stdout, terminal: process.stdin.isTTY })
        : undefined;
      const io = createConsoleIO(rl);
      const dispatcher = new Dispatcher(registry, {
        interactive,
        io,
        services: createDefaultServices(),
      });

      if (rl) {
        await runShell(dispatcher, io, rl);
        return;
      }
      process.exitCode = await dispatcher.dispatch(tokens);
    });

  await program.parseAsync(argv);
}

main(process.argv).catch((error: unknown) => {
  logger.fatal({ error }, "Unhandled error");
  process.exitCode = 1;
});
