import { Command, CommanderError, InvalidArgumentError } from "commander";
import { UsageError } from "../core/errors";

export function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return Number.parseInt(value, 10);
}

/**
 * Parses one command's arguments with commander, turning its usage errors
 * into UsageError instead of exiting the process.
 */
export function parseCommandArgs(command: Command, args: string[], usage: string): Command {
  command
    .exitOverride()
    .helpOption(false)
    .allowExcessArguments(true)
    .configureOutput({
      writeOut: () => undefined,
      writeErr: () => undefined,
    });

  try {
    command.parse(args, { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      throw new UsageError(error.message.replace(/^error:\s*/i, ""), usage);
    }
    throw error;
  }
  return command;
}
