import type { Interface } from "readline";
import type { Dispatcher } from "./dispatcher";
import type { CommandIO } from "./types";

const EXIT_WORDS = new Set(["exit", "quit"]);
export const SHELL_PROMPT = "webscout> ";

/** Reads commands from `rl` until exit, quit or end of input, then closes it. */
export async function runShell(dispatcher: Dispatcher, io: CommandIO, rl: Interface): Promise<void> {
  rl.setPrompt(SHELL_PROMPT);
  io.print('webscout interactive shell. Type "help" for commands, "exit" to leave.');
  rl.prompt();

  try {
    for await (const line of rl) {
      const trimmed = line.trim();
      if (EXIT_WORDS.has(trimmed.toLowerCase())) break;
      if (trimmed) {
        await dispatcher.dispatch(trimmed);
      }
      rl.prompt();
    }
  } finally {
    rl.close();
  }
  io.print("Bye.");
}
