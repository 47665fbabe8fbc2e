#!/usr/bin/env node
import "dotenv/config";
import { Command, InvalidArgumentError } from "commander";
import { createTerminal } from "./cli";
import type { Terminal } from "./cli";
import { executeColor } from "./commands/color";
import { executeGuess } from "./commands/guess";
import { executeName } from "./commands/name";
import { executeSafari } from "./commands/safari";
import { getDefaultPageSize, shouldClearScreen } from "./utils/config";
import { isPromptError } from "./utils/errors";
import { logger } from "./utils/logger";

function parseInteger(value: string): number {
  if (!/^[+-]?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return Number.parseInt(value, 10);
}

/**
 * Run a demo against stdin/stdout, closing the terminal afterwards.
 */
async function withTerminal(run: (terminal: Terminal) => Promise<unknown>): Promise<void> {
  const terminal = createTerminal();
  try {
    await run(terminal);
  } finally {
    terminal.close();
  }
}

const program = new Command();

program
  .name("terminal-prompts")
  .description("Demo programs for the terminal prompt helpers")
  .version("1.0.0");

program
  .command("guess")
  .description("Guess the secret number")
  .option("--min <n>", "Lowest possible number", parseInteger, 1)
  .option("--max <n>", "Highest possible number", parseInteger, 100)
  .option("--no-clear", "Do not clear the screen between guesses")
  .action(async (options: { min: number; max: number; clear: boolean }) => {
    await withTerminal((terminal) =>
      executeGuess({ ...options, clear: options.clear && shouldClearScreen() }, terminal)
    );
  });

program
  .command("color")
  .description("Pick your favorite color")
  .option("--no-clear", "Do not clear the screen first")
  .action(async (options: { clear: boolean }) => {
    await withTerminal((terminal) => executeColor({ clear: options.clear && shouldClearScreen() }, terminal));
  });

program
  .command("safari")
  .description("Page through the animals seen on a safari")
  .option("-p, --per-page <n>", "Animals per page", parseInteger)
  .option("--no-clear", "Do not clear the screen between pages")
  .action(async (options: { perPage?: number; clear: boolean }) => {
    await withTerminal((terminal) =>
      executeSafari(
        { perPage: options.perPage ?? getDefaultPageSize(), clear: options.clear && shouldClearScreen() },
        terminal
      )
    );
  });

program
  .command("name")
  .description("Say hello")
  .option("-m, --max-length <n>", "Maximum name length", parseInteger)
  .action(async (options: { maxLength?: number }) => {
    await withTerminal((terminal) => executeName(options, terminal));
  });

program.parseAsync().catch((error: unknown) => {
  if (isPromptError(error)) {
    process.stderr.write(`${error.getFullMessage()}\n`);
  } else {
    logger.error("Unexpected failure", {}, error);
    process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  }
  process.exitCode = 1;
});
