import { clearTerminal, getNumber } from "../cli";
import type { Terminal } from "../cli";
import { ConfigurationError } from "../utils/errors";
import { logger } from "../utils/logger";

interface GuessOptions {
  min?: number;
  max?: number;
  clear?: boolean;
}

/**
 * Returns a value in [0, 1), like Math.random.
 */
export type RandomSource = () => number;

/**
 * Number guessing game: keep asking until the secret number is found.
 *
 * @returns the number of guesses it took
 */
export async function executeGuess(
  options: GuessOptions,
  terminal: Terminal,
  random: RandomSource = Math.random
): Promise<number> {
  const { min = 1, max = 100, clear = true } = options;

  if (!Number.isInteger(min) || !Number.isInteger(max) || min > max) {
    throw new ConfigurationError(`Invalid range: ${min} to ${max}.`);
  }

  const secret = min + Math.floor(random() * (max - min + 1));
  logger.debug("Guessing game started", { min, max });

  if (clear) {
    clearTerminal(terminal);
  }

  let guesses = 0;
  for (;;) {
    const guess = await getNumber(
      { header: `Pick a number between ${min} and ${max}!`, retry: "Try Again.", min, max },
      terminal
    );
    guesses += 1;

    if (clear) {
      clearTerminal(terminal);
    }

    if (guess < secret) {
      terminal.writeLine(`${guess} is too low!`);
    } else if (guess > secret) {
      terminal.writeLine(`${guess} is too high!`);
    } else {
      terminal.writeLine("YOU WIN!");
      terminal.writeLine(`${guess} was the secret number!`);
      terminal.writeLine(`Number of guesses: ${guesses}`);
      return guesses;
    }
  }
}
