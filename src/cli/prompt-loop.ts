import type { LineWriter, Terminal } from "./terminal";
import { InputStreamError } from "../utils/errors";
import { createContextLogger } from "../utils/logger";

const log = createContextLogger({ module: "prompt-loop" });

export type ParseResult<T> = { ok: true; value: T } | { ok: false; expected: string };

export type Parser<T> = (text: string) => ParseResult<T>;

export type Validator<T> = (value: T, output: LineWriter) => boolean;

export interface PromptText {
  /** Shown once, before the first attempt. */
  header?: string;
  /** Shown before every attempt after the first. */
  retry?: string;
}

export interface PromptLoopOptions<T> extends PromptText {
  parse: Parser<T>;
  validators: ReadonlyArray<Validator<T>>;
}

export function parsed<T>(value: T): ParseResult<T> {
  return { ok: true, value };
}

export function unparsable<T>(expected: string): ParseResult<T> {
  return { ok: false, expected };
}

export const identity: Parser<string> = (text) => parsed(text);

async function readAttempt(terminal: Terminal): Promise<string> {
  try {
    return await terminal.readLine();
  } catch (error) {
    const fatal =
      error instanceof InputStreamError
        ? error
        : new InputStreamError("Unexpected stdin error while reading input.", { cause: error });
    // Ctrl-D lands here too
    log.debug("Aborting prompt: input could not be read", { error: fatal.message });
    throw fatal;
  }
}

/**
 * Read, parse and validate until a line passes.
 *
 * A line that fails to parse prints "Please enter a valid {expected} value.";
 * a failing validator has already printed its own message. Either way the
 * retry text is shown and the next line read. There is no attempt limit.
 */
export async function runPromptLoop<T>(options: PromptLoopOptions<T>, terminal: Terminal): Promise<T> {
  const { header, retry, parse, validators } = options;

  for (let attempt = 1; ; attempt++) {
    const message = attempt === 1 ? header : retry;
    if (message !== undefined) {
      terminal.writeLine(message);
    }

    const text = (await readAttempt(terminal)).trim();
    const result = parse(text);

    if (!result.ok) {
      terminal.writeLine(`Please enter a valid ${result.expected} value.`);
      log.debug("Rejected unparsable input", { attempt, expected: result.expected });
      continue;
    }

    const value = result.value;
    if (validators.every((validate) => validate(value, terminal))) {
      log.debug("Accepted input", { attempt });
      return value;
    }
    log.debug("Rejected input", { attempt });
  }
}
