import { identity, parsed, runPromptLoop, unparsable } from "./prompt-loop";
import type { Parser, PromptText } from "./prompt-loop";
import type { Terminal } from "./terminal";
import { isMember, lengthOk, nonEmptyOk, rangeOk } from "./validators";
import type { MembershipOptions } from "./validators";
import { ConfigurationError } from "../utils/errors";
import { createContextLogger } from "../utils/logger";

const log = createContextLogger({ module: "prompt" });

export type NumberKind = "integer" | "float";

export interface StringPromptOptions extends PromptText {
  maxLength?: number;
  /** Defaults to false. */
  allowEmpty?: boolean;
}

export interface NumberPromptOptions extends PromptText {
  /** Defaults to "integer". */
  kind?: NumberKind;
  min?: number;
  max?: number;
}

export interface NumberChoiceOptions extends PromptText {
  choices: readonly number[];
  /** Inferred from the choices when omitted. */
  kind?: NumberKind;
  showChoicesOnFailure?: boolean;
}

export interface StringChoiceOptions extends PromptText, MembershipOptions {
  choices: readonly string[];
}

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Parser for the given kind of number. Integers outside the safe range are
 * rejected rather than rounded.
 */
export function numberParser(kind: NumberKind): Parser<number> {
  return (text) => {
    if (kind === "integer") {
      const value = INTEGER_PATTERN.test(text) ? Number(text) : Number.NaN;
      // "-0" reads as 0
      return Number.isSafeInteger(value) ? parsed(value === 0 ? 0 : value) : unparsable("integer");
    }
    const value = FLOAT_PATTERN.test(text) ? Number(text) : Number.NaN;
    return Number.isFinite(value) ? parsed(value) : unparsable("float");
  };
}

/**
 * Length in characters, not UTF-16 code units.
 */
function characterCount(text: string): number {
  return Array.from(text).length;
}

function refuse(message: string, context: Record<string, unknown>): never {
  const error = new ConfigurationError(message);
  log.error("Refusing to prompt: unsatisfiable configuration", context, error);
  throw error;
}

function requireChoices(choices: readonly unknown[], kind: string): void {
  if (choices.length === 0) {
    refuse(`You have not supplied at least one ${kind} choice.`, { kind, choices: 0 });
  }
}

/**
 * Prompts the user for a string input and returns it, trimmed.
 *
 * @example
 * const name = await getString({ header: "Enter your name:", maxLength: 25 }, terminal);
 */
export async function getString(options: StringPromptOptions, terminal: Terminal): Promise<string> {
  const { maxLength, allowEmpty = false } = options;

  return runPromptLoop(
    {
      header: options.header,
      retry: options.retry,
      parse: identity,
      validators: [
        (text, output) => lengthOk(characterCount(text), maxLength, output),
        (text, output) => nonEmptyOk(characterCount(text), allowEmpty, output),
      ],
    },
    terminal
  );
}

/**
 * Prompts the user for a number input and returns it.
 *
 * @example
 * const guess = await getNumber({ header: "Pick a number between 1 and 100!", min: 1, max: 100 }, terminal);
 * const ratio = await getNumber({ kind: "float", min: 0, max: 1 }, terminal);
 */
export async function getNumber(options: NumberPromptOptions, terminal: Terminal): Promise<number> {
  const { kind = "integer", min, max } = options;

  if (min !== undefined && max !== undefined && min > max) {
    refuse(`Minimum value ${min} is larger than maximum value ${max}.`, { min, max });
  }

  return runPromptLoop(
    {
      header: options.header,
      retry: options.retry,
      parse: numberParser(kind),
      validators: [(value, output) => rangeOk(value, min, max, output)],
    },
    terminal
  );
}

/**
 * Prompts the user to enter one of the given numbers and returns it.
 * Throws ConfigurationError, without reading anything, when there are no choices.
 */
export async function selectNumberFromChoices(options: NumberChoiceOptions, terminal: Terminal): Promise<number> {
  const { choices } = options;
  requireChoices(choices, "number");

  const kind = options.kind ?? (choices.every((choice) => Number.isInteger(choice)) ? "integer" : "float");
  const membership: MembershipOptions = { showChoicesOnFailure: options.showChoicesOnFailure };

  return runPromptLoop(
    {
      header: options.header,
      retry: options.retry,
      parse: numberParser(kind),
      validators: [(value, output) => isMember(value, choices, membership, output)],
    },
    terminal
  );
}

/**
 * Prompts the user to enter one of the given strings and returns the input as
 * typed (trimmed). With caseSensitive false, "earl" selects "Earl" but "earl"
 * is what comes back.
 * Throws ConfigurationError, without reading anything, when there are no choices.
 */
export async function selectStringFromChoices(options: StringChoiceOptions, terminal: Terminal): Promise<string> {
  const { choices, caseSensitive, showChoicesOnFailure } = options;
  requireChoices(choices, "string");

  return runPromptLoop(
    {
      header: options.header,
      retry: options.retry,
      parse: identity,
      validators: [(text, output) => isMember(text, choices, { caseSensitive, showChoicesOnFailure }, output)],
    },
    terminal
  );
}
