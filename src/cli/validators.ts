import type { LineWriter } from "./terminal";

/**
 * Input validators.
 *
 * Each one answers accept/reject and, on reject, prints why. The message is
 * part of the contract: it is what the user sees before being asked again.
 */

export type Choice = string | number;

export interface MembershipOptions {
  /** String choices only. Defaults to true. */
  caseSensitive?: boolean;
  /** List every choice in the rejection message. Defaults to true. */
  showChoicesOnFailure?: boolean;
}

/**
 * Accepts when there is no limit or the length is within it.
 */
export function lengthOk(length: number, maxLength: number | undefined, output: LineWriter): boolean {
  if (maxLength === undefined || length <= maxLength) {
    return true;
  }
  output.writeLine(
    `Your input is ${length - maxLength} characters higher than the ${maxLength} character limit. Please try again.`
  );
  return false;
}

export function nonEmptyOk(length: number, canBeEmpty: boolean, output: LineWriter): boolean {
  if (canBeEmpty || length > 0) {
    return true;
  }
  output.writeLine("Your input cannot be empty.");
  return false;
}

/**
 * Inclusive bounds, each optional. The minimum is checked first.
 */
export function rangeOk(
  value: number,
  min: number | undefined,
  max: number | undefined,
  output: LineWriter
): boolean {
  if (min !== undefined && value < min) {
    output.writeLine(`Your input (${value}) is lower than the minimum allowed value of ${min}.`);
    return false;
  }
  if (max !== undefined && value > max) {
    output.writeLine(`Your input (${value}) is larger than the maximum allowed value of ${max}.`);
    return false;
  }
  return true;
}

function matchesChoice<T extends Choice>(value: T, choice: T, caseSensitive: boolean): boolean {
  if (value === choice) {
    return true;
  }
  return (
    !caseSensitive &&
    typeof value === "string" &&
    typeof choice === "string" &&
    value.toLowerCase() === choice.toLowerCase()
  );
}

/**
 * Accepts when the value equals one of the choices. Numbers compare exactly;
 * strings ignore case when caseSensitive is false.
 */
export function isMember<T extends Choice>(
  value: T,
  choices: readonly T[],
  options: MembershipOptions,
  output: LineWriter
): boolean {
  const caseSensitive = options.caseSensitive ?? true;
  const showChoices = options.showChoicesOnFailure ?? true;

  if (choices.some((choice) => matchesChoice(value, choice, caseSensitive))) {
    return true;
  }

  const caseNote = typeof value === "string" ? `(Case Sensitive: ${caseSensitive})` : undefined;

  if (showChoices) {
    output.writeLine(`Your input (${value}) is not an option of the choices: ${choices.join(", ")}`);
    if (caseNote) {
      output.writeLine(caseNote);
    }
  } else {
    const line = `Your input (${value}) is not a valid choice.`;
    output.writeLine(caseNote ? `${line} ${caseNote}` : line);
  }
  return false;
}
