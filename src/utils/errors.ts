/**
 * Fatal prompt errors
 *
 * Invalid input typed by the user is never an error: it is reported on the
 * terminal and asked for again. The classes here cover the two cases that
 * abort a prompt and reach the caller instead.
 */

export type PromptErrorCode = "CONFIGURATION_ERROR" | "INPUT_STREAM_ERROR";

/**
 * Base class for errors thrown out of a prompt
 */
export abstract class PromptError extends Error {
  abstract readonly code: PromptErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = this.constructor.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Message including every wrapped cause
   */
  getFullMessage(): string {
    const lines = [this.message];
    let current: unknown = this.cause;

    while (current instanceof Error) {
      lines.push(`  Caused by: ${current.message}`);
      current = current.cause;
    }

    return lines.join("\n");
  }
}

/**
 * The caller passed a constraint no input could ever satisfy
 * (an empty choice set, a non-positive page size, inverted bounds).
 */
export class ConfigurationError extends PromptError {
  readonly code = "CONFIGURATION_ERROR";
}

/**
 * Reading from the input stream failed or the stream ended.
 */
export class InputStreamError extends PromptError {
  readonly code = "INPUT_STREAM_ERROR";
}

export function isPromptError(error: unknown): error is PromptError {
  return error instanceof PromptError;
}
