import * as readline from "readline";
import type { Readable, Writable } from "stream";
import { InputStreamError } from "../utils/errors";

/**
 * ANSI "reset to initial state" sequence, which also clears the screen.
 */
export const CLEAR_SEQUENCE = "\x1bc";

/**
 * Where validators and prompts print.
 */
export interface LineWriter {
  writeLine(text: string): void;
}

/**
 * Line-oriented terminal: one reader, one writer.
 *
 * Every prompt takes one of these instead of touching process.stdin and
 * process.stdout, so the same code runs against a TTY, a pipe, or a script.
 */
export interface Terminal extends LineWriter {
  /**
   * Read the next line without its line terminator.
   * Rejects with InputStreamError when the stream fails or has ended.
   */
  readLine(): Promise<string>;
  /** Write raw text, no newline appended. */
  write(text: string): void;
  close(): void;
}

export interface TerminalStreams {
  input?: Readable;
  output?: Writable;
}

/**
 * Terminal over real streams (stdin and stdout by default).
 */
export function createTerminal(streams: TerminalStreams = {}): Terminal {
  const input = streams.input ?? process.stdin;
  const output = streams.output ?? process.stdout;

  const rl = readline.createInterface({ input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();
  let closed = false;
  let interfaceClosed = false;
  rl.once("close", () => {
    interfaceClosed = true;
  });

  return {
    async readLine(): Promise<string> {
      if (closed) {
        throw new InputStreamError("Cannot read from a closed terminal.");
      }

      let next: IteratorResult<string>;
      try {
        next = await lines.next();
      } catch (error) {
        throw new InputStreamError("Unexpected stdin error while reading input.", { cause: error });
      }

      if (next.done) {
        throw new InputStreamError("Input stream ended before a valid value was entered.");
      }
      return next.value;
    },
    writeLine(text: string): void {
      output.write(`${text}\n`);
    },
    write(text: string): void {
      output.write(text);
    },
    close(): void {
      closed = true;
      if (!interfaceClosed) {
        rl.close();
      }
    },
  };
}

/**
 * In-memory terminal fed from a fixed list of lines.
 */
export interface MemoryTerminal extends Terminal {
  /** Everything written, one entry per writeLine or write call. */
  readonly output: string[];
  /** Lines consumed so far. */
  readonly linesRead: number;
}

/**
 * Terminal that reads from a script of lines and records what is written.
 * Reading past the end of the script behaves like a closed stdin.
 */
export function createMemoryTerminal(script: readonly string[]): MemoryTerminal {
  const pending = [...script];
  const output: string[] = [];
  let linesRead = 0;
  let closed = false;

  return {
    output,
    get linesRead() {
      return linesRead;
    },
    async readLine(): Promise<string> {
      const line = closed ? undefined : pending.shift();
      if (line === undefined) {
        throw new InputStreamError("Input stream ended before a valid value was entered.");
      }
      linesRead += 1;
      return line;
    },
    writeLine(text: string): void {
      output.push(text);
    },
    write(text: string): void {
      output.push(text);
    },
    close(): void {
      closed = true;
    },
  };
}

/**
 * Clears all printed lines from the terminal.
 */
export function clearTerminal(terminal: Terminal): void {
  terminal.write(CLEAR_SEQUENCE);
}
