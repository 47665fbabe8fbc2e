import { getString } from "../cli";
import type { Terminal } from "../cli";

interface NameOptions {
  maxLength?: number;
}

export async function executeName(options: NameOptions, terminal: Terminal): Promise<string> {
  const name = await getString(
    { header: "Enter your name:", retry: "Enter your name:", maxLength: options.maxLength },
    terminal
  );
  terminal.writeLine(`Hello, ${name}!`);
  return name;
}
