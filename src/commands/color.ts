import { clearTerminal, selectStringFromChoices } from "../cli";
import type { Terminal } from "../cli";

export const COLORS = [
  "Blue",
  "Red",
  "Green",
  "Yellow",
  "Orange",
  "Purple",
  "Brown",
  "Pink",
  "Gray",
  "Black",
  "White",
] as const;

interface ColorOptions {
  clear?: boolean;
}

export async function executeColor(options: ColorOptions, terminal: Terminal): Promise<string> {
  if (options.clear ?? true) {
    clearTerminal(terminal);
  }

  const color = await selectStringFromChoices(
    {
      header: "Enter your favorite color!",
      retry: "That isn't a color!",
      choices: COLORS,
      caseSensitive: false,
      showChoicesOnFailure: false,
    },
    terminal
  );

  terminal.writeLine(`Your favorite color is ${color}!`);
  return color;
}
