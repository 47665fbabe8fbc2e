import { clearTerminal, paginatedList } from "../cli";
import type { Terminal } from "../cli";
import { logger } from "../utils/logger";

export const ANIMALS = [
  "Hippo",
  "Elephant",
  "Lion",
  "Crocodile",
  "Giraffe",
  "Cheetah",
  "Hyena",
  "Rhino",
  "Buffalo",
  "Gorilla",
  "Mongoose",
  "Impala",
  "Mosquito",
  "Bird",
] as const;

interface SafariOptions {
  perPage: number;
  clear?: boolean;
}

export async function executeSafari(options: SafariOptions, terminal: Terminal): Promise<void> {
  const clear = options.clear ?? true;
  logger.debug("Showing safari list", { perPage: options.perPage, clear });

  if (clear) {
    clearTerminal(terminal);
  }

  await paginatedList(
    {
      header: "Animals seen on the Super Cool Safari:",
      items: ANIMALS,
      itemsPerPage: options.perPage,
      clearOnUpdate: clear,
    },
    terminal
  );
}
