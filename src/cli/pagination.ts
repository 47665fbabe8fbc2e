import { selectNumberFromChoices, selectStringFromChoices } from "./prompt";
import { clearTerminal } from "./terminal";
import type { Terminal } from "./terminal";
import { ConfigurationError } from "../utils/errors";
import { createContextLogger } from "../utils/logger";

const log = createContextLogger({ module: "pagination" });

export const NAVIGATION_PROMPT =
  "Press N to view the next page, P for previous, S for a specific page, or E to Exit.";
export const PAGE_PROMPT = "Enter the page you would like to view.";

const NAVIGATION_CHOICES = ["N", "P", "S", "E"] as const;

export type NavigationCommand = "next" | "previous" | "select" | "exit";

const COMMANDS: Record<string, NavigationCommand> = {
  n: "next",
  p: "previous",
  s: "select",
  e: "exit",
};

export interface ListOptions<T> {
  header?: string;
  items: readonly T[];
  /** Defaults to String(item). */
  format?: (item: T) => string;
}

export interface PaginatedListOptions<T> extends ListOptions<T> {
  itemsPerPage: number;
  /** Clear the screen after every command, so each page replaces the last. */
  clearOnUpdate?: boolean;
}

/**
 * Number of pages needed for the items; never less than one.
 */
export function countPages(itemCount: number, itemsPerPage: number): number {
  return Math.max(1, Math.ceil(itemCount / itemsPerPage));
}

/**
 * Items shown on a 1-based page.
 */
export function pageSlice<T>(items: readonly T[], page: number, itemsPerPage: number): readonly T[] {
  const start = (page - 1) * itemsPerPage;
  return items.slice(start, Math.min(page * itemsPerPage, items.length));
}

/**
 * Page after a next/previous command; stays put at either end.
 */
export function applyNavigation(page: number, totalPages: number, command: "next" | "previous"): number {
  if (command === "next") {
    return page < totalPages ? page + 1 : page;
  }
  return page > 1 ? page - 1 : page;
}

export function parseNavigationCommand(input: string): NavigationCommand | undefined {
  return COMMANDS[input.trim().toLowerCase()];
}

function writeItems<T>(terminal: Terminal, items: readonly T[], format: (item: T) => string): void {
  for (const item of items) {
    terminal.writeLine(format(item));
  }
}

/**
 * Displays a list of items once.
 */
export function printList<T>(options: ListOptions<T>, terminal: Terminal): void {
  const { header, items, format = String } = options;
  if (header !== undefined) {
    terminal.writeLine(header);
  }
  writeItems(terminal, items, format);
}

/**
 * Displays a paginated list and lets the user move between pages until they
 * press E.
 *
 * Every iteration prints the header, the current page's items and
 * "(Page X of Y)", then asks for N, P, S or E (any case). N and P stop at the
 * last and first page. S asks for a page number.
 *
 * @example
 * await paginatedList({ header: "Animals:", items: animals, itemsPerPage: 3, clearOnUpdate: true }, terminal);
 */
export async function paginatedList<T>(options: PaginatedListOptions<T>, terminal: Terminal): Promise<void> {
  const { header, items, itemsPerPage, clearOnUpdate = false, format = String } = options;

  if (!Number.isInteger(itemsPerPage) || itemsPerPage <= 0) {
    const error = new ConfigurationError("Items per page must be greater than zero.");
    log.error("Refusing to paginate: unsatisfiable configuration", { itemsPerPage }, error);
    throw error;
  }

  const totalPages = countPages(items.length, itemsPerPage);
  let page = 1;
  let quit = false;

  while (!quit) {
    if (header !== undefined) {
      terminal.writeLine(header);
    }
    writeItems(terminal, pageSlice(items, page, itemsPerPage), format);
    terminal.writeLine(`(Page ${page} of ${totalPages})`);

    const input = await selectStringFromChoices(
      {
        header: NAVIGATION_PROMPT,
        retry: NAVIGATION_PROMPT,
        choices: NAVIGATION_CHOICES,
        caseSensitive: false,
        showChoicesOnFailure: true,
      },
      terminal
    );

    const command = parseNavigationCommand(input);
    switch (command) {
      case "next":
      case "previous":
        page = applyNavigation(page, totalPages, command);
        break;
      case "select":
        page = await selectNumberFromChoices(
          {
            header: PAGE_PROMPT,
            retry: PAGE_PROMPT,
            choices: Array.from({ length: totalPages }, (_, index) => index + 1),
            showChoicesOnFailure: false,
          },
          terminal
        );
        break;
      case "exit":
        quit = true;
        break;
      default:
        break;
    }
    log.debug("Navigation command handled", { command, page, totalPages });

    if (clearOnUpdate) {
      clearTerminal(terminal);
    }
  }
}
