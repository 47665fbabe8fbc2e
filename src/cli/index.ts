/**
 * CLI Library Module
 *
 * Terminal prompts that ask until the input is valid, plus list rendering
 * and pagination built on top of them.
 */

export { createTerminal, createMemoryTerminal, clearTerminal, CLEAR_SEQUENCE } from "./terminal";
export type { LineWriter, MemoryTerminal, Terminal, TerminalStreams } from "./terminal";
export { lengthOk, nonEmptyOk, rangeOk, isMember } from "./validators";
export type { Choice, MembershipOptions } from "./validators";
export { runPromptLoop, parsed, unparsable, identity } from "./prompt-loop";
export type { ParseResult, Parser, PromptLoopOptions, PromptText, Validator } from "./prompt-loop";
export { getString, getNumber, selectNumberFromChoices, selectStringFromChoices, numberParser } from "./prompt";
export type {
  NumberChoiceOptions,
  NumberKind,
  NumberPromptOptions,
  StringChoiceOptions,
  StringPromptOptions,
} from "./prompt";
export {
  paginatedList,
  printList,
  countPages,
  pageSlice,
  applyNavigation,
  parseNavigationCommand,
  NAVIGATION_PROMPT,
  PAGE_PROMPT,
} from "./pagination";
export type { ListOptions, NavigationCommand, PaginatedListOptions } from "./pagination";
