export * from "./cli";
export { PromptError, ConfigurationError, InputStreamError, isPromptError } from "./utils/errors";
export type { PromptErrorCode } from "./utils/errors";
export { logger, createContextLogger } from "./utils/logger";
export type { Logger } from "./utils/logger";
