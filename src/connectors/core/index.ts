// Config
export {
  DEFAULT_CACHE_DIR,
  DEFAULT_NOTION_WAIT_MS,
  DEFAULT_NUCLINO_WAIT_MS,
  loadEnvFiles,
  readConfig,
  requireKey,
} from "./config.js";
export type { MigrateConfig } from "./config.js";
// Errors
export {
  DestinationError,
  MigrateError,
  SourceError,
  StoreError,
  errorMessage,
  isNetworkError,
  statusOf,
} from "./errors.js";
// Logger
export { ConsoleLogger, SilentLogger, createLogger } from "./logger.js";
// Output writer
export { createOutputWriter, FileOutputWriter } from "./output.js";
// Pacing
export { createPacer, FixedIntervalPacer } from "./pacer.js";
// Interactive prompts
export { ClackMediaPrompter, notionPageUrl, selectWorkspace } from "./prompt.js";
export type { MediaPrompter, UploadRequest } from "./prompt.js";
export type { RetryOptions } from "./retry.js";
// Retry helper
export { retryAfterFromHeaders, withRetry } from "./retry.js";

// Slug generator
export { sanitizeFilename, slugify, uniqueSlug } from "./slugify.js";
// Migration ledger
export { MigrationLedger } from "./state.js";
export type {
  ItemError,
  LogLevel,
  Logger,
  MigrationRecord,
  MigrationStatus,
  OutputWriter,
  Pacer,
  PacerConfig,
  PersistedLedger,
} from "./types.js";
