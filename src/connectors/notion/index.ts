export { MAX_BLOCKS_PER_REQUEST, NotionApi } from "./api.js";
export type { NotionApiOptions } from "./api.js";
export { Migrator, emptySummary } from "./migrator.js";
export type { MigratorOptions } from "./migrator.js";
export {
  DEFAULT_MAX_LIST_DEPTH,
  FLATTEN_MARKER,
  MAX_RICH_TEXT_LENGTH,
  UPLOAD_PLACEHOLDER_PREFIX,
  mapLanguage,
  translate,
  translateBlock,
} from "./translator.js";
export type {
  BlockPayload,
  BlockType,
  CodeLanguage,
  EquationRichTextRequest,
  MediaPlaceholder,
  MigrationSummary,
  NotionEndpoints,
  PageMetadata,
  RichTextAnnotations,
  RichTextRequest,
  TextRichTextRequest,
  TranslateOptions,
  TranslatedBlock,
  TranslationResult,
  TranslationWarning,
} from "./types.js";
