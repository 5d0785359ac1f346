export { NUCLINO_API_URL, NuclinoApi, buildTree } from "./api.js";
export type { NuclinoApiOptions } from "./api.js";
export { CacheBuilder } from "./builder.js";
export type { CacheSource } from "./builder.js";
export { CacheStore, listCaches, workspaceDirName } from "./cache.js";
export { createMarkdownParser, parseMarkdown, parseMarkdownTree } from "./markdown.js";
export type {
  CacheManifest,
  CacheSummary,
  CachedItem,
  ItemKind,
  MediaInfo,
  MediaRef,
  SourceBlock,
  SourceItem,
  TextRun,
  TreeEntry,
  WorkspaceRef,
} from "./types.js";
