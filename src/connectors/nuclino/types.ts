/**
 * Nuclino connector — type definitions.
 *
 * Wire schemas for the Nuclino v0 REST API (validated with zod at the
 * boundary) and the cache's own data model.
 */

import { z } from "zod";
import type { ItemError } from "../core/index.js";

// ─── Wire Schemas ───

export const workspaceSchema = z.object({
  object: z.literal("workspace"),
  id: z.string(),
  teamId: z.string().optional(),
  name: z.string(),
  createdAt: z.string().optional(),
  childIds: z.array(z.string()).default([]),
});

const contentMetaSchema = z.object({
  itemIds: z.array(z.string()).default([]),
  fileIds: z.array(z.string()).default([]),
});

const baseEntrySchema = z.object({
  id: z.string(),
  workspaceId: z.string(),
  url: z.string().default(""),
  title: z.string().default(""),
  createdAt: z.string(),
  createdUserId: z.string().optional(),
  lastUpdatedAt: z.string().optional(),
  lastUpdatedUserId: z.string().optional(),
  content: z.string().optional(),
  contentMeta: contentMetaSchema.optional(),
});

export const itemSchema = baseEntrySchema.extend({
  object: z.literal("item"),
});

export const collectionSchema = baseEntrySchema.extend({
  object: z.literal("collection"),
  childIds: z.array(z.string()).default([]),
});

export const entrySchema = z.discriminatedUnion("object", [
  itemSchema,
  collectionSchema,
]);

export const fileSchema = z.object({
  object: z.literal("file"),
  id: z.string(),
  itemId: z.string().optional(),
  fileName: z.string(),
  download: z.object({
    url: z.string(),
    expiresAt: z.string().optional(),
  }),
});

export const userSchema = z.object({
  object: z.literal("user"),
  id: z.string(),
  firstName: z.string().default(""),
  lastName: z.string().default(""),
  email: z.string().optional(),
});

export const envelopeSchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("success"), data: z.unknown() }),
  z.object({ status: z.literal("fail"), message: z.string().optional() }),
  z.object({ status: z.literal("error"), message: z.string().optional() }),
]);

export const listSchema = z.object({
  object: z.literal("list"),
  results: z.array(z.unknown()),
});

export type NuclinoWorkspace = z.infer<typeof workspaceSchema>;
export type NuclinoEntry = z.infer<typeof entrySchema>;
export type NuclinoFile = z.infer<typeof fileSchema>;
export type NuclinoUser = z.infer<typeof userSchema>;

// ─── Source Block Tree ───

export interface TextRun {
  text: string;
  bold?: boolean;
  italic?: boolean;
  strikethrough?: boolean;
  code?: boolean;
  /** Inline TeX; `text` holds the expression. */
  equation?: boolean;
  href?: string;
}

export interface SourceBlock {
  /** Block kind: "paragraph", "heading", "list_item", ... or a raw node type. */
  kind: string;
  text: TextRun[];
  children: SourceBlock[];
  level?: number;
  ordered?: boolean;
  checked?: boolean | null;
  lang?: string | null;
  url?: string;
  alt?: string;
  identifier?: string;
}

export const textRunSchema = z.object({
  text: z.string(),
  bold: z.boolean().optional(),
  italic: z.boolean().optional(),
  strikethrough: z.boolean().optional(),
  code: z.boolean().optional(),
  equation: z.boolean().optional(),
  href: z.string().optional(),
});

export const sourceBlockSchema: z.ZodType<SourceBlock> = z.lazy(() =>
  z.object({
    kind: z.string(),
    text: z.array(textRunSchema),
    children: z.array(sourceBlockSchema),
    level: z.number().optional(),
    ordered: z.boolean().optional(),
    checked: z.boolean().nullable().optional(),
    lang: z.string().nullable().optional(),
    url: z.string().optional(),
    alt: z.string().optional(),
    identifier: z.string().optional(),
  }),
);

// ─── Cache Model ───

export interface WorkspaceRef {
  id: string;
  name: string;
}

export type ItemKind = "page" | "collection";

export interface TreeEntry {
  id: string;
  parentId: string | null;
  kind: ItemKind;
  title: string;
}

export interface MediaInfo {
  mediaId: string;
  filename: string;
}

export interface MediaRef extends MediaInfo {
  localPath: string;
}

/** An item as returned by the source, before its media is downloaded. */
export interface SourceItem {
  id: string;
  parentId: string | null;
  kind: ItemKind;
  title: string;
  url: string;
  createdAt: string;
  updatedAt: string;
  author: string;
  content: string;
  contentBlocks: SourceBlock[];
  childIds: string[];
  media: MediaInfo[];
}

export interface CachedItem extends Omit<SourceItem, "media"> {
  mediaRefs: MediaRef[];
}

export const cachedItemSchema = z.object({
  id: z.string(),
  parentId: z.string().nullable(),
  kind: z.enum(["page", "collection"]),
  title: z.string(),
  url: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
  author: z.string(),
  content: z.string(),
  contentBlocks: z.array(sourceBlockSchema),
  childIds: z.array(z.string()),
  mediaRefs: z.array(
    z.object({
      mediaId: z.string(),
      filename: z.string(),
      localPath: z.string(),
    }),
  ),
});

export interface CacheManifest {
  workspace: WorkspaceRef;
  itemIds: string[];
  cachedAt: string;
}

export const manifestSchema = z.object({
  workspace: z.object({ id: z.string(), name: z.string() }),
  itemIds: z.array(z.string()),
  cachedAt: z.string(),
});

export interface CacheSummary {
  workspace: WorkspaceRef;
  cached: number;
  failed: number;
  missing: number;
  media: number;
  errors: ItemError[];
  durationMs: number;
}
