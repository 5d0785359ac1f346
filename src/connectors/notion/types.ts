/**
 * Notion connector — type definitions.
 *
 * Request payloads for the subset of Notion blocks the translator emits.
 * Each payload is assignable to the SDK's `BlockObjectRequest`; children are
 * kept outside the payload so the client can append them level by level.
 */

import type {
  AppendBlockChildrenParameters,
  CreatePageParameters,
  UpdatePageParameters,
} from "@notionhq/client/build/src/api-endpoints.js";
import type { ItemError } from "../core/index.js";

// ─── Rich Text ───

export interface RichTextAnnotations {
  bold: boolean;
  italic: boolean;
  strikethrough: boolean;
  code: boolean;
}

export interface TextRichTextRequest {
  type: "text";
  text: { content: string; link: { url: string } | null };
  annotations: RichTextAnnotations;
}

/** Inline TeX, rendered by Notion. */
export interface EquationRichTextRequest {
  type: "equation";
  equation: { expression: string };
  annotations: RichTextAnnotations;
}

export type RichTextRequest = TextRichTextRequest | EquationRichTextRequest;

// ─── Block Payloads ───

export type CodeLanguage =
  | "plain text"
  | "javascript"
  | "typescript"
  | "python"
  | "rust"
  | "go"
  | "java"
  | "c"
  | "c++"
  | "c#"
  | "ruby"
  | "shell"
  | "bash"
  | "json"
  | "yaml"
  | "html"
  | "css"
  | "sql"
  | "markdown";

export type CalloutEmoji = "📎" | "📝";

export interface TextBlockBody {
  rich_text: RichTextRequest[];
}

export interface TableRowPayload {
  type: "table_row";
  table_row: { cells: RichTextRequest[][] };
}

export type BlockPayload =
  | { type: "paragraph"; paragraph: TextBlockBody }
  | { type: "heading_1"; heading_1: TextBlockBody }
  | { type: "heading_2"; heading_2: TextBlockBody }
  | { type: "heading_3"; heading_3: TextBlockBody }
  | { type: "bulleted_list_item"; bulleted_list_item: TextBlockBody }
  | { type: "numbered_list_item"; numbered_list_item: TextBlockBody }
  | { type: "to_do"; to_do: TextBlockBody & { checked: boolean } }
  | { type: "quote"; quote: TextBlockBody }
  | { type: "code"; code: TextBlockBody & { language: CodeLanguage } }
  | { type: "divider"; divider: Record<string, never> }
  | { type: "equation"; equation: { expression: string } }
  | {
      type: "callout";
      callout: TextBlockBody & { icon: { type: "emoji"; emoji: CalloutEmoji } };
    }
  | {
      type: "image";
      image: { type: "external"; external: { url: string }; caption: RichTextRequest[] };
    }
  | {
      type: "table";
      table: {
        table_width: number;
        has_column_header: boolean;
        has_row_header: boolean;
        children: TableRowPayload[];
      };
    };

export type BlockType = BlockPayload["type"];

export interface TranslatedBlock {
  payload: BlockPayload;
  /** Appended under the created block in a later call. */
  children: TranslatedBlock[];
}

// ─── Translation ───

export interface TranslationWarning {
  kind: "TranslationDegraded";
  sourceKind: string;
  message: string;
}

export interface MediaPlaceholder {
  /** Cached media id, when the image pointed at one. */
  mediaId: string | undefined;
  filename: string;
}

export interface TranslationResult {
  blocks: TranslatedBlock[];
  warnings: TranslationWarning[];
  placeholders: MediaPlaceholder[];
}

export interface TranslateOptions {
  /** Deepest list nesting kept as real nesting. Defaults to 3. */
  maxListDepth?: number;
  mediaRefs?: ReadonlyArray<{ mediaId: string; filename: string }>;
  /** Maps a source link to a destination URL, or `undefined` to keep it. */
  resolveLink?: (href: string) => string | undefined;
}

// ─── Client Surface ───

export type PageIcon = "📁" | "📄";

export interface PageMetadata {
  icon?: PageIcon;
}

/** The slice of `@notionhq/client`'s `Client` the migration uses. */
export interface NotionEndpoints {
  pages: {
    create(args: CreatePageParameters): Promise<{ id: string }>;
    update(args: UpdatePageParameters): Promise<{ id: string }>;
  };
  blocks: {
    children: {
      append(
        args: AppendBlockChildrenParameters,
      ): Promise<{ results: Array<{ id: string }> }>;
    };
  };
}

// ─── Migration ───

export interface MigrationSummary {
  created: number;
  failed: number;
  skipped: number;
  /** Not attempted because an ancestor failed in this run. */
  blocked: number;
  /** Requested ids with no cached item. */
  missing: number;
  errors: ItemError[];
  warnings: number;
  durationMs: number;
}
