/**
 * Block translator — cached source blocks to Notion block requests.
 *
 * Pure and deterministic. Every source node yields at least one destination
 * block; kinds without a Notion counterpart degrade to a paragraph holding
 * their text and a TranslationWarning.
 */

import type { SourceBlock, TextRun } from "../nuclino/types.js";
import type {
  BlockPayload,
  CodeLanguage,
  MediaPlaceholder,
  RichTextRequest,
  TableRowPayload,
  TranslateOptions,
  TranslatedBlock,
  TranslationResult,
  TranslationWarning,
} from "./types.js";

// ─── Constants ───

/** Notion rejects rich text items longer than this. */
export const MAX_RICH_TEXT_LENGTH = 2000;
export const DEFAULT_MAX_LIST_DEPTH = 3;
export const FLATTEN_MARKER = "→ ";
export const UPLOAD_PLACEHOLDER_PREFIX = "Upload manually: ";

const LANGUAGE_ALIASES: Record<string, CodeLanguage> = {
  js: "javascript",
  javascript: "javascript",
  jsx: "javascript",
  ts: "typescript",
  typescript: "typescript",
  tsx: "typescript",
  py: "python",
  python: "python",
  rs: "rust",
  rust: "rust",
  go: "go",
  golang: "go",
  java: "java",
  c: "c",
  h: "c",
  cpp: "c++",
  "c++": "c++",
  cs: "c#",
  csharp: "c#",
  "c#": "c#",
  rb: "ruby",
  ruby: "ruby",
  sh: "shell",
  shell: "shell",
  zsh: "shell",
  console: "shell",
  bash: "bash",
  json: "json",
  yml: "yaml",
  yaml: "yaml",
  html: "html",
  xml: "html",
  css: "css",
  sql: "sql",
  md: "markdown",
  markdown: "markdown",
};

export function mapLanguage(lang: string | null | undefined): CodeLanguage {
  if (!lang) return "plain text";
  return LANGUAGE_ALIASES[lang.trim().toLowerCase()] ?? "plain text";
}

// ─── Rich Text ───

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/** Split on UTF-16 length, never between the two halves of a surrogate pair. */
function chunk(text: string): string[] {
  if (text.length <= MAX_RICH_TEXT_LENGTH) return [text];
  const parts: string[] = [];
  let start = 0;
  while (start < text.length) {
    let end = Math.min(start + MAX_RICH_TEXT_LENGTH, text.length);
    if (end < text.length && isHighSurrogate(text.charCodeAt(end - 1))) end--;
    parts.push(text.slice(start, end));
    start = end;
  }
  return parts;
}

function isLinkable(href: string): boolean {
  return /^(https?:|mailto:)/i.test(href);
}

function plainText(text: string): RichTextRequest[] {
  return chunk(text).map((content) => ({
    type: "text",
    text: { content, link: null },
    annotations: { bold: false, italic: false, strikethrough: false, code: false },
  }));
}

function runsToPlain(runs: TextRun[]): string {
  return runs.map((run) => run.text).join("");
}

// ─── Translation Context ───

class Translation {
  readonly warnings: TranslationWarning[] = [];
  readonly placeholders: MediaPlaceholder[] = [];
  private readonly maxListDepth: number;
  private readonly mediaRefs: ReadonlyArray<{ mediaId: string; filename: string }>;
  private readonly resolveLink: ((href: string) => string | undefined) | undefined;

  constructor(options: TranslateOptions) {
    this.maxListDepth = Math.max(1, options.maxListDepth ?? DEFAULT_MAX_LIST_DEPTH);
    this.mediaRefs = options.mediaRefs ?? [];
    this.resolveLink = options.resolveLink;
  }

  richText(runs: TextRun[], prefix = ""): RichTextRequest[] {
    const items: RichTextRequest[] = prefix ? plainText(prefix) : [];
    for (const run of runs) {
      if (!run.text) continue;
      const href = run.href ? (this.resolveLink?.(run.href) ?? run.href) : undefined;
      const link = href && isLinkable(href) ? { url: href } : null;
      const annotations = {
        bold: run.bold === true,
        italic: run.italic === true,
        strikethrough: run.strikethrough === true,
        code: run.code === true,
      };
      if (run.equation) {
        items.push({ type: "equation", equation: { expression: run.text }, annotations });
        continue;
      }
      for (const content of chunk(run.text)) {
        items.push({ type: "text", text: { content, link }, annotations });
      }
    }
    return items;
  }

  /** Translate a sibling sequence, `listDepth` being the depth of the list items in it. */
  nodes(nodes: SourceBlock[], listDepth: number): TranslatedBlock[] {
    return nodes.flatMap((node) => this.node(node, listDepth));
  }

  node(node: SourceBlock, listDepth: number): TranslatedBlock[] {
    switch (node.kind) {
      case "paragraph":
        return [
          this.block(
            { type: "paragraph", paragraph: { rich_text: this.richText(node.text) } },
            node.children,
            listDepth,
          ),
        ];
      case "heading":
        return this.heading(node, listDepth);
      case "list_item":
        return this.listItem(node, listDepth, 0);
      case "quote":
        return [
          this.block(
            { type: "quote", quote: { rich_text: this.richText(node.text) } },
            node.children,
            listDepth,
          ),
        ];
      case "code":
      case "html":
        return [
          {
            payload: {
              type: "code",
              code: {
                rich_text: plainText(runsToPlain(node.text)),
                language: node.kind === "code" ? mapLanguage(node.lang) : "plain text",
              },
            },
            children: [],
          },
        ];
      case "divider":
        return [{ payload: { type: "divider", divider: {} }, children: [] }];
      case "equation":
        return [
          {
            payload: { type: "equation", equation: { expression: runsToPlain(node.text) } },
            children: [],
          },
        ];
      case "image":
        return [this.image(node)];
      case "table":
        return [this.table(node)];
      case "footnote":
        return [
          this.block(
            {
              type: "callout",
              callout: {
                rich_text: this.richText(node.text, `[^${node.identifier ?? ""}] `),
                icon: { type: "emoji", emoji: "📝" },
              },
            },
            node.children,
            listDepth,
          ),
        ];
      default:
        return [this.degraded(node, listDepth)];
    }
  }

  private block(
    payload: BlockPayload,
    children: SourceBlock[],
    listDepth: number,
  ): TranslatedBlock {
    return { payload, children: this.nodes(children, listDepth) };
  }

  private heading(node: SourceBlock, listDepth: number): TranslatedBlock[] {
    const level = Math.min(Math.max(node.level ?? 1, 1), 3);
    const body = { rich_text: this.richText(node.text) };
    const payload: BlockPayload =
      level === 1
        ? { type: "heading_1", heading_1: body }
        : level === 2
          ? { type: "heading_2", heading_2: body }
          : { type: "heading_3", heading_3: body };
    // Headings cannot hold children; keep them as following siblings.
    return [{ payload, children: [] }, ...this.nodes(node.children, listDepth)];
  }

  private listPayload(node: SourceBlock, prefix: string): BlockPayload {
    const rich_text = this.richText(node.text, prefix);
    if (typeof node.checked === "boolean") {
      return { type: "to_do", to_do: { rich_text, checked: node.checked } };
    }
    if (node.ordered) {
      return { type: "numbered_list_item", numbered_list_item: { rich_text } };
    }
    return { type: "bulleted_list_item", bulleted_list_item: { rich_text } };
  }

  /**
   * A list item at `depth` (1 = top level). Below `maxListDepth` nested
   * items stay nested; from there on they become following siblings marked
   * with one FLATTEN_MARKER per level they were moved up.
   */
  private listItem(node: SourceBlock, depth: number, extraLevels: number): TranslatedBlock[] {
    const atLimit = depth >= this.maxListDepth;
    const children: TranslatedBlock[] = [];
    const flattened: TranslatedBlock[] = [];

    for (const child of node.children) {
      if (child.kind !== "list_item") {
        children.push(...this.node(child, depth + 1));
      } else if (atLimit) {
        flattened.push(...this.listItem(child, depth, extraLevels + 1));
      } else {
        children.push(...this.listItem(child, depth + 1, 0));
      }
    }

    const item: TranslatedBlock = {
      payload: this.listPayload(node, FLATTEN_MARKER.repeat(extraLevels)),
      children,
    };
    return [item, ...flattened];
  }

  private image(node: SourceBlock): TranslatedBlock {
    const url = node.url ?? "";
    const ref = this.mediaRefs.find((media) => url.includes(media.mediaId));
    if (ref || !/^https?:\/\//i.test(url)) {
      const filename = ref?.filename ?? (url.split(/[/\\]/).pop() || node.alt || "image");
      this.placeholders.push({ mediaId: ref?.mediaId, filename });
      return {
        payload: {
          type: "callout",
          callout: {
            rich_text: plainText(`${UPLOAD_PLACEHOLDER_PREFIX}${filename}`),
            icon: { type: "emoji", emoji: "📎" },
          },
        },
        children: [],
      };
    }
    return {
      payload: {
        type: "image",
        image: {
          type: "external",
          external: { url },
          caption: node.alt ? plainText(node.alt) : [],
        },
      },
      children: [],
    };
  }

  private table(node: SourceBlock): TranslatedBlock {
    const rows = node.children.filter((row) => row.kind === "table_row");
    const width = Math.max(0, ...rows.map((row) => row.children.length));
    if (rows.length === 0 || width === 0) {
      return this.degraded(node, 1);
    }
    const children: TableRowPayload[] = rows.map((row) => {
      const cells = row.children.map((cell) => this.richText(cell.text));
      while (cells.length < width) cells.push([]);
      return { type: "table_row", table_row: { cells } };
    });
    return {
      payload: {
        type: "table",
        table: {
          table_width: width,
          has_column_header: true,
          has_row_header: false,
          children,
        },
      },
      children: [],
    };
  }

  private degraded(node: SourceBlock, listDepth: number): TranslatedBlock {
    this.warnings.push({
      kind: "TranslationDegraded",
      sourceKind: node.kind,
      message: `No Notion block for "${node.kind}", kept as plain text`,
    });
    return this.block(
      { type: "paragraph", paragraph: { rich_text: this.richText(node.text) } },
      node.children,
      listDepth,
    );
  }
}

// ─── Public API ───

/** Translate a whole block tree (top-level list items are at depth 1). */
export function translate(
  blocks: SourceBlock[],
  options: TranslateOptions = {},
): TranslationResult {
  const translation = new Translation(options);
  const translated = translation.nodes(blocks, 1);
  return {
    blocks: translated,
    warnings: translation.warnings,
    placeholders: translation.placeholders,
  };
}

/** Translate one node whose list items sit at `depth`. */
export function translateBlock(
  node: SourceBlock,
  depth = 1,
  options: TranslateOptions = {},
): TranslationResult {
  const translation = new Translation(options);
  const translated = translation.node(node, depth);
  return {
    blocks: translated,
    warnings: translation.warnings,
    placeholders: translation.placeholders,
  };
}
