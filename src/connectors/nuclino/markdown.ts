/**
 * Nuclino markdown -> source block tree.
 *
 * Item content arrives as GitHub-flavoured markdown with TeX math. We parse it with
 * unified/remark into mdast and fold that into the cache's SourceBlock
 * tree: one node per block, inline formatting flattened into styled runs,
 * link and image reference definitions resolved in place.
 */

import type {
  Definition,
  ListItem,
  Nodes,
  PhrasingContent,
  Root,
  RootContent,
} from "mdast";
import { toString as mdastToString } from "mdast-util-to-string";
import remarkGfm from "remark-gfm";
import remarkMath from "remark-math";
import remarkParse from "remark-parse";
import { unified } from "unified";
import type { SourceBlock, TextRun } from "./types.js";

// ─── Parser ───

export function createMarkdownParser() {
  return unified().use(remarkParse).use(remarkGfm).use(remarkMath);
}

export function parseMarkdownTree(content: string): Root {
  return createMarkdownParser().parse(content);
}

/**
 * Parse markdown into source blocks. Total: every markdown block node ends
 * up as a SourceBlock (unknown ones keep their node type as `kind`).
 */
export function parseMarkdown(content: string): SourceBlock[] {
  const tree = parseMarkdownTree(content);
  const ctx: ParseContext = { definitions: collectDefinitions(tree) };
  return convertNodes(tree.children, ctx);
}

// ─── Definitions ───

interface ParseContext {
  definitions: Map<string, Definition>;
}

function collectDefinitions(tree: Nodes): Map<string, Definition> {
  const definitions = new Map<string, Definition>();
  const walk = (node: Nodes): void => {
    if (node.type === "definition") {
      definitions.set(node.identifier, node);
      return;
    }
    if ("children" in node) {
      for (const child of node.children) walk(child);
    }
  };
  walk(tree);
  return definitions;
}

// ─── Inline Runs ───

type RunStyle = Omit<TextRun, "text">;

function makeRun(text: string, style: RunStyle): TextRun {
  const run: TextRun = { text };
  if (style.bold) run.bold = true;
  if (style.italic) run.italic = true;
  if (style.strikethrough) run.strikethrough = true;
  if (style.code) run.code = true;
  if (style.equation) run.equation = true;
  if (style.href) run.href = style.href;
  return run;
}

function imageBlock(url: string, alt: string): SourceBlock {
  return { kind: "image", text: [], children: [], url, alt };
}

/**
 * Flatten phrasing content into runs. Images are not inline in the
 * destination, so they are collected into `hoisted` and emitted as sibling
 * blocks right after the text they appeared in.
 */
function collectRuns(
  nodes: PhrasingContent[],
  style: RunStyle,
  ctx: ParseContext,
  runs: TextRun[],
  hoisted: SourceBlock[],
): void {
  for (const node of nodes) {
    switch (node.type) {
      case "text":
        runs.push(makeRun(node.value, style));
        break;
      case "strong":
        collectRuns(node.children, { ...style, bold: true }, ctx, runs, hoisted);
        break;
      case "emphasis":
        collectRuns(node.children, { ...style, italic: true }, ctx, runs, hoisted);
        break;
      case "delete":
        collectRuns(
          node.children,
          { ...style, strikethrough: true },
          ctx,
          runs,
          hoisted,
        );
        break;
      case "inlineCode":
        runs.push(makeRun(node.value, { ...style, code: true }));
        break;
      case "inlineMath":
        runs.push(makeRun(node.value, { ...style, equation: true }));
        break;
      case "link":
        collectRuns(node.children, { ...style, href: node.url }, ctx, runs, hoisted);
        break;
      case "linkReference": {
        const definition = ctx.definitions.get(node.identifier);
        if (definition) {
          collectRuns(
            node.children,
            { ...style, href: definition.url },
            ctx,
            runs,
            hoisted,
          );
        } else {
          runs.push(makeRun(`[${mdastToString(node)}]`, style));
        }
        break;
      }
      case "image":
        hoisted.push(imageBlock(node.url, node.alt ?? ""));
        break;
      case "imageReference": {
        const definition = ctx.definitions.get(node.identifier);
        if (definition) {
          hoisted.push(imageBlock(definition.url, node.alt ?? ""));
        } else {
          runs.push(makeRun(`![${node.alt ?? node.label ?? ""}]`, style));
        }
        break;
      }
      case "break":
        runs.push(makeRun("\n", style));
        break;
      case "footnoteReference":
        runs.push(makeRun(`[^${node.identifier}]`, style));
        break;
      case "html":
        runs.push(makeRun(node.value, style));
        break;
      default:
        runs.push(makeRun(mdastToString(node), style));
    }
  }
}

function phrasing(
  nodes: PhrasingContent[],
  ctx: ParseContext,
): { runs: TextRun[]; hoisted: SourceBlock[] } {
  const runs: TextRun[] = [];
  const hoisted: SourceBlock[] = [];
  collectRuns(nodes, {}, ctx, runs, hoisted);
  return { runs, hoisted };
}

function hasText(runs: TextRun[]): boolean {
  return runs.some((run) => run.text.trim().length > 0);
}

// ─── Block Conversion ───

function convertNodes(nodes: RootContent[], ctx: ParseContext): SourceBlock[] {
  return nodes.flatMap((node) => convertNode(node, ctx));
}

/**
 * Split a container's children into a lead paragraph (the block's own text)
 * and the remaining children.
 */
function leadAndRest(
  children: RootContent[],
  ctx: ParseContext,
): { text: TextRun[]; children: SourceBlock[] } {
  const [first, ...rest] = children;
  if (first?.type === "paragraph") {
    const { runs, hoisted } = phrasing(first.children, ctx);
    return { text: runs, children: [...hoisted, ...convertNodes(rest, ctx)] };
  }
  return { text: [], children: convertNodes(children, ctx) };
}

function convertListItem(item: ListItem, ordered: boolean, ctx: ParseContext): SourceBlock {
  const { text, children } = leadAndRest(item.children, ctx);
  const block: SourceBlock = { kind: "list_item", text, children, ordered };
  if (typeof item.checked === "boolean") block.checked = item.checked;
  return block;
}

function convertNode(node: RootContent, ctx: ParseContext): SourceBlock[] {
  switch (node.type) {
    case "paragraph": {
      const { runs, hoisted } = phrasing(node.children, ctx);
      if (!hasText(runs)) return hoisted;
      return [{ kind: "paragraph", text: runs, children: [] }, ...hoisted];
    }
    case "heading": {
      const { runs, hoisted } = phrasing(node.children, ctx);
      return [
        { kind: "heading", level: node.depth, text: runs, children: [] },
        ...hoisted,
      ];
    }
    case "list":
      return node.children.map((item) =>
        convertListItem(item, node.ordered === true, ctx),
      );
    case "listItem":
      return [convertListItem(node, false, ctx)];
    case "blockquote": {
      const { text, children } = leadAndRest(node.children, ctx);
      return [{ kind: "quote", text, children }];
    }
    case "code":
      return [
        {
          kind: "code",
          lang: node.lang ?? null,
          text: [{ text: node.value }],
          children: [],
        },
      ];
    case "thematicBreak":
      return [{ kind: "divider", text: [], children: [] }];
    case "math":
      return [{ kind: "equation", text: [{ text: node.value }], children: [] }];
    case "table":
      return [
        {
          kind: "table",
          text: [],
          children: node.children.map((row) => ({
            kind: "table_row",
            text: [],
            children: row.children.map((cell) => ({
              kind: "table_cell",
              text: phrasing(cell.children, ctx).runs,
              children: [],
            })),
          })),
        },
      ];
    case "html":
      return [{ kind: "html", text: [{ text: node.value }], children: [] }];
    case "footnoteDefinition": {
      const { text, children } = leadAndRest(node.children, ctx);
      return [{ kind: "footnote", identifier: node.identifier, text, children }];
    }
    case "definition":
      // Resolved into the links and images that reference it.
      return [];
    default:
      return [
        {
          kind: node.type,
          text: [{ text: mdastToString(node) }],
          children: [],
        },
      ];
  }
}
