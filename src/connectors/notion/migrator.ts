/**
 * Migration orchestrator.
 *
 * Reads the cache, translates each item and recreates it under a Notion
 * parent page, recording every step in the migration ledger:
 *
 *   (no record) → pending → created
 *                         ↘ failed   (retried on the next invocation)
 *
 * Items already `created` are skipped, so re-runs resume instead of
 * duplicating pages. A retried item whose earlier page exists but never
 * reached `created` has that page archived before a new one is made, and an
 * abort leaves the item `pending` for the next run to pick up. Whole-workspace runs walk the cached tree parents
 * first; a failed parent blocks its subtree for the rest of the run.
 */

import {
  type ItemError,
  type Logger,
  type MediaPrompter,
  type MigrationLedger,
  MigrateError,
  StoreError,
  errorMessage,
  isNetworkError,
  notionPageUrl,
  statusOf,
} from "../core/index.js";
import type { CacheStore } from "../nuclino/cache.js";
import type { CachedItem } from "../nuclino/types.js";
import type { NotionApi } from "./api.js";
import { UPLOAD_PLACEHOLDER_PREFIX, translate } from "./translator.js";
import type { MediaPlaceholder, MigrationSummary, PageMetadata } from "./types.js";

type Outcome = "created" | "skipped" | "failed" | "missing";

export interface MigratorOptions {
  store: CacheStore;
  notion: Pick<NotionApi, "createPage" | "appendBlocks" | "archivePage">;
  ledger: MigrationLedger;
  logger: Logger;
  /** Asked once per downloaded file of every page created. */
  prompter?: MediaPrompter;
  maxListDepth?: number;
  signal?: AbortSignal;
}

export function emptySummary(): MigrationSummary {
  return {
    created: 0,
    failed: 0,
    skipped: 0,
    blocked: 0,
    missing: 0,
    errors: [],
    warnings: 0,
    durationMs: 0,
  };
}

function pageMetadata(item: CachedItem): PageMetadata {
  return { icon: item.kind === "collection" ? "📁" : "📄" };
}

function suggestedPlacement(
  mediaId: string,
  filename: string,
  placeholders: MediaPlaceholder[],
): string {
  if (placeholders.some((placeholder) => placeholder.mediaId === mediaId)) {
    return `replace the "📎 ${UPLOAD_PLACEHOLDER_PREFIX}${filename}" callout`;
  }
  return "anywhere on the page (the file was attached, not embedded)";
}

export class Migrator {
  private readonly store: CacheStore;
  private readonly notion: Pick<NotionApi, "createPage" | "appendBlocks" | "archivePage">;
  private readonly ledger: MigrationLedger;
  private readonly logger: Logger;
  private readonly prompter: MediaPrompter | undefined;
  private readonly maxListDepth: number | undefined;
  private readonly signal: AbortSignal | undefined;
  private links: Map<string, string> | undefined;

  constructor(opts: MigratorOptions) {
    this.store = opts.store;
    this.notion = opts.notion;
    this.ledger = opts.ledger;
    this.logger = opts.logger;
    this.prompter = opts.prompter;
    this.maxListDepth = opts.maxListDepth;
    this.signal = opts.signal;
  }

  // ─── Entry points ───

  async migratePage(id: string, parentId: string): Promise<MigrationSummary> {
    return this.migratePages([id], parentId);
  }

  /** Migrate the given items, each directly under `parentId`. */
  async migratePages(ids: string[], parentId: string): Promise<MigrationSummary> {
    const startTime = Date.now();
    const summary = emptySummary();
    for (const id of ids) {
      this.checkAbort();
      const outcome = await this.migrateItem(id, parentId, summary);
      summary[outcome]++;
    }
    summary.durationMs = Date.now() - startTime;
    return summary;
  }

  /**
   * Migrate every cached item. Roots (no parent, or a parent that is not
   * cached) go under `rootParentId`; everything else under the page
   * recorded for its parent.
   */
  async migrateWorkspace(rootParentId: string): Promise<MigrationSummary> {
    const startTime = Date.now();
    const summary = emptySummary();
    const items = await this.store.loadAll();

    // Arena: items by index, child index lists derived from parentId.
    const indexById = new Map(items.map((item, index) => [item.id, index]));
    const childIndexes: number[][] = items.map(() => []);
    const roots: number[] = [];
    for (const [index, item] of items.entries()) {
      const parentIndex = item.parentId === null ? undefined : indexById.get(item.parentId);
      if (parentIndex === undefined || parentIndex === index) {
        roots.push(index);
      } else {
        childIndexes[parentIndex]?.push(index);
      }
    }

    const visited = new Set<number>();
    const countSubtree = (index: number): number => {
      let count = 0;
      const stack = [...(childIndexes[index] ?? [])];
      while (stack.length > 0) {
        const next = stack.pop();
        if (next === undefined || visited.has(next)) continue;
        visited.add(next);
        count++;
        stack.push(...(childIndexes[next] ?? []));
      }
      return count;
    };

    const walk = async (start: number[]): Promise<void> => {
      const stack = start.map((index) => ({ index, parentId: rootParentId })).reverse();
      while (stack.length > 0) {
        const next = stack.pop();
        if (!next || visited.has(next.index)) continue;
        visited.add(next.index);
        const item = items[next.index];
        if (!item) continue;
        this.checkAbort();
        this.logger.progress(visited.size, items.length, "Migrating");

        const outcome = await this.migrateItem(item.id, next.parentId, summary);
        summary[outcome]++;

        const destinationId = this.ledger.destinationOf(item.id);
        if (outcome === "failed" || destinationId === undefined) {
          const blocked = countSubtree(next.index);
          if (blocked > 0) {
            this.logger.warn(
              `Skipping ${blocked} descendants of "${item.title}" for this run`,
            );
            summary.blocked += blocked;
          }
          continue;
        }
        const children = childIndexes[next.index] ?? [];
        for (let i = children.length - 1; i >= 0; i--) {
          const child = children[i];
          if (child !== undefined) stack.push({ index: child, parentId: destinationId });
        }
      }
    };

    await walk(roots);

    // Parent cycles are unreachable from any root; attach them at the top.
    const stranded = items.map((_, index) => index).filter((index) => !visited.has(index));
    if (stranded.length > 0) {
      this.logger.warn(`${stranded.length} items have cyclic parents, placing them at the root`);
      await walk(stranded);
    }

    summary.durationMs = Date.now() - startTime;
    this.logger.info(
      `Migration finished in ${(summary.durationMs / 1000).toFixed(1)}s: ${summary.created} created, ${summary.skipped} skipped, ${summary.failed} failed, ${summary.blocked} blocked`,
    );
    return summary;
  }

  // ─── One item ───

  private async migrateItem(
    id: string,
    parentId: string,
    summary: MigrationSummary,
  ): Promise<Outcome> {
    if (this.ledger.isCreated(id)) {
      this.logger.info(`Already migrated: ${id}`);
      return "skipped";
    }
    const item = await this.store.get(id);
    if (!item) {
      this.logger.warn(`Item ${id} is not in the cache, run "cache" first`);
      return "missing";
    }

    const orphanId = this.ledger.get(id)?.destinationId ?? undefined;
    this.ledger.markPending(id);
    const resolveLink = await this.linkResolver();
    const { blocks, warnings, placeholders } = translate(item.contentBlocks, {
      maxListDepth: this.maxListDepth,
      mediaRefs: item.mediaRefs,
      resolveLink,
    });
    for (const warning of warnings) {
      this.logger.warn(`"${item.title}": ${warning.message}`);
    }
    summary.warnings += warnings.length;

    let pageId: string;
    try {
      if (orphanId) {
        this.logger.info(`Archiving incomplete page ${orphanId} of "${item.title}"`);
        await this.notion.archivePage(orphanId);
        this.ledger.detachDestination(id);
      }
      pageId = await this.notion.createPage(parentId, item.title || "Untitled", pageMetadata(item));
      this.ledger.attachDestination(id, pageId);
      await this.notion.appendBlocks(pageId, blocks);
    } catch (err) {
      if (err instanceof StoreError) throw err;
      // An abort leaves the item pending.
      this.checkAbort();
      const message = errorMessage(err);
      this.logger.error(`Failed to migrate "${item.title}" (${id}): ${message}`);
      this.ledger.markFailed(id, message);
      summary.errors.push(this.itemError(id, err));
      return "failed";
    }

    this.ledger.markCreated(id, pageId);
    this.logger.info(`Created "${item.title}" → ${notionPageUrl(pageId)}`);

    if (this.prompter) {
      for (const ref of item.mediaRefs) {
        await this.prompter.requestUpload({
          destinationPageId: pageId,
          localPath: ref.localPath,
          filename: ref.filename,
          suggestedPlacement: suggestedPlacement(ref.mediaId, ref.filename, placeholders),
        });
      }
    }
    return "created";
  }

  private itemError(id: string, err: unknown): ItemError {
    const status = statusOf(err);
    return {
      entity: `item:${id}`,
      error: errorMessage(err),
      retryable:
        isNetworkError(err) ||
        status === 409 ||
        status === 429 ||
        (status !== undefined && status >= 500),
    };
  }

  // ─── Links between migrated pages ───

  /**
   * Source links that point at a cached item resolve to that item's Notion
   * page once it has been created; others stay untouched.
   */
  private async linkResolver(): Promise<(href: string) => string | undefined> {
    if (!this.links) {
      this.links = new Map();
      for (const item of await this.store.loadAll()) {
        if (item.url) this.links.set(item.url, item.id);
      }
    }
    const links = this.links;
    return (href) => {
      let sourceId = links.get(href);
      if (sourceId === undefined) {
        for (const id of links.values()) {
          if (href.includes(id)) {
            sourceId = id;
            break;
          }
        }
      }
      if (sourceId === undefined) return undefined;
      const destinationId = this.ledger.destinationOf(sourceId);
      return destinationId ? notionPageUrl(destinationId) : undefined;
    };
  }

  private checkAbort(): void {
    if (this.signal?.aborted) {
      throw new MigrateError("Migration aborted; progress so far is in the ledger");
    }
  }
}
