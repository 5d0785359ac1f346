/**
 * Cache builder: pulls a whole workspace through the source client into a
 * CacheStore. Best-effort per item; only a StoreError stops the run.
 */

import {
  type ItemError,
  type Logger,
  SourceError,
  StoreError,
  errorMessage,
  isNetworkError,
  statusOf,
} from "../core/index.js";
import type { CacheStore } from "./cache.js";
import type {
  CacheSummary,
  CachedItem,
  MediaRef,
  SourceItem,
  TreeEntry,
  WorkspaceRef,
} from "./types.js";

/** The part of NuclinoApi the builder needs. */
export interface CacheSource {
  listTree(workspace: WorkspaceRef): Promise<TreeEntry[]>;
  getItem(id: string): Promise<SourceItem | undefined>;
  downloadMedia(mediaId: string): Promise<Buffer>;
}

function isTransientError(err: unknown): boolean {
  if (isNetworkError(err)) return true;
  const status = statusOf(err);
  return status === 429 || (status !== undefined && status >= 500);
}

export class CacheBuilder {
  private readonly source: CacheSource;
  private readonly store: CacheStore;
  private readonly logger: Logger;
  private readonly signal: AbortSignal | undefined;

  constructor(opts: {
    source: CacheSource;
    store: CacheStore;
    logger: Logger;
    signal?: AbortSignal;
  }) {
    this.source = opts.source;
    this.store = opts.store;
    this.logger = opts.logger;
    this.signal = opts.signal;
  }

  async build(workspace: WorkspaceRef): Promise<CacheSummary> {
    const startTime = Date.now();
    const errors: ItemError[] = [];
    let cached = 0;
    let failed = 0;
    let missing = 0;
    let media = 0;

    this.logger.info(`Listing items of workspace "${workspace.name}"...`);
    const tree = await this.source.listTree(workspace);
    await this.store.putManifest(
      workspace,
      tree.map((entry) => entry.id),
    );
    this.logger.info(`${tree.length} items to cache into ${this.store.dir}`);

    for (const [index, entry] of tree.entries()) {
      if (this.signal?.aborted) {
        throw new SourceError("Cache run aborted");
      }
      this.logger.progress(index + 1, tree.length, "Caching");

      try {
        const item = await this.source.getItem(entry.id);
        if (!item) {
          this.logger.warn(`Item ${entry.id} ("${entry.title}") disappeared, skipping`);
          missing++;
          continue;
        }

        const mediaRefs = await this.downloadMedia(item, errors);
        media += mediaRefs.length;

        const { media: _media, ...rest } = item;
        const cachedItem: CachedItem = { ...rest, parentId: entry.parentId, mediaRefs };
        await this.store.put(cachedItem);
        cached++;
      } catch (err) {
        if (err instanceof StoreError) throw err;
        const message = errorMessage(err);
        this.logger.error(`Failed to cache item ${entry.id}: ${message}`);
        errors.push({
          entity: `item:${entry.id}`,
          error: message,
          retryable: isTransientError(err),
        });
        failed++;
      }
    }

    const durationMs = Date.now() - startTime;
    this.logger.info(
      `Cached ${cached} items and ${media} files in ${(durationMs / 1000).toFixed(1)}s: ${failed} failed, ${missing} missing`,
    );

    return { workspace, cached, failed, missing, media, errors, durationMs };
  }

  /** Download every blob the item lists; failures are recorded, not thrown. */
  private async downloadMedia(item: SourceItem, errors: ItemError[]): Promise<MediaRef[]> {
    const refs: MediaRef[] = [];
    for (const info of item.media) {
      try {
        const bytes = await this.source.downloadMedia(info.mediaId);
        const localPath = await this.store.putBlob(info.mediaId, info.filename, bytes);
        refs.push({ ...info, localPath });
      } catch (err) {
        if (err instanceof StoreError) throw err;
        const message = errorMessage(err);
        this.logger.warn(
          `Could not download ${info.filename} (${info.mediaId}) of item ${item.id}: ${message}`,
        );
        errors.push({
          entity: `media:${info.mediaId}`,
          error: message,
          retryable: isTransientError(err),
        });
      }
    }
    return refs;
  }
}
