/**
 * Notion API wrapper.
 *
 * Thin wrapper around @notionhq/client for the two calls the migration
 * makes: page creation, block appends and archiving a page left half-built.
 * Every call waits on the pacer, then 409/429/5xx and network failures are
 * retried with exponential backoff, or after `Retry-After` when the API sends
 * one. Anything else, or running out of attempts, is a DestinationError.
 */

import {
  APIErrorCode,
  Client,
  ClientErrorCode,
  isNotionClientError,
} from "@notionhq/client";
import type { CreatePageParameters } from "@notionhq/client/build/src/api-endpoints.js";
import type { Logger, Pacer } from "../core/index.js";
import {
  DestinationError,
  MigrateError,
  errorMessage,
  isNetworkError,
  retryAfterFromHeaders,
  statusOf,
  withRetry,
} from "../core/index.js";
import type {
  BlockPayload,
  NotionEndpoints,
  PageMetadata,
  TranslatedBlock,
} from "./types.js";

// ─── Constants ───

/** Maximum children per append call. */
export const MAX_BLOCKS_PER_REQUEST = 100;
const DEFAULT_MAX_RETRIES = 5;
const BASE_RETRY_DELAY_MS = 1_000;
const MAX_RETRY_DELAY_MS = 60_000;

function isTransient(err: unknown): boolean {
  if (isNotionClientError(err)) {
    return (
      err.code === APIErrorCode.ConflictError ||
      err.code === APIErrorCode.RateLimited ||
      err.code === APIErrorCode.InternalServerError ||
      err.code === APIErrorCode.ServiceUnavailable ||
      err.code === ClientErrorCode.RequestTimeout
    );
  }
  if (isNetworkError(err)) return true;
  const status = statusOf(err);
  return status === 409 || status === 429 || (status !== undefined && status >= 500);
}

// ─── Notion API Wrapper ───

export interface NotionApiOptions {
  /** Integration token; ignored when `client` is given. */
  token?: string;
  client?: NotionEndpoints;
  pacer: Pacer;
  logger: Logger;
  signal?: AbortSignal;
  maxRetries?: number;
  baseDelayMs?: number;
}

export class NotionApi {
  private readonly client: NotionEndpoints;
  private readonly pacer: Pacer;
  private readonly logger: Logger;
  private readonly signal: AbortSignal | undefined;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;

  constructor(opts: NotionApiOptions) {
    this.client = opts.client ?? new Client({ auth: opts.token });
    this.pacer = opts.pacer;
    this.logger = opts.logger;
    this.signal = opts.signal;
    this.maxRetries = opts.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.baseDelayMs = opts.baseDelayMs ?? BASE_RETRY_DELAY_MS;
  }

  // ─── Low-level: paced + retried API call ───

  private checkAbort(): void {
    if (this.signal?.aborted) {
      throw new MigrateError("Migration aborted");
    }
  }

  private async call<T>(label: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withRetry(
        async () => {
          this.checkAbort();
          await this.pacer.waitBeforeNextCall();
          return fn();
        },
        {
          maxRetries: this.maxRetries,
          baseDelayMs: this.baseDelayMs,
          maxDelayMs: MAX_RETRY_DELAY_MS,
          backoff: "exponential",
          retryOn: isTransient,
          retryAfterMs: retryAfterFromHeaders,
          onRetry: (err, attempt, delayMs) => {
            this.logger.warn(
              `Transient error on ${label}, retrying in ${Math.round(delayMs / 1000)}s (attempt ${attempt}/${this.maxRetries}): ${errorMessage(err)}`,
            );
          },
        },
      );
    } catch (err) {
      if (err instanceof MigrateError) throw err;
      throw new DestinationError(`${label}: ${errorMessage(err)}`, {
        status: statusOf(err),
        cause: err,
      });
    }
  }

  // ─── Pages ───

  async createPage(
    parentId: string,
    title: string,
    metadata: PageMetadata = {},
  ): Promise<string> {
    const params: CreatePageParameters = {
      parent: { type: "page_id", page_id: parentId },
      properties: {
        title: { title: [{ type: "text", text: { content: title } }] },
      },
    };
    if (metadata.icon) {
      params.icon = { type: "emoji", emoji: metadata.icon };
    }
    const page = await this.call(`createPage(${title})`, () =>
      this.client.pages.create(params),
    );
    return page.id;
  }

  /** Move a page to the trash. A page that no longer exists counts as archived. */
  async archivePage(pageId: string): Promise<void> {
    try {
      await this.call(`archivePage(${pageId})`, () =>
        this.client.pages.update({ page_id: pageId, archived: true }),
      );
    } catch (err) {
      if (err instanceof DestinationError && err.status === 404) {
        this.logger.warn(`Page ${pageId} is already gone`);
        return;
      }
      throw err;
    }
  }

  // ─── Blocks ───

  /**
   * Append a translated tree under `parentId`. Siblings go out in batches
   * of MAX_BLOCKS_PER_REQUEST in order; each block's children follow under
   * the id the API returned for it.
   */
  async appendBlocks(parentId: string, blocks: TranslatedBlock[]): Promise<void> {
    for (let start = 0; start < blocks.length; start += MAX_BLOCKS_PER_REQUEST) {
      const batch = blocks.slice(start, start + MAX_BLOCKS_PER_REQUEST);
      const children: BlockPayload[] = batch.map((block) => block.payload);
      const response = await this.call(
        `appendBlocks(${parentId}, ${start}..${start + batch.length - 1})`,
        () => this.client.blocks.children.append({ block_id: parentId, children }),
      );

      for (const [index, block] of batch.entries()) {
        if (block.children.length === 0) continue;
        const created = response.results[index];
        if (!created) {
          throw new DestinationError(
            `appendBlocks(${parentId}): response is missing block ${start + index}`,
          );
        }
        await this.appendBlocks(created.id, block.children);
      }
    }
  }
}
