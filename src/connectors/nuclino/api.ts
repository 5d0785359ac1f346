/**
 * Nuclino API wrapper.
 *
 * Thin fetch-based client for the Nuclino v0 REST API. Every request waits
 * on the injected pacer first; 5xx, 429 and network failures are retried a
 * bounded number of times at the same pace, other 4xx responses are fatal.
 */

import type { z } from "zod";
import type { Logger, Pacer } from "../core/index.js";
import {
  SourceError,
  errorMessage,
  isNetworkError,
  statusOf,
  withRetry,
} from "../core/index.js";
import { parseMarkdown } from "./markdown.js";
import {
  type MediaInfo,
  type NuclinoEntry,
  type NuclinoFile,
  type NuclinoWorkspace,
  type SourceItem,
  type TreeEntry,
  type WorkspaceRef,
  entrySchema,
  envelopeSchema,
  fileSchema,
  listSchema,
  userSchema,
  workspaceSchema,
} from "./types.js";

// ─── Constants ───

export const NUCLINO_API_URL = "https://api.nuclino.com/v0";
const PAGE_SIZE = 100;
const DEFAULT_MAX_RETRIES = 3;

// ─── Errors ───

class HttpStatusError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.status = status;
  }
}

function isTransient(err: unknown): boolean {
  if (isNetworkError(err)) return true;
  const status = statusOf(err);
  return status === 429 || (status !== undefined && status >= 500);
}

// ─── Nuclino API Wrapper ───

export interface NuclinoApiOptions {
  apiKey: string;
  pacer: Pacer;
  logger: Logger;
  signal?: AbortSignal;
  baseUrl?: string;
  maxRetries?: number;
  fetch?: typeof fetch;
}

export class NuclinoApi {
  private readonly apiKey: string;
  private readonly pacer: Pacer;
  private readonly logger: Logger;
  private readonly signal: AbortSignal | undefined;
  private readonly baseUrl: string;
  private readonly maxRetries: number;
  private readonly fetchImpl: typeof fetch;
  private readonly authors = new Map<string, string>();

  constructor(opts: NuclinoApiOptions) {
    this.apiKey = opts.apiKey;
    this.pacer = opts.pacer;
    this.logger = opts.logger;
    this.signal = opts.signal;
    this.baseUrl = opts.baseUrl ?? NUCLINO_API_URL;
    this.maxRetries = opts.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.fetchImpl = opts.fetch ?? fetch;
  }

  // ─── Low-level: paced + retried request ───

  private checkAbort(): void {
    if (this.signal?.aborted) {
      throw new SourceError("Cache run aborted");
    }
  }

  /**
   * Issue one paced request. Resolves with the raw response for 2xx and
   * 404 (absence is the caller's business), throws for everything else.
   */
  private async send(label: string, url: string, auth: boolean): Promise<Response> {
    try {
      return await withRetry(
        async () => {
          this.checkAbort();
          await this.pacer.waitBeforeNextCall();
          const response = await this.fetchImpl(url, {
            headers: auth
              ? { Authorization: this.apiKey, Accept: "application/json" }
              : {},
            signal: this.signal,
          });
          if (response.ok || response.status === 404) return response;
          throw new HttpStatusError(
            response.status,
            `${label} failed: ${response.status} ${response.statusText}`,
          );
        },
        {
          maxRetries: this.maxRetries,
          baseDelayMs: 0,
          backoff: "fixed",
          retryOn: isTransient,
          onRetry: (err, attempt) => {
            this.logger.warn(
              `Transient error on ${label}, retrying (attempt ${attempt}/${this.maxRetries}): ${errorMessage(err)}`,
            );
          },
        },
      );
    } catch (err) {
      if (err instanceof SourceError) throw err;
      throw new SourceError(`${label}: ${errorMessage(err)}`, {
        status: statusOf(err),
        cause: err,
      });
    }
  }

  /** GET a JSON endpoint and unwrap the `{ status, data }` envelope. */
  private async get<T>(
    label: string,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T | undefined> {
    const response = await this.send(label, `${this.baseUrl}${path}`, true);
    if (response.status === 404) return undefined;

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new SourceError(`${label}: invalid JSON`, { status: response.status, cause: err });
    }
    const envelope = envelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new SourceError(`${label}: unexpected response shape`);
    }
    if (envelope.data.status !== "success") {
      throw new SourceError(
        `${label}: ${envelope.data.message ?? envelope.data.status}`,
      );
    }
    const parsed = schema.safeParse(envelope.data.data);
    if (!parsed.success) {
      throw new SourceError(
        `${label}: response did not match schema: ${parsed.error.message}`,
      );
    }
    return parsed.data;
  }

  /** Walk a cursor-paginated list endpoint (cursor = id of the last result). */
  private async list<T>(
    label: string,
    path: string,
    params: Record<string, string>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T[]> {
    const all: T[] = [];
    let after: string | undefined;
    for (;;) {
      const query = new URLSearchParams({
        ...params,
        limit: String(PAGE_SIZE),
        ...(after && { after }),
      });
      const page = await this.get(label, `${path}?${query.toString()}`, listSchema);
      const results = page?.results ?? [];
      for (const raw of results) {
        const parsed = schema.safeParse(raw);
        if (!parsed.success) {
          this.logger.warn(`Skipping malformed ${label} entry: ${parsed.error.message}`);
          continue;
        }
        all.push(parsed.data);
      }
      const last = results.at(-1);
      if (
        results.length < PAGE_SIZE ||
        typeof last !== "object" ||
        last === null ||
        !("id" in last) ||
        typeof last.id !== "string"
      ) {
        break;
      }
      after = last.id;
    }
    return all;
  }

  // ─── Workspaces ───

  private async listRawWorkspaces(): Promise<NuclinoWorkspace[]> {
    return this.list("listWorkspaces", "/workspaces", {}, workspaceSchema);
  }

  async listWorkspaces(): Promise<WorkspaceRef[]> {
    const workspaces = await this.listRawWorkspaces();
    return workspaces.map((ws) => ({ id: ws.id, name: ws.name }));
  }

  // ─── Tree listing ───

  /**
   * Flat listing of every item in the workspace, in pre-order from the
   * workspace's own child list. Parents are derived from the workspace's
   * and collections' child id lists.
   */
  async listTree(workspace: WorkspaceRef): Promise<TreeEntry[]> {
    const raw = await this.get(
      `getWorkspace(${workspace.id})`,
      `/workspaces/${encodeURIComponent(workspace.id)}`,
      workspaceSchema,
    );
    if (!raw) {
      throw new SourceError(`Workspace ${workspace.id} not found`, { status: 404 });
    }
    const entries = await this.list(
      `listItems(${workspace.id})`,
      "/items",
      { workspaceId: workspace.id },
      entrySchema,
    );
    return buildTree(raw.childIds, entries);
  }

  // ─── Items ───

  async getItem(id: string): Promise<SourceItem | undefined> {
    const entry = await this.get(
      `getItem(${id})`,
      `/items/${encodeURIComponent(id)}`,
      entrySchema,
    );
    if (!entry) return undefined;

    const media: MediaInfo[] = [];
    for (const fileId of entry.contentMeta?.fileIds ?? []) {
      const file = await this.getFile(fileId);
      if (file) {
        media.push({ mediaId: file.id, filename: file.fileName });
      } else {
        this.logger.warn(`File ${fileId} referenced by item ${id} no longer exists`);
      }
    }

    const content = entry.content ?? "";
    return {
      id: entry.id,
      parentId: null,
      kind: entry.object === "collection" ? "collection" : "page",
      title: entry.title,
      url: entry.url,
      createdAt: entry.createdAt,
      updatedAt: entry.lastUpdatedAt ?? entry.createdAt,
      author: await this.resolveAuthor(entry.createdUserId),
      content,
      contentBlocks: parseMarkdown(content),
      childIds:
        entry.object === "collection"
          ? entry.childIds
          : (entry.contentMeta?.itemIds ?? []),
      media,
    };
  }

  // ─── Users (best effort) ───

  private async resolveAuthor(userId: string | undefined): Promise<string> {
    if (!userId) return "unknown";
    const known = this.authors.get(userId);
    if (known) return known;

    let author = userId;
    try {
      const user = await this.get(
        `getUser(${userId})`,
        `/users/${encodeURIComponent(userId)}`,
        userSchema,
      );
      if (user) {
        const name = `${user.firstName} ${user.lastName}`.trim();
        author = user.email ? `${name || user.id} <${user.email}>` : name || user.id;
      }
    } catch (err) {
      this.logger.warn(`Could not resolve user ${userId}: ${errorMessage(err)}`);
    }
    this.authors.set(userId, author);
    return author;
  }

  // ─── Files ───

  private async getFile(fileId: string): Promise<NuclinoFile | undefined> {
    return this.get(
      `getFile(${fileId})`,
      `/files/${encodeURIComponent(fileId)}`,
      fileSchema,
    );
  }

  /** Download a file's bytes through its short-lived signed URL. */
  async downloadMedia(mediaId: string): Promise<Buffer> {
    const file = await this.getFile(mediaId);
    if (!file) {
      throw new SourceError(`File ${mediaId} not found`, { status: 404 });
    }
    const response = await this.send(`download(${mediaId})`, file.download.url, false);
    if (response.status === 404) {
      throw new SourceError(`Download for file ${mediaId} not found`, { status: 404 });
    }
    const arrayBuffer = await response.arrayBuffer();
    return Buffer.from(arrayBuffer);
  }
}

// ─── Helpers ───

/**
 * Pre-order walk from the workspace root. Entries the walk never reaches
 * are kept at the end as roots so nothing is silently left out.
 */
export function buildTree(
  rootChildIds: string[],
  entries: NuclinoEntry[],
): TreeEntry[] {
  const byId = new Map(entries.map((entry) => [entry.id, entry]));
  const tree: TreeEntry[] = [];
  const seen = new Set<string>();

  const stack: Array<{ id: string; parentId: string | null }> = rootChildIds
    .map((id) => ({ id, parentId: null }))
    .reverse();

  while (stack.length > 0) {
    const next = stack.pop();
    if (!next || seen.has(next.id)) continue;
    const entry = byId.get(next.id);
    if (!entry) continue;
    seen.add(entry.id);
    tree.push({
      id: entry.id,
      parentId: next.parentId,
      kind: entry.object === "collection" ? "collection" : "page",
      title: entry.title,
    });
    if (entry.object === "collection") {
      for (let i = entry.childIds.length - 1; i >= 0; i--) {
        stack.push({ id: entry.childIds[i], parentId: entry.id });
      }
    }
  }

  for (const entry of entries) {
    if (seen.has(entry.id)) continue;
    seen.add(entry.id);
    tree.push({
      id: entry.id,
      parentId: null,
      kind: entry.object === "collection" ? "collection" : "page",
      title: entry.title,
    });
  }

  return tree;
}
