/**
 * Local cache store.
 *
 * One directory per workspace under the cache root:
 *
 *   workspace.json          manifest (workspace ref + item ids in source order)
 *   items/<id>.json         CachedItem
 *   items/<id>.md           readable copy of the source markdown
 *   files/<mediaId>/<name>  downloaded media
 *   migration.json          migration ledger
 *
 * Every write is atomic (tmp + rename). Absence is `undefined`; any I/O or
 * parse failure is a StoreError.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import {
  MigrationLedger,
  type OutputWriter,
  StoreError,
  createOutputWriter,
  errorMessage,
  sanitizeFilename,
  uniqueSlug,
} from "../core/index.js";
import {
  type CacheManifest,
  type CachedItem,
  type WorkspaceRef,
  cachedItemSchema,
  manifestSchema,
} from "./types.js";

const MANIFEST_FILE = "workspace.json";
const LEDGER_FILE = "migration.json";

export function workspaceDirName(workspace: WorkspaceRef): string {
  return uniqueSlug(workspace.name, workspace.id);
}

/** Cache file names must not escape their directory. */
function safeId(id: string): string {
  return sanitizeFilename(id).replace(/\.\./g, "_");
}

function readManifestFile(filePath: string): CacheManifest | undefined {
  if (!fs.existsSync(filePath)) return undefined;
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new StoreError(`Cannot read ${filePath}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  const parsed = manifestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new StoreError(`${filePath} is malformed: ${parsed.error.message}`);
  }
  return parsed.data;
}

/** Manifests of every workspace cached under `cacheDir`. */
export function listCaches(cacheDir: string): Array<CacheManifest & { dir: string }> {
  if (!fs.existsSync(cacheDir)) return [];
  const caches: Array<CacheManifest & { dir: string }> = [];
  for (const entry of fs.readdirSync(cacheDir, { withFileTypes: true })) {
    if (!entry.isDirectory()) continue;
    const dir = path.join(cacheDir, entry.name);
    const manifest = readManifestFile(path.join(dir, MANIFEST_FILE));
    if (manifest) caches.push({ ...manifest, dir });
  }
  return caches.sort((a, b) => a.workspace.name.localeCompare(b.workspace.name));
}

export class CacheStore {
  readonly dir: string;
  private readonly out: OutputWriter;
  private ledgerInstance: MigrationLedger | undefined;

  constructor(dir: string) {
    this.dir = dir;
    this.out = createOutputWriter(dir);
  }

  /** Open (creating on first write) the cache directory for a workspace. */
  static open(cacheDir: string, workspace: WorkspaceRef): CacheStore {
    return new CacheStore(path.join(cacheDir, workspaceDirName(workspace)));
  }

  /** Locate an existing cache by workspace id or exact name. */
  static find(cacheDir: string, idOrName: string): CacheStore | undefined {
    const match = listCaches(cacheDir).find(
      (c) => c.workspace.id === idOrName || c.workspace.name === idOrName,
    );
    return match ? new CacheStore(match.dir) : undefined;
  }

  // ─── Guarded I/O ───

  private async guard<T>(what: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof StoreError) throw err;
      throw new StoreError(`Cache ${what} failed in ${this.dir}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  // ─── Manifest ───

  async putManifest(workspace: WorkspaceRef, itemIds: string[]): Promise<void> {
    const manifest: CacheManifest = {
      workspace: { id: workspace.id, name: workspace.name },
      itemIds,
      cachedAt: new Date().toISOString(),
    };
    await this.guard("manifest write", () => this.out.writeJson(MANIFEST_FILE, manifest));
  }

  async getManifest(): Promise<CacheManifest | undefined> {
    return this.guard("manifest read", async () =>
      readManifestFile(this.out.absolute(MANIFEST_FILE)),
    );
  }

  // ─── Items ───

  async put(item: CachedItem): Promise<void> {
    const id = safeId(item.id);
    await this.guard(`write of item ${item.id}`, async () => {
      await this.out.writeJson(`items/${id}.json`, item);
      await this.out.writeDocument(
        `items/${id}.md`,
        {
          id: item.id,
          title: item.title,
          kind: item.kind,
          parent: item.parentId,
          author: item.author,
          created: item.createdAt,
          updated: item.updatedAt,
          url: item.url,
        },
        item.content,
      );
    });
  }

  async get(id: string): Promise<CachedItem | undefined> {
    const raw = await this.guard(`read of item ${id}`, () =>
      this.out.readText(`items/${safeId(id)}.json`),
    );
    if (raw === undefined) return undefined;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new StoreError(`Cached item ${id} is not valid JSON: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    const parsed = cachedItemSchema.safeParse(json);
    if (!parsed.success) {
      throw new StoreError(`Cached item ${id} is malformed: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  /** Item ids in source enumeration order (as of the last cache run). */
  async listIds(): Promise<string[]> {
    const manifest = await this.getManifest();
    if (manifest) return manifest.itemIds;
    const files = await this.guard("listing", () => this.out.list("items"));
    return files
      .filter((name) => name.endsWith(".json"))
      .map((name) => name.slice(0, -".json".length));
  }

  /** Every cached item, in `listIds` order. Ids without a cached file are skipped. */
  async loadAll(): Promise<CachedItem[]> {
    const items: CachedItem[] = [];
    for (const id of await this.listIds()) {
      const item = await this.get(id);
      if (item) items.push(item);
    }
    return items;
  }

  // ─── Blobs ───

  async putBlob(mediaId: string, filename: string, bytes: Buffer): Promise<string> {
    const relative = `files/${safeId(mediaId)}/${sanitizeFilename(filename) || "file"}`;
    await this.guard(`write of media ${mediaId}`, () => this.out.writeBinary(relative, bytes));
    return this.out.absolute(relative);
  }

  async getBlobPath(mediaId: string): Promise<string | undefined> {
    const names = await this.guard(`lookup of media ${mediaId}`, () =>
      this.out.list(`files/${safeId(mediaId)}`),
    );
    const first = names[0];
    return first ? this.out.absolute(`files/${safeId(mediaId)}/${first}`) : undefined;
  }

  // ─── Migration ledger ───

  ledger(): MigrationLedger {
    if (!this.ledgerInstance) {
      this.ledgerInstance = new MigrationLedger(path.join(this.dir, LEDGER_FILE));
    }
    return this.ledgerInstance;
  }
}
