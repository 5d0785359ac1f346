import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { StoreError } from "../../../src/connectors/core/errors.js";
import { CacheStore, listCaches } from "../../../src/connectors/nuclino/cache.js";
import type { CachedItem, WorkspaceRef } from "../../../src/connectors/nuclino/types.js";

const workspace: WorkspaceRef = {
  id: "3f2a9c1e-77b0-4d2e-9a51-0c3e8f6b1d24",
  name: "Team Wiki",
};

function cachedItem(id: string, overrides: Partial<CachedItem> = {}): CachedItem {
  return {
    id,
    parentId: null,
    kind: "page",
    title: `Page ${id}`,
    url: `https://app.nuclino.com/team/wiki/${id}`,
    createdAt: "2026-01-01T00:00:00.000Z",
    updatedAt: "2026-01-02T00:00:00.000Z",
    author: "Ada Byron <ada@example.com>",
    content: "Hello",
    contentBlocks: [{ kind: "paragraph", text: [{ text: "Hello" }], children: [] }],
    childIds: [],
    mediaRefs: [],
    ...overrides,
  };
}

describe("CacheStore", () => {
  let cacheDir: string;
  let store: CacheStore;

  beforeEach(() => {
    cacheDir = fs.mkdtempSync(path.join(os.tmpdir(), "nuclino-notion-cache-"));
    store = CacheStore.open(cacheDir, workspace);
  });

  afterEach(() => {
    fs.rmSync(cacheDir, { recursive: true, force: true });
  });

  it("keys the directory by slug and short id", () => {
    expect(store.dir).toBe(path.join(cacheDir, "team-wiki-3f2a9c1e"));
  });

  it("round-trips items and returns undefined when absent", async () => {
    const item = cachedItem("a", { parentId: "root", childIds: ["b"] });
    await store.put(item);

    expect(await store.get("a")).toEqual(item);
    expect(await store.get("missing")).toBeUndefined();
  });

  it("overwrites an item entirely on put", async () => {
    await store.put(cachedItem("a", { title: "Old" }));
    await store.put(cachedItem("a", { title: "New", content: "" }));

    const item = await store.get("a");
    expect(item?.title).toBe("New");
    expect(item?.content).toBe("");
  });

  it("writes a readable markdown copy next to the JSON", async () => {
    await store.put(cachedItem("a", { content: "# Heading\n" }));

    const md = fs.readFileSync(path.join(store.dir, "items", "a.md"), "utf-8");
    expect(md).toBe(
      [
        "---",
        "id: a",
        "title: Page a",
        "kind: page",
        "parent: null",
        "author: Ada Byron <ada@example.com>",
        "created: 2026-01-01T00:00:00.000Z",
        "updated: 2026-01-02T00:00:00.000Z",
        "url: https://app.nuclino.com/team/wiki/a",
        "---",
        "",
        "# Heading",
        "",
      ].join("\n"),
    );
  });

  it("lists ids in manifest order", async () => {
    await store.putManifest(workspace, ["c", "a", "b"]);
    expect(await store.listIds()).toEqual(["c", "a", "b"]);
  });

  it("falls back to cached files when there is no manifest", async () => {
    await store.put(cachedItem("b"));
    await store.put(cachedItem("a"));
    expect(await store.listIds()).toEqual(["a", "b"]);
  });

  it("loads every cached item and skips ids that were never written", async () => {
    await store.putManifest(workspace, ["b", "gone", "a"]);
    await store.put(cachedItem("a"));
    await store.put(cachedItem("b"));

    const items = await store.loadAll();
    expect(items.map((item) => item.id)).toEqual(["b", "a"]);
  });

  it("stores blobs under their media id", async () => {
    const localPath = await store.putBlob("f1", "team photo.png", Buffer.from([7, 8]));

    expect(localPath).toBe(path.resolve(store.dir, "files", "f1", "team_photo.png"));
    expect(fs.readFileSync(localPath)).toEqual(Buffer.from([7, 8]));
    expect(await store.getBlobPath("f1")).toBe(localPath);
    expect(await store.getBlobPath("f2")).toBeUndefined();
  });

  it("raises a StoreError for a corrupt item file", async () => {
    fs.mkdirSync(path.join(store.dir, "items"), { recursive: true });
    fs.writeFileSync(path.join(store.dir, "items", "bad.json"), '{"id": 1}');

    await expect(store.get("bad")).rejects.toBeInstanceOf(StoreError);
  });

  it("raises a StoreError when the directory cannot be written", async () => {
    fs.writeFileSync(path.join(cacheDir, "blocked"), "");
    const blocked = new CacheStore(path.join(cacheDir, "blocked"));

    await expect(blocked.put(cachedItem("a"))).rejects.toBeInstanceOf(StoreError);
  });

  it("is found again by workspace id or name", async () => {
    await store.putManifest(workspace, ["a"]);

    expect(CacheStore.find(cacheDir, workspace.id)?.dir).toBe(store.dir);
    expect(CacheStore.find(cacheDir, "Team Wiki")?.dir).toBe(store.dir);
    expect(CacheStore.find(cacheDir, "Other")).toBeUndefined();

    const caches = listCaches(cacheDir);
    expect(caches).toHaveLength(1);
    expect(caches[0]?.workspace).toEqual(workspace);
    expect(caches[0]?.itemIds).toEqual(["a"]);
  });

  it("keeps the migration ledger inside the workspace directory", () => {
    store.ledger().markCreated("a", "page-1");
    expect(fs.existsSync(path.join(store.dir, "migration.json"))).toBe(true);
    expect(store.ledger()).toBe(store.ledger());
  });
});
