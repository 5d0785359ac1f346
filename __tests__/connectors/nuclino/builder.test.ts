import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SourceError, StoreError } from "../../../src/connectors/core/errors.js";
import { SilentLogger } from "../../../src/connectors/core/logger.js";
import { type CacheSource, CacheBuilder } from "../../../src/connectors/nuclino/builder.js";
import { CacheStore } from "../../../src/connectors/nuclino/cache.js";
import { parseMarkdown } from "../../../src/connectors/nuclino/markdown.js";
import type {
  MediaInfo,
  SourceItem,
  TreeEntry,
  WorkspaceRef,
} from "../../../src/connectors/nuclino/types.js";

const workspace: WorkspaceRef = { id: "ws-0001", name: "Docs" };

function sourceItem(id: string, content: string, media: MediaInfo[] = []): SourceItem {
  return {
    id,
    parentId: null,
    kind: "page",
    title: `Page ${id}`,
    url: `https://app.nuclino.com/t/docs/${id}`,
    createdAt: "2026-01-01T00:00:00.000Z",
    updatedAt: "2026-01-01T00:00:00.000Z",
    author: "u1",
    content,
    contentBlocks: parseMarkdown(content),
    childIds: [],
    media,
  };
}

/** In-memory source: A (with B beneath it), C, plus whatever the test adds. */
class FakeSource implements CacheSource {
  tree: TreeEntry[] = [
    { id: "A", parentId: null, kind: "page", title: "A" },
    { id: "B", parentId: "A", kind: "page", title: "B" },
    { id: "C", parentId: null, kind: "page", title: "C" },
  ];
  items = new Map<string, SourceItem | Error>([
    ["A", sourceItem("A", "# A\n\n![chart](https://files.nuclino.com/files/m1/chart.png)", [
      { mediaId: "m1", filename: "chart.png" },
    ])],
    ["B", sourceItem("B", "Child of A")],
    ["C", sourceItem("C", "- one\n- two")],
  ]);
  blobs = new Map<string, Buffer | Error>([["m1", Buffer.from("png-bytes")]]);
  downloads: string[] = [];

  async listTree(): Promise<TreeEntry[]> {
    return this.tree;
  }

  async getItem(id: string): Promise<SourceItem | undefined> {
    const item = this.items.get(id);
    if (item instanceof Error) throw item;
    return item;
  }

  async downloadMedia(mediaId: string): Promise<Buffer> {
    this.downloads.push(mediaId);
    const blob = this.blobs.get(mediaId);
    if (blob === undefined) throw new SourceError(`File ${mediaId} not found`, { status: 404 });
    if (blob instanceof Error) throw blob;
    return blob;
  }
}

describe("CacheBuilder", () => {
  let cacheDir: string;
  let store: CacheStore;
  let source: FakeSource;

  beforeEach(() => {
    cacheDir = fs.mkdtempSync(path.join(os.tmpdir(), "nuclino-notion-build-"));
    store = CacheStore.open(cacheDir, workspace);
    source = new FakeSource();
  });

  afterEach(() => {
    fs.rmSync(cacheDir, { recursive: true, force: true });
  });

  function builder(target: CacheStore = store): CacheBuilder {
    return new CacheBuilder({ source, store: target, logger: new SilentLogger() });
  }

  it("caches every item with its parent and downloaded media", async () => {
    const summary = await builder().build(workspace);

    expect(summary).toMatchObject({ cached: 3, failed: 0, missing: 0, media: 1, errors: [] });
    expect(await store.listIds()).toEqual(["A", "B", "C"]);

    const a = await store.get("A");
    const blobPath = path.resolve(store.dir, "files", "m1", "chart.png");
    expect(a?.mediaRefs).toEqual([{ mediaId: "m1", filename: "chart.png", localPath: blobPath }]);
    expect(fs.readFileSync(blobPath, "utf-8")).toBe("png-bytes");
    expect((await store.get("B"))?.parentId).toBe("A");
    expect((await store.get("C"))?.contentBlocks).toHaveLength(2);
  });

  it("keeps going past an item that fails", async () => {
    source.items.set("B", new SourceError("getItem(B): 500 Internal Server Error", { status: 500 }));

    const summary = await builder().build(workspace);

    expect(summary.cached).toBe(2);
    expect(summary.failed).toBe(1);
    expect(summary.errors).toEqual([
      { entity: "item:B", error: "getItem(B): 500 Internal Server Error", retryable: true },
    ]);
    expect(await store.get("C")).toBeDefined();
  });

  it("counts items that vanished between listing and fetching", async () => {
    source.items.delete("C");
    const summary = await builder().build(workspace);
    expect(summary.missing).toBe(1);
    expect(summary.cached).toBe(2);
  });

  it("caches an item without the media that could not be downloaded", async () => {
    source.blobs.set("m1", new SourceError("download(m1): 403 Forbidden", { status: 403 }));

    const summary = await builder().build(workspace);

    expect(summary.cached).toBe(3);
    expect(summary.media).toBe(0);
    expect(summary.errors).toEqual([
      { entity: "media:m1", error: "download(m1): 403 Forbidden", retryable: false },
    ]);
    expect((await store.get("A"))?.mediaRefs).toEqual([]);
  });

  it("produces byte-identical item files when re-run without source changes", async () => {
    await builder().build(workspace);
    const itemsDir = path.join(store.dir, "items");
    const snapshot = (): Record<string, string> =>
      Object.fromEntries(
        fs
          .readdirSync(itemsDir)
          .sort()
          .map((name) => [name, fs.readFileSync(path.join(itemsDir, name), "utf-8")]),
      );
    const first = snapshot();

    await builder().build(workspace);

    expect(Object.keys(first)).toEqual(["A.json", "A.md", "B.json", "B.md", "C.json", "C.md"]);
    expect(snapshot()).toEqual(first);
  });

  it("refreshes items that changed in the source", async () => {
    await builder().build(workspace);
    source.items.set("B", sourceItem("B", "Edited"));

    await builder().build(workspace);

    expect((await store.get("B"))?.content).toBe("Edited");
  });

  it("aborts the run on a StoreError", async () => {
    fs.writeFileSync(path.join(cacheDir, "not-a-dir"), "");
    const broken = new CacheStore(path.join(cacheDir, "not-a-dir"));

    await expect(builder(broken).build(workspace)).rejects.toBeInstanceOf(StoreError);
    expect(source.downloads).toEqual([]);
  });
});
