import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileOutputWriter } from "../../../src/connectors/core/output.js";

describe("FileOutputWriter", () => {
  let tmpDir: string;
  let writer: FileOutputWriter;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "nuclino-notion-out-"));
    writer = new FileOutputWriter(tmpDir);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("writes markdown with YAML frontmatter", async () => {
    await writer.writeDocument(
      "items/page.md",
      { title: "Onboarding", parent: null },
      "# Welcome\n",
    );

    const content = fs.readFileSync(path.join(tmpDir, "items/page.md"), "utf-8");
    expect(content).toBe("---\ntitle: Onboarding\nparent: null\n---\n\n# Welcome\n");
  });

  it("writes pretty JSON with a trailing newline", async () => {
    await writer.writeJson("meta/info.json", { id: "123", count: 5 });

    const raw = fs.readFileSync(path.join(tmpDir, "meta/info.json"), "utf-8");
    expect(raw).toBe('{\n  "id": "123",\n  "count": 5\n}\n');
  });

  it("writes binary data", async () => {
    const buf = Buffer.from([0x89, 0x50, 0x4e, 0x47]);
    await writer.writeBinary("files/image.png", buf);

    const data = fs.readFileSync(path.join(tmpDir, "files/image.png"));
    expect(data).toEqual(buf);
  });

  it("reads text back and returns undefined for missing files", async () => {
    await writer.writeJson("a.json", { a: 1 });
    expect(await writer.readText("a.json")).toBe('{\n  "a": 1\n}\n');
    expect(await writer.readText("missing.json")).toBeUndefined();
  });

  it("lists files sorted, without directories or temp files", async () => {
    await writer.writeJson("items/b.json", {});
    await writer.writeJson("items/a.json", {});
    fs.mkdirSync(path.join(tmpDir, "items/nested"));
    fs.writeFileSync(path.join(tmpDir, "items/c.json.tmp"), "");

    expect(await writer.list("items")).toEqual(["a.json", "b.json"]);
    expect(await writer.list("nowhere")).toEqual([]);
  });

  it("overwrites atomically without leaving temp files", async () => {
    await writer.writeJson("x.json", { v: 1 });
    await writer.writeJson("x.json", { v: 2 });
    expect(JSON.parse(fs.readFileSync(path.join(tmpDir, "x.json"), "utf-8"))).toEqual({ v: 2 });
    expect(fs.readdirSync(tmpDir)).toEqual(["x.json"]);
  });

  it("creates nested directories automatically", async () => {
    await writer.writeJson("a/b/c/d/deep.json", { deep: true });
    const data = JSON.parse(
      fs.readFileSync(path.join(tmpDir, "a/b/c/d/deep.json"), "utf-8"),
    );
    expect(data.deep).toBe(true);
  });

  it("resolves absolute paths under the base directory", () => {
    expect(writer.absolute("files/x.png")).toBe(path.resolve(tmpDir, "files/x.png"));
  });
});
