import * as fs from "node:fs";
import * as path from "node:path";
import { stringify as yamlStringify } from "yaml";
import type { OutputWriter } from "./types.js";

export class FileOutputWriter implements OutputWriter {
  private readonly baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = baseDir;
  }

  private resolve(relativePath: string): string {
    return path.join(this.baseDir, relativePath);
  }

  private ensureDir(filePath: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  private atomicWrite(filePath: string, content: string | Buffer): void {
    this.ensureDir(filePath);
    const tmp = `${filePath}.tmp`;
    fs.writeFileSync(tmp, content);
    fs.renameSync(tmp, filePath);
  }

  absolute(relativePath: string): string {
    return path.resolve(this.resolve(relativePath));
  }

  async writeDocument(
    relativePath: string,
    frontmatter: Record<string, unknown>,
    body: string,
  ): Promise<void> {
    const filePath = this.resolve(relativePath);
    const fm = yamlStringify(frontmatter).trim();
    const content = `---\n${fm}\n---\n\n${body}`;
    this.atomicWrite(filePath, content);
  }

  async writeJson(relativePath: string, data: unknown): Promise<void> {
    const filePath = this.resolve(relativePath);
    this.atomicWrite(filePath, `${JSON.stringify(data, null, 2)}\n`);
  }

  async writeBinary(relativePath: string, data: Buffer): Promise<void> {
    const filePath = this.resolve(relativePath);
    this.atomicWrite(filePath, data);
  }

  async readText(relativePath: string): Promise<string | undefined> {
    const filePath = this.resolve(relativePath);
    if (!fs.existsSync(filePath)) return undefined;
    return fs.readFileSync(filePath, "utf-8");
  }

  async list(relativeDir: string): Promise<string[]> {
    const dir = this.resolve(relativeDir);
    if (!fs.existsSync(dir)) return [];
    return fs
      .readdirSync(dir, { withFileTypes: true })
      .filter((entry) => entry.isFile() && !entry.name.endsWith(".tmp"))
      .map((entry) => entry.name)
      .sort();
  }
}

export function createOutputWriter(baseDir: string): OutputWriter {
  return new FileOutputWriter(baseDir);
}
