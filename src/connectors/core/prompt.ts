import { confirm, isCancel, log, note, select } from "@clack/prompts";

export interface UploadRequest {
  destinationPageId: string;
  localPath: string;
  filename: string;
  /** Where in the page the file belongs, e.g. `after "Intro" (block 3)`. */
  suggestedPlacement: string;
}

/**
 * Human-in-the-loop step for what the destination API cannot do. The
 * migrator awaits every call before it moves on to the next page.
 */
export interface MediaPrompter {
  requestUpload(request: UploadRequest): Promise<void>;
}

function unwrapPrompt<T>(value: T | symbol): T {
  if (isCancel(value)) {
    process.exit(0);
  }
  return value;
}

export function notionPageUrl(pageId: string): string {
  return `https://www.notion.so/${pageId.replace(/-/g, "")}`;
}

export class ClackMediaPrompter implements MediaPrompter {
  async requestUpload(request: UploadRequest): Promise<void> {
    note(
      [
        `File:      ${request.localPath}`,
        `Page:      ${notionPageUrl(request.destinationPageId)}`,
        `Placement: ${request.suggestedPlacement}`,
      ].join("\n"),
      `Upload ${request.filename}`,
    );
    const done = unwrapPrompt(
      await confirm({ message: "Uploaded? (No skips it for now)", initialValue: true }),
    );
    if (!done) {
      log.warn(`Skipped upload of ${request.filename}`);
    }
  }
}

export async function selectWorkspace<W extends { id: string; name: string }>(
  workspaces: W[],
): Promise<W> {
  const first = workspaces[0];
  if (!first) {
    throw new Error("No workspaces available for this API key");
  }
  if (workspaces.length === 1) return first;

  const selectedId = unwrapPrompt(
    await select<{ value: string; label: string; hint: string }[], string>({
      message: "Which workspace?",
      options: workspaces.map((ws) => ({ value: ws.id, label: ws.name, hint: ws.id })),
    }),
  );
  return workspaces.find((ws) => ws.id === selectedId) ?? first;
}
