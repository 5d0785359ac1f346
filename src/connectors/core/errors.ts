/**
 * Error kinds shared by both phases.
 *
 * Absence is never an error: cache misses and 404s are `undefined`.
 * Translation fidelity loss is reported as a warning, not thrown.
 */

export class MigrateError extends Error {
  readonly status: number | undefined;

  constructor(message: string, opts: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = new.target.name;
    this.status = opts.status;
  }
}

/** Non-retryable fault from the source API (or retries exhausted). */
export class SourceError extends MigrateError {}

/** Fault from the destination API after exhausting conflict retries. */
export class DestinationError extends MigrateError {}

/** Local durability fault. Always fatal to the current run. */
export class StoreError extends MigrateError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** HTTP status carried by an error thrown by fetch wrappers or the Notion SDK. */
export function statusOf(err: unknown): number | undefined {
  if (err instanceof Error && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}

export function isNetworkError(err: unknown): boolean {
  if (err instanceof Error) {
    const msg = err.message.toLowerCase();
    return (
      msg.includes("econnreset") ||
      msg.includes("etimedout") ||
      msg.includes("enotfound") ||
      msg.includes("socket hang up") ||
      msg.includes("fetch failed")
    );
  }
  return false;
}
