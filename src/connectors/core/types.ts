/** Core type definitions for nuclino-notion-migrate. */

// ─── Pacing ───

export interface PacerConfig {
  /** Fixed wait between two consecutive calls. */
  intervalMs?: number;
}

/**
 * Strategy consulted before every remote call. The clients only ever call
 * `waitBeforeNextCall`, so a header-driven or token-bucket strategy can
 * replace the fixed interval without touching them.
 */
export interface Pacer {
  waitBeforeNextCall(): Promise<void>;
}

// ─── Logger ───

export type LogLevel = "info" | "warn" | "error" | "silent";

export interface Logger {
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  progress(current: number, total: number, label: string): void;
}

// ─── Output Writer ───

export interface OutputWriter {
  writeDocument(
    relativePath: string,
    frontmatter: Record<string, unknown>,
    body: string,
  ): Promise<void>;
  writeJson(relativePath: string, data: unknown): Promise<void>;
  writeBinary(relativePath: string, data: Buffer): Promise<void>;
  readText(relativePath: string): Promise<string | undefined>;
  list(relativeDir: string): Promise<string[]>;
  absolute(relativePath: string): string;
}

// ─── Per-item failures ───

export interface ItemError {
  entity: string;
  error: string;
  retryable: boolean;
}

// ─── Migration bookkeeping ───

export type MigrationStatus = "pending" | "created" | "failed";

export interface MigrationRecord {
  sourceId: string;
  status: MigrationStatus;
  destinationId: string | null;
  lastAttemptAt: string;
  error: string | null;
}

export interface PersistedLedger {
  version: 1;
  records: Record<string, MigrationRecord>;
}
