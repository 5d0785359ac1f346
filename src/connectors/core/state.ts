import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { StoreError, errorMessage } from "./errors.js";
import type {
  MigrationRecord,
  MigrationStatus,
  PersistedLedger,
} from "./types.js";

const recordSchema = z.object({
  sourceId: z.string(),
  status: z.enum(["pending", "created", "failed"]),
  destinationId: z.string().nullable(),
  lastAttemptAt: z.string(),
  error: z.string().nullable(),
});

const ledgerSchema = z.object({
  version: z.literal(1),
  records: z.record(recordSchema),
});

function emptyLedger(): PersistedLedger {
  return { version: 1, records: {} };
}

/**
 * Source id → destination page bookkeeping. Every transition is written to
 * disk before it returns, so an interrupted run leaves the ledger describing
 * exactly what was done.
 */
export class MigrationLedger {
  private state: PersistedLedger;
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
    this.state = this.loadFromDisk();
  }

  private loadFromDisk(): PersistedLedger {
    if (!fs.existsSync(this.filePath)) return emptyLedger();
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, "utf-8"));
    } catch (err) {
      throw new StoreError(
        `Cannot read migration ledger ${this.filePath}: ${errorMessage(err)}`,
        { cause: err },
      );
    }
    const parsed = ledgerSchema.safeParse(raw);
    if (!parsed.success) {
      throw new StoreError(
        `Migration ledger ${this.filePath} is malformed: ${parsed.error.message}`,
      );
    }
    return parsed.data;
  }

  private writeToDisk(): void {
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      const tmp = `${this.filePath}.tmp`;
      fs.writeFileSync(tmp, JSON.stringify(this.state, null, 2));
      fs.renameSync(tmp, this.filePath);
    } catch (err) {
      throw new StoreError(
        `Cannot write migration ledger ${this.filePath}: ${errorMessage(err)}`,
        { cause: err },
      );
    }
  }

  private transition(
    sourceId: string,
    status: MigrationStatus,
    changes: Partial<Pick<MigrationRecord, "destinationId" | "error">>,
  ): MigrationRecord {
    const previous = this.state.records[sourceId];
    const record: MigrationRecord = {
      sourceId,
      status,
      destinationId:
        changes.destinationId === undefined
          ? (previous?.destinationId ?? null)
          : changes.destinationId,
      lastAttemptAt: new Date().toISOString(),
      error: changes.error ?? null,
    };
    this.state.records[sourceId] = record;
    this.writeToDisk();
    return record;
  }

  get(sourceId: string): MigrationRecord | undefined {
    return this.state.records[sourceId];
  }

  isCreated(sourceId: string): boolean {
    return this.state.records[sourceId]?.status === "created";
  }

  /** Destination page id for an item that was migrated successfully. */
  destinationOf(sourceId: string): string | undefined {
    const record = this.state.records[sourceId];
    if (record?.status !== "created" || !record.destinationId) return undefined;
    return record.destinationId;
  }

  markPending(sourceId: string): MigrationRecord {
    return this.transition(sourceId, "pending", {});
  }

  /** Remembers a page id as soon as the page exists, before its blocks land. */
  attachDestination(sourceId: string, destinationId: string): MigrationRecord {
    return this.transition(sourceId, "pending", { destinationId });
  }

  /** Forgets a page id once that page has been archived. */
  detachDestination(sourceId: string): MigrationRecord {
    return this.transition(sourceId, "pending", { destinationId: null });
  }

  markCreated(sourceId: string, destinationId: string): MigrationRecord {
    return this.transition(sourceId, "created", { destinationId });
  }

  markFailed(sourceId: string, error: string): MigrationRecord {
    return this.transition(sourceId, "failed", { error });
  }

  records(): MigrationRecord[] {
    return Object.values(this.state.records);
  }

  counts(): Record<MigrationStatus, number> {
    const counts: Record<MigrationStatus, number> = {
      pending: 0,
      created: 0,
      failed: 0,
    };
    for (const record of Object.values(this.state.records)) {
      counts[record.status]++;
    }
    return counts;
  }
}
