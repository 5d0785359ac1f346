#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";
import {
  CacheBuilder,
  CacheStore,
  type CacheSummary,
  NuclinoApi,
  type WorkspaceRef,
  listCaches,
} from "../nuclino/index.js";
import { type MigrationSummary, Migrator, NotionApi } from "../notion/index.js";
import { type MigrateConfig, loadEnvFiles, readConfig, requireKey } from "./config.js";
import { errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import { createPacer } from "./pacer.js";
import { ClackMediaPrompter, selectWorkspace } from "./prompt.js";

loadEnvFiles();

interface GlobalOptions {
  wait?: number;
  notionWait?: number;
  cacheDir?: string;
  quiet?: boolean;
}

function parseNonNegativeInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

function parsePositiveInt(value: string): number {
  const parsed = parseNonNegativeInt(value);
  if (parsed === 0) throw new InvalidArgumentError("Expected a positive integer.");
  return parsed;
}

// ─── Shared setup ───

const controller = new AbortController();
let interrupted = false;
process.on("SIGINT", () => {
  if (interrupted) process.exit(130);
  interrupted = true;
  console.log("\nStopping after the current call... (Ctrl-C again to force)");
  controller.abort();
});

function settings(): MigrateConfig {
  const env = readConfig();
  const flags = program.opts<GlobalOptions>();
  return {
    ...env,
    cacheDir: flags.cacheDir ?? env.cacheDir,
    nuclinoWaitMs: flags.wait ?? env.nuclinoWaitMs,
    notionWaitMs: flags.notionWait ?? env.notionWaitMs,
    logLevel: flags.quiet && env.logLevel === "info" ? "warn" : env.logLevel,
  };
}

function nuclinoApi(config: MigrateConfig): NuclinoApi {
  return new NuclinoApi({
    apiKey: requireKey(config.nuclinoApiKey, "NUCLINO_API_KEY"),
    pacer: createPacer({ intervalMs: config.nuclinoWaitMs }),
    logger: createLogger("nuclino", config.logLevel),
    signal: controller.signal,
  });
}

async function chooseWorkspace(
  workspaces: WorkspaceRef[],
  idOrName: string | undefined,
): Promise<WorkspaceRef> {
  if (!idOrName) return selectWorkspace(workspaces);
  const match = workspaces.find((ws) => ws.id === idOrName || ws.name === idOrName);
  if (!match) {
    throw new Error(`No workspace "${idOrName}". Run "workspaces" to list them.`);
  }
  return match;
}

/** An existing cache, by id/name or by asking when there are several. */
async function openCache(cacheDir: string, idOrName: string | undefined): Promise<CacheStore> {
  const caches = listCaches(cacheDir);
  if (caches.length === 0) {
    throw new Error(`No cached workspace in ${cacheDir}. Run "cache" first.`);
  }
  const workspace = await chooseWorkspace(
    caches.map((c) => c.workspace),
    idOrName,
  );
  const store = CacheStore.find(cacheDir, workspace.id);
  if (!store) throw new Error(`Cache for ${workspace.name} disappeared`);
  return store;
}

function migrator(config: MigrateConfig, store: CacheStore, maxListDepth?: number): Migrator {
  return new Migrator({
    store,
    notion: new NotionApi({
      token: requireKey(config.notionApiKey, "NOTION_API_KEY"),
      pacer: createPacer({ intervalMs: config.notionWaitMs }),
      logger: createLogger("notion", config.logLevel),
      signal: controller.signal,
    }),
    ledger: store.ledger(),
    logger: createLogger("migrate", config.logLevel),
    prompter: new ClackMediaPrompter(),
    maxListDepth,
    signal: controller.signal,
  });
}

// ─── Summaries ───

function printErrors(errors: Array<{ entity: string; error: string }>): void {
  for (const err of errors.slice(0, 5)) {
    console.log(`  ✗ ${err.entity}: ${err.error}`);
  }
  if (errors.length > 5) {
    console.log(`  ... and ${errors.length - 5} more errors`);
  }
}

function printCacheSummary(s: CacheSummary): void {
  console.log("\n═══ Cache Summary ═══\n");
  const status = s.errors.length === 0 ? "✓" : "⚠";
  console.log(
    `${status} ${s.workspace.name}: ${s.cached} cached, ${s.media} files, ${s.failed} failed, ${s.missing} missing [${(s.durationMs / 1000).toFixed(1)}s]`,
  );
  printErrors(s.errors);
}

function printMigrationSummary(s: MigrationSummary): void {
  console.log("\n═══ Migration Summary ═══\n");
  const status = s.failed === 0 ? "✓" : "⚠";
  console.log(
    `${status} ${s.created} created, ${s.skipped} skipped, ${s.failed} failed, ${s.blocked} blocked, ${s.missing} missing [${(s.durationMs / 1000).toFixed(1)}s]`,
  );
  if (s.warnings > 0) {
    console.log(`  ${s.warnings} blocks were kept as plain text`);
  }
  printErrors(s.errors);
}

// ─── Commands ───

const program = new Command()
  .name("nuclino-notion")
  .description("Cache a Nuclino workspace locally, then recreate it in Notion")
  .version("1.0.0")
  .option("--wait <ms>", "Pause before each Nuclino request", parseNonNegativeInt)
  .option("--notion-wait <ms>", "Pause before each Notion request", parseNonNegativeInt)
  .option("--cache-dir <dir>", "Cache directory")
  .option("-q, --quiet", "Only log warnings and errors");

program
  .command("workspaces")
  .description("List the Nuclino workspaces the API key can read")
  .action(async () => {
    const config = settings();
    const cached = new Set(listCaches(config.cacheDir).map((c) => c.workspace.id));
    for (const ws of await nuclinoApi(config).listWorkspaces()) {
      console.log(`${cached.has(ws.id) ? "●" : " "} ${ws.id}  ${ws.name}`);
    }
  });

program
  .command("cache")
  .description("Download a whole workspace (items and files) into the cache")
  .option("--workspace <id|name>", "Workspace to cache (asks when omitted)")
  .action(async (opts: { workspace?: string }) => {
    const config = settings();
    const api = nuclinoApi(config);
    const workspace = await chooseWorkspace(await api.listWorkspaces(), opts.workspace);
    const store = CacheStore.open(config.cacheDir, workspace);
    const builder = new CacheBuilder({
      source: api,
      store,
      logger: createLogger("cache", config.logLevel),
      signal: controller.signal,
    });
    const summary = await builder.build(workspace);
    printCacheSummary(summary);
    process.exit(summary.failed > 0 ? 1 : 0);
  });

program
  .command("migrate-page")
  .description("Migrate cached pages, each directly under the given Notion page")
  .argument("<ids...>", "Nuclino item ids")
  .requiredOption("--parent <id>", "Notion parent page id")
  .option("--workspace <id|name>", "Cached workspace (asks when several)")
  .option("--max-list-depth <n>", "Deepest list nesting kept", parsePositiveInt)
  .action(
    async (
      ids: string[],
      opts: { parent: string; workspace?: string; maxListDepth?: number },
    ) => {
      const config = settings();
      const store = await openCache(config.cacheDir, opts.workspace);
      const summary = await migrator(config, store, opts.maxListDepth).migratePages(
        ids,
        opts.parent,
      );
      printMigrationSummary(summary);
      process.exit(summary.failed > 0 || summary.missing > 0 ? 1 : 0);
    },
  );

program
  .command("migrate-workspace")
  .description("Migrate every cached item, parents before children")
  .requiredOption("--parent <id>", "Notion page to create the workspace under")
  .option("--workspace <id|name>", "Cached workspace (asks when several)")
  .option("--max-list-depth <n>", "Deepest list nesting kept", parsePositiveInt)
  .action(async (opts: { parent: string; workspace?: string; maxListDepth?: number }) => {
    const config = settings();
    const store = await openCache(config.cacheDir, opts.workspace);
    const summary = await migrator(config, store, opts.maxListDepth).migrateWorkspace(
      opts.parent,
    );
    printMigrationSummary(summary);
    process.exit(summary.failed > 0 ? 1 : 0);
  });

program
  .command("status")
  .description("Show cached workspaces and their migration progress")
  .option("--workspace <id|name>", "Only this cached workspace")
  .action(async (opts: { workspace?: string }) => {
    const config = settings();
    const caches = listCaches(config.cacheDir).filter(
      (c) =>
        !opts.workspace ||
        c.workspace.id === opts.workspace ||
        c.workspace.name === opts.workspace,
    );
    if (caches.length === 0) {
      console.log(`No cached workspaces in ${config.cacheDir}`);
      return;
    }
    for (const cache of caches) {
      const ledger = new CacheStore(cache.dir).ledger();
      const counts = ledger.counts();
      const notStarted =
        cache.itemIds.length - counts.created - counts.failed - counts.pending;
      console.log(
        `${cache.workspace.name} (${cache.workspace.id}): ${cache.itemIds.length} items cached ${cache.cachedAt}`,
      );
      console.log(
        `  ${counts.created} created, ${counts.failed} failed, ${counts.pending} pending, ${Math.max(0, notStarted)} not started`,
      );
      printErrors(
        ledger
          .records()
          .filter((r) => r.status === "failed")
          .map((r) => ({ entity: r.sourceId, error: r.error ?? "unknown error" })),
      );
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(`✗ ${errorMessage(err)}`);
  process.exit(1);
});
