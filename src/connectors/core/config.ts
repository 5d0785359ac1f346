/**
 * Environment-backed configuration.
 *
 * `.env` is loaded first and `.env.local` overrides it; command-line flags
 * override both (see cli.ts).
 */

import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import type { LogLevel } from "./types.js";

export const DEFAULT_CACHE_DIR = ".cache";
export const DEFAULT_NUCLINO_WAIT_MS = 750;
export const DEFAULT_NOTION_WAIT_MS = 350;

// Unset and empty (as copied from .env.example) both mean "no key".
const optionalKey = z
  .string()
  .optional()
  .transform((value) => value || undefined);

const envSchema = z.object({
  NUCLINO_API_KEY: optionalKey,
  NOTION_API_KEY: optionalKey,
  CACHE_DIR: z.string().min(1).default(DEFAULT_CACHE_DIR),
  NUCLINO_WAIT_MS: z.coerce.number().int().nonnegative().default(DEFAULT_NUCLINO_WAIT_MS),
  NOTION_WAIT_MS: z.coerce.number().int().nonnegative().default(DEFAULT_NOTION_WAIT_MS),
  LOG_LEVEL: z.enum(["info", "warn", "error", "silent"]).default("info"),
});

export interface MigrateConfig {
  nuclinoApiKey: string | undefined;
  notionApiKey: string | undefined;
  cacheDir: string;
  nuclinoWaitMs: number;
  notionWaitMs: number;
  logLevel: LogLevel;
}

export function loadEnvFiles(): void {
  loadDotenv();
  loadDotenv({ path: ".env.local", override: true });
}

export function readConfig(
  env: Record<string, string | undefined> = process.env,
): MigrateConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const vars = parsed.data;
  return {
    nuclinoApiKey: vars.NUCLINO_API_KEY,
    notionApiKey: vars.NOTION_API_KEY,
    cacheDir: vars.CACHE_DIR,
    nuclinoWaitMs: vars.NUCLINO_WAIT_MS,
    notionWaitMs: vars.NOTION_WAIT_MS,
    logLevel: vars.LOG_LEVEL,
  };
}

export function requireKey(
  value: string | undefined,
  name: "NUCLINO_API_KEY" | "NOTION_API_KEY",
): string {
  if (!value) {
    throw new Error(
      `${name} is not set. Put it in .env or export it before running.`,
    );
  }
  return value;
}
