import type { Logger, LogLevel } from "./types.js";

const LEVEL_RANK: Record<LogLevel, number> = {
  info: 0,
  warn: 1,
  error: 2,
  silent: 3,
};

/**
 * Prefixed console logger. Messages below `level` are dropped; progress
 * lines are shown at `info` only and redraw in place on a TTY.
 */
export class ConsoleLogger implements Logger {
  private readonly prefix: string;
  private readonly rank: number;

  constructor(component: string, level: LogLevel = "info") {
    this.prefix = `[${component}]`;
    this.rank = LEVEL_RANK[level];
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= this.rank;
  }

  private format(marker: string, msg: string, data?: Record<string, unknown>): string {
    const extra = data ? ` ${JSON.stringify(data)}` : "";
    return `${this.prefix} ${marker}${msg}${extra}`;
  }

  info(msg: string, data?: Record<string, unknown>): void {
    if (this.enabled("info")) console.log(this.format("", msg, data));
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    if (this.enabled("warn")) console.warn(this.format("⚠ ", msg, data));
  }

  error(msg: string, data?: Record<string, unknown>): void {
    if (this.enabled("error")) console.error(this.format("✗ ", msg, data));
  }

  progress(current: number, total: number, label: string): void {
    if (!this.enabled("info")) return;
    const pct = total > 0 ? Math.round((current / total) * 100) : 0;
    const line = `${this.prefix} ${label}: ${current}/${total} (${pct}%)`;
    if (!process.stdout.isTTY) {
      console.log(line);
      return;
    }
    process.stdout.write(`\r${line}`);
    if (current >= total) process.stdout.write("\n");
  }
}

/** Drops everything; for tests and library callers that log elsewhere. */
export class SilentLogger implements Logger {
  info(): void {}
  warn(): void {}
  error(): void {}
  progress(): void {}
}

export function createLogger(component: string, level: LogLevel = "info"): Logger {
  return level === "silent" ? new SilentLogger() : new ConsoleLogger(component, level);
}
