import fs from "node:fs";
import path from "node:path";
import { DEFAULTS, type QuakeLogger } from "@quakewatch/core";

export const LOG_FILENAME = "quake_monitor.log";

export type FileLoggerOptions = {
  logDir: string;
  maxSizeBytes?: number;
  backupCount?: number;
  /** Mirror lines to stdout/stderr. Defaults to true. */
  console?: boolean;
  clock?: () => Date;
};

type Level = "INFO" | "WARN" | "ERROR";

function resolveLogPath(logDir: string): string {
  return path.join(logDir, LOG_FILENAME);
}

function ensureDir(dir: string): void {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

/**
 * Logger that appends timestamped lines to `<logDir>/quake_monitor.log` and
 * mirrors them to the console. The file rotates at `maxSizeBytes`, keeping
 * `backupCount` numbered backups (`.1` is the newest).
 */
export function createFileLogger(opts: FileLoggerOptions): QuakeLogger {
  const logPath = resolveLogPath(opts.logDir);
  const maxSize = opts.maxSizeBytes ?? DEFAULTS.maxLogSizeBytes;
  const backups = opts.backupCount ?? DEFAULTS.logBackupCount;
  const mirror = opts.console ?? true;
  const clock = opts.clock ?? (() => new Date());

  ensureDir(opts.logDir);

  function write(level: Level, msg: string): void {
    const stamp = clock().toISOString();
    const line = `${stamp} - quake_monitor - ${level} - ${msg}\n`;

    if (mirror) {
      const out = `${stamp} - ${level} - ${msg}`;
      if (level === "INFO") console.log(out);
      else console.error(out);
    }

    try {
      rotateIfNeeded(logPath, Buffer.byteLength(line, "utf-8"), maxSize, backups);
      fs.appendFileSync(logPath, line, "utf-8");
    } catch (err) {
      // File sink failures never reach the caller.
      if (mirror) console.error(`${stamp} - ERROR - log write failed: ${String(err)}`);
    }
  }

  return {
    info: (msg) => write("INFO", msg),
    warn: (msg) => write("WARN", msg),
    error: (msg) => write("ERROR", msg),
  };
}

/** Shift `.log` → `.log.1` → … when the next line would push it past `maxSize`. */
export function rotateIfNeeded(logPath: string, incomingBytes: number, maxSize: number, backups: number): boolean {
  let size: number;
  try {
    size = fs.statSync(logPath).size;
  } catch {
    return false;
  }
  if (size === 0 || size + incomingBytes <= maxSize) return false;

  if (backups <= 0) {
    fs.truncateSync(logPath, 0);
    return true;
  }

  const oldest = `${logPath}.${backups}`;
  if (fs.existsSync(oldest)) fs.unlinkSync(oldest);
  for (let i = backups - 1; i >= 1; i--) {
    const from = `${logPath}.${i}`;
    if (fs.existsSync(from)) fs.renameSync(from, `${logPath}.${i + 1}`);
  }
  fs.renameSync(logPath, `${logPath}.1`);
  return true;
}

/**
 * Delete log files (current and rotated) whose mtime is older than the
 * retention window. Returns the names removed.
 */
export function sweepOldLogs(
  logDir: string,
  retentionDays: number,
  now: number = Date.now(),
): string[] {
  if (!fs.existsSync(logDir)) return [];

  const cutoff = now - retentionDays * 24 * 60 * 60 * 1000;
  const removed: string[] = [];

  for (const name of fs.readdirSync(logDir)) {
    if (!name.startsWith(LOG_FILENAME)) continue;
    const file = path.join(logDir, name);
    const stat = fs.statSync(file);
    if (stat.isFile() && stat.mtimeMs < cutoff) {
      fs.unlinkSync(file);
      removed.push(name);
    }
  }

  return removed.sort();
}
