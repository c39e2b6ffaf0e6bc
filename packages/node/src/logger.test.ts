import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { LOG_FILENAME, createFileLogger, sweepOldLogs } from "./logger.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const fixedClock = () => new Date("2026-01-02T03:04:05.000Z");

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "quakewatch-logs-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function read(name: string): string {
  return fs.readFileSync(path.join(dir, name), "utf-8");
}

describe("createFileLogger", () => {
  it("appends timestamped lines with their level", () => {
    const logger = createFileLogger({ logDir: dir, console: false, clock: fixedClock });
    logger.info("started");
    logger.warn("slow push");
    logger.error("push failed");

    expect(read(LOG_FILENAME)).toBe(
      [
        "2026-01-02T03:04:05.000Z - quake_monitor - INFO - started",
        "2026-01-02T03:04:05.000Z - quake_monitor - WARN - slow push",
        "2026-01-02T03:04:05.000Z - quake_monitor - ERROR - push failed",
        "",
      ].join("\n"),
    );
  });

  it("creates the log directory when missing", () => {
    const nested = path.join(dir, "a", "b");
    createFileLogger({ logDir: nested, console: false, clock: fixedClock }).info("hello");
    expect(fs.existsSync(path.join(nested, LOG_FILENAME))).toBe(true);
  });

  it("rotates once the file would exceed the size limit", () => {
    // each line is 52 bytes, so a 60 byte limit holds exactly one line
    const logger = createFileLogger({ logDir: dir, console: false, clock: fixedClock, maxSizeBytes: 60, backupCount: 1 });
    logger.info("a");
    logger.info("b");
    logger.info("c");

    expect(read(LOG_FILENAME)).toBe("2026-01-02T03:04:05.000Z - quake_monitor - INFO - c\n");
    expect(read(`${LOG_FILENAME}.1`)).toBe("2026-01-02T03:04:05.000Z - quake_monitor - INFO - b\n");
    expect(fs.existsSync(path.join(dir, `${LOG_FILENAME}.2`))).toBe(false);
  });

  it("shifts older backups up", () => {
    const logger = createFileLogger({ logDir: dir, console: false, clock: fixedClock, maxSizeBytes: 60, backupCount: 3 });
    for (const msg of ["a", "b", "c"]) logger.info(msg);

    expect(read(`${LOG_FILENAME}.1`)).toBe("2026-01-02T03:04:05.000Z - quake_monitor - INFO - b\n");
    expect(read(`${LOG_FILENAME}.2`)).toBe("2026-01-02T03:04:05.000Z - quake_monitor - INFO - a\n");
  });
});

describe("sweepOldLogs", () => {
  it("removes log files past the retention window and nothing else", () => {
    const now = Date.parse("2026-03-01T00:00:00.000Z");
    const touch = (name: string, ageDays: number) => {
      const file = path.join(dir, name);
      fs.writeFileSync(file, "x");
      const mtime = new Date(now - ageDays * DAY_MS);
      fs.utimesSync(file, mtime, mtime);
    };

    touch(LOG_FILENAME, 1);
    touch(`${LOG_FILENAME}.1`, 31);
    touch(`${LOG_FILENAME}.2`, 45);
    touch(`${LOG_FILENAME}.3`, 29);
    touch("other.log", 90);

    expect(sweepOldLogs(dir, 30, now)).toEqual([`${LOG_FILENAME}.1`, `${LOG_FILENAME}.2`]);
    expect(fs.readdirSync(dir).sort()).toEqual(["other.log", LOG_FILENAME, `${LOG_FILENAME}.3`].sort());
  });

  it("returns nothing for a missing directory", () => {
    expect(sweepOldLogs(path.join(dir, "missing"), 30)).toEqual([]);
  });
});
