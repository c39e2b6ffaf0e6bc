/**
 * Configuration for quakewatch, read once from QUAKE_* environment variables
 */

import path from "node:path";
import { ConfigError, DEFAULTS, isJmaLabel, type JmaLabel, type SourceId, type ThresholdConfig } from "@quakewatch/core";
import { z } from "zod";

export interface AppConfig {
  cooldownMs: number;
  thresholds: ThresholdConfig;
  gotifyUrl: string;
  gotifyToken: string;
  /** Stream endpoint per source. A source without one is not connected. */
  streams: Partial<Record<SourceId, string>>;
  reconnectDelayMs: number;
  logDir: string;
  maxLogSizeBytes: number;
  logBackupCount: number;
  logRetentionDays: number;
  logCleanupIntervalMs: number;
  healthPort: number;
}

export type Env = Record<string, string | undefined>;

export const DEFAULT_STREAMS = {
  JMA: "wss://ws-api.wolfx.jp/jma_eew",
  CEA: "wss://ws.fanstudio.tech/cea",
} as const;

const blankAsUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const seconds = (fallback: number) =>
  z.preprocess(blankAsUndefined, z.coerce.number().int().min(0).default(fallback));

function isWebSocketUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === "ws:" || protocol === "wss:";
  } catch {
    return false;
  }
}

const streamUrl = (source: SourceId) =>
  z.string().trim().refine(isWebSocketUrl, `${source} stream URL must be a ws:// or wss:// URL`);

const EnvSchema = z.object({
  QUAKE_COOLDOWN: seconds(DEFAULTS.cooldownMs / 1000),
  QUAKE_TRIGGER_JMA_INTENSITY: z
    .preprocess(blankAsUndefined, z.string().trim().default("5弱"))
    .refine((label): label is JmaLabel => isJmaLabel(label), (label) => ({
      message: `unknown JMA intensity threshold: ${label}`,
    })),
  QUAKE_TRIGGER_CEA_INTENSITY: z.preprocess(
    blankAsUndefined,
    z.coerce
      .number({ invalid_type_error: "CEA intensity threshold must be a number" })
      .gt(0, "CEA intensity threshold must be greater than 0")
      .default(7.0),
  ),
  QUAKE_GOTIFY_URL: z.string({ required_error: "Gotify URL is missing" }).trim().url("Gotify URL is not a valid URL"),
  QUAKE_GOTIFY_APP_TOKEN: z
    .string({ required_error: "Gotify app token is missing" })
    .trim()
    .min(1, "Gotify app token is missing"),
  QUAKE_WS_JMA: z.preprocess(blankAsUndefined, streamUrl("JMA").default(DEFAULT_STREAMS.JMA)),
  QUAKE_WS_CEA: z.preprocess(blankAsUndefined, streamUrl("CEA").default(DEFAULT_STREAMS.CEA)),
  QUAKE_WS_TEST: z.preprocess(blankAsUndefined, streamUrl("TEST").optional()),
  QUAKE_LOG_DIR: z.preprocess(blankAsUndefined, z.string().optional()),
  QUAKE_WS_RECONNECT_DELAY: seconds(DEFAULTS.reconnectDelayMs / 1000),
  QUAKE_MAX_LOG_SIZE: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(DEFAULTS.maxLogSizeBytes)),
  QUAKE_LOG_BACKUP_COUNT: z.preprocess(blankAsUndefined, z.coerce.number().int().min(0).default(DEFAULTS.logBackupCount)),
  QUAKE_LOG_RETENTION_DAYS: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(DEFAULTS.logRetentionDays)),
  QUAKE_LOG_CLEANUP_INTERVAL: z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().positive().default(DEFAULTS.logCleanupIntervalMs / 1000),
  ),
  QUAKE_HEALTH_PORT: z.preprocess(blankAsUndefined, z.coerce.number().int().min(0).max(65535).default(DEFAULTS.healthPort)),
});

/**
 * Parse and validate configuration from the environment.
 * Throws a ConfigError listing every problem at once.
 */
export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`),
    );
  }

  const e = parsed.data;
  const streams: AppConfig["streams"] = { JMA: e.QUAKE_WS_JMA, CEA: e.QUAKE_WS_CEA };
  if (e.QUAKE_WS_TEST) streams.TEST = e.QUAKE_WS_TEST;

  return {
    cooldownMs: e.QUAKE_COOLDOWN * 1000,
    thresholds: { jma: e.QUAKE_TRIGGER_JMA_INTENSITY, cea: e.QUAKE_TRIGGER_CEA_INTENSITY },
    gotifyUrl: e.QUAKE_GOTIFY_URL,
    gotifyToken: e.QUAKE_GOTIFY_APP_TOKEN,
    streams,
    reconnectDelayMs: e.QUAKE_WS_RECONNECT_DELAY * 1000,
    logDir: path.resolve(cwd, e.QUAKE_LOG_DIR ?? "logs"),
    maxLogSizeBytes: e.QUAKE_MAX_LOG_SIZE,
    logBackupCount: e.QUAKE_LOG_BACKUP_COUNT,
    logRetentionDays: e.QUAKE_LOG_RETENTION_DAYS,
    logCleanupIntervalMs: e.QUAKE_LOG_CLEANUP_INTERVAL * 1000,
    healthPort: e.QUAKE_HEALTH_PORT,
  };
}

/** One-line summary for the startup log. Leaves out the push token. */
export function describeConfig(config: AppConfig): string {
  const sources = Object.keys(config.streams).join(", ");
  return (
    `JMA threshold: ${config.thresholds.jma}, CEA threshold: ${config.thresholds.cea}, ` +
    `cooldown: ${config.cooldownMs / 1000}s, sources: ${sources}, log retention: ${config.logRetentionDays} days`
  );
}
