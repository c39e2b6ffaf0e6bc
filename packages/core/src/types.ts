import type { JmaLabel } from "./intensity.js";

// ─── Sources ─────────────────────────────────────────────────────────────────

export type SourceId = "JMA" | "CEA" | "TEST";

export const ALL_SOURCES: readonly SourceId[] = ["JMA", "CEA", "TEST"];

export const SOURCE_DISPLAY_NAMES: Record<SourceId, string> = {
  JMA: "Japan Meteorological Agency (JMA)",
  CEA: "China Earthquake Early Warning Network (CEA)",
  TEST: "Manual test",
};

// ─── Severity ────────────────────────────────────────────────────────────────

/** JMA shindo label mapped onto its ordinal rank (-1 when unknown). */
export type RankSeverity = {
  kind: "rank";
  label: string;
  rank: number;
};

/** CEA estimated epicentral intensity. */
export type IntensitySeverity = {
  kind: "intensity";
  value: number;
};

/** Synthetic events from the TEST feed always qualify. */
export type ManualSeverity = {
  kind: "manual";
};

export type SeverityValue = RankSeverity | IntensitySeverity | ManualSeverity;

// ─── Canonical Event ─────────────────────────────────────────────────────────

export type AlertEvent = Readonly<{
  source: SourceId;
  /** Upstream event id. Empty when the feed does not provide one. */
  eventId: string;
  severity: SeverityValue;
  place: string;
  magnitude: string;
  depth: string;
  /** Origin time as reported by the feed. */
  timestamp: string;
  announcedAt: string;
  /** Local receive time (ms since epoch). */
  receivedAt: number;
}>;

export type ThresholdConfig = Readonly<{
  jma: JmaLabel;
  cea: number;
}>;

// ─── Notifications ───────────────────────────────────────────────────────────

export type Notification = Readonly<{
  title: string;
  message: string;
  priority: number;
}>;

export interface PushChannel {
  readonly name: string;
  push(notification: Notification): Promise<void>;
}

// ─── Gate ────────────────────────────────────────────────────────────────────

export type DenyReason = "paused" | "duplicate_event" | "in_cooldown";

export type GateDecision =
  | { accepted: true }
  | { accepted: false; reason: DenyReason };

// ─── Logging ─────────────────────────────────────────────────────────────────

export type QuakeLogger = {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

export type Clock = () => number;

// ─── Constants ───────────────────────────────────────────────────────────────

export const DEFAULTS = {
  cooldownMs: 360_000, // 6 minutes
  reconnectDelayMs: 5_000,
  pingIntervalMs: 25_000,
  pingTimeoutMs: 10_000,
  pushTimeoutMs: 8_000,
  pushPriority: 10,
  deliveryMaxAttempts: 3,
  deliveryBackoffBaseMs: 4_000,
  deliveryBackoffCapMs: 10_000,
  dispatchConcurrency: 2,
  dispatchCapacity: 32,
  dedupTtlMs: 24 * 60 * 60 * 1000, // 24 hours
  dedupMaxEntries: 10_000,
  logCleanupIntervalMs: 24 * 60 * 60 * 1000,
  logRetentionDays: 30,
  maxLogSizeBytes: 5 * 1024 * 1024, // 5MB
  logBackupCount: 5,
  healthPort: 5000,
} as const;
