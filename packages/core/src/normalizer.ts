import { ParseError } from "./errors.js";
import { jmaRank } from "./intensity.js";
import type { AlertEvent, SourceId } from "./types.js";

export type NormalizeResult =
  | { kind: "event"; event: AlertEvent }
  | { kind: "skip"; reason: string; silent: boolean }
  | { kind: "error"; error: ParseError };

type JsonRecord = Record<string, unknown>;

// ─── Entry Point ─────────────────────────────────────────────────────────────

/**
 * Convert one raw frame from `source` into a canonical AlertEvent.
 *
 * Never throws: malformed frames come back as `{ kind: "error" }` and
 * frames that carry no alert (cancellations, drills, keepalives) as
 * `{ kind: "skip" }`.
 */
export function normalize(source: SourceId, raw: string, now: number = Date.now()): NormalizeResult {
  const parsed = parseRecord(source, raw);
  if (!parsed.ok) return { kind: "error", error: parsed.error };

  switch (source) {
    case "JMA":
      return normalizeJma(parsed.record, now);
    case "CEA":
      return normalizeCea(parsed.record, now);
    case "TEST":
      return normalizeTest(parsed.record, now);
  }
}

// ─── JMA ─────────────────────────────────────────────────────────────────────

const JMA_KEEPALIVE_TYPES = new Set(["heartbeat", "pong"]);

export function normalizeJma(data: JsonRecord, now: number): NormalizeResult {
  if (typeof data.type === "string" && JMA_KEEPALIVE_TYPES.has(data.type)) {
    return { kind: "skip", reason: `keepalive frame (${data.type})`, silent: true };
  }

  if (Boolean(data.isCancel) || Boolean(data.isTraining) || Boolean(data.isAssumption)) {
    return { kind: "skip", reason: "JMA cancellation/training/assumption report", silent: false };
  }

  const label = text(data.MaxIntensity).trim();
  const announcedAt = text(data.AnnouncedTime);

  return {
    kind: "event",
    event: {
      source: "JMA",
      eventId: text(data.EventID),
      severity: { kind: "rank", label, rank: jmaRank(label) },
      place: text(data.Hypocenter),
      // The feed spells this field "Magunitude".
      magnitude: text(data.Magunitude),
      depth: text(data.Depth),
      timestamp: text(data.OriginTime) || announcedAt,
      announcedAt,
      receivedAt: now,
    },
  };
}

// ─── CEA ─────────────────────────────────────────────────────────────────────

export function normalizeCea(data: JsonRecord, now: number): NormalizeResult {
  const payload = data.Data;

  if (isEmptyPayload(payload)) {
    return { kind: "skip", reason: "CEA frame without Data", silent: true };
  }
  if (!isRecord(payload)) {
    return { kind: "error", error: new ParseError("CEA", "Data is not an object") };
  }

  const shockTime = text(payload.shockTime);

  return {
    kind: "event",
    event: {
      source: "CEA",
      eventId: text(payload.eventId),
      severity: { kind: "intensity", value: toIntensity(payload.epiIntensity) },
      place: text(payload.placeName),
      magnitude: text(payload.magnitude),
      depth: text(payload.depth),
      timestamp: shockTime,
      announcedAt: text(payload.updateTime) || shockTime,
      receivedAt: now,
    },
  };
}

// ─── TEST ────────────────────────────────────────────────────────────────────

export function normalizeTest(data: JsonRecord, now: number): NormalizeResult {
  const stamp = new Date(now).toISOString();
  return {
    kind: "event",
    event: {
      source: "TEST",
      eventId: text(data.eventId),
      severity: { kind: "manual" },
      place: text(data.message) || "Test alert",
      magnitude: "",
      depth: "",
      timestamp: stamp,
      announcedAt: stamp,
      receivedAt: now,
    },
  };
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function parseRecord(
  source: SourceId,
  raw: string,
): { ok: true; record: JsonRecord } | { ok: false; error: ParseError } {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (err) {
    return { ok: false, error: new ParseError(source, "malformed JSON", { cause: err }) };
  }
  if (!isRecord(value)) {
    return { ok: false, error: new ParseError(source, "payload is not a JSON object") };
  }
  return { ok: true, record: value };
}

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isEmptyPayload(value: unknown): boolean {
  if (value === undefined || value === null || value === false || value === 0 || value === "") return true;
  if (Array.isArray(value)) return value.length === 0;
  return isRecord(value) && Object.keys(value).length === 0;
}

function text(value: unknown): string {
  if (value === undefined || value === null) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value);
}

/** Parse a CEA intensity. Anything non-numeric reads as 0, which never triggers. */
export function toIntensity(value: unknown): number {
  if (typeof value === "number") return Number.isFinite(value) ? value : 0;
  if (typeof value !== "string" || value.trim() === "") return 0;
  const parsed = Number(value.trim());
  return Number.isFinite(parsed) ? parsed : 0;
}
