import { beforeEach, describe, expect, it } from "vitest";
import { TriggerGate } from "./trigger-gate.js";
import type { AlertEvent, SourceId } from "./types.js";

const COOLDOWN_MS = 360_000;

let now = 1_750_000_000_000;
const clock = () => now;

function event(source: SourceId, eventId: string): AlertEvent {
  return {
    source,
    eventId,
    severity: source === "JMA" ? { kind: "rank", label: "6弱", rank: 7 } : { kind: "intensity", value: 8 },
    place: "",
    magnitude: "",
    depth: "",
    timestamp: "",
    announcedAt: "",
    receivedAt: now,
  };
}

describe("TriggerGate", () => {
  let gate: TriggerGate;

  beforeEach(() => {
    now = 1_750_000_000_000;
    gate = new TriggerGate({ cooldownMs: COOLDOWN_MS, clock });
  });

  it("accepts the first trigger", () => {
    expect(gate.tryAccept(event("JMA", "eq001"))).toEqual({ accepted: true });
  });

  it("denies a replayed event id even once the cooldown has passed", () => {
    gate.tryAccept(event("JMA", "eq001"));
    now += COOLDOWN_MS * 2;
    expect(gate.tryAccept(event("JMA", "eq001"))).toEqual({ accepted: false, reason: "duplicate_event" });
  });

  it("checks duplicates before the cooldown", () => {
    gate.tryAccept(event("JMA", "eq001"));
    now += 1_000;
    expect(gate.tryAccept(event("JMA", "eq001"))).toEqual({ accepted: false, reason: "duplicate_event" });
  });

  it("shares the cooldown across sources", () => {
    gate.tryAccept(event("JMA", "eq001"));
    now += 10_000;
    expect(gate.tryAccept(event("CEA", "c2"))).toEqual({ accepted: false, reason: "in_cooldown" });
  });

  it("accepts again once the cooldown has fully elapsed", () => {
    gate.tryAccept(event("JMA", "eq001"));
    now += COOLDOWN_MS - 1;
    expect(gate.tryAccept(event("CEA", "c2"))).toEqual({ accepted: false, reason: "in_cooldown" });
    now += 1;
    expect(gate.tryAccept(event("CEA", "c2"))).toEqual({ accepted: true });
  });

  it("does not record ids of denied events", () => {
    gate.tryAccept(event("JMA", "eq001"));
    now += 10_000;
    gate.tryAccept(event("CEA", "c2"));
    now += COOLDOWN_MS;
    expect(gate.tryAccept(event("CEA", "c2"))).toEqual({ accepted: true });
  });

  it("falls back to cooldown-only gating for empty event ids", () => {
    expect(gate.tryAccept(event("CEA", ""))).toEqual({ accepted: true });
    now += 1_000;
    expect(gate.tryAccept(event("CEA", ""))).toEqual({ accepted: false, reason: "in_cooldown" });
    now += COOLDOWN_MS;
    expect(gate.tryAccept(event("CEA", ""))).toEqual({ accepted: true });
    expect(gate.snapshot().trackedEventIds).toBe(0);
  });

  it("denies everything while paused, without touching state", () => {
    gate.setMonitoringEnabled(false);
    expect(gate.tryAccept(event("JMA", "eq001"))).toEqual({ accepted: false, reason: "paused" });
    expect(gate.snapshot().lastTriggerTime).toBeNull();

    gate.setMonitoringEnabled(true);
    expect(gate.tryAccept(event("JMA", "eq001"))).toEqual({ accepted: true });
  });

  it("admits exactly one of a burst of qualifying triggers", () => {
    const decisions = ["a", "b", "c", "d", "e"].map((id, i) =>
      gate.tryAccept(event(i % 2 === 0 ? "JMA" : "CEA", id)),
    );
    expect(decisions.filter((d) => d.accepted)).toHaveLength(1);
    expect(decisions[0]).toEqual({ accepted: true });
  });

  it("forgets event ids after the dedup TTL", () => {
    const shortMemory = new TriggerGate({ cooldownMs: 0, dedupTtlMs: 60_000, clock });
    shortMemory.tryAccept(event("JMA", "eq001"));
    now += 30_000;
    expect(shortMemory.tryAccept(event("JMA", "eq001"))).toEqual({ accepted: false, reason: "duplicate_event" });
    now += 30_001;
    expect(shortMemory.tryAccept(event("JMA", "eq001"))).toEqual({ accepted: true });
  });

  it("caps the number of remembered event ids", () => {
    const small = new TriggerGate({ cooldownMs: 0, dedupMaxEntries: 2, clock });
    small.tryAccept(event("JMA", "a"));
    small.tryAccept(event("JMA", "b"));
    small.tryAccept(event("JMA", "c"));
    expect(small.snapshot().trackedEventIds).toBe(2);
    expect(small.tryAccept(event("JMA", "a"))).toEqual({ accepted: true });
  });

  it("prunes expired ids on demand", () => {
    const shortMemory = new TriggerGate({ cooldownMs: 0, dedupTtlMs: 1_000, clock });
    shortMemory.tryAccept(event("JMA", "a"));
    shortMemory.tryAccept(event("CEA", "b"));
    now += 1_001;
    expect(shortMemory.prune()).toBe(2);
    expect(shortMemory.snapshot().trackedEventIds).toBe(0);
  });

  it("reports the remaining cooldown", () => {
    expect(gate.snapshot()).toEqual({
      monitoringEnabled: true,
      lastTriggerTime: null,
      trackedEventIds: 0,
      cooldownRemainingMs: 0,
    });

    const acceptedAt = now;
    gate.tryAccept(event("JMA", "eq001"));
    now += 60_000;
    expect(gate.snapshot()).toEqual({
      monitoringEnabled: true,
      lastTriggerTime: acceptedAt,
      trackedEventIds: 1,
      cooldownRemainingMs: COOLDOWN_MS - 60_000,
    });
  });
});
