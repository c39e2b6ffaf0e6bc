import { BoundedMap } from "./bounded-map.js";
import { DEFAULTS, type AlertEvent, type Clock, type GateDecision } from "./types.js";

export type TriggerGateOptions = {
  /** Minimum gap between two accepted triggers, across every source. */
  cooldownMs?: number;
  /** How long an accepted event id is remembered for dedup. */
  dedupTtlMs?: number;
  /** Upper bound on remembered event ids. */
  dedupMaxEntries?: number;
  monitoringEnabled?: boolean;
  clock?: Clock;
};

export type TriggerGateSnapshot = {
  monitoringEnabled: boolean;
  lastTriggerTime: number | null;
  trackedEventIds: number;
  cooldownRemainingMs: number;
};

/**
 * Single arbiter for every ingestion path.
 *
 * `tryAccept` is synchronous and does no I/O: the check and the update run
 * without yielding to the event loop, so two frames can never both pass the
 * same cooldown window or claim the same event id. Dispatch happens after
 * the decision, outside the gate.
 */
export class TriggerGate {
  private monitoringEnabled: boolean;
  private lastTriggerTime: number | null = null;
  private readonly triggeredEventIds: BoundedMap<string, number>;
  private readonly cooldownMs: number;
  private readonly clock: Clock;

  constructor(options: TriggerGateOptions = {}) {
    this.cooldownMs = options.cooldownMs ?? DEFAULTS.cooldownMs;
    this.monitoringEnabled = options.monitoringEnabled ?? true;
    this.clock = options.clock ?? Date.now;
    this.triggeredEventIds = new BoundedMap({
      maxSize: options.dedupMaxEntries ?? DEFAULTS.dedupMaxEntries,
      ttlMs: options.dedupTtlMs ?? DEFAULTS.dedupTtlMs,
      clock: this.clock,
    });
  }

  tryAccept(event: AlertEvent): GateDecision {
    if (!this.monitoringEnabled) {
      return { accepted: false, reason: "paused" };
    }

    if (event.eventId && this.triggeredEventIds.has(event.eventId)) {
      return { accepted: false, reason: "duplicate_event" };
    }

    const now = this.clock();
    if (this.lastTriggerTime !== null && now - this.lastTriggerTime < this.cooldownMs) {
      return { accepted: false, reason: "in_cooldown" };
    }

    this.lastTriggerTime = now;
    if (event.eventId) {
      this.triggeredEventIds.set(event.eventId, now);
    }
    return { accepted: true };
  }

  setMonitoringEnabled(enabled: boolean): void {
    this.monitoringEnabled = enabled;
  }

  isMonitoringEnabled(): boolean {
    return this.monitoringEnabled;
  }

  /** Drop expired dedup entries ahead of their lazy expiry. */
  prune(): number {
    return this.triggeredEventIds.purgeExpired();
  }

  snapshot(): TriggerGateSnapshot {
    const remaining = this.lastTriggerTime === null
      ? 0
      : this.cooldownMs - (this.clock() - this.lastTriggerTime);
    return {
      monitoringEnabled: this.monitoringEnabled,
      lastTriggerTime: this.lastTriggerTime,
      trackedEventIds: this.triggeredEventIds.size,
      cooldownRemainingMs: Math.max(0, remaining),
    };
  }
}
