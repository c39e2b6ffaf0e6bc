import { jmaRank, UNKNOWN_RANK } from "./intensity.js";
import type { AlertEvent, ThresholdConfig } from "./types.js";

/** Whether an event reaches its source's configured severity threshold. */
export function evaluate(event: AlertEvent, thresholds: ThresholdConfig): boolean {
  const severity = event.severity;

  switch (severity.kind) {
    case "rank":
      return severity.rank !== UNKNOWN_RANK && severity.rank >= jmaRank(thresholds.jma);
    case "intensity":
      return severity.value >= thresholds.cea;
    case "manual":
      return true;
  }
}

/** Short human-readable threshold for the event's source, used in log lines. */
export function describeThreshold(event: AlertEvent, thresholds: ThresholdConfig): string {
  switch (event.severity.kind) {
    case "rank":
      return thresholds.jma;
    case "intensity":
      return String(thresholds.cea);
    case "manual":
      return "none";
  }
}
