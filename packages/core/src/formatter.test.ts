import { describe, expect, it } from "vitest";
import { formatNotification, formatSeverity } from "./formatter.js";
import type { AlertEvent } from "./types.js";

const ceaEvent: AlertEvent = {
  source: "CEA",
  eventId: "c9",
  severity: { kind: "intensity", value: 7.5 },
  place: "Test County",
  magnitude: "6.1",
  depth: "12",
  timestamp: "2026-01-02 03:04:05",
  announcedAt: "2026-01-02 03:04:20",
  receivedAt: 0,
};

describe("formatNotification", () => {
  it("lists the CEA report with its origin time", () => {
    expect(formatNotification(ceaEvent)).toEqual({
      title: "⚠️ Strong earthquake alert",
      message: [
        "Source: China Earthquake Early Warning Network (CEA)",
        "Location: Test County",
        "Estimated intensity: 7.5",
        "Magnitude: M6.1   Depth: 12 km",
        "Origin time: 2026-01-02 03:04:05",
        "Event ID: c9",
      ].join("\n"),
      priority: 10,
    });
  });

  it("takes a custom priority", () => {
    expect(formatNotification(ceaEvent, 5).priority).toBe(5);
  });
});

describe("formatSeverity", () => {
  it("renders each severity kind", () => {
    expect(formatSeverity({ kind: "rank", label: "6強", rank: 8 })).toBe("6強");
    expect(formatSeverity({ kind: "intensity", value: 7 })).toBe("7");
    expect(formatSeverity({ kind: "manual" })).toBe("manual");
  });
});
