import { SOURCE_DISPLAY_NAMES, DEFAULTS, type AlertEvent, type Notification, type SeverityValue } from "./types.js";

export const NOTIFICATION_TITLE = "⚠️ Strong earthquake alert";

// ─── Push Notification ───────────────────────────────────────────────────────

export function formatNotification(event: AlertEvent, priority: number = DEFAULTS.pushPriority): Notification {
  return {
    title: NOTIFICATION_TITLE,
    message: [`Source: ${SOURCE_DISPLAY_NAMES[event.source]}`, ...formatEventLines(event)].join("\n"),
    priority,
  };
}

/** Body lines describing an event, shared by the push message and the trigger log. */
export function formatEventLines(event: AlertEvent): string[] {
  if (event.source === "TEST") {
    return [`Message: ${event.place}`, `Time: ${event.announcedAt}`];
  }

  const timeLabel = event.source === "JMA" ? "Announced" : "Origin time";
  const timeValue = event.source === "JMA" ? event.announcedAt : event.timestamp;

  return [
    `Location: ${event.place}`,
    `${severityLabel(event.severity)}: ${formatSeverity(event.severity)}`,
    `Magnitude: M${event.magnitude}   Depth: ${event.depth} km`,
    `${timeLabel}: ${timeValue}`,
    `Event ID: ${event.eventId}`,
  ];
}

// ─── Severity ────────────────────────────────────────────────────────────────

export function formatSeverity(severity: SeverityValue): string {
  switch (severity.kind) {
    case "rank":
      return severity.label;
    case "intensity":
      return String(severity.value);
    case "manual":
      return "manual";
  }
}

function severityLabel(severity: SeverityValue): string {
  switch (severity.kind) {
    case "rank":
      return "Max intensity";
    case "intensity":
      return "Estimated intensity";
    case "manual":
      return "Severity";
  }
}
