import { DispatchQueue } from "./dispatch-queue.js";
import type { ParseError } from "./errors.js";
import { describeThreshold, evaluate } from "./evaluator.js";
import { QuakeEventBus } from "./event-bus.js";
import { formatEventLines, formatNotification, formatSeverity } from "./formatter.js";
import { normalize } from "./normalizer.js";
import type { DeliveryOutcome, NotificationDispatcher } from "./notification-dispatcher.js";
import { TriggerGate } from "./trigger-gate.js";
import {
  SOURCE_DISPLAY_NAMES,
  type AlertEvent,
  type Clock,
  type DenyReason,
  type QuakeLogger,
  type SourceId,
  type ThresholdConfig,
} from "./types.js";

export type IngestOutcome =
  | { status: "skipped"; reason: string }
  | { status: "parse_error"; error: ParseError }
  | { status: "below_threshold"; event: AlertEvent }
  | { status: "denied"; event: AlertEvent; reason: DenyReason }
  | { status: "accepted"; event: AlertEvent; queued: boolean };

export type EngineStats = {
  messagesProcessed: number;
  parseErrors: number;
  skipped: number;
  belowThreshold: number;
  denied: Record<DenyReason, number>;
  accepted: number;
  deliveriesSucceeded: number;
  deliveriesFailed: number;
  startedAt: number;
};

export type QuakeAlertEngineOptions = {
  thresholds: ThresholdConfig;
  dispatcher: NotificationDispatcher;
  gate?: TriggerGate;
  queue?: DispatchQueue;
  logger?: QuakeLogger;
  logPrefix?: string;
  clock?: Clock;
};

const DENY_MESSAGES: Record<DenyReason, string> = {
  paused: "monitoring paused, trigger ignored",
  duplicate_event: "already triggered, ignored",
  in_cooldown: "in cooldown, trigger ignored",
};

/**
 * QuakeAlertEngine — the ingestion pipeline.
 *
 * Connectors hand raw frames to `handleMessage()`, which normalizes,
 * evaluates, gates and finally queues a push. Everything up to the gate
 * decision is synchronous; delivery runs on the dispatch queue.
 */
export class QuakeAlertEngine {
  readonly bus: QuakeEventBus;
  readonly gate: TriggerGate;

  private readonly thresholds: ThresholdConfig;
  private readonly dispatcher: NotificationDispatcher;
  private readonly queue: DispatchQueue;
  private readonly logger: QuakeLogger;
  private readonly logPrefix: string;
  private readonly clock: Clock;
  private readonly stats: EngineStats;

  constructor(options: QuakeAlertEngineOptions) {
    this.thresholds = options.thresholds;
    this.dispatcher = options.dispatcher;
    this.logger = options.logger ?? console;
    this.logPrefix = options.logPrefix ?? "quakewatch";
    this.clock = options.clock ?? Date.now;
    this.gate = options.gate ?? new TriggerGate({ clock: this.clock });
    this.queue = options.queue ?? new DispatchQueue({ logger: this.logger, logPrefix: this.logPrefix });
    this.bus = new QuakeEventBus((err) => {
      this.logger.error(`${this.logPrefix}: event listener error: ${String(err)}`);
    });
    this.stats = {
      messagesProcessed: 0,
      parseErrors: 0,
      skipped: 0,
      belowThreshold: 0,
      denied: { paused: 0, duplicate_event: 0, in_cooldown: 0 },
      accepted: 0,
      deliveriesSucceeded: 0,
      deliveriesFailed: 0,
      startedAt: this.clock(),
    };
  }

  /** Process one raw frame from `source`. Never throws. */
  handleMessage(source: SourceId, raw: string): IngestOutcome {
    const now = this.clock();
    this.stats.messagesProcessed++;
    const outcome = this.process(source, raw, now);
    this.bus.emit({ source, ts: now, outcome });
    return outcome;
  }

  /** Push a synthetic TEST event through the gate, as if it came off a feed. */
  triggerTest(message = "Manual test trigger"): IngestOutcome {
    return this.handleMessage("TEST", JSON.stringify({ message }));
  }

  /** Resolves once every queued delivery has settled. */
  drain(): Promise<void> {
    return this.queue.onIdle();
  }

  getStats(): EngineStats {
    return { ...this.stats, denied: { ...this.stats.denied } };
  }

  // ─── Internal ──────────────────────────────────────────────────────────────

  private process(source: SourceId, raw: string, now: number): IngestOutcome {
    const result = normalize(source, raw, now);

    if (result.kind === "error") {
      this.stats.parseErrors++;
      this.logger.error(`${this.logPrefix}: ${result.error.message}`);
      return { status: "parse_error", error: result.error };
    }

    if (result.kind === "skip") {
      this.stats.skipped++;
      if (!result.silent) {
        this.logger.info(`${this.logPrefix}: ${result.reason}, ignored`);
      }
      return { status: "skipped", reason: result.reason };
    }

    const event = result.event;
    if (!evaluate(event, this.thresholds)) {
      this.stats.belowThreshold++;
      this.logger.info(
        `${this.logPrefix}: ${source} update: intensity ${formatSeverity(event.severity)} (threshold: ${describeThreshold(event, this.thresholds)})`,
      );
      return { status: "below_threshold", event };
    }

    const decision = this.gate.tryAccept(event);
    if (!decision.accepted) {
      this.stats.denied[decision.reason]++;
      const subject = decision.reason === "duplicate_event" ? `event ${event.eventId}` : source;
      this.logger.info(`${this.logPrefix}: ${subject}: ${DENY_MESSAGES[decision.reason]}`);
      return { status: "denied", event, reason: decision.reason };
    }

    this.stats.accepted++;
    this.logger.info(
      `${this.logPrefix}: trigger from ${SOURCE_DISPLAY_NAMES[source]}\n${formatEventLines(event).join("\n")}`,
    );
    const notification = formatNotification(event);
    const queued = this.queue.submit(async () => {
      this.recordDelivery(await this.dispatcher.deliver(notification));
    });
    return { status: "accepted", event, queued };
  }

  private recordDelivery(outcome: DeliveryOutcome): void {
    if (outcome.ok) this.stats.deliveriesSucceeded++;
    else this.stats.deliveriesFailed++;
  }
}
