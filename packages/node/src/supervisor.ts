import { ALL_SOURCES, DEFAULTS, describeError, type QuakeAlertEngine, type QuakeLogger, type SourceId } from "@quakewatch/core";
import { StreamConnector, type StreamConnectorConfig } from "./stream-connector.js";

export type SupervisorState = "running" | "paused" | "stopping";

/** The part of a connector the supervisor drives. */
export interface Connector {
  readonly name: string;
  start(): void;
  stop(): void;
  isConnected(): boolean;
}

export type ConnectorFactory = (config: StreamConnectorConfig) => Connector;

export type SupervisorOptions = {
  engine: QuakeAlertEngine;
  streams: Partial<Record<SourceId, string>>;
  reconnectDelayMs?: number;
  housekeepingIntervalMs?: number;
  /** Extra periodic work, e.g. sweeping old log files. */
  housekeeping?: () => void;
  logger?: QuakeLogger;
  logPrefix?: string;
  createConnector?: ConnectorFactory;
};

export type ConnectorStatus = {
  name: string;
  connected: boolean;
  /** Frames the engine has processed from this feed. */
  messages: number;
  lastMessageAt: number | null;
};

export type SupervisorStatus = {
  state: SupervisorState;
  connectors: ConnectorStatus[];
};

type FeedActivity = { messages: number; lastMessageAt: number | null };

const defaultFactory: ConnectorFactory = (config) => new StreamConnector(config);

/**
 * Owns the process lifecycle: one connector per configured source plus the
 * housekeeping timer. `running ⇄ paused` toggles the gate; `stopping` is
 * terminal and stops every connector.
 */
export class Supervisor {
  private state: SupervisorState = "running";
  private started = false;
  private connectors: Connector[] = [];
  private housekeepingTimer: ReturnType<typeof setInterval> | null = null;
  private readonly activity = new Map<string, FeedActivity>();
  private unsubscribe: (() => void) | null = null;
  private readonly engine: QuakeAlertEngine;
  private readonly options: SupervisorOptions;
  private readonly logger: QuakeLogger;
  private readonly logPrefix: string;
  private readonly stopped: Promise<void>;
  private resolveStopped: () => void = () => {};

  constructor(options: SupervisorOptions) {
    this.options = options;
    this.engine = options.engine;
    this.logger = options.logger ?? console;
    this.logPrefix = options.logPrefix ?? "quakewatch";
    this.stopped = new Promise((resolve) => {
      this.resolveStopped = resolve;
    });
  }

  start(): void {
    if (this.started || this.state === "stopping") return;
    this.started = true;

    this.unsubscribe = this.engine.bus.on((event) => {
      const feed = this.activity.get(event.source);
      if (feed) {
        feed.messages++;
        feed.lastMessageAt = event.ts;
      }
    });

    const factory = this.options.createConnector ?? defaultFactory;
    try {
      for (const [source, url] of streamEntries(this.options.streams)) {
        const connector = factory({
          name: source,
          url,
          reconnectDelayMs: this.options.reconnectDelayMs,
          logger: this.logger,
          onMessage: (raw) => {
            this.engine.handleMessage(source, raw);
          },
        });
        this.connectors.push(connector);
        this.activity.set(source, { messages: 0, lastMessageAt: null });
        connector.start();
      }
    } catch (err) {
      // all feeds or none
      this.logger.error(`${this.logPrefix}: failed to start streams: ${describeError(err)}`);
      this.stop();
      throw err;
    }

    this.housekeepingTimer = setInterval(
      () => this.runHousekeeping(),
      this.options.housekeepingIntervalMs ?? DEFAULTS.logCleanupIntervalMs,
    );

    this.logger.info(`${this.logPrefix}: supervisor started, ${this.connectors.length} stream(s)`);
  }

  pause(): boolean {
    if (this.state !== "running") return false;
    this.state = "paused";
    this.engine.gate.setMonitoringEnabled(false);
    this.logger.info(`${this.logPrefix}: monitoring paused`);
    return true;
  }

  resume(): boolean {
    if (this.state !== "paused") return false;
    this.state = "running";
    this.engine.gate.setMonitoringEnabled(true);
    this.logger.info(`${this.logPrefix}: monitoring resumed`);
    return true;
  }

  /** Flip between running and paused. Returns the resulting state. */
  toggle(): SupervisorState {
    if (this.state === "running") this.pause();
    else if (this.state === "paused") this.resume();
    return this.state;
  }

  /** Fire a manual TEST trigger through the normal gate. */
  triggerTest(message?: string): void {
    if (this.state === "stopping") return;
    const outcome = this.engine.triggerTest(message);
    if (outcome.status !== "accepted") {
      this.logger.info(`${this.logPrefix}: test trigger ${outcome.status}`);
    }
  }

  stop(): void {
    if (this.state === "stopping") return;
    this.state = "stopping";

    if (this.housekeepingTimer) {
      clearInterval(this.housekeepingTimer);
      this.housekeepingTimer = null;
    }
    for (const connector of this.connectors) {
      connector.stop();
    }
    this.unsubscribe?.();
    this.unsubscribe = null;

    this.logger.info(`${this.logPrefix}: stopping`);
    this.resolveStopped();
  }

  /** Resolves once `stop()` has been called. */
  waitForStop(): Promise<void> {
    return this.stopped;
  }

  get currentState(): SupervisorState {
    return this.state;
  }

  isStopping(): boolean {
    return this.state === "stopping";
  }

  getStatus(): SupervisorStatus {
    return {
      state: this.state,
      connectors: this.connectors.map((c) => {
        const feed = this.activity.get(c.name);
        return {
          name: c.name,
          connected: c.isConnected(),
          messages: feed?.messages ?? 0,
          lastMessageAt: feed?.lastMessageAt ?? null,
        };
      }),
    };
  }

  runHousekeeping(): void {
    if (this.state === "stopping") return;
    try {
      const pruned = this.engine.gate.prune();
      if (pruned > 0) {
        this.logger.info(`${this.logPrefix}: dropped ${pruned} expired event id(s)`);
      }
      this.options.housekeeping?.();
    } catch (err) {
      this.logger.error(`${this.logPrefix}: housekeeping failed: ${describeError(err)}`);
    }
  }
}

function streamEntries(streams: Partial<Record<SourceId, string>>): Array<[SourceId, string]> {
  const entries: Array<[SourceId, string]> = [];
  for (const source of ALL_SOURCES) {
    const url = streams[source];
    if (url) entries.push([source, url]);
  }
  return entries;
}
