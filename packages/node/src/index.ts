import {
  DispatchQueue,
  NotificationDispatcher,
  QuakeAlertEngine,
  TriggerGate,
  type PushChannel,
  type QuakeLogger,
} from "@quakewatch/core";
import { GotifyPushChannel } from "./channels/gotify.js";
import type { AppConfig } from "./config.js";
import { sweepOldLogs } from "./logger.js";
import { Supervisor, type ConnectorFactory } from "./supervisor.js";

export { GotifyPushChannel } from "./channels/gotify.js";
export { DEFAULT_STREAMS, describeConfig, loadConfig, type AppConfig, type Env } from "./config.js";
export { startHealthServer, type HealthServer } from "./health.js";
export { LOG_FILENAME, createFileLogger, rotateIfNeeded, sweepOldLogs, type FileLoggerOptions } from "./logger.js";
export { StreamConnector, type StreamConnectorConfig, type StreamConnectorEvents } from "./stream-connector.js";
export {
  Supervisor,
  type Connector,
  type ConnectorFactory,
  type ConnectorStatus,
  type SupervisorOptions,
  type SupervisorState,
  type SupervisorStatus,
} from "./supervisor.js";

// ─── Global singleton ────────────────────────────────────────────────────────

let _supervisor: Supervisor | null = null;

export type QuakewatchNodeOptions = {
  config: AppConfig;
  logger?: QuakeLogger;
  /** Push channel. Defaults to Gotify at `config.gotifyUrl`. */
  channel?: PushChannel;
  createConnector?: ConnectorFactory;
};

/**
 * Wire the engine, gate and dispatcher from `config` and start supervising
 * the configured streams. Call once at startup.
 *
 * ```ts
 * import { init, loadConfig } from "@quakewatch/node";
 * const supervisor = init({ config: loadConfig() });
 * ```
 */
export function init(options: QuakewatchNodeOptions): Supervisor {
  if (_supervisor && !_supervisor.isStopping()) {
    _supervisor.stop();
  }

  const { config } = options;
  const logger = options.logger ?? console;
  const channel = options.channel ?? new GotifyPushChannel(config.gotifyUrl, config.gotifyToken);

  const engine = new QuakeAlertEngine({
    thresholds: config.thresholds,
    gate: new TriggerGate({ cooldownMs: config.cooldownMs }),
    dispatcher: new NotificationDispatcher({ channel, logger }),
    queue: new DispatchQueue({ logger }),
    logger,
  });

  _supervisor = new Supervisor({
    engine,
    streams: config.streams,
    reconnectDelayMs: config.reconnectDelayMs,
    housekeepingIntervalMs: config.logCleanupIntervalMs,
    housekeeping: () => {
      for (const name of sweepOldLogs(config.logDir, config.logRetentionDays)) {
        logger.info(`quakewatch: removed old log file ${name}`);
      }
    },
    logger,
    createConnector: options.createConnector,
  });

  _supervisor.start();
  return _supervisor;
}

/** Stop the running supervisor, if any. */
export function shutdown(): void {
  if (_supervisor) {
    _supervisor.stop();
    _supervisor = null;
  }
}

export function getSupervisor(): Supervisor | null {
  return _supervisor;
}
