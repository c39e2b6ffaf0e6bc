// @quakewatch/core — seismic alert pipeline

// Types
export type {
	AlertEvent,
	Clock,
	DenyReason,
	GateDecision,
	IntensitySeverity,
	ManualSeverity,
	Notification,
	PushChannel,
	QuakeLogger,
	RankSeverity,
	SeverityValue,
	SourceId,
	ThresholdConfig,
} from "./types.js";

// Constants
export { ALL_SOURCES, DEFAULTS, SOURCE_DISPLAY_NAMES } from "./types.js";
export { JMA_INTENSITY_MAP, UNKNOWN_RANK, isJmaLabel, jmaRank, type JmaLabel } from "./intensity.js";

// Errors
export {
	ConfigError,
	ConnectionError,
	DeliveryError,
	ParseError,
	QuakeError,
	describeError,
} from "./errors.js";

// Engine
export {
	QuakeAlertEngine,
	type EngineStats,
	type IngestOutcome,
	type QuakeAlertEngineOptions,
} from "./engine.js";

// Event Bus
export { QuakeEventBus, type EngineEvent, type EngineListener } from "./event-bus.js";

// Normalizer
export { normalize, normalizeCea, normalizeJma, normalizeTest, toIntensity, type NormalizeResult } from "./normalizer.js";

// Evaluator
export { describeThreshold, evaluate } from "./evaluator.js";

// Trigger Gate
export { TriggerGate, type TriggerGateOptions, type TriggerGateSnapshot } from "./trigger-gate.js";

// Delivery
export {
	NotificationDispatcher,
	isRetryableDelivery,
	type DeliveryOutcome,
	type NotificationDispatcherOptions,
} from "./notification-dispatcher.js";
export { DispatchQueue, type DispatchQueueOptions, type DispatchQueueStats, type DispatchTask } from "./dispatch-queue.js";
export { exponentialBackoff, retry, sleep, type BackoffFn, type RetryOptions } from "./retry.js";

// Formatter
export { NOTIFICATION_TITLE, formatEventLines, formatNotification, formatSeverity } from "./formatter.js";

// Bounded Map
export { BoundedMap, type BoundedMapOptions, type BoundedMapStats } from "./bounded-map.js";
