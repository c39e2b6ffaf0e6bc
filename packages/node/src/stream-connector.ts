import { ConnectionError, DEFAULTS, describeError, type QuakeLogger } from "@quakewatch/core";
import { EventEmitter } from "eventemitter3";
import { WebSocket, type RawData } from "ws";

export interface StreamConnectorConfig {
	name: string;
	url: string;
	/** Called synchronously for every inbound frame, in arrival order. */
	onMessage: (raw: string) => void;
	reconnectDelayMs?: number;
	pingIntervalMs?: number;
	pingTimeoutMs?: number;
	logger?: QuakeLogger;
}

export interface StreamConnectorEvents {
	connected: () => void;
	disconnected: (code: number, reason: string) => void;
	error: (err: ConnectionError) => void;
	stopped: () => void;
}

/**
 * Long-lived WebSocket feed client
 * - Hands every frame to `onMessage`; a throwing handler never drops the socket
 * - Pings every `pingIntervalMs`; a missing pong counts as a disconnect
 * - Reconnects after a fixed delay on failure, close or keepalive timeout
 * - Only `stop()` ends it
 */
export class StreamConnector extends EventEmitter<StreamConnectorEvents> {
	readonly name: string;
	private ws: WebSocket | null = null;
	private readonly url: string;
	private readonly handler: (raw: string) => void;
	private readonly reconnectDelayMs: number;
	private readonly pingIntervalMs: number;
	private readonly pingTimeoutMs: number;
	private readonly logger: QuakeLogger;
	private closed = false;
	private started = false;
	private connected = false;
	private reconnectTimer: NodeJS.Timeout | null = null;
	private pingTimer: NodeJS.Timeout | null = null;
	private pongTimer: NodeJS.Timeout | null = null;
	private connectCount = 0;

	constructor(config: StreamConnectorConfig) {
		super();
		this.name = config.name;
		this.url = config.url;
		this.handler = config.onMessage;
		this.reconnectDelayMs = config.reconnectDelayMs ?? DEFAULTS.reconnectDelayMs;
		this.pingIntervalMs = config.pingIntervalMs ?? DEFAULTS.pingIntervalMs;
		this.pingTimeoutMs = config.pingTimeoutMs ?? DEFAULTS.pingTimeoutMs;
		this.logger = config.logger ?? console;
	}

	start(): void {
		if (this.closed || this.started) {
			return;
		}
		this.started = true;
		this.doConnect();
	}

	stop(): void {
		if (this.closed) {
			return;
		}
		this.closed = true;
		if (this.reconnectTimer) {
			clearTimeout(this.reconnectTimer);
			this.reconnectTimer = null;
		}
		this.clearKeepalive();
		if (this.ws) {
			const ws = this.ws;
			this.ws = null;
			this.connected = false;
			ws.close(1000, "shutdown");
		}
		this.emit("stopped");
	}

	isConnected(): boolean {
		return this.connected;
	}

	/** Successful handshakes so far, including reconnects. */
	get connections(): number {
		return this.connectCount;
	}

	private doConnect(): void {
		if (this.closed || this.ws) {
			return;
		}

		let ws: WebSocket;
		try {
			ws = new WebSocket(this.url, {
				handshakeTimeout: this.pingIntervalMs,
			});
		} catch (err) {
			// ws rejects an unusable address synchronously
			this.fail(err);
			this.ws = null;
			this.scheduleReconnect();
			return;
		}
		this.ws = ws;

		ws.on("open", () => {
			if (this.ws !== ws) return;
			this.connected = true;
			this.connectCount++;
			this.logger.info(`connected ${this.name}`);
			this.startKeepalive(ws);
			this.emit("connected");
		});

		ws.on("message", (data: RawData) => {
			this.dispatch(rawDataToString(data));
		});

		ws.on("pong", () => {
			if (this.pongTimer) {
				clearTimeout(this.pongTimer);
				this.pongTimer = null;
			}
		});

		ws.on("error", (err) => {
			this.fail(err);
		});

		ws.on("close", (code: number, reason: Buffer) => {
			const text = reason.toString();
			this.logger.info(`${this.name} closed: ${code} ${text}`);
			if (this.ws !== ws) {
				return;
			}
			this.ws = null;
			this.connected = false;
			this.clearKeepalive();
			this.emit("disconnected", code, text);
			this.scheduleReconnect();
		});
	}

	private fail(err: unknown): void {
		const message = describeError(err);
		this.logger.error(`${this.name} error: ${message}`);
		this.emit("error", new ConnectionError(this.name, message, { cause: err }));
	}

	private dispatch(raw: string): void {
		try {
			this.handler(raw);
		} catch (err) {
			this.logger.error(`${this.name} message handler failed: ${describeError(err)}`);
		}
	}

	private startKeepalive(ws: WebSocket): void {
		this.clearKeepalive();
		this.pingTimer = setInterval(() => {
			if (ws.readyState !== WebSocket.OPEN || this.pongTimer) {
				return;
			}
			this.pongTimer = setTimeout(() => {
				this.pongTimer = null;
				this.logger.warn(`${this.name} keepalive timeout after ${this.pingTimeoutMs}ms, reconnecting`);
				ws.terminate();
			}, this.pingTimeoutMs);
			ws.ping();
		}, this.pingIntervalMs);
	}

	private clearKeepalive(): void {
		if (this.pingTimer) {
			clearInterval(this.pingTimer);
			this.pingTimer = null;
		}
		if (this.pongTimer) {
			clearTimeout(this.pongTimer);
			this.pongTimer = null;
		}
	}

	private scheduleReconnect(): void {
		if (this.closed) {
			return;
		}
		if (this.reconnectTimer) {
			clearTimeout(this.reconnectTimer);
		}

		this.reconnectTimer = setTimeout(() => {
			this.reconnectTimer = null;
			this.doConnect();
		}, this.reconnectDelayMs);
	}
}

function rawDataToString(data: RawData): string {
	if (Array.isArray(data)) {
		return Buffer.concat(data).toString("utf-8");
	}
	if (Buffer.isBuffer(data)) {
		return data.toString("utf-8");
	}
	return Buffer.from(data).toString("utf-8");
}
