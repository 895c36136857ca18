import type winston from "winston";

import { connectError, constructionError, errorMessage, publishError } from "../lib/errors";
import type { BrokerTransport, BrokerTransportFactory, QoS } from "./transport";

export type SessionState = "disconnected" | "connecting" | "connected" | "reconnect-pending";

export const DISCONNECTED_BUFFER_SIZE = 100;

interface BufferedMessage {
	topic: string;
	payload: string;
	qos: QoS;
}

/**
 * Bounded FIFO for messages published while offline. Not persisted.
 * When full, new messages are refused; the oldest are never evicted.
 */
export class DisconnectedBuffer {
	private readonly messages: BufferedMessage[] = [];

	constructor(readonly capacity: number = DISCONNECTED_BUFFER_SIZE) {}

	get size(): number {
		return this.messages.length;
	}

	get isFull(): boolean {
		return this.messages.length >= this.capacity;
	}

	offer(message: BufferedMessage): boolean {
		if (this.isFull) return false;
		this.messages.push(message);
		return true;
	}

	shift(): BufferedMessage | undefined {
		return this.messages.shift();
	}

	clear(): void {
		this.messages.length = 0;
	}
}

export interface BrokerSessionOptions {
	endpoint: string;
	clientId: string;
	username?: string;
	password?: string;
	reconnectPeriodMs: number;
	connectTimeoutMs: number;
	connect: BrokerTransportFactory;
	logger: winston.Logger;
}

/**
 * Owns the one broker connection: connects at construction with automatic
 * reconnect and a persistent session, buffers while offline once the first
 * connect succeeded, and flushes the buffer on every (re)connect.
 */
export class BrokerSession {
	private readonly logger: winston.Logger;
	private readonly transport: BrokerTransport;
	private buffer: DisconnectedBuffer | null = null;
	private autoReconnect = true;
	private closed = false;
	private _state: SessionState = "connecting";

	constructor(private readonly opts: BrokerSessionOptions) {
		this.logger = opts.logger;

		this.logger.info("Connecting to MQTT broker %s (clientId=%s)", opts.endpoint, opts.clientId);

		try {
			this.transport = opts.connect(
				opts.endpoint,
				{
					clientId: opts.clientId,
					cleanSession: false,
					autoReconnect: true,
					reconnectPeriodMs: opts.reconnectPeriodMs,
					connectTimeoutMs: opts.connectTimeoutMs,
					username: opts.username,
					password: opts.password
				},
				{
					onConnect: reconnect => this.handleConnect(reconnect),
					onConnectionLost: cause => this.handleConnectionLost(cause),
					onConnectFailed: cause => this.handleConnectFailed(cause),
					onReconnecting: () => this.handleReconnecting(),
					onError: err => this.handleError(err)
				}
			);
		} catch (err) {
			throw constructionError(`Cannot connect to MQTT broker ${opts.endpoint}: ${errorMessage(err)}`, err);
		}
	}

	get state(): SessionState {
		return this._state;
	}

	get bufferedCount(): number {
		return this.buffer?.size ?? 0;
	}

	get isBuffering(): boolean {
		return this.buffer !== null;
	}

	/**
	 * Send or buffer one message. Throws PUBLISH_ERROR when the message
	 * can be neither sent nor buffered.
	 */
	publish(topic: string, payload: string, qos: QoS): void {
		if (this.closed) {
			throw publishError("SESSION_CLOSED", topic);
		}

		if (this.transport.connected) {
			this.send({ topic, payload, qos });
			return;
		}

		if (!this.buffer) {
			throw publishError("NOT_CONNECTED", topic);
		}

		if (!this.buffer.offer({ topic, payload, qos })) {
			throw publishError("BUFFER_FULL", topic);
		}

		this.logger.debug("Buffered message while offline (%d/%d)", this.buffer.size, this.buffer.capacity);
	}

	setReconnectPolicy(enabled: boolean): void {
		this.autoReconnect = enabled;
		this.transport.setAutoReconnect(enabled);
		if (!this.closed && this._state === "disconnected" && enabled) {
			this._state = "reconnect-pending";
		}
		this.logger.info("Automatic reconnect %s", enabled ? "enabled" : "disabled");
	}

	async disconnect(): Promise<void> {
		if (this.closed) return;
		this.closed = true;

		const dropped = this.bufferedCount;
		this.buffer?.clear();
		this._state = "disconnected";

		if (dropped > 0) {
			this.logger.warn("Disconnecting with %d buffered message(s) undelivered", dropped);
		}

		try {
			await this.transport.end();
			this.logger.info("Disconnected from MQTT broker");
		} catch (err) {
			this.logger.error("Error disconnecting MQTT client: %s", errorMessage(err));
		}
	}

	private send(message: BufferedMessage): void {
		this.transport.publish(message.topic, message.payload, message.qos, err => {
			if (err) {
				const failure = publishError("DELIVERY_FAILED", message.topic, err);
				this.logger.error("%s: %s", failure.message, err.message);
				return;
			}
			this.logger.debug("MQTT delivery complete (topic=%s)", message.topic);
		});
	}

	private handleConnect(reconnect: boolean): void {
		if (this.closed) return;
		this._state = "connected";
		this.logger.info("MQTT connection complete (reconnect=%s)", String(reconnect));

		if (!this.buffer) {
			this.buffer = new DisconnectedBuffer(DISCONNECTED_BUFFER_SIZE);
			return;
		}

		this.flush();
	}

	private flush(): void {
		if (!this.buffer || this.buffer.size === 0) return;

		let sent = 0;
		while (this.transport.connected) {
			const next = this.buffer.shift();
			if (!next) break;
			this.send(next);
			sent++;
		}
		this.logger.info("Flushed %d buffered message(s)", sent);
	}

	private handleConnectionLost(cause?: Error): void {
		if (this.closed) return;
		this._state = this.autoReconnect ? "reconnect-pending" : "disconnected";
		this.logger.warn("MQTT connection lost%s", cause ? `: ${cause.message}` : "");
	}

	private handleConnectFailed(cause?: Error): void {
		if (this.closed) return;
		this._state = this.autoReconnect ? "reconnect-pending" : "disconnected";
		this.logger.warn("MQTT connect attempt failed%s", cause ? `: ${cause.message}` : "");
	}

	private handleReconnecting(): void {
		if (this.closed) return;
		this._state = "connecting";
		this.logger.debug("Reconnecting to MQTT broker %s", this.opts.endpoint);
	}

	private handleError(err: Error): void {
		const failure = connectError(`MQTT client error: ${err.message}`, err);
		this.logger.error(failure.message);
	}
}
