import { connect } from "mqtt";
import type { IClientOptions, MqttClient } from "mqtt";

import type { BrokerConnectOptions, BrokerTransport, BrokerTransportEvents, BrokerTransportFactory, QoS } from "./transport";

// How long a connected client may wait for outstanding acks before end() cuts the socket
export const END_GRACE_MS = 2_000;

function toClientOptions(options: BrokerConnectOptions): IClientOptions {
	return {
		clientId: options.clientId,
		clean: options.cleanSession,
		// Reconnects are scheduled by MqttTransport so the policy can change at runtime
		reconnectPeriod: 0,
		connectTimeout: options.connectTimeoutMs,
		username: options.username,
		password: options.password
	};
}

/**
 * mqtt.js client behind the BrokerTransport contract.
 *
 * "close" is reported as onConnectionLost after an established connection and
 * as onConnectFailed after an attempt that never connected; either way a retry
 * is scheduled `reconnectPeriodMs` later while auto-reconnect is on.
 */
export class MqttTransport implements BrokerTransport {
	private autoReconnect: boolean;
	private everConnected = false;
	private up = false;
	private attempting = true;
	private ending = false;
	private lastError: Error | undefined;
	private retryTimer: NodeJS.Timeout | null = null;

	constructor(
		private readonly client: MqttClient,
		private readonly options: BrokerConnectOptions,
		private readonly events: BrokerTransportEvents
	) {
		this.autoReconnect = options.autoReconnect;

		client.on("connect", () => this.handleConnect());
		client.on("reconnect", () => events.onReconnecting());
		client.on("error", err => {
			this.lastError = err;
			events.onError(err);
		});
		client.on("close", () => this.handleClose());
	}

	get connected(): boolean {
		return this.client.connected;
	}

	publish(topic: string, payload: string, qos: QoS, onDelivery: (err?: Error) => void): void {
		this.client.publish(topic, payload, { qos }, err => onDelivery(err ?? undefined));
	}

	setAutoReconnect(enabled: boolean): void {
		this.autoReconnect = enabled;

		if (!enabled) {
			this.cancelRetry();
			return;
		}

		if (!this.ending && !this.client.connected && !this.attempting && !this.retryTimer) {
			this.reconnect();
		}
	}

	/**
	 * Offline: end at once; QoS 1 messages still unacknowledged stay with the
	 * broker-side session. Online: let outstanding acks arrive for up to
	 * END_GRACE_MS, then drop the socket.
	 */
	async end(): Promise<void> {
		this.ending = true;
		this.cancelRetry();

		if (!this.client.connected) {
			await this.client.endAsync(true);
			return;
		}

		await new Promise<void>(resolve => {
			const timer = setTimeout(() => this.client.stream.destroy(), END_GRACE_MS);
			const finish = () => {
				clearTimeout(timer);
				this.client.removeListener("close", finish);
				resolve();
			};
			this.client.once("close", finish);
			this.client.end(false, finish);
		});
	}

	private handleConnect(): void {
		const reconnect = this.everConnected;
		this.everConnected = true;
		this.up = true;
		this.attempting = false;
		this.lastError = undefined;
		this.events.onConnect(reconnect);
	}

	private handleClose(): void {
		this.attempting = false;
		if (this.ending) return;

		const cause = this.lastError;
		this.lastError = undefined;

		if (this.up) {
			this.up = false;
			this.events.onConnectionLost(cause);
		} else {
			this.events.onConnectFailed(cause);
		}

		if (this.autoReconnect) {
			this.scheduleRetry();
		}
	}

	private scheduleRetry(): void {
		if (this.retryTimer) return;
		this.retryTimer = setTimeout(() => {
			this.retryTimer = null;
			this.reconnect();
		}, this.options.reconnectPeriodMs);
	}

	private cancelRetry(): void {
		if (this.retryTimer) {
			clearTimeout(this.retryTimer);
			this.retryTimer = null;
		}
	}

	private reconnect(): void {
		this.attempting = true;
		// Emits "reconnect" before dialing
		this.client.reconnect();
	}
}

export const connectMqtt: BrokerTransportFactory = (endpoint, options, events) => {
	const client = connect(endpoint, toClientOptions(options));
	return new MqttTransport(client, options, events);
};
