export type QoS = 0 | 1 | 2;

// At least once
export const QOS_AT_LEAST_ONCE: QoS = 1;

export interface BrokerConnectOptions {
	clientId: string;
	// false keeps the broker-side session (and unacknowledged QoS 1 messages) across reconnects
	cleanSession: boolean;
	autoReconnect: boolean;
	reconnectPeriodMs: number;
	connectTimeoutMs: number;
	username?: string;
	password?: string;
}

/**
 * Connection callbacks raised by a transport. onConnect lets the session
 * flush its buffer; the others drive its reported state.
 */
export interface BrokerTransportEvents {
	onConnect(reconnect: boolean): void;
	// An established connection went down
	onConnectionLost(cause?: Error): void;
	// A connect or reconnect attempt ended without a connection
	onConnectFailed(cause?: Error): void;
	onReconnecting(): void;
	onError(err: Error): void;
}

export interface BrokerTransport {
	readonly connected: boolean;
	publish(topic: string, payload: string, qos: QoS, onDelivery: (err?: Error) => void): void;
	setAutoReconnect(enabled: boolean): void;
	end(): Promise<void>;
}

/**
 * Starts connecting and returns immediately. Throws when the connect cannot
 * even be issued (bad endpoint).
 */
export type BrokerTransportFactory = (
	endpoint: string,
	options: BrokerConnectOptions,
	events: BrokerTransportEvents
) => BrokerTransport;
