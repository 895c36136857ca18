import { randomBytes } from "node:crypto";
import type winston from "winston";

import type { MetricName } from "@weather-station/common";

import { componentLogger } from "../lib/log";
import { constructionError, stateError } from "../lib/errors";
import { BrokerSession } from "./broker-session";
import type { SessionState } from "./broker-session";
import { createInterfaceConnectivityGate } from "./connectivity";
import type { ConnectivityGate } from "./connectivity";
import { LatestValueCache } from "./metric-cache";
import { connectMqtt } from "./mqtt-transport";
import { PublishScheduler } from "./scheduler";
import type { SchedulerState } from "./scheduler";
import { createMetricSink } from "./sinks";
import type { SensorEventListener } from "./sinks";
import type { BrokerTransportFactory } from "./transport";
import { WorkerContext } from "./worker";

export const DEFAULT_BROKER_URL = "mqtt://mqtt.eclipseprojects.io:1883";
export const DEFAULT_RECONNECT_PERIOD_MS = 5_000;
export const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

export interface BrokerOptions {
	url?: string;
	username?: string;
	password?: string;
	reconnectPeriodMs?: number;
	connectTimeoutMs?: number;
}

export interface TelemetryPublisherOptions {
	appName: string;
	topic: string;
	deviceId: string;
	logger: winston.Logger;
	broker?: BrokerOptions;
	intervalMs?: number;
	connectivity?: ConnectivityGate;
	// Transport factory; mqtt.js unless overridden
	connect?: BrokerTransportFactory;
	clock?: () => number;
}

export function generateClientId(appName: string): string {
	return `${appName}_${randomBytes(8).toString("hex")}`;
}

/**
 * Samples the latest temperature and pressure readings at a fixed interval
 * and publishes them to one MQTT topic.
 *
 * Sensor sources write through {@link getTemperatureListener} and
 * {@link getPressureListener} at their own pace; start() / stop() control the
 * publish loop only, the broker session stays up until close().
 */
export class TelemetryPublisher {
	readonly clientId: string;

	private readonly logger: winston.Logger;
	private readonly cache = new LatestValueCache();
	private readonly worker: WorkerContext;
	private readonly session: BrokerSession;
	private readonly scheduler: PublishScheduler;
	private readonly listeners: Record<MetricName, SensorEventListener>;
	private closing: Promise<void> | null = null;

	constructor(opts: TelemetryPublisherOptions) {
		if (!opts.topic.trim()) {
			throw constructionError("MQTT topic must not be empty");
		}
		if (!opts.deviceId.trim()) {
			throw constructionError("Device id must not be empty");
		}

		this.logger = opts.logger;
		this.clientId = generateClientId(opts.appName);
		this.worker = new WorkerContext(`${opts.appName}-publisher`, componentLogger(opts.logger, "worker"));

		const broker = opts.broker ?? {};
		this.session = new BrokerSession({
			endpoint: broker.url ?? DEFAULT_BROKER_URL,
			clientId: this.clientId,
			username: broker.username,
			password: broker.password,
			reconnectPeriodMs: broker.reconnectPeriodMs ?? DEFAULT_RECONNECT_PERIOD_MS,
			connectTimeoutMs: broker.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
			connect: opts.connect ?? connectMqtt,
			logger: componentLogger(opts.logger, "broker")
		});

		this.scheduler = new PublishScheduler({
			worker: this.worker,
			session: this.session,
			snapshot: () => this.cache.snapshot(),
			isOnline: opts.connectivity ?? createInterfaceConnectivityGate(),
			topic: opts.topic,
			deviceId: opts.deviceId,
			intervalMs: opts.intervalMs,
			clock: opts.clock,
			logger: componentLogger(opts.logger, "scheduler")
		});

		this.listeners = {
			temperature: createMetricSink(this.cache, "temperature"),
			pressure: createMetricSink(this.cache, "pressure")
		};
	}

	get sessionState(): SessionState {
		return this.session.state;
	}

	get schedulerState(): SchedulerState {
		return this.scheduler.state;
	}

	get bufferedCount(): number {
		return this.session.bufferedCount;
	}

	start(): void {
		if (this.closing) {
			throw stateError("Publisher is closed");
		}
		this.scheduler.start();
	}

	stop(): void {
		this.scheduler.stop();
	}

	/**
	 * Stop publishing, disconnect from the broker and drain the worker.
	 * The instance cannot be restarted afterwards.
	 */
	close(): Promise<void> {
		if (!this.closing) {
			this.closing = this.shutdown();
		}
		return this.closing;
	}

	setReconnectPolicy(enabled: boolean): void {
		this.worker.post(() => this.session.setReconnectPolicy(enabled));
	}

	getTemperatureListener(): SensorEventListener {
		return this.listeners.temperature;
	}

	getPressureListener(): SensorEventListener {
		return this.listeners.pressure;
	}

	getListener(metric: MetricName): SensorEventListener {
		return this.listeners[metric];
	}

	private async shutdown(): Promise<void> {
		this.scheduler.stop();
		this.worker.post(() => this.session.disconnect());
		await this.worker.quitSafely();
		this.logger.info("Telemetry publisher closed");
	}
}
