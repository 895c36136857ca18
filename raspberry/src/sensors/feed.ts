import type winston from "winston";

import type { MetricName } from "@weather-station/common";

import type { SensorConfig } from "../lib/config";
import { sensorError } from "../lib/errors";
import { componentLogger } from "../lib/log";
import type { SensorEventListener } from "../publisher/sinks";
import { getSensorModule } from "./index";
import type { SensorModule } from "./types";

/**
 * Polls one sensor module and hands every reading to a listener.
 * The next read is scheduled `intervalMs` after the previous one finished.
 */
export class SensorFeed {
	private timer: NodeJS.Timeout | null = null;
	private inFlight: Promise<void> | null = null;
	private running = false;

	constructor(
		private readonly sensor: SensorConfig,
		private readonly module: SensorModule,
		private readonly listener: SensorEventListener,
		private readonly logger: winston.Logger,
		private readonly clock: () => number = Date.now
	) {}

	get sensorId(): string {
		return this.sensor.sensorId;
	}

	start(): void {
		if (this.running) return;
		this.running = true;
		this.logger.info(
			"Sensor feed started: id=%s type=%s metric=%s intervalMs=%d",
			this.sensor.sensorId,
			this.sensor.type,
			this.sensor.metric,
			this.sensor.intervalMs
		);
		this.schedule(0);
	}

	/**
	 * Cancel the next read and wait for a read already in progress.
	 */
	async stop(): Promise<void> {
		this.running = false;
		if (this.timer) {
			clearTimeout(this.timer);
			this.timer = null;
		}
		await this.inFlight;
	}

	private schedule(delayMs: number): void {
		this.timer = setTimeout(() => {
			this.timer = null;
			this.inFlight = this.poll().finally(() => {
				this.inFlight = null;
				if (this.running) this.schedule(this.sensor.intervalMs);
			});
		}, delayMs);
	}

	private async poll(): Promise<void> {
		try {
			const value = await this.module.read(this.sensor);
			if (!this.running) return;
			this.listener.onSensorChanged({
				value,
				sensorId: this.sensor.sensorId,
				timestamp: this.clock()
			});
			this.logger.debug("Sensor %s reading: %s %s", this.sensor.sensorId, String(value), this.sensor.unit ?? "-");
		} catch (err) {
			const failure = sensorError(this.sensor.sensorId, err);
			this.logger.warn(failure.message);
		}
	}
}

/**
 * One feed per configured sensor, each wired to the listener of its metric.
 * Applies module defaults and validates before anything starts; throws on
 * an unknown type or invalid sensor settings.
 */
export function createSensorFeeds(
	sensors: SensorConfig[],
	listenerFor: (metric: MetricName) => SensorEventListener,
	logger: winston.Logger
): SensorFeed[] {
	return sensors.map(sensor => {
		const module = getSensorModule(sensor.type);
		module.defaults?.(sensor);
		module.validate(sensor);

		return new SensorFeed(sensor, module, listenerFor(sensor.metric), componentLogger(logger, `sensor:${sensor.sensorId}`));
	});
}
