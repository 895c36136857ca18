import type { MetricName } from "@weather-station/common";

import type { LatestValueCache } from "./metric-cache";

/**
 * A single sensor reading as delivered by a sensor source.
 * Only `value` is used by the publisher.
 */
export interface SensorEvent {
	value: number;
	sensorId?: string;
	timestamp?: number;
	accuracy?: number;
}

export interface SensorEventListener {
	onSensorChanged(event: SensorEvent): void;
}

export function createMetricSink(cache: LatestValueCache, metric: MetricName): SensorEventListener {
	return {
		onSensorChanged(event: SensorEvent): void {
			cache.set(metric, event.value);
		}
	};
}
