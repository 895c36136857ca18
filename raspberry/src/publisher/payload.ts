import { METRIC_NAMES, TELEMETRY_CHANNEL, TelemetrySchema, formatIssues } from "@weather-station/common";
import type { TelemetryData, TelemetryMessage } from "@weather-station/common";

import { serializationError } from "../lib/errors";
import type { MetricSnapshot } from "./metric-cache";

// Magnitudes outside [1e-3, 1e7) are written in E notation on the wire
const PLAIN_MIN = 1e-3;
const PLAIN_MAX = 1e7;

/**
 * Render a reading the way existing consumers expect it on the wire:
 * integral values keep one decimal ("22.0"), others use the shortest
 * representation ("21.5"); very small or large magnitudes use E notation
 * with at least one fraction digit ("1.0E-4", "1.25E7").
 */
export function formatMetricValue(value: number): string {
	const magnitude = Math.abs(value);
	if (value !== 0 && (magnitude < PLAIN_MIN || magnitude >= PLAIN_MAX)) {
		const [mantissa = "", exponent = "0"] = value.toExponential().split("e");
		const digits = mantissa.includes(".") ? mantissa : `${mantissa}.0`;
		return `${digits}E${exponent.replace("+", "")}`;
	}
	return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

export function buildTelemetryMessage(snapshot: MetricSnapshot, deviceId: string, timestamp: number): TelemetryMessage {
	const data: TelemetryData = {};
	let present = 0;

	for (const metric of METRIC_NAMES) {
		const value = snapshot[metric];
		if (Number.isFinite(value)) {
			data[metric] = formatMetricValue(value);
			present++;
		}
	}

	const message: TelemetryMessage = {
		deviceId,
		channel: TELEMETRY_CHANNEL,
		timestamp: Math.trunc(timestamp)
	};
	if (present > 0) {
		message.data = data;
	}
	return message;
}

export function hasData(message: TelemetryMessage): message is TelemetryMessage & { data: TelemetryData } {
	return message.data !== undefined;
}

export function serializeTelemetry(message: TelemetryMessage): string {
	const res = TelemetrySchema.safeParse(message);
	if (!res.success) {
		throw serializationError(`Telemetry payload is invalid: ${formatIssues(res.error)}`, res.error);
	}

	try {
		return JSON.stringify(message);
	} catch (err) {
		throw serializationError("Telemetry payload could not be encoded", err);
	}
}
