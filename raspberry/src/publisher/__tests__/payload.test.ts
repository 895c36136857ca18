import { describe, expect, it } from "vitest";

import { parseTelemetryMessage } from "@weather-station/common";

import { buildTelemetryMessage, formatMetricValue, hasData, serializeTelemetry } from "../payload";
import { emptySnapshot } from "../metric-cache";

const TS = 1_700_000_000_000;

describe("formatMetricValue", () => {
	it("keeps one decimal for integral readings", () => {
		expect(formatMetricValue(22)).toBe("22.0");
		expect(formatMetricValue(1013)).toBe("1013.0");
		expect(formatMetricValue(-4)).toBe("-4.0");
	});

	it("uses the shortest representation otherwise", () => {
		expect(formatMetricValue(21.5)).toBe("21.5");
		expect(formatMetricValue(1013.25)).toBe("1013.25");
		expect(formatMetricValue(-3.75)).toBe("-3.75");
	});

	it("switches to E notation outside the plain range", () => {
		expect(formatMetricValue(0)).toBe("0.0");
		expect(formatMetricValue(0.001)).toBe("0.001");
		expect(formatMetricValue(9999999)).toBe("9999999.0");
		expect(formatMetricValue(0.0001)).toBe("1.0E-4");
		expect(formatMetricValue(-0.00025)).toBe("-2.5E-4");
		expect(formatMetricValue(10000000)).toBe("1.0E7");
		expect(formatMetricValue(12500000)).toBe("1.25E7");
	});
});

describe("buildTelemetryMessage", () => {
	it("omits data entirely when nothing was recorded", () => {
		const message = buildTelemetryMessage(emptySnapshot(), "station-1", TS);

		expect(message).toEqual({ deviceId: "station-1", channel: "pubsub", timestamp: TS });
		expect(message).not.toHaveProperty("data");
		expect(hasData(message)).toBe(false);
	});

	it("includes only the metric that has a reading", () => {
		const message = buildTelemetryMessage({ temperature: 21.5, pressure: Number.NaN }, "station-1", TS);

		expect(message.data).toEqual({ temperature: "21.5" });
		expect(Object.keys(message.data ?? {})).toEqual(["temperature"]);
	});

	it("includes both metrics as strings", () => {
		const message = buildTelemetryMessage({ temperature: 21.5, pressure: 1013.25 }, "station-1", TS);

		expect(message).toEqual({
			deviceId: "station-1",
			channel: "pubsub",
			timestamp: TS,
			data: { temperature: "21.5", pressure: "1013.25" }
		});
	});

	it("treats non-finite readings as absent", () => {
		const message = buildTelemetryMessage({ temperature: Number.POSITIVE_INFINITY, pressure: Number.NaN }, "station-1", TS);

		expect(message.data).toBeUndefined();
	});

	it("truncates the timestamp to whole milliseconds", () => {
		expect(buildTelemetryMessage(emptySnapshot(), "station-1", TS + 0.9).timestamp).toBe(TS);
	});

	it("is deterministic for the same snapshot and timestamp", () => {
		const snapshot = { temperature: 19.25, pressure: 998.5 };

		const a = buildTelemetryMessage(snapshot, "station-1", TS);
		const b = buildTelemetryMessage(snapshot, "station-1", TS);

		expect(a).toEqual(b);
		expect(serializeTelemetry(a)).toBe(serializeTelemetry(b));
	});
});

describe("serializeTelemetry", () => {
	it("renders the wire payload with string-encoded values", () => {
		const message = buildTelemetryMessage({ temperature: 21.5, pressure: 1013 }, "station-1", TS);

		expect(serializeTelemetry(message)).toBe(
			'{"deviceId":"station-1","channel":"pubsub","timestamp":1700000000000,"data":{"temperature":"21.5","pressure":"1013.0"}}'
		);
	});

	it("produces payloads consumers can parse back", () => {
		const message = buildTelemetryMessage({ temperature: -2.5, pressure: Number.NaN }, "station-1", TS);

		expect(parseTelemetryMessage(serializeTelemetry(message))).toEqual(message);
	});

	it("rejects a message that does not match the wire schema", () => {
		const message = buildTelemetryMessage({ temperature: 21.5, pressure: Number.NaN }, "", TS);

		expect(() => serializeTelemetry(message)).toThrowError(/Telemetry payload is invalid: deviceId:/);
		try {
			serializeTelemetry(message);
		} catch (err) {
			expect(err).toMatchObject({ code: "SERIALIZATION_ERROR" });
		}
	});
});
