export const METRIC_NAMES = ["temperature", "pressure"] as const;

export type MetricName = (typeof METRIC_NAMES)[number];

export const TELEMETRY_CHANNEL = "pubsub";

export type TelemetryData = Partial<Record<MetricName, string>>;

export interface TelemetryMessage {
    deviceId: string;
    channel: typeof TELEMETRY_CHANNEL;

    timestamp: number; // epoch millis

    // Present only when at least one metric has a reading.
    // Values are string-encoded floats, e.g. "21.5"
    data?: TelemetryData;
}

export function isMetricName(value: string): value is MetricName {
    return METRIC_NAMES.some(m => m === value);
}
