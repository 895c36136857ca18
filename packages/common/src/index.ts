// Telemetry message shape (used by the device agent and by consumers)
export type { MetricName, TelemetryData, TelemetryMessage } from "./telemetry";
export { METRIC_NAMES, TELEMETRY_CHANNEL, isMetricName } from "./telemetry";

// Validation schema + parsing (used when serializing and by consumers)
export { TelemetrySchema, TelemetryDataSchema, formatIssues, parseTelemetryMessage } from "./schema";
