export { TelemetryPublisher, DEFAULT_BROKER_URL, generateClientId } from "./publisher";
export type { BrokerOptions, TelemetryPublisherOptions } from "./publisher";

export { BrokerSession, DisconnectedBuffer, DISCONNECTED_BUFFER_SIZE } from "./broker-session";
export type { SessionState } from "./broker-session";

export { createInterfaceConnectivityGate } from "./connectivity";
export type { ConnectivityGate } from "./connectivity";

export { buildTelemetryMessage, formatMetricValue, serializeTelemetry } from "./payload";
export type { SensorEvent, SensorEventListener } from "./sinks";
export type { BrokerTransport, BrokerTransportEvents, BrokerTransportFactory, QoS } from "./transport";
