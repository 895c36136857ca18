import { describe, expect, it } from "vitest";

import { AppError } from "../../lib/errors";
import { BrokerSession, DISCONNECTED_BUFFER_SIZE, DisconnectedBuffer } from "../broker-session";
import type { BrokerTransportFactory } from "../transport";
import { captureError, fakeConnector, silentLogger } from "./fake-transport";

const TOPIC = "weather/test";

function newSession(connect?: BrokerTransportFactory) {
	const connector = fakeConnector();
	const session = new BrokerSession({
		endpoint: "mqtt://broker.test:1883",
		clientId: "test-station_0011223344556677",
		reconnectPeriodMs: 5000,
		connectTimeoutMs: 10000,
		connect: connect ?? connector.connect,
		logger: silentLogger()
	});
	return { session, connector };
}

describe("DisconnectedBuffer", () => {
	it("keeps the oldest messages and refuses new ones when full", () => {
		const buffer = new DisconnectedBuffer(2);

		expect(buffer.offer({ topic: TOPIC, payload: "a", qos: 1 })).toBe(true);
		expect(buffer.offer({ topic: TOPIC, payload: "b", qos: 1 })).toBe(true);
		expect(buffer.offer({ topic: TOPIC, payload: "c", qos: 1 })).toBe(false);

		expect(buffer.size).toBe(2);
		expect(buffer.shift()?.payload).toBe("a");
		expect(buffer.shift()?.payload).toBe("b");
		expect(buffer.shift()).toBeUndefined();
	});

	it("defaults to a capacity of 100", () => {
		expect(new DisconnectedBuffer().capacity).toBe(100);
		expect(DISCONNECTED_BUFFER_SIZE).toBe(100);
	});
});

describe("BrokerSession", () => {
	it("connects at construction with auto-reconnect and a persistent session", () => {
		const { session, connector } = newSession();
		const transport = connector.last();

		expect(connector.count()).toBe(1);
		expect(transport.endpoint).toBe("mqtt://broker.test:1883");
		expect(transport.options).toEqual({
			clientId: "test-station_0011223344556677",
			cleanSession: false,
			autoReconnect: true,
			reconnectPeriodMs: 5000,
			connectTimeoutMs: 10000,
			username: undefined,
			password: undefined
		});
		expect(session.state).toBe("connecting");
	});

	it("fails construction when the connect cannot be issued", () => {
		const err = captureError(
			() =>
				newSession(() => {
					throw new Error("Missing protocol");
				}).session
		);

		expect(err).toBeInstanceOf(AppError);
		expect(err).toMatchObject({
			code: "CONSTRUCTION_ERROR",
			message: "Cannot connect to MQTT broker mqtt://broker.test:1883: Missing protocol"
		});
	});

	it("refuses to publish before the first connect", () => {
		const { session, connector } = newSession();

		const err = captureError(() => session.publish(TOPIC, "m", 1));

		expect(err).toMatchObject({ code: "PUBLISH_ERROR", details: { reason: "NOT_CONNECTED", topic: TOPIC } });
		expect(session.isBuffering).toBe(false);
		expect(connector.last().published).toHaveLength(0);
	});

	it("publishes directly while connected", () => {
		const { session, connector } = newSession();
		const transport = connector.last();
		transport.connect();

		session.publish(TOPIC, "m1", 1);

		expect(session.state).toBe("connected");
		expect(transport.published).toEqual([{ topic: TOPIC, payload: "m1", qos: 1 }]);
		expect(session.bufferedCount).toBe(0);
	});

	it("buffers while disconnected and flushes in FIFO order on reconnect", () => {
		const { session, connector } = newSession();
		const transport = connector.last();
		transport.connect();
		session.publish(TOPIC, "m0", 1);

		transport.drop(new Error("keepalive timeout"));
		expect(session.state).toBe("reconnect-pending");

		for (let i = 1; i <= 5; i++) {
			session.publish(TOPIC, `m${i}`, 1);
		}
		expect(session.bufferedCount).toBe(5);
		expect(transport.payloads()).toEqual(["m0"]);

		transport.reconnecting();
		expect(session.state).toBe("connecting");

		transport.connect();
		expect(session.state).toBe("connected");
		expect(session.bufferedCount).toBe(0);
		expect(transport.payloads()).toEqual(["m0", "m1", "m2", "m3", "m4", "m5"]);

		session.publish(TOPIC, "m6", 1);
		expect(transport.payloads()).toEqual(["m0", "m1", "m2", "m3", "m4", "m5", "m6"]);
	});

	it("keeps the earliest 100 messages and drops newer ones once the buffer is full", () => {
		const { session, connector } = newSession();
		const transport = connector.last();
		transport.connect();
		transport.drop();

		const dropped: unknown[] = [];
		for (let i = 0; i < 105; i++) {
			try {
				session.publish(TOPIC, `m${i}`, 1);
			} catch (err) {
				dropped.push(err);
			}
		}

		expect(session.bufferedCount).toBe(100);
		expect(dropped).toHaveLength(5);
		for (const err of dropped) {
			expect(err).toMatchObject({ code: "PUBLISH_ERROR", details: { reason: "BUFFER_FULL" } });
		}

		transport.connect();

		const expected = Array.from({ length: 100 }, (_, i) => `m${i}`);
		expect(transport.payloads()).toEqual(expected);
	});

	it("goes to disconnected instead of reconnect-pending when reconnect is disabled", () => {
		const { session, connector } = newSession();
		const transport = connector.last();
		transport.connect();

		session.setReconnectPolicy(false);
		expect(transport.autoReconnect).toBe(false);

		transport.drop();
		expect(session.state).toBe("disconnected");

		session.setReconnectPolicy(true);
		expect(transport.autoReconnect).toBe(true);
		expect(session.state).toBe("reconnect-pending");
	});

	it("returns to reconnect-pending after each failed attempt", () => {
		const { session, connector } = newSession();
		const transport = connector.last();

		transport.failAttempt(new Error("connect ECONNREFUSED"));
		expect(session.state).toBe("reconnect-pending");

		transport.reconnecting();
		expect(session.state).toBe("connecting");

		transport.failAttempt();
		expect(session.state).toBe("reconnect-pending");

		session.setReconnectPolicy(false);
		transport.reconnecting();
		transport.failAttempt();
		expect(session.state).toBe("disconnected");
	});

	it("does not throw when the broker rejects a delivery", () => {
		const { session, connector } = newSession();
		const transport = connector.last();
		transport.connect();
		transport.failDeliveries = true;

		expect(() => session.publish(TOPIC, "m1", 1)).not.toThrow();
		expect(transport.published).toHaveLength(1);
	});

	it("disconnects once, drops the buffer and refuses later publishes", async () => {
		const { session, connector } = newSession();
		const transport = connector.last();
		transport.connect();
		transport.drop();
		session.publish(TOPIC, "pending", 1);

		await session.disconnect();
		await session.disconnect();

		expect(transport.endCalls).toBe(1);
		expect(session.state).toBe("disconnected");
		expect(session.bufferedCount).toBe(0);
		expect(captureError(() => session.publish(TOPIC, "late", 1))).toMatchObject({
			code: "PUBLISH_ERROR",
			details: { reason: "SESSION_CLOSED" }
		});

		// A late connect event from the transport does not revive the session
		transport.connect();
		expect(session.state).toBe("disconnected");
		expect(transport.payloads()).toEqual([]);
	});

	it("swallows transport errors while disconnecting", async () => {
		const { session, connector } = newSession();
		const transport = connector.last();
		transport.connect();
		transport.failEnd = true;

		await expect(session.disconnect()).resolves.toBeUndefined();
		expect(session.state).toBe("disconnected");
	});
});
