import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { BrokerSession } from "../broker/broker-session";
import type { SessionListener } from "../broker/broker-session";
import { AgentError } from "../lib/errors";
import { CONTROL_TOPIC, createTestConfig, createTestLogger, FakeTransport, TELEMETRY_TOPIC, TEST_IDENTITY } from "./test-utils";
import type { TestLogger } from "./test-utils";

class RecordingListener implements SessionListener {
	readonly events: string[] = [];

	onConnect(): void {
		this.events.push("connect");
	}

	onDisconnect(reason: string): void {
		this.events.push(`disconnect:${reason}`);
	}

	onMessage(topic: string, payload: Buffer): void {
		this.events.push(`message:${topic}:${payload.toString("utf8")}`);
	}
}

describe("BrokerSession", () => {
	let transport: FakeTransport;
	let log: TestLogger;
	let session: BrokerSession;
	let listener: RecordingListener;

	beforeEach(() => {
		transport = new FakeTransport();
		log = createTestLogger();
		// connectTimeoutMs 1000, retryDelayMs 1000, reconnectTimeoutMs 5000
		session = new BrokerSession(
			transport,
			{ clientId: TEST_IDENTITY.macAddress, connection: createTestConfig().connection },
			log.logger
		);
		listener = new RecordingListener();
		session.addListener(listener);
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	describe("connect", () => {
		it("opens the transport with the client id and notifies listeners", async () => {
			await session.connect("broker.test", 1883);

			expect(session.connectionState).toBe("connected");
			expect(transport.targets).toEqual([
				{ address: "broker.test", port: 1883, clientId: "DC:A6:32:01:02:03", connectTimeoutMs: 1_000 }
			]);
			expect(listener.events).toEqual(["connect"]);
			expect(log.lines("info")).toContain("Connected to broker broker.test:1883 as DC:A6:32:01:02:03");
		});

		it("reports a refused connection as CONNECTION_ERROR", async () => {
			transport.openBehaviours.push("refused");

			const err = await session.connect("broker.test", 1883).catch((e: unknown) => e);

			expect(err).toBeInstanceOf(AgentError);
			expect(err).toMatchObject({
				code: "CONNECTION_ERROR",
				message: "Broker broker.test:1883 refused the connection: connect ECONNREFUSED broker.test:1883"
			});
			expect(session.connectionState).toBe("disconnected");
			expect(listener.events).toEqual([]);
		});

		it("reports an unknown host as CONNECTION_ERROR", async () => {
			transport.openBehaviours.push("unreachable");

			await expect(session.connect("broker.test", 1883)).rejects.toMatchObject({
				code: "CONNECTION_ERROR",
				message: "Broker broker.test:1883 could not be reached: getaddrinfo ENOTFOUND broker.test"
			});
		});

		it("gives up on a broker that never answers and drops the half-open connection", async () => {
			vi.useFakeTimers();
			transport.openBehaviours.push("hang");

			const assertion = expect(session.connect("broker.test", 1883)).rejects.toMatchObject({
				code: "TIMEOUT_ERROR",
				message: "Timeout encountered while connecting to the MQTT broker broker.test:1883"
			});
			await vi.advanceTimersByTimeAsync(1_000);
			await assertion;

			expect(transport.closeCalls).toEqual([true]);
			expect(session.connectionState).toBe("disconnected");
		});

		it("refuses to connect once closed", async () => {
			await session.close();

			await expect(session.connect("broker.test", 1883)).rejects.toMatchObject({
				code: "CONNECTION_ERROR",
				message: "Broker session is closed"
			});
			expect(transport.openCalls).toBe(0);
		});
	});

	describe("subscribe", () => {
		it("subscribes with the requested QoS", async () => {
			await session.connect("broker.test", 1883);

			await expect(session.subscribe(CONTROL_TOPIC, 2)).resolves.toBe(true);
			expect(transport.subscribeCalls).toEqual([{ topic: CONTROL_TOPIC, qos: 2 }]);
			expect(session.subscribedTopics.get(CONTROL_TOPIC)).toBe(2);
		});

		it("resolves false when the broker refuses, but remembers the topic", async () => {
			await session.connect("broker.test", 1883);
			transport.grantSubscriptions = false;

			await expect(session.subscribe(CONTROL_TOPIC, 1)).resolves.toBe(false);
			expect(log.lines("warn")).toEqual([`Broker refused the subscription to '${CONTROL_TOPIC}'`]);
			expect(session.subscribedTopics.has(CONTROL_TOPIC)).toBe(true);
		});

		it("defers the subscription while disconnected", async () => {
			await expect(session.subscribe(CONTROL_TOPIC, 1)).resolves.toBe(false);
			expect(transport.subscribeCalls).toEqual([]);
			expect(session.subscribedTopics.get(CONTROL_TOPIC)).toBe(1);
		});
	});

	describe("publish", () => {
		it("hands the message to the transport", async () => {
			await session.connect("broker.test", 1883);

			expect(session.publish(TELEMETRY_TOPIC, "{}", 1)).toBe(true);
			expect(transport.published).toEqual([{ topic: TELEMETRY_TOPIC, payload: "{}", qos: 1 }]);
		});

		it("drops the message with a warning while disconnected", () => {
			expect(session.publish(TELEMETRY_TOPIC, "{}", 1)).toBe(false);
			expect(transport.published).toEqual([]);
			expect(log.lines("warn")).toEqual([`Not connected; dropping message for '${TELEMETRY_TOPIC}'`]);
		});

		it("logs a delivery failure instead of throwing", async () => {
			await session.connect("broker.test", 1883);
			transport.failPublishes = true;

			expect(session.publish(TELEMETRY_TOPIC, "{}", 0)).toBe(true);
			await vi.waitFor(() => {
				expect(log.lines("warn")).toEqual([`Publish to '${TELEMETRY_TOPIC}' failed: publish rejected`]);
			});
		});
	});

	describe("inbound messages and drops", () => {
		it("delivers messages to listeners in arrival order", async () => {
			await session.connect("broker.test", 1883);

			transport.deliver(CONTROL_TOPIC, "one");
			transport.deliver(CONTROL_TOPIC, "two");
			transport.deliver(TELEMETRY_TOPIC, "three");

			expect(listener.events).toEqual([
				"connect",
				`message:${CONTROL_TOPIC}:one`,
				`message:${CONTROL_TOPIC}:two`,
				`message:${TELEMETRY_TOPIC}:three`
			]);
		});

		it("keeps dispatching when a listener throws", async () => {
			const second = new RecordingListener();
			session.addListener({
				onConnect: () => undefined,
				onDisconnect: () => undefined,
				onMessage: () => {
					throw new Error("boom");
				}
			});
			session.addListener(second);
			await session.connect("broker.test", 1883);

			transport.deliver(CONTROL_TOPIC, "hello");

			expect(second.events).toEqual(["connect", `message:${CONTROL_TOPIC}:hello`]);
			expect(log.lines("error")).toEqual(["Session listener failed in onMessage: boom"]);
		});

		it("reports an unexpected drop once", async () => {
			await session.connect("broker.test", 1883);

			transport.drop("keepalive timeout");

			expect(session.isConnected()).toBe(false);
			expect(listener.events).toEqual(["connect", "disconnect:keepalive timeout"]);
			expect(log.lines("warn")).toEqual(["Disconnected from the broker! Reason: keepalive timeout"]);
		});
	});

	describe("reconnectWithBackoff", () => {
		beforeEach(async () => {
			vi.useFakeTimers();
			await session.connect("broker.test", 1883);
			await session.subscribe(CONTROL_TOPIC, 1);
			transport.drop("broker restarted");
		});

		it("retries until the broker accepts and re-subscribes", async () => {
			transport.openBehaviours.push("refused", "refused");

			const reconnecting = session.reconnectWithBackoff();
			await vi.advanceTimersByTimeAsync(2_000);
			await reconnecting;

			expect(transport.openCalls).toBe(4);
			expect(session.isConnected()).toBe(true);
			expect(transport.subscribeCalls).toEqual([
				{ topic: CONTROL_TOPIC, qos: 1 },
				{ topic: CONTROL_TOPIC, qos: 1 }
			]);
			expect(log.lines("warn").filter(l => l.startsWith("Reconnect attempt"))).toHaveLength(2);
		});

		it("gives up with TIMEOUT_ERROR once the reconnect window has passed", async () => {
			transport.openBehaviours.push(...Array.from({ length: 10 }, () => "refused" as const));

			const assertion = expect(session.reconnectWithBackoff()).rejects.toMatchObject({
				code: "TIMEOUT_ERROR",
				message: "Timeout encountered while trying to reconnect to the MQTT broker (5 attempts in 5000ms)"
			});
			await vi.advanceTimersByTimeAsync(5_000);
			await assertion;

			// one initial connect plus five attempts
			expect(transport.openCalls).toBe(6);
			expect(session.isConnected()).toBe(false);
		});

		it("stops retrying when the caller's signal aborts", async () => {
			transport.openBehaviours.push(...Array.from({ length: 10 }, () => "refused" as const));
			const stop = new AbortController();

			const assertion = expect(session.reconnectWithBackoff(stop.signal)).rejects.toMatchObject({
				code: "CONNECTION_ERROR",
				message: "Reconnect cancelled"
			});
			await vi.advanceTimersByTimeAsync(1_500);
			stop.abort();
			await assertion;

			// initial connect plus the attempts at +0s and +1s
			expect(transport.openCalls).toBe(3);
			await vi.advanceTimersByTimeAsync(5_000);
			expect(transport.openCalls).toBe(3);
			expect(session.isClosed).toBe(false);
		});

		it("makes no attempt with an already aborted signal", async () => {
			const stop = new AbortController();
			stop.abort();

			await expect(session.reconnectWithBackoff(stop.signal)).rejects.toMatchObject({ message: "Reconnect cancelled" });
			expect(transport.openCalls).toBe(1);
		});

		it("stops waiting when the session is closed", async () => {
			transport.openBehaviours.push("refused");

			const assertion = expect(session.reconnectWithBackoff()).rejects.toMatchObject({
				code: "CONNECTION_ERROR",
				message: "Broker session closed while reconnecting"
			});
			await vi.advanceTimersByTimeAsync(0);
			await session.close();
			await assertion;

			expect(transport.openCalls).toBe(2);
		});
	});

	describe("close", () => {
		it("unsubscribes and closes the transport gracefully when connected", async () => {
			await session.connect("broker.test", 1883);
			await session.subscribe(CONTROL_TOPIC, 1);

			await session.close();

			expect(transport.unsubscribeCalls).toEqual([CONTROL_TOPIC]);
			expect(transport.closeCalls).toEqual([false]);
			expect(session.isClosed).toBe(true);
			expect(session.subscribedTopics.size).toBe(0);
		});

		it("force-closes when the connection is already gone", async () => {
			await session.connect("broker.test", 1883);
			transport.drop("gone");

			await session.close();

			expect(transport.unsubscribeCalls).toEqual([]);
			expect(transport.closeCalls).toEqual([true]);
		});

		it("closes the transport only once however often it is called", async () => {
			await session.connect("broker.test", 1883);

			await Promise.all([session.close(), session.close()]);
			await session.close();

			expect(transport.closeCalls).toEqual([false]);
			expect(log.lines("info").filter(l => l === "Broker session closed")).toHaveLength(1);
		});

		it("stops notifying listeners", async () => {
			await session.connect("broker.test", 1883);
			await session.close();

			transport.deliver(CONTROL_TOPIC, "late");
			transport.drop("late");

			expect(listener.events).toEqual(["connect"]);
		});
	});
});
