import mqtt from "mqtt";
import type { IClientOptions, MqttClient } from "mqtt";

import type { QoS } from "@host-telemetry/common";

import type { BrokerTarget, BrokerTransport, TransportEvents } from "./transport";

type ConnectFn = (brokerUrl: string, options: IClientOptions) => MqttClient;

// Broker answered SUBACK with the failure return code
const SUBACK_FAILURE = 128;

/**
 * BrokerTransport over MQTT.js.
 *
 * Automatic reconnects are disabled (`reconnectPeriod: 0`); the broker
 * session decides when to reconnect. Every `open()` creates a fresh client
 * with a clean session, so subscriptions have to be re-issued.
 */
export class MqttTransport implements BrokerTransport {
	private client: MqttClient | null = null;

	constructor(private readonly connectFn: ConnectFn = (url, options) => mqtt.connect(url, options)) {}

	async open(target: BrokerTarget, events: TransportEvents): Promise<void> {
		await this.close(true);

		const brokerUrl = `mqtt://${target.address}:${target.port}`;

		await new Promise<void>((resolve, reject) => {
			let settled = false;

			const client = this.connectFn(brokerUrl, {
				clientId: target.clientId,
				clean: true,
				reconnectPeriod: 0,
				connectTimeout: target.connectTimeoutMs
			});
			this.client = client;

			const isCurrent = () => this.client === client;

			client.on("connect", () => {
				if (settled) return;
				settled = true;
				resolve();
			});

			client.on("error", err => {
				if (!settled) {
					settled = true;
					if (isCurrent()) this.client = null;
					client.end(true);
					reject(err);
					return;
				}
				if (isCurrent()) events.onError(err);
			});

			client.on("close", () => {
				if (!settled) {
					settled = true;
					if (isCurrent()) this.client = null;
					reject(new Error(`Connection to ${brokerUrl} closed before the broker answered`));
					return;
				}
				if (isCurrent()) {
					this.client = null;
					events.onClose("connection closed");
				}
			});

			client.on("message", (topic: string, payload: Buffer) => {
				if (isCurrent()) events.onMessage(topic, payload);
			});
		});
	}

	async subscribe(topic: string, qos: QoS): Promise<boolean> {
		const client = this.requireClient();
		return new Promise((resolve, reject) => {
			client.subscribe(topic, { qos }, (err, granted) => {
				if (err) return reject(err);
				if (!granted || granted.length === 0) return resolve(false);
				resolve(granted[0].qos !== SUBACK_FAILURE);
			});
		});
	}

	async unsubscribe(topic: string): Promise<void> {
		const client = this.requireClient();
		return new Promise((resolve, reject) => {
			client.unsubscribe(topic, {}, err => {
				if (err) return reject(err);
				resolve();
			});
		});
	}

	async publish(topic: string, payload: string, qos: QoS): Promise<void> {
		const client = this.requireClient();
		return new Promise((resolve, reject) => {
			client.publish(topic, payload, { qos }, err => {
				if (err) return reject(err);
				resolve();
			});
		});
	}

	async close(force: boolean): Promise<void> {
		const client = this.client;
		if (!client) return;
		this.client = null;

		await new Promise<void>(resolve => {
			client.end(force, {}, () => resolve());
		});
	}

	private requireClient(): MqttClient {
		if (!this.client) {
			throw new Error("MQTT client not connected");
		}
		return this.client;
	}
}
