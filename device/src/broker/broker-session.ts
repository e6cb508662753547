import type winston from "winston";

import type { QoS } from "@host-telemetry/common";

import type { ConnectionSettings } from "../lib/config";
import { connectionError, formatError, isAgentError, timeoutError } from "../lib/errors";
import { sleep } from "../lib/time";
import type { BrokerTransport, TransportEvents } from "./transport";

export type ConnectionState = "disconnected" | "connecting" | "connected";

/**
 * Receives the session's lifecycle and inbound-message events.
 * Called synchronously, in the order the transport reported them.
 */
export interface SessionListener {
	onConnect(): void;
	onDisconnect(reason: string): void;
	onMessage(topic: string, payload: Buffer): void;
}

export interface BrokerSessionOptions {
	clientId: string;
	connection: ConnectionSettings;
}

function isRefused(err: unknown): boolean {
	return err instanceof Error && "code" in err && err.code === "ECONNREFUSED";
}

/**
 * Owns the broker connection: connect, subscribe, publish, reconnect, close.
 *
 * Subscriptions are remembered and re-issued after every reconnect since each
 * connection starts a clean session. After `close()` the session is done for
 * good: no more events, no more connects.
 */
export class BrokerSession {
	private state: ConnectionState = "disconnected";
	private target: { address: string; port: number } | null = null;
	private closing: Promise<void> | null = null;

	private readonly subscriptions = new Map<string, QoS>();
	private readonly listeners = new Set<SessionListener>();
	private readonly abort = new AbortController();

	private readonly events: TransportEvents = {
		onClose: reason => this.handleDrop(reason),
		onMessage: (topic, payload) => this.dispatchMessage(topic, payload),
		onError: err => this.logger.warn("Broker transport error: %s", err.message)
	};

	constructor(
		private readonly transport: BrokerTransport,
		private readonly options: BrokerSessionOptions,
		private readonly logger: winston.Logger
	) {}

	get connectionState(): ConnectionState {
		return this.state;
	}

	get isClosed(): boolean {
		return this.closing !== null;
	}

	/** Topics re-issued after a reconnect, with their QoS. */
	get subscribedTopics(): ReadonlyMap<string, QoS> {
		return this.subscriptions;
	}

	isConnected(): boolean {
		return this.state === "connected";
	}

	addListener(listener: SessionListener): void {
		this.listeners.add(listener);
	}

	removeListener(listener: SessionListener): void {
		this.listeners.delete(listener);
	}

	/**
	 * Connect once. Rejects with CONNECTION_ERROR when the broker refused or
	 * could not be reached, TIMEOUT_ERROR when it did not answer in time.
	 */
	async connect(address: string, port: number): Promise<void> {
		if (this.isClosed) {
			throw connectionError("Broker session is closed");
		}
		this.target = { address, port };
		await this.attempt();
	}

	/**
	 * Register interest in a topic. Resolves false if the broker refused the
	 * subscription or the session is not connected; the topic is remembered
	 * either way and retried on the next reconnect.
	 */
	async subscribe(topic: string, qos: QoS): Promise<boolean> {
		this.subscriptions.set(topic, qos);
		if (!this.isConnected()) {
			this.logger.warn("Not connected; subscription to '%s' deferred until reconnect", topic);
			return false;
		}
		return this.subscribeNow(topic, qos);
	}

	/**
	 * Fire-and-forget publish. Returns whether the message was handed to the
	 * transport; delivery failures are logged, not thrown.
	 */
	publish(topic: string, payload: string, qos: QoS): boolean {
		if (!this.isConnected()) {
			this.logger.warn("Not connected; dropping message for '%s'", topic);
			return false;
		}

		this.transport.publish(topic, payload, qos).catch((err: unknown) => {
			this.logger.warn("Publish to '%s' failed: %s", topic, formatError(err));
		});
		return true;
	}

	/**
	 * Retry connecting every `retryDelayMs` until it works or
	 * `reconnectTimeoutMs` has passed, then reject with TIMEOUT_ERROR.
	 * Aborting `signal` ends the wait and rejects with CONNECTION_ERROR.
	 */
	async reconnectWithBackoff(signal?: AbortSignal): Promise<void> {
		if (this.isClosed) {
			throw connectionError("Broker session is closed");
		}

		const cancel = signal ? AbortSignal.any([this.abort.signal, signal]) : this.abort.signal;
		const { retryDelayMs, reconnectTimeoutMs } = this.options.connection;
		const deadline = Date.now() + reconnectTimeoutMs;

		for (let attempt = 1; ; attempt++) {
			if (cancel.aborted) {
				throw connectionError(this.isClosed ? "Broker session closed while reconnecting" : "Reconnect cancelled");
			}

			try {
				await this.attempt();
				break;
			} catch (err) {
				if (this.isClosed) throw err;

				const code = isAgentError(err) ? err.code : "UNKNOWN";
				this.logger.warn("Reconnect attempt %d failed [%s]: %s", attempt, code, formatError(err));

				if (Date.now() + retryDelayMs >= deadline) {
					throw timeoutError(
						`Timeout encountered while trying to reconnect to the MQTT broker (${attempt} attempts in ${reconnectTimeoutMs}ms)`,
						{ attempts: attempt, reconnectTimeoutMs }
					);
				}

				await sleep(retryDelayMs, cancel);
			}
		}

		for (const [topic, qos] of this.subscriptions) {
			const ok = await this.subscribeNow(topic, qos);
			if (!ok) {
				this.logger.warn("Could not re-subscribe to '%s' after reconnect", topic);
			}
		}
	}

	/**
	 * Unsubscribe, stop delivery and disconnect. Safe to call any number of
	 * times; the transport is closed once.
	 */
	close(): Promise<void> {
		if (!this.closing) {
			this.closing = this.doClose();
		}
		return this.closing;
	}

	private async doClose(): Promise<void> {
		this.abort.abort();
		const wasConnected = this.isConnected();

		if (wasConnected) {
			for (const topic of this.subscriptions.keys()) {
				try {
					await this.transport.unsubscribe(topic);
				} catch (err) {
					this.logger.warn("Unsubscribe from '%s' failed: %s", topic, formatError(err));
				}
			}
		}

		this.listeners.clear();
		this.subscriptions.clear();
		this.state = "disconnected";

		try {
			await this.transport.close(!wasConnected);
		} catch (err) {
			this.logger.warn("Closing the broker transport failed: %s", formatError(err));
		}

		this.logger.info("Broker session closed");
	}

	private async attempt(): Promise<void> {
		if (!this.target) {
			throw connectionError("connect() has not been called");
		}
		const { address, port } = this.target;
		const { connectTimeoutMs } = this.options.connection;

		this.state = "connecting";
		this.logger.debug("Connecting to broker %s:%d", address, port);

		let timer: NodeJS.Timeout | undefined;
		const timeout = new Promise<never>((_, reject) => {
			timer = setTimeout(
				() => reject(timeoutError(`Timeout encountered while connecting to the MQTT broker ${address}:${port}`)),
				connectTimeoutMs
			);
		});

		try {
			await Promise.race([
				this.transport.open({ address, port, clientId: this.options.clientId, connectTimeoutMs }, this.events),
				timeout
			]);
		} catch (err) {
			this.state = "disconnected";

			if (isAgentError(err, "TIMEOUT_ERROR")) {
				await this.transport.close(true).catch((closeErr: unknown) => {
					this.logger.debug("Dropping half-open connection failed: %s", formatError(closeErr));
				});
				throw err;
			}

			const what = isRefused(err) ? "refused the connection" : "could not be reached";
			throw connectionError(`Broker ${address}:${port} ${what}: ${formatError(err)}`, err);
		} finally {
			clearTimeout(timer);
		}

		if (this.isClosed) {
			// close() ran while we were connecting
			this.state = "disconnected";
			await this.transport.close(true);
			throw connectionError("Broker session closed while connecting");
		}

		this.state = "connected";
		this.logger.info("Connected to broker %s:%d as %s", address, port, this.options.clientId);
		this.dispatch("onConnect", listener => listener.onConnect());
	}

	private async subscribeNow(topic: string, qos: QoS): Promise<boolean> {
		try {
			const granted = await this.transport.subscribe(topic, qos);
			if (granted) {
				this.logger.info("Subscribed to '%s' (QoS %d)", topic, qos);
			} else {
				this.logger.warn("Broker refused the subscription to '%s'", topic);
			}
			return granted;
		} catch (err) {
			this.logger.warn("Subscribe to '%s' failed: %s", topic, formatError(err));
			return false;
		}
	}

	private handleDrop(reason: string): void {
		if (this.isClosed || this.state !== "connected") return;

		this.state = "disconnected";
		this.logger.warn("Disconnected from the broker! Reason: %s", reason);
		this.dispatch("onDisconnect", listener => listener.onDisconnect(reason));
	}

	private dispatchMessage(topic: string, payload: Buffer): void {
		if (this.isClosed) return;
		this.dispatch("onMessage", listener => listener.onMessage(topic, payload));
	}

	private dispatch(event: keyof SessionListener, call: (listener: SessionListener) => void): void {
		for (const listener of [...this.listeners]) {
			try {
				call(listener);
			} catch (err) {
				this.logger.error("Session listener failed in %s: %s", event, formatError(err));
			}
		}
	}
}
