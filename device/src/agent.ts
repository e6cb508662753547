import type winston from "winston";

import { AgentState } from "./agent-state";
import { BrokerSession } from "./broker/broker-session";
import type { SessionListener } from "./broker/broker-session";
import type { BrokerTransport } from "./broker/transport";
import { CommandProcessor } from "./command-processor";
import type { AgentConfig } from "./lib/config";
import { formatError, isAgentError } from "./lib/errors";
import type { HostIdentity } from "./lib/identity";
import { formatTimestamp, sleep } from "./lib/time";
import type { TelemetryProvider } from "./telemetry-provider";
import { TelemetryPublisher } from "./telemetry-publisher";
import { TelemetryRecord } from "./telemetry-record";

export type AgentOutcome = "stopped" | "connection-lost";

export interface AgentOptions {
	config: AgentConfig;
	logger: winston.Logger;
	transport: BrokerTransport;
	provider: TelemetryProvider;
	identity: HostIdentity;
}

/**
 * Wires the broker session, the command processor and the publish cadence
 * together and runs the supervising loop.
 *
 * Lifecycle: `start()` once, then `run()` until it resolves, then
 * `shutdown()` (also safe after a failed start). `stop()` may be called at any
 * time, e.g. from a signal handler.
 */
export class Agent implements SessionListener {
	readonly state: AgentState;
	readonly record: TelemetryRecord;
	readonly session: BrokerSession;
	readonly publisher: TelemetryPublisher;
	readonly commands: CommandProcessor;
	readonly identity: HostIdentity;

	private readonly config: AgentConfig;
	private readonly logger: winston.Logger;
	private readonly stopController = new AbortController();
	private shutdownPromise: Promise<void> | null = null;

	constructor(opts: AgentOptions) {
		this.config = opts.config;
		this.logger = opts.logger;
		this.identity = opts.identity;

		this.state = new AgentState(this.config.publishInterval);
		this.record = new TelemetryRecord({
			macAddress: this.identity.macAddress,
			host: this.identity.host,
			ipAddress: this.identity.ipAddress,
			brokerAddress: this.config.brokerAddress,
			brokerPort: this.config.brokerPort,
			notes: this.config.notes
		});

		this.session = new BrokerSession(
			opts.transport,
			{ clientId: this.identity.macAddress, connection: this.config.connection },
			this.logger
		);

		this.publisher = new TelemetryPublisher({
			session: this.session,
			provider: opts.provider,
			record: this.record,
			state: this.state,
			topic: this.config.publishTopic,
			qos: this.config.brokerQoS,
			logger: this.logger
		});

		this.commands = new CommandProcessor({
			state: this.state,
			publisher: this.publisher,
			logger: this.logger,
			diagnostics: () => this.diagnostics()
		});

		this.session.addListener(this);
	}

	get stopRequested(): boolean {
		return this.stopController.signal.aborted;
	}

	/**
	 * Connect and subscribe to the control topic. Connection failures
	 * propagate (CONNECTION_ERROR / TIMEOUT_ERROR); a refused subscription is
	 * only logged.
	 */
	async start(): Promise<void> {
		const c = this.config;
		this.logger.info("Hostname: %s", this.identity.host);
		this.logger.info("IP address: %s", this.identity.ipAddress);
		this.logger.info("MAC address (client id): %s", this.identity.macAddress);
		this.logger.info("Current time: %s", formatTimestamp());
		this.logger.info("Using broker %s:%d", c.brokerAddress, c.brokerPort);
		this.logger.info('Publishing to the telemetry topic: "%s"', c.publishTopic);
		this.logger.info('Subscribing to the control topic: "%s"', c.controlTopic);
		this.logger.info("Publishing and subscribing using QoS: %d", c.brokerQoS);
		this.logger.info("Waiting %d seconds between publishes", c.publishInterval);

		await this.session.connect(c.brokerAddress, c.brokerPort);

		const subscribed = await this.session.subscribe(c.controlTopic, c.brokerQoS);
		if (subscribed) {
			this.logger.info('Successfully subscribed to the control topic: "%s"', c.controlTopic);
		} else {
			this.logger.warn('Subscription to the control topic "%s" did not succeed; commands will not be received until a reconnect', c.controlTopic);
		}
	}

	/**
	 * The supervising loop: reconnect when needed, publish when due, idle one
	 * tick. Resolves "connection-lost" when reconnecting timed out.
	 */
	async run(): Promise<AgentOutcome> {
		const signal = this.stopController.signal;
		const { quiescentMs } = this.config.connection;

		while (!signal.aborted) {
			if (!this.session.isConnected()) {
				await sleep(quiescentMs, signal);
				if (signal.aborted) break;

				try {
					await this.session.reconnectWithBackoff(signal);
				} catch (err) {
					// a stop during the reconnect window is a normal shutdown
					if (signal.aborted || this.session.isClosed) break;
					if (isAgentError(err, "TIMEOUT_ERROR")) {
						this.logger.error("[%s] %s", err.code, err.message);
						return "connection-lost";
					}
					this.logger.error("Reconnect failed: %s", formatError(err));
					continue;
				}
			}

			try {
				await this.publisher.publishIfDue();
			} catch (err) {
				this.logger.error("Scheduled publish failed: %s", formatError(err));
			}

			await sleep(this.config.tickMs, signal);
		}

		return "stopped";
	}

	stop(reason: string): void {
		if (this.stopRequested) return;
		this.logger.info("Stopping agent (%s)", reason);
		this.stopController.abort();
	}

	/** Closes the broker session; repeated calls share the first close. */
	shutdown(): Promise<void> {
		if (!this.shutdownPromise) {
			this.stop("shutdown");
			this.shutdownPromise = this.session.close();
		}
		return this.shutdownPromise;
	}

	onConnect(): void {
		this.logger.debug("Broker session connected");
	}

	onDisconnect(reason: string): void {
		this.logger.info("Lost the broker connection (%s); reconnecting after %dms", reason, this.config.connection.quiescentMs);
	}

	onMessage(topic: string, payload: Buffer): void {
		if (topic !== this.config.controlTopic) {
			this.logger.debug("Ignoring message on '%s'", topic);
			return;
		}
		this.commands.enqueue(payload).catch((err: unknown) => {
			this.logger.error("Command processing failed: %s", formatError(err));
		});
	}

	diagnostics(): Record<string, unknown> {
		return {
			connectionState: this.session.connectionState,
			subscriptions: Object.fromEntries(this.session.subscribedTopics),
			publishTopic: this.config.publishTopic,
			publishInterval: this.state.publishInterval,
			lastPublish: this.state.lastPublish,
			pendingCommands: this.commands.pending,
			telemetry: this.record.toPayload()
		};
	}
}
