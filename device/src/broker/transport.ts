import type { QoS } from "@host-telemetry/common";

export interface BrokerTarget {
	address: string;
	port: number;
	clientId: string;
	connectTimeoutMs: number;
}

/**
 * Callbacks a transport raises after `open()` resolved.
 */
export interface TransportEvents {
	onClose(reason: string): void;
	onMessage(topic: string, payload: Buffer): void;
	onError(err: Error): void;
}

/**
 * The wire-level capability the broker session drives.
 * A transport never reconnects by itself.
 */
export interface BrokerTransport {
	/** Resolves once the broker accepted the connection, rejects if it refused or went away first. */
	open(target: BrokerTarget, events: TransportEvents): Promise<void>;
	/** Resolves true when the broker granted the subscription. */
	subscribe(topic: string, qos: QoS): Promise<boolean>;
	unsubscribe(topic: string): Promise<void>;
	publish(topic: string, payload: string, qos: QoS): Promise<void>;
	close(force: boolean): Promise<void>;
}
