export type QoS = 0 | 1 | 2;

export interface TelemetryIdentity {
	macAddress: string;
	host: string;
	ipAddress: string;

	brokerAddress: string;
	brokerPort: number;

	notes?: string;
}

/**
 * Message published on the telemetry topic.
 * Metric fields (cpuTemp, loadAverage, ...) sit next to the identity fields.
 */
export interface TelemetryPayload extends TelemetryIdentity {
	timeStamp: string; // Ex. 2026-01-23 12:34:56 (local time)
	[metric: string]: string | number | undefined;
}

export type CommandName = "publishTelemetry" | "changeTelemetryInterval" | "publishStatus" | "debug";
