import type { TelemetryIdentity, TelemetryPayload } from "@host-telemetry/common";

import { formatTimestamp } from "./lib/time";

export type MetricValues = Record<string, number>;

/** Payload keys a metric may not be published under. */
export const RESERVED_FIELDS: ReadonlySet<string> = new Set([
	"macAddress",
	"ipAddress",
	"host",
	"timeStamp",
	"notes",
	"brokerAddress",
	"brokerPort"
]);

/**
 * The snapshot published on the telemetry topic.
 *
 * Created once at startup with the identity fields; metric fields are
 * overwritten in place on every sampling pass and `timeStamp` on every
 * publish attempt.
 */
export class TelemetryRecord {
	private readonly identity: Readonly<TelemetryIdentity>;
	private readonly metrics = new Map<string, number>();
	private timeStamp: string;

	constructor(identity: TelemetryIdentity, now: Date = new Date()) {
		this.identity = { ...identity };
		this.timeStamp = formatTimestamp(now);
	}

	get macAddress(): string {
		return this.identity.macAddress;
	}

	updateMetrics(values: MetricValues): void {
		for (const [field, value] of Object.entries(values)) {
			if (RESERVED_FIELDS.has(field)) {
				throw new Error(`Metric field '${field}' would overwrite an identity field`);
			}
			this.metrics.set(field, value);
		}
	}

	stamp(now: Date = new Date()): void {
		this.timeStamp = formatTimestamp(now);
	}

	metricValues(): MetricValues {
		return Object.fromEntries(this.metrics);
	}

	toPayload(): TelemetryPayload {
		const payload: TelemetryPayload = {
			macAddress: this.identity.macAddress,
			ipAddress: this.identity.ipAddress,
			host: this.identity.host,
			timeStamp: this.timeStamp,
			brokerAddress: this.identity.brokerAddress,
			brokerPort: this.identity.brokerPort
		};
		if (this.identity.notes !== undefined) {
			payload.notes = this.identity.notes;
		}
		for (const [field, value] of this.metrics) {
			payload[field] = value;
		}
		return payload;
	}

	serialize(): string {
		return JSON.stringify(this.toPayload(), null, "\t");
	}
}
