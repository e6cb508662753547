import type winston from "winston";

import type { QoS } from "@host-telemetry/common";

import type { AgentState } from "./agent-state";
import type { BrokerSession } from "./broker/broker-session";
import { epochSeconds } from "./lib/time";
import type { TelemetryProvider } from "./telemetry-provider";
import type { TelemetryRecord } from "./telemetry-record";

export interface TelemetryPublisherOptions {
	session: BrokerSession;
	provider: TelemetryProvider;
	record: TelemetryRecord;
	state: AgentState;
	topic: string;
	qos: QoS;
	logger: winston.Logger;
}

/**
 * The two publish paths. Sampling paths run inside the state's exclusive
 * section and move `lastPublish`; a status publish does neither.
 */
export class TelemetryPublisher {
	constructor(private readonly opts: TelemetryPublisherOptions) {}

	/** Sample and publish now (publishTelemetry command). */
	publishTelemetry(): Promise<void> {
		return this.opts.state.withExclusive(() => this.sampleAndPublish(new Date()));
	}

	/** Sample and publish if the interval has elapsed. Resolves true if it published. */
	publishIfDue(): Promise<boolean> {
		return this.opts.state.withExclusive(async () => {
			const now = new Date();
			if (!this.opts.state.isPublishDue(epochSeconds(now.getTime()))) {
				return false;
			}
			await this.sampleAndPublish(now);
			return true;
		});
	}

	/** Re-publish the held record without sampling (publishStatus command). */
	publishStatus(): boolean {
		return this.publishRecord(new Date());
	}

	private async sampleAndPublish(now: Date): Promise<void> {
		const values = await this.opts.provider.sample();
		this.opts.record.updateMetrics(values);
		this.publishRecord(now);
		this.opts.state.markPublished(epochSeconds(now.getTime()));
	}

	private publishRecord(now: Date): boolean {
		const { record, session, topic, qos, logger } = this.opts;

		record.stamp(now);
		const payload = record.serialize();
		const sent = session.publish(topic, payload, qos);
		if (sent) {
			logger.info("Published telemetry to '%s'", topic);
			logger.debug("Payload:\n%s", payload);
		}
		return sent;
	}
}
