import type winston from "winston";

import type { SensorConfig } from "./lib/config";
import { configError, formatError, sensorError } from "./lib/errors";
import { resolveSensor } from "./sensors";
import type { ResolvedSensorConfig, SensorModule } from "./sensors";
import { RESERVED_FIELDS } from "./telemetry-record";
import type { MetricValues } from "./telemetry-record";

/**
 * Produces current values for every tracked metric on demand.
 */
export interface TelemetryProvider {
	readonly fields: readonly string[];
	sample(): Promise<MetricValues>;
}

interface ActiveSensor {
	module: SensorModule;
	config: ResolvedSensorConfig;
}

/**
 * TelemetryProvider backed by the configured sensor modules.
 * A sensor that fails to read is logged and left out of the sample;
 * the others are still returned.
 */
export class SensorTelemetryProvider implements TelemetryProvider {
	private readonly sensors: ActiveSensor[];

	constructor(
		configs: readonly SensorConfig[],
		private readonly logger: winston.Logger
	) {
		this.sensors = configs.map(c => {
			try {
				return resolveSensor(c);
			} catch (err) {
				throw configError(`Invalid sensor configuration: ${formatError(err)}`, c, err);
			}
		});

		const seen = new Set<string>();
		for (const { config } of this.sensors) {
			if (RESERVED_FIELDS.has(config.field)) {
				throw configError(`Sensor '${config.type}' cannot publish under reserved field '${config.field}'`);
			}
			if (seen.has(config.field)) {
				throw configError(`Two sensors publish under the same field '${config.field}'`);
			}
			seen.add(config.field);
		}
	}

	get fields(): readonly string[] {
		return this.sensors.map(s => s.config.field);
	}

	async sample(): Promise<MetricValues> {
		const results = await Promise.allSettled(this.sensors.map(s => s.module.read(s.config)));

		const values: MetricValues = {};
		results.forEach((res, idx) => {
			const { config } = this.sensors[idx];
			if (res.status === "fulfilled") {
				values[config.field] = res.value;
				return;
			}

			const err = sensorError(`Sensor '${config.type}' (${config.field}) read failed: ${formatError(res.reason)}`, res.reason);
			this.logger.error("[%s] %s", err.code, err.message);
		});

		this.logger.debug("Sampled %d/%d sensors: %s", Object.keys(values).length, this.sensors.length, JSON.stringify(values));
		return values;
	}
}
