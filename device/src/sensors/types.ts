import type { SensorConfig } from "../lib/config";

/**
 * SensorModule defines the contract that all sensor implementations must follow.
 * - type: unique sensor type identifier used in config.json
 * - defaults: optional hook to apply sensor-specific default values
 * - validate: validates sensor-specific configuration
 * - read: reads a single value (one-shot)
 */
export interface SensorModule {
	readonly type: string;

	/**
	 * Apply sensor-specific default values (optional), e.g. the telemetry field name.
	 */
	defaults?(config: SensorConfig): void;

	/**
	 * Validate sensor-specific configuration.
	 * Should throw an Error on invalid configuration.
	 */
	validate(config: SensorConfig): void;

	read(config: SensorConfig): Promise<number>;
}

/** Sensor config after defaults() ran: every sensor publishes under a field. */
export type ResolvedSensorConfig = SensorConfig & { field: string };
