import type { SensorConfig } from "../lib/config";
import type { ResolvedSensorConfig, SensorModule } from "./types";
import LoadAverageSensor from "./load-average";
import MemoryUsageSensor from "./memory-usage";
import PiCpuTempSensor from "./pi-cpu-temp";
import RandomTempSensor from "./random-temp";

const registry = new Map<string, SensorModule>([
	[PiCpuTempSensor.type, PiCpuTempSensor],
	[RandomTempSensor.type, RandomTempSensor],
	[LoadAverageSensor.type, LoadAverageSensor],
	[MemoryUsageSensor.type, MemoryUsageSensor]
]);

/**
 * Resolve a sensor module by sensor type.
 * Throws if the type is unsupported.
 */
export function getSensorModule(type: string): SensorModule {
	const mod = registry.get(type);
	if (!mod) {
		throw new Error(`Unsupported sensor type '${type}' (known: ${[...registry.keys()].join(", ")})`);
	}
	return mod;
}

/**
 * Apply sensor defaults and validate. Returns a copy; the input config is left untouched.
 */
export function resolveSensor(config: SensorConfig): { module: SensorModule; config: ResolvedSensorConfig } {
	const module = getSensorModule(config.type);
	const copy: SensorConfig = { ...config };

	module.defaults?.(copy);
	module.validate(copy);

	const field = copy.field;
	if (!field) {
		throw new Error(`Sensor '${copy.type}' did not define a field after defaults()`);
	}

	return { module, config: { ...copy, field } };
}

export type { ResolvedSensorConfig, SensorModule } from "./types";
