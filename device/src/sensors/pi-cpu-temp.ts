import fs from "node:fs/promises";

import type { SensorConfig } from "../lib/config";
import type { SensorModule } from "./types";

// Default Linux sysfs path for CPU temperature on Raspberry Pi (and most Linux boards).
// Value is typically an integer in millidegrees Celsius, e.g. "45321\n".
export const DEFAULT_SYSFS_TEMP_PATH = "/sys/class/thermal/thermal_zone0/temp";

async function readCpuTempC(sysfsPath: string): Promise<number> {
	const raw = (await fs.readFile(sysfsPath, "utf8")).trim();
	const milli = Number(raw);
	if (raw === "" || !Number.isFinite(milli)) {
		throw new Error(`Invalid CPU temperature value '${raw}' from ${sysfsPath}`);
	}
	// Convert millidegrees Celsius -> Celsius
	return milli / 1000;
}

const PiCpuTempSensor: SensorModule = {
	type: "pi_cpu_temp",

	defaults(config: SensorConfig): void {
		if (!config.field) {
			config.field = "cpuTemp";
		}
		if (!config.path) {
			config.path = DEFAULT_SYSFS_TEMP_PATH;
		}
	},

	validate(config: SensorConfig): void {
		if (config.path !== undefined && !config.path.startsWith("/")) {
			throw new Error("pi_cpu_temp: path must be an absolute sysfs path");
		}
	},

	async read(config: SensorConfig): Promise<number> {
		const tempC = await readCpuTempC(config.path ?? DEFAULT_SYSFS_TEMP_PATH);
		return Math.round(tempC * 100) / 100;
	}
};

export default PiCpuTempSensor;
