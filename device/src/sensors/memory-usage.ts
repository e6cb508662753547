import os from "node:os";

import type { SensorConfig } from "../lib/config";
import type { SensorModule } from "./types";

const MemoryUsageSensor: SensorModule = {
	type: "memory_usage",

	defaults(config: SensorConfig): void {
		if (!config.field) {
			config.field = "memoryUsedPercent";
		}
	},

	validate(config: SensorConfig): void {
		if (config.path !== undefined) {
			throw new Error("memory_usage: path is not supported");
		}
	},

	async read(): Promise<number> {
		const total = os.totalmem();
		if (total <= 0) {
			throw new Error("memory_usage: total memory reported as 0");
		}
		const used = ((total - os.freemem()) / total) * 100;
		return Math.round(used * 10) / 10;
	}
};

export default MemoryUsageSensor;
