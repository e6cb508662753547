import os from "node:os";

import type { SensorConfig } from "../lib/config";
import type { SensorModule } from "./types";

const LoadAverageSensor: SensorModule = {
	type: "load_average",

	defaults(config: SensorConfig): void {
		if (!config.field) {
			config.field = "loadAverage";
		}
	},

	validate(config: SensorConfig): void {
		if (config.path !== undefined) {
			throw new Error("load_average: path is not supported");
		}
	},

	// 1-minute load average; always 0 on Windows
	async read(): Promise<number> {
		const [oneMinute] = os.loadavg();
		return Math.round(oneMinute * 100) / 100;
	}
};

export default LoadAverageSensor;
