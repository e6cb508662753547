import type { SensorConfig } from "../lib/config";
import type { SensorModule } from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;

function nowPhase(): number {
	const now = Date.now();
	return (now % DAY_MS) / DAY_MS; // 0..1
}

function sinusoidalTemp(base: number, amplitude: number): number {
	// phase 0 = midnight, peak at ~14:00
	const phaseShift = -0.25;
	const phase = 2 * Math.PI * (nowPhase() + phaseShift);
	return base + amplitude * Math.sin(phase);
}

function jitter(max: number): number {
	return (Math.random() * 2 - 1) * max;
}

/**
 * Simulated temperature for hosts without a thermal zone (dev machines, containers).
 */
const RandomTempSensor: SensorModule = {
	type: "random_temp",

	defaults(config: SensorConfig): void {
		if (!config.field) {
			config.field = "simulatedTemp";
		}
	},

	validate(config: SensorConfig): void {
		if (config.path !== undefined) {
			throw new Error("random_temp: path is not supported");
		}
	},

	async read(): Promise<number> {
		// a warm CPU idling around 45C, daily swing ~3C
		const base = 45.0;
		const amplitude = 3.0;

		const temp = sinusoidalTemp(base, amplitude) + jitter(0.1);
		return Math.round(temp * 100) / 100;
	}
};

export default RandomTempSensor;
