import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { isAgentError } from "../lib/errors";
import { SensorTelemetryProvider } from "../telemetry-provider";
import { createTestLogger } from "./test-utils";

describe("SensorTelemetryProvider", () => {
	let dir: string;
	let tempFile: string;

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "provider-"));
		tempFile = path.join(dir, "temp");
		fs.writeFileSync(tempFile, "42000\n");
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	it("samples every configured sensor under its field", async () => {
		const { logger } = createTestLogger();
		const provider = new SensorTelemetryProvider(
			[{ type: "pi_cpu_temp", path: tempFile }, { type: "memory_usage" }],
			logger
		);

		expect(provider.fields).toEqual(["cpuTemp", "memoryUsedPercent"]);

		const values = await provider.sample();
		expect(values.cpuTemp).toBe(42);
		expect(typeof values.memoryUsedPercent).toBe("number");
	});

	it("leaves out a failing sensor and logs a SENSOR_ERROR", async () => {
		const { logger, lines } = createTestLogger();
		const missing = path.join(dir, "missing");
		const provider = new SensorTelemetryProvider(
			[
				{ type: "pi_cpu_temp", path: missing },
				{ type: "pi_cpu_temp", path: tempFile, field: "boardTemp" }
			],
			logger
		);

		const values = await provider.sample();

		expect(values).toEqual({ boardTemp: 42 });
		expect(lines("error")).toHaveLength(1);
		expect(lines("error")[0].startsWith("[SENSOR_ERROR] Sensor 'pi_cpu_temp' (cpuTemp) read failed:")).toBe(true);
	});

	it("rejects two sensors publishing under one field", () => {
		const { logger } = createTestLogger();
		const create = () => new SensorTelemetryProvider([{ type: "pi_cpu_temp" }, { type: "random_temp", field: "cpuTemp" }], logger);

		expect(create).toThrow("Two sensors publish under the same field 'cpuTemp'");
	});

	it("rejects a field that would overwrite an identity field", () => {
		const { logger } = createTestLogger();
		expect(() => new SensorTelemetryProvider([{ type: "load_average", field: "host" }], logger)).toThrow(
			"Sensor 'load_average' cannot publish under reserved field 'host'"
		);
	});

	it("reports unknown sensor types as configuration errors", () => {
		const { logger } = createTestLogger();
		try {
			new SensorTelemetryProvider([{ type: "thermocouple" }], logger);
			expect.unreachable("constructor should throw");
		} catch (err) {
			expect(isAgentError(err, "CONFIG_ERROR")).toBe(true);
		}
	});
});
