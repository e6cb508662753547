import "dotenv/config";
import fs from "node:fs";
import process from "node:process";
import { Command, CommanderError } from "commander";
import { z } from "zod";

import { QosSchema } from "@host-telemetry/common";
import type { QoS } from "@host-telemetry/common";

import { configError, formatError } from "./errors";

export type LogLevel = "error" | "warn" | "info" | "http" | "verbose" | "debug" | "silly";

export interface SensorConfig {
	type: string;
	// Name of the telemetry field the value is published under
	field?: string;
	// Sensor specific source, e.g. the sysfs file for pi_cpu_temp
	path?: string;
}

export interface ConnectionSettings {
	connectTimeoutMs: number;
	// Pause before a reconnect attempt, so a flapping broker is not flooded
	quiescentMs: number;
	retryDelayMs: number;
	reconnectTimeoutMs: number;
}

export interface AgentConfig {
	brokerAddress: string;
	brokerPort: number;
	brokerQoS: QoS;
	publishTopic: string;
	controlTopic: string;
	publishInterval: number; // seconds
	notes?: string;

	logLevel: LogLevel;
	logFiles: boolean;
	paths: {
		logDir: string;
	};

	connection: ConnectionSettings;
	tickMs: number;

	sensors: SensorConfig[];
}

/* ---------- defaults ---------- */

export const DEFAULT_CONFIG_PATH = "config.json";
export const MIN_PUBLISH_INTERVAL_S = 4; // exclusive lower bound

const DEFAULT_LOG_DIR = "/var/log/host-telemetry";
const DEFAULT_LOG_LEVEL: LogLevel = "info";
const DEFAULT_TICK_MS = 1_000;
const DEFAULT_SENSORS: SensorConfig[] = [{ type: "pi_cpu_temp" }];

const DEFAULT_CONNECTION: ConnectionSettings = {
	connectTimeoutMs: 10_000,
	quiescentMs: 3_000,
	retryDelayMs: 3_000,
	reconnectTimeoutMs: 60_000
};

const LOG_LEVELS = ["error", "warn", "info", "http", "verbose", "debug", "silly"] as const;

/* ---------- schema ---------- */

const positiveMs = z.number().int().positive();

const ConfigFileSchema = z.object({
	brokerAddress: z.string().trim().min(1),
	brokerPort: z.coerce.number().int().min(1).max(65535),
	brokerQoS: z.coerce.number().pipe(QosSchema),
	publishTopic: z.string().trim().min(1),
	controlTopic: z.string().trim().min(1),
	publishInterval: z.coerce.number().int().gt(MIN_PUBLISH_INTERVAL_S),
	notes: z.string().optional(),

	logLevel: z.enum(LOG_LEVELS).optional(),
	logFiles: z.boolean().optional(),
	paths: z
		.object({
			logDir: z.string().min(1).optional()
		})
		.optional(),

	connection: z
		.object({
			connectTimeoutMs: positiveMs.optional(),
			quiescentMs: positiveMs.optional(),
			retryDelayMs: positiveMs.optional(),
			reconnectTimeoutMs: positiveMs.optional()
		})
		.optional(),
	tickMs: positiveMs.optional(),

	sensors: z
		.array(
			z.object({
				type: z.string().min(1),
				field: z.string().min(1).optional(),
				path: z.string().min(1).optional()
			})
		)
		.min(1)
		.optional()
});

type ConfigFile = z.infer<typeof ConfigFileSchema>;

/* ---------- command line ---------- */

export type CommandLine =
	| { kind: "run"; configPath: string }
	// --help, or arguments commander rejected; commander has already printed why
	| { kind: "exit"; exitCode: number };

export function parseCommandLine(argv: readonly string[] = process.argv): CommandLine {
	const program = new Command();

	program
		.name("host-telemetry-agent")
		.argument("[configFile]", "Path to configuration file")
		.option("-c, --config <path>", "Path to configuration file (overrides the positional argument)")
		.allowUnknownOption(true)
		.allowExcessArguments(true)
		.exitOverride();

	try {
		program.parse([...argv]);
	} catch (err) {
		if (err instanceof CommanderError) {
			return { kind: "exit", exitCode: err.exitCode };
		}
		throw err;
	}

	const opts = program.opts<{ config?: string }>();
	const positional = program.args[0];
	const configPath = opts.config ?? positional ?? process.env.AGENT_CONFIG ?? DEFAULT_CONFIG_PATH;
	return { kind: "run", configPath };
}

/* ---------- validation ---------- */

function envLogLevel(): LogLevel | undefined {
	const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
	if (!raw) return undefined;

	const res = z.enum(LOG_LEVELS).safeParse(raw);
	if (!res.success) {
		throw configError(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(", ")}`, { value: raw });
	}
	return res.data;
}

function withDefaults(file: ConfigFile): AgentConfig {
	return {
		brokerAddress: file.brokerAddress,
		brokerPort: file.brokerPort,
		brokerQoS: file.brokerQoS,
		publishTopic: file.publishTopic,
		controlTopic: file.controlTopic,
		publishInterval: file.publishInterval,
		notes: file.notes,

		logLevel: envLogLevel() ?? file.logLevel ?? DEFAULT_LOG_LEVEL,
		logFiles: file.logFiles ?? true,
		paths: {
			logDir: process.env.LOG_DIR?.trim() || (file.paths?.logDir ?? DEFAULT_LOG_DIR)
		},

		connection: {
			connectTimeoutMs: file.connection?.connectTimeoutMs ?? DEFAULT_CONNECTION.connectTimeoutMs,
			quiescentMs: file.connection?.quiescentMs ?? DEFAULT_CONNECTION.quiescentMs,
			retryDelayMs: file.connection?.retryDelayMs ?? DEFAULT_CONNECTION.retryDelayMs,
			reconnectTimeoutMs: file.connection?.reconnectTimeoutMs ?? DEFAULT_CONNECTION.reconnectTimeoutMs
		},
		tickMs: file.tickMs ?? DEFAULT_TICK_MS,

		sensors: (file.sensors ?? DEFAULT_SENSORS).map(s => ({ ...s }))
	};
}

/**
 * Validate an already-decoded configuration document and apply defaults.
 * Throws a CONFIG_ERROR listing the first few offending fields.
 */
export function parseConfig(raw: unknown): AgentConfig {
	const res = ConfigFileSchema.safeParse(raw);
	if (!res.success) {
		const issues = res.error.issues
			.slice(0, 5)
			.map(i => `${i.path.map(String).join(".") || "<root>"}: ${i.message}`)
			.join("; ");
		throw configError(`Invalid configuration: ${issues}`, res.error.issues);
	}

	return withDefaults(res.data);
}

/* ---------- public API ---------- */

/**
 * Read, validate and complete the configuration file.
 */
export function loadConfig(configPath: string): AgentConfig & { configPath: string } {
	let text: string;
	try {
		text = fs.readFileSync(configPath, "utf8");
	} catch (err) {
		throw configError(`Cannot read configuration file '${configPath}': ${formatError(err)}`, { configPath }, err);
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(text) as unknown;
	} catch (err) {
		throw configError(`Configuration file '${configPath}' is not valid JSON: ${formatError(err)}`, { configPath }, err);
	}

	return { ...parseConfig(parsed), configPath };
}
