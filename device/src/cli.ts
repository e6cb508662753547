import type winston from "winston";

import { Agent } from "./agent";
import { MqttTransport } from "./broker/mqtt-transport";
import type { BrokerTransport } from "./broker/transport";
import { loadConfig, parseCommandLine } from "./lib/config";
import type { AgentConfig } from "./lib/config";
import { asAgentError } from "./lib/errors";
import type { ErrorCode } from "./lib/errors";
import { detectIdentity } from "./lib/identity";
import type { HostIdentity } from "./lib/identity";
import { createLogger } from "./lib/log";
import { SensorTelemetryProvider } from "./telemetry-provider";
import type { TelemetryProvider } from "./telemetry-provider";

export const SERVICE_NAME = "host-telemetry-agent";

export const EXIT_CODES = {
	OK: 0,
	FAILURE: 1,
	CONFIG_ERROR: 2,
	BROKER_UNAVAILABLE: 3
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/** Seams for tests; production uses MQTT.js, the configured sensors and the real interfaces. */
export interface CliDependencies {
	createTransport?: () => BrokerTransport;
	createProvider?: (config: AgentConfig, logger: winston.Logger) => TelemetryProvider;
	createLogger?: (config: AgentConfig) => winston.Logger;
	identity?: HostIdentity;
	// Registers stop handlers; returns a function that removes them
	onSignals?: (stop: (signal: string) => void) => () => void;
}

export function exitCodeFor(code: ErrorCode): ExitCode {
	switch (code) {
		case "CONFIG_ERROR":
			return EXIT_CODES.CONFIG_ERROR;
		case "CONNECTION_ERROR":
		case "TIMEOUT_ERROR":
			return EXIT_CODES.BROKER_UNAVAILABLE;
		default:
			return EXIT_CODES.FAILURE;
	}
}

function installSignalHandlers(stop: (signal: string) => void): () => void {
	const onSigint = () => stop("SIGINT"); // Ctrl+C
	const onSigterm = () => stop("SIGTERM"); // systemd stop

	process.on("SIGINT", onSigint);
	process.on("SIGTERM", onSigterm);

	return () => {
		process.off("SIGINT", onSigint);
		process.off("SIGTERM", onSigterm);
	};
}

function defaultLogger(config: AgentConfig): winston.Logger {
	return createLogger({
		logDir: config.paths.logDir,
		serviceName: SERVICE_NAME,
		level: config.logLevel,
		files: config.logFiles
	});
}

/**
 * Load the configuration, run the agent until it stops and map the outcome to
 * a process exit code. The broker session is closed on every path once the
 * agent exists.
 */
export async function runCli(argv: readonly string[] = process.argv, deps: CliDependencies = {}): Promise<ExitCode> {
	const commandLine = parseCommandLine(argv);
	if (commandLine.kind === "exit") {
		return commandLine.exitCode === 0 ? EXIT_CODES.OK : EXIT_CODES.CONFIG_ERROR;
	}

	let config: AgentConfig & { configPath: string };
	try {
		config = loadConfig(commandLine.configPath);
	} catch (err) {
		const e = asAgentError(err);
		console.error(`[${e.code}] ${e.message}`);
		return exitCodeFor(e.code);
	}

	const logger = (deps.createLogger ?? defaultLogger)(config);
	logger.info("Using %s as the config file", config.configPath);

	let agent: Agent;
	try {
		const identity = deps.identity ?? (await detectIdentity());
		const provider = (deps.createProvider ?? ((c, l) => new SensorTelemetryProvider(c.sensors, l)))(config, logger);
		agent = new Agent({
			config,
			logger,
			transport: (deps.createTransport ?? (() => new MqttTransport()))(),
			provider,
			identity
		});
	} catch (err) {
		const e = asAgentError(err);
		logger.error("[%s] %s", e.code, e.message);
		return exitCodeFor(e.code);
	}

	const removeSignalHandlers = (deps.onSignals ?? installSignalHandlers)(signal => agent.stop(signal));

	try {
		await agent.start();
		const outcome = await agent.run();
		return outcome === "connection-lost" ? EXIT_CODES.BROKER_UNAVAILABLE : EXIT_CODES.OK;
	} catch (err) {
		const e = asAgentError(err);
		logger.error("[%s] %s", e.code, e.message);
		return exitCodeFor(e.code);
	} finally {
		removeSignalHandlers();
		await agent.shutdown();
		logger.info("Telemetry agent exiting");
	}
}
