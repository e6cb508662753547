import pLimit from "p-limit";
import type winston from "winston";

import { parseControlMessage, RECOGNIZED_COMMANDS } from "@host-telemetry/common";
import type { ControlCommand } from "@host-telemetry/common";

import type { AgentState } from "./agent-state";
import { MIN_PUBLISH_INTERVAL_S } from "./lib/config";
import { formatError, malformedMessage, unknownCommand } from "./lib/errors";
import type { TelemetryPublisher } from "./telemetry-publisher";

export type CommandOutcome =
	| "telemetry-published"
	| "interval-changed"
	| "interval-unchanged"
	| "status-published"
	| "debug-logged"
	| "unknown-command"
	| "malformed"
	| "failed";

export interface CommandProcessorOptions {
	state: AgentState;
	publisher: TelemetryPublisher;
	logger: winston.Logger;
	/** Snapshot for the debug command. */
	diagnostics: () => Record<string, unknown>;
}

/**
 * Validates and executes control-topic messages, one at a time and in
 * arrival order. Never rejects: every failure is logged and turned into an
 * outcome so the next message is still handled.
 */
export class CommandProcessor {
	private readonly queue = pLimit(1);

	constructor(private readonly opts: CommandProcessorOptions) {}

	get pending(): number {
		return this.queue.pendingCount + this.queue.activeCount;
	}

	enqueue(payload: string | Buffer): Promise<CommandOutcome> {
		return this.queue(() => this.process(payload));
	}

	async process(payload: string | Buffer): Promise<CommandOutcome> {
		const { logger } = this.opts;
		const parsed = parseControlMessage(payload);

		switch (parsed.kind) {
			case "malformed": {
				const err = malformedMessage(parsed.reason, { preview: parsed.preview, issues: parsed.issues });
				logger.warn("[%s] %s (payload: %s)", err.code, err.message, parsed.preview);
				return "malformed";
			}
			case "unrecognized": {
				const err = unknownCommand(parsed.command, RECOGNIZED_COMMANDS);
				logger.warn("[%s] %s. Currently recognized commands are: %s", err.code, err.message, RECOGNIZED_COMMANDS.join(", "));
				return "unknown-command";
			}
			case "command":
				logger.info('Processing command "%s"', parsed.command.command);
				try {
					return await this.execute(parsed.command);
				} catch (err) {
					logger.error('Command "%s" failed: %s', parsed.command.command, formatError(err));
					return "failed";
				}
		}
	}

	private async execute(command: ControlCommand): Promise<CommandOutcome> {
		const { state, publisher, logger } = this.opts;

		switch (command.command) {
			case "publishTelemetry":
				await publisher.publishTelemetry();
				return "telemetry-published";

			case "changeTelemetryInterval": {
				const change = await state.withExclusive(async () => state.changePublishInterval(command.value));
				if (change.result === "changed") {
					logger.info("Publish interval changed from %d to %d seconds", change.previous, change.current);
					return "interval-changed";
				}
				if (change.result === "too-small") {
					logger.warn(
						"Not changing the telemetry publish interval: %d is not greater than %d (current %d)",
						change.requested,
						MIN_PUBLISH_INTERVAL_S,
						change.current
					);
				} else {
					logger.debug("Publish interval already %d seconds", change.current);
				}
				return "interval-unchanged";
			}

			case "publishStatus":
				publisher.publishStatus();
				return "status-published";

			case "debug":
				logger.info("Diagnostics: %s", JSON.stringify(this.opts.diagnostics()));
				return "debug-logged";
		}
	}
}
