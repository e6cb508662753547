export type ErrorCode =
	| "CONFIG_ERROR"
	| "CONNECTION_ERROR"
	| "TIMEOUT_ERROR"
	| "MALFORMED_MESSAGE"
	| "UNKNOWN_COMMAND"
	| "SENSOR_ERROR"
	| "INTERNAL_ERROR";

export class AgentError extends Error {
	public readonly code: ErrorCode;
	public readonly details?: unknown;

	constructor(params: { code: ErrorCode; message: string; details?: unknown; cause?: unknown }) {
		super(params.message, params.cause !== undefined ? { cause: params.cause } : undefined);
		this.name = "AgentError";
		this.code = params.code;
		this.details = params.details;
	}
}

export function isAgentError(err: unknown, code?: ErrorCode): err is AgentError {
	return err instanceof AgentError && (code === undefined || err.code === code);
}

export function asAgentError(err: unknown): AgentError {
	if (err instanceof AgentError) {
		return err;
	}

	if (err instanceof Error) {
		return new AgentError({
			code: "INTERNAL_ERROR",
			message: err.message,
			cause: err
		});
	}

	return new AgentError({
		code: "INTERNAL_ERROR",
		message: "Unknown error",
		details: err
	});
}

/**
 * Format an unknown error value into a string message.
 */
export function formatError(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

export function configError(message: string, details?: unknown, cause?: unknown): AgentError {
	return new AgentError({
		code: "CONFIG_ERROR",
		message,
		details,
		cause
	});
}

export function connectionError(message: string, cause?: unknown): AgentError {
	return new AgentError({
		code: "CONNECTION_ERROR",
		message,
		cause
	});
}

export function timeoutError(message: string, details?: unknown): AgentError {
	return new AgentError({
		code: "TIMEOUT_ERROR",
		message,
		details
	});
}

export function malformedMessage(message: string, details?: unknown): AgentError {
	return new AgentError({
		code: "MALFORMED_MESSAGE",
		message,
		details
	});
}

export function unknownCommand(command: string, recognized: readonly string[]): AgentError {
	return new AgentError({
		code: "UNKNOWN_COMMAND",
		message: `The command "${command}" is not recognized`,
		details: { command, recognized }
	});
}

export function sensorError(message: string, cause?: unknown): AgentError {
	return new AgentError({
		code: "SENSOR_ERROR",
		message,
		cause
	});
}
