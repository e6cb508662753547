import { CommandEnvelopeSchema, ControlCommandSchema } from "./schema";
import type { ControlCommand } from "./schema";
import type { CommandName } from "./telemetry";

export const RECOGNIZED_COMMANDS: readonly CommandName[] = [
	"publishTelemetry",
	"changeTelemetryInterval",
	"publishStatus",
	"debug"
];

export type ControlMessageIssue = {
	path: string;
	message: string;
};

export type ParsedControlMessage =
	| { kind: "command"; command: ControlCommand }
	| { kind: "unrecognized"; command: string }
	| { kind: "malformed"; reason: string; preview: string; issues: ControlMessageIssue[] };

type ZodIssueLike = {
	path: readonly (string | number)[];
	message: string;
};

function previewBody(body: string, maxLen = 256): string {
	const trimmed = body.trim();
	if (trimmed.length <= maxLen) return trimmed;
	return trimmed.slice(0, maxLen) + "…";
}

function parseJsonSafe(text: string): unknown | undefined {
	try {
		return JSON.parse(text) as unknown;
	} catch {
		return undefined;
	}
}

function toIssues(issues: readonly ZodIssueLike[]): ControlMessageIssue[] {
	return issues.map(i => ({
		path: i.path.map(String).join(".") || "<root>",
		message: i.message
	}));
}

function isRecognized(command: string): command is CommandName {
	return RECOGNIZED_COMMANDS.some(known => known === command);
}

/**
 * Decode a raw control-topic payload.
 *
 * Never throws: bad input comes back as the `malformed` variant, a well-formed
 * message naming a command we do not know comes back as `unrecognized`.
 */
export function parseControlMessage(payload: string | Buffer): ParsedControlMessage {
	const text = typeof payload === "string" ? payload : payload.toString("utf8");
	const preview = previewBody(text);

	const parsed = parseJsonSafe(text);
	if (parsed === undefined) {
		return { kind: "malformed", reason: "Payload is not valid JSON", preview, issues: [] };
	}

	const envelope = CommandEnvelopeSchema.safeParse(parsed);
	if (!envelope.success) {
		return {
			kind: "malformed",
			reason: "Message did not contain a command property",
			preview,
			issues: toIssues(envelope.error.issues)
		};
	}

	if (!isRecognized(envelope.data.command)) {
		return { kind: "unrecognized", command: envelope.data.command };
	}

	const res = ControlCommandSchema.safeParse(parsed);
	if (!res.success) {
		const fields = toIssues(res.error.issues)
			.map(i => `${i.path}: ${i.message}`)
			.join("; ");
		return {
			kind: "malformed",
			reason: `Invalid fields for command '${envelope.data.command}': ${fields}`,
			preview,
			issues: toIssues(res.error.issues)
		};
	}

	return { kind: "command", command: res.data };
}
