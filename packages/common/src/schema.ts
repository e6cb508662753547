import { z } from "zod";

export const QosSchema = z.union([z.literal(0), z.literal(1), z.literal(2)]);

export const MAC_ADDRESS_PATTERN = /^([0-9A-F]{2}:){5}[0-9A-F]{2}$/;
export const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/;

export const TelemetryPayloadSchema = z
	.object({
		macAddress: z.string().regex(MAC_ADDRESS_PATTERN),
		host: z.string().min(1),
		ipAddress: z.string().ip({ version: "v4" }),
		brokerAddress: z.string().min(1),
		brokerPort: z.number().int().min(1).max(65535),
		timeStamp: z.string().regex(TIMESTAMP_PATTERN),
		notes: z.string().optional()
	})
	// metric fields
	.catchall(z.union([z.number(), z.string()]));

export type TelemetryPayloadValidated = z.infer<typeof TelemetryPayloadSchema>;

/* ---------- control commands ---------- */

export const PublishTelemetryCommandSchema = z.object({
	command: z.literal("publishTelemetry")
});

export const ChangeTelemetryIntervalCommandSchema = z.object({
	command: z.literal("changeTelemetryInterval"),
	value: z.number().int()
});

export const PublishStatusCommandSchema = z.object({
	command: z.literal("publishStatus")
});

export const DebugCommandSchema = z.object({
	command: z.literal("debug")
});

export const ControlCommandSchema = z.discriminatedUnion("command", [
	PublishTelemetryCommandSchema,
	ChangeTelemetryIntervalCommandSchema,
	PublishStatusCommandSchema,
	DebugCommandSchema
]);

export type ControlCommand = z.infer<typeof ControlCommandSchema>;

/** Shape every control message must have before the command name is looked at. */
export const CommandEnvelopeSchema = z.object({ command: z.string() }).passthrough();
