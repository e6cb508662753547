// Message shapes (used by the device and by consumers of the telemetry topic)
export type { CommandName, QoS, TelemetryIdentity, TelemetryPayload } from "./telemetry";

// Validation schemas
export {
	ChangeTelemetryIntervalCommandSchema,
	CommandEnvelopeSchema,
	ControlCommandSchema,
	DebugCommandSchema,
	MAC_ADDRESS_PATTERN,
	PublishStatusCommandSchema,
	PublishTelemetryCommandSchema,
	QosSchema,
	TelemetryPayloadSchema,
	TIMESTAMP_PATTERN
} from "./schema";
export type { ControlCommand, TelemetryPayloadValidated } from "./schema";

// Control topic decoding
export { parseControlMessage, RECOGNIZED_COMMANDS } from "./control";
export type { ControlMessageIssue, ParsedControlMessage } from "./control";
