// Decoded record shape (used by the receiver and any other consumer)
export type {
    Activity,
    CanEntry,
    DataMode,
    Device,
    DeviceIdentifier,
    Envelope,
    EventField,
    GpsFix,
    GpsFixFlag,
    GsmInfo,
    GsmStatusFlag,
    MessageType,
    Network,
    ObdII,
    ObdPid,
    SensorReading,
    SimInfo,
    TelemetryEvent,
    TelemetryRecord,
    Transmission
} from "./telemetry";
export { ACTIVITIES, DATA_MODES, GPS_FIX_FLAGS, GSM_STATUS_FLAGS, MESSAGE_TYPES, TRANSMISSIONS } from "./telemetry";

export type { FieldValue, JsonScalar } from "./values";
export { fieldValueToJson, formatFieldValue, toFieldValue } from "./values";

// Two-phase decode
export type { EnvelopeDecision } from "./envelope";
export { classify, classifyDocument, isDecodable, SUPPORTED_MESSAGE_TYPE, SUPPORTED_MESSAGE_VERSION } from "./envelope";
export type { DecodeResult } from "./decoder";
export { decode, decodeDocument } from "./decoder";
export type { ProcessedMessage, ProcessStatus } from "./pipeline";
export { processMessage } from "./pipeline";
export { encodeRecord } from "./encoder";

export type { ParsedDocument, RawPayload } from "./payload";
export { parseDocument, payloadToText, previewPayload } from "./payload";
export type { DecodeErrorCode, ValidationIssue } from "./errors";
export { DecodeError, formatPath } from "./errors";

// Wire schemas (zod)
export { EnvelopeSchema, GpsMessageSchema } from "./schema";
export type { GpsMessageWire } from "./schema";
