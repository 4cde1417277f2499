import { decodeDocument } from "./decoder";
import { classifyDocument } from "./envelope";
import { malformedEnvelope, type DecodeError } from "./errors";
import { parseDocument, type RawPayload } from "./payload";
import type { Envelope, TelemetryRecord } from "./telemetry";

export type ProcessedMessage =
    | { status: "decoded"; envelope: Envelope; record: TelemetryRecord }
    | { status: "ignored"; envelope: Envelope }
    | { status: "malformed_envelope"; error: DecodeError }
    | { status: "malformed_payload"; envelope: Envelope; error: DecodeError };

export type ProcessStatus = ProcessedMessage["status"];

/**
 * Classify, then decode when the envelope allows it. The payload is parsed
 * once and both stages read the same document.
 */
export function processMessage(payload: RawPayload): ProcessedMessage {
    const parsed = parseDocument(payload);
    if (!parsed.ok) {
        return { status: "malformed_envelope", error: malformedEnvelope(parsed.message) };
    }

    const decision = classifyDocument(parsed.value);
    switch (decision.kind) {
        case "malformed":
            return { status: "malformed_envelope", error: decision.error };
        case "ignored":
            return { status: "ignored", envelope: decision.envelope };
        case "decodable": {
            const res = decodeDocument(parsed.value);
            return res.ok
                ? { status: "decoded", envelope: decision.envelope, record: res.value }
                : { status: "malformed_payload", envelope: decision.envelope, error: res.error };
        }
    }
}
