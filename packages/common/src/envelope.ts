import { malformedEnvelope, type DecodeError } from "./errors";
import { parseDocument, type RawPayload } from "./payload";
import { EnvelopeSchema } from "./schema";
import type { Envelope } from "./telemetry";

export const SUPPORTED_MESSAGE_VERSION = 1;
export const SUPPORTED_MESSAGE_TYPE = "gps";

export type EnvelopeDecision =
    | { kind: "decodable"; envelope: Envelope }
    | { kind: "ignored"; envelope: Envelope }
    | { kind: "malformed"; error: DecodeError };

export function isDecodable(envelope: Envelope): boolean {
    return (
        envelope.messageVer === SUPPORTED_MESSAGE_VERSION &&
        envelope.messageType === SUPPORTED_MESSAGE_TYPE &&
        envelope.valid === true
    );
}

export function classifyDocument(doc: unknown): EnvelopeDecision {
    const res = EnvelopeSchema.safeParse(doc);
    if (!res.success) {
        return { kind: "malformed", error: malformedEnvelope("Payload is not a JSON object") };
    }

    const envelope: Envelope = {
        messageVer: res.data.message_ver ?? null,
        messageType: res.data.message_type ?? null,
        valid: res.data.valid ?? null
    };

    // Other types/versions and messages the gateway flagged as invalid are
    // expected traffic, not failures.
    return { kind: isDecodable(envelope) ? "decodable" : "ignored", envelope };
}

/** Look at `message_ver`, `message_type` and `valid` only. */
export function classify(payload: RawPayload): EnvelopeDecision {
    const parsed = parseDocument(payload);
    if (!parsed.ok) {
        return { kind: "malformed", error: malformedEnvelope(parsed.message) };
    }
    return classifyDocument(parsed.value);
}
