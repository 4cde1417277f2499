import { TextDecoder } from "util";

// Broker deliveries hand us a Buffer, the file mode reads a Buffer and tests
// mostly pass strings. Everything funnels through here before JSON parsing.

export type RawPayload = string | Uint8Array;

export type ParsedDocument =
    | { ok: true; value: unknown }
    | { ok: false; message: string };

const BOM = "\uFEFF";

// Fatal: a byte sequence that is not UTF-8 makes the payload malformed instead
// of turning into U+FFFD inside a field value.
const utf8 = new TextDecoder("utf-8", { fatal: true });

/** Lenient conversion for log previews; invalid bytes become U+FFFD. */
export function payloadToText(payload: RawPayload): string {
    let text: string;
    if (typeof payload === "string") {
        text = payload;
    } else if (Buffer.isBuffer(payload)) {
        text = payload.toString("utf8");
    } else {
        text = Buffer.from(payload.buffer, payload.byteOffset, payload.byteLength).toString("utf8");
    }
    return text.startsWith(BOM) ? text.slice(BOM.length) : text;
}

export function parseDocument(payload: RawPayload): ParsedDocument {
    let text: string;
    if (typeof payload === "string") {
        text = payload.startsWith(BOM) ? payload.slice(BOM.length) : payload;
    } else {
        // TextDecoder drops a leading BOM itself.
        try {
            text = utf8.decode(payload);
        } catch (err) {
            return { ok: false, message: `Payload is not valid UTF-8 (${err instanceof Error ? err.message : String(err)})` };
        }
    }

    try {
        return { ok: true, value: JSON.parse(text) as unknown };
    } catch (err) {
        return { ok: false, message: `Payload is not valid JSON (${err instanceof Error ? err.message : String(err)})` };
    }
}

/** Short single-line excerpt for log lines; never the full message. */
export function previewPayload(payload: RawPayload, maxLen = 256): string {
    const trimmed = payloadToText(payload).trim().replace(/\s+/g, " ");
    if (trimmed.length <= maxLen) return trimmed;
    return trimmed.slice(0, maxLen) + "…";
}
