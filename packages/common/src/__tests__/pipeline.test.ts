import { describe, it, expect } from "@jest/globals";
import * as fs from "fs";
import * as path from "path";

import { previewPayload } from "../payload";
import { processMessage } from "../pipeline";
import { fieldValueToJson, formatFieldValue, toFieldValue } from "../values";

const sample = fs.readFileSync(path.join(__dirname, "fixtures", "gps-message.json"), "utf8");

describe("processMessage", () => {
    it("decodes a valid gps message", () => {
        const res = processMessage(Buffer.from(sample));
        expect(res.status).toBe("decoded");
        if (res.status === "decoded") {
            expect(res.record.device.imei).toBe("350000000000001");
            expect(res.envelope).toEqual({ messageVer: 1, messageType: "gps", valid: true });
        }
    });

    it("filters messages that are not gps v1", () => {
        const res = processMessage(JSON.stringify({ message_ver: 1, message_type: "register", valid: true }));
        expect(res).toEqual({
            status: "ignored",
            envelope: { messageVer: 1, messageType: "register", valid: true }
        });
    });

    it("skips the full decode for filtered messages", () => {
        // Would fail the full decode, but the gateway already flagged it.
        const res = processMessage(JSON.stringify({ message_ver: 1, message_type: "gps", valid: false }));
        expect(res.status).toBe("ignored");
    });

    it("separates unparsable payloads from schema violations", () => {
        const unparsable = processMessage("<xml/>");
        expect(unparsable.status).toBe("malformed_envelope");

        const mismatch = processMessage(JSON.stringify({ message_ver: 1, message_type: "gps", valid: true }));
        expect(mismatch.status).toBe("malformed_payload");
        if (mismatch.status === "malformed_payload") {
            expect(mismatch.envelope).toEqual({ messageVer: 1, messageType: "gps", valid: true });
            expect(mismatch.error.code).toBe("MALFORMED_PAYLOAD");
            expect(mismatch.error.fieldPath).toBe("device");
        }
    });
});

describe("field values", () => {
    it("tags each JSON scalar by its runtime kind", () => {
        expect(toFieldValue("AA34553")).toEqual({ kind: "string", value: "AA34553" });
        expect(toFieldValue(23.7)).toEqual({ kind: "number", value: 23.7 });
        expect(toFieldValue(false)).toEqual({ kind: "boolean", value: false });
        expect(toFieldValue(null)).toEqual({ kind: "null" });
    });

    it("formats and re-encodes values", () => {
        expect(formatFieldValue({ kind: "number", value: -0.4531 })).toBe("-0.4531");
        expect(formatFieldValue({ kind: "boolean", value: true })).toBe("true");
        expect(formatFieldValue({ kind: "null" })).toBe("null");
        expect(fieldValueToJson({ kind: "string", value: "x" })).toBe("x");
        expect(fieldValueToJson({ kind: "null" })).toBeNull();
    });
});

describe("previewPayload", () => {
    it("collapses whitespace", () => {
        expect(previewPayload('{\n\t"message_ver": 1\n}\n')).toBe('{ "message_ver": 1 }');
    });

    it("truncates long payloads", () => {
        expect(previewPayload("a".repeat(300), 10)).toBe("aaaaaaaaaa…");
    });
});
