/**
 * Event and sensor values arrive as whatever JSON scalar the device chose,
 * so the same sensor name may carry a number in one message and a string in
 * the next. Consumers switch on `kind`.
 */
export type FieldValue =
    | { readonly kind: "string"; readonly value: string }
    | { readonly kind: "number"; readonly value: number }
    | { readonly kind: "boolean"; readonly value: boolean }
    | { readonly kind: "null" };

export type JsonScalar = string | number | boolean | null;

export function toFieldValue(raw: JsonScalar): FieldValue {
    if (raw === null) return { kind: "null" };
    if (typeof raw === "string") return { kind: "string", value: raw };
    if (typeof raw === "number") return { kind: "number", value: raw };
    return { kind: "boolean", value: raw };
}

export function fieldValueToJson(v: FieldValue): JsonScalar {
    switch (v.kind) {
        case "string":
        case "number":
        case "boolean":
            return v.value;
        case "null":
            return null;
        default:
            return assertNever(v);
    }
}

export function formatFieldValue(v: FieldValue): string {
    switch (v.kind) {
        case "string":
            return v.value;
        case "number":
        case "boolean":
            return String(v.value);
        case "null":
            return "null";
        default:
            return assertNever(v);
    }
}

function assertNever(v: never): never {
    throw new Error(`Unhandled field value: ${JSON.stringify(v)}`);
}
