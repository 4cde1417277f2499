export type DecodeErrorCode = "MALFORMED_ENVELOPE" | "MALFORMED_PAYLOAD";

export type ValidationIssue = {
    path: (string | number)[];
    message: string;
};

type ZodIssueLike = {
    path: readonly (string | number | symbol)[];
    message: string;
};

export function formatPath(path: readonly (string | number)[]): string {
    return path.length === 0 ? "<root>" : path.map(String).join(".");
}

/**
 * Returned (never thrown) by the classifier and decoder.
 *
 * `fieldPath` is the dotted path of the first offending field, e.g. `device`
 * or `events.2.0`; `<root>` when the document itself is the problem.
 */
export class DecodeError extends Error {
    public readonly code: DecodeErrorCode;
    public readonly fieldPath: string;
    public readonly issues: ValidationIssue[];

    constructor(code: DecodeErrorCode, issues: ValidationIssue[]) {
        const first = issues[0] ?? { path: [], message: "Unknown decode failure" };
        const fieldPath = formatPath(first.path);
        super(`${code === "MALFORMED_ENVELOPE" ? "Malformed envelope" : "Malformed payload"} at ${fieldPath}: ${first.message}`);
        this.name = "DecodeError";
        this.code = code;
        this.fieldPath = fieldPath;
        this.issues = issues;
    }
}

export function malformedEnvelope(message: string): DecodeError {
    return new DecodeError("MALFORMED_ENVELOPE", [{ path: [], message }]);
}

export function malformedPayload(issues: ValidationIssue[]): DecodeError {
    return new DecodeError("MALFORMED_PAYLOAD", issues);
}

export function zodIssuesToValidationIssues(issues: readonly ZodIssueLike[]): ValidationIssue[] {
    return issues.map(i => ({
        path: i.path
            .map((p): string | number => (typeof p === "symbol" ? (p.description ?? p.toString()) : p)),
        message: i.message
    }));
}
