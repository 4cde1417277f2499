export type ErrorCode =
	| "CONFIG_ERROR"
	| "BROKER_ERROR"
	| "INTERNAL_ERROR";

export class AppError extends Error {
	public readonly code: ErrorCode;
	public readonly details?: unknown;

	constructor(params: { code: ErrorCode; message: string; details?: unknown; cause?: unknown }) {
		super(params.message, params.cause === undefined ? undefined : { cause: params.cause });
		this.name = "AppError";
		this.code = params.code;
		this.details = params.details;
	}
}

export function asAppError(err: unknown): AppError {
	if (err instanceof AppError) {
		return err;
	}

	if (err instanceof Error) {
		return new AppError({
			code: "INTERNAL_ERROR",
			message: err.message,
			cause: err
		});
	}

	return new AppError({
		code: "INTERNAL_ERROR",
		message: "Unknown error",
		details: err
	});
}

export function configError(message: string, details?: unknown): AppError {
	return new AppError({
		code: "CONFIG_ERROR",
		message,
		details
	});
}

export function brokerError(message: string, cause?: unknown): AppError {
	return new AppError({
		code: "BROKER_ERROR",
		message: cause instanceof Error ? `${message}: ${cause.message}` : message,
		cause
	});
}
