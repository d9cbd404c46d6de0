import type { ErrorKind } from "../shared/types";

export type AppErrorCode = ErrorKind;

/**
 * Application-level error with a user-facing message.
 * Every filesystem and subprocess failure leaves the supervisor as one of these.
 */
export class AppError extends Error {
	readonly code: AppErrorCode;
	readonly cause?: unknown;

	constructor(code: AppErrorCode, message: string, cause?: unknown) {
		super(message);
		this.name = "AppError";
		this.code = code;
		this.cause = cause;
	}
}

export function isAppError(error: unknown): error is AppError {
	return error instanceof AppError;
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/** Node system error code (ENOENT, EACCES, ...) when present */
export function errnoCode(error: unknown): string | undefined {
	if (typeof error === "object" && error !== null && "code" in error) {
		const { code } = error;
		return typeof code === "string" ? code : undefined;
	}
	return undefined;
}

/** Keep AppErrors as they are; wrap anything else under the given code. */
export function toAppError(
	error: unknown,
	fallback: AppErrorCode,
	context: string,
): AppError {
	if (isAppError(error)) {
		return error;
	}
	return new AppError(fallback, `${context}: ${errorMessage(error)}`, error);
}
