export type ErrorCode =
	| "BINARY_MISSING"
	| "SHELL_UNAVAILABLE"
	| "SPAWN_FAILED"
	| "SIGNAL_FAILED"
	| "NOT_RUNNING"
	| "VALIDATION_FAILED"
	| "CORRUPTED";

export class AppError extends Error {
	public readonly code: ErrorCode;
	public readonly context?: Record<string, unknown>;

	constructor(
		code: ErrorCode,
		message: string,
		context?: Record<string, unknown>,
	) {
		super(message);
		this.code = code;
		this.context = context;
		this.name = "AppError";
		Object.setPrototypeOf(this, AppError.prototype);
	}
}

export const hasErrorCode = (error: unknown, code: ErrorCode): boolean =>
	error instanceof AppError && error.code === code;

export const isErrnoException = (
	error: unknown,
): error is NodeJS.ErrnoException =>
	error instanceof Error && "code" in error;
