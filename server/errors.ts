export type AppErrorCode =
	| "SOURCE_NOT_FOUND"
	| "INVALID_CATALOG"
	| "INVALID_PROFILE";

/**
 * Application-level error with a user-facing message.
 * Used for missing records, rejected source paths and bad startup data.
 */
export class AppError extends Error {
	public readonly code: AppErrorCode;
	public readonly cause?: unknown;

	constructor(code: AppErrorCode, message: string, cause?: unknown) {
		super(message);
		this.name = "AppError";
		this.code = code;
		this.cause = cause;
	}
}

/** Thrown at startup when the process environment does not parse. */
export class ConfigError extends Error {
	public readonly issues: string[];

	constructor(issues: string[]) {
		super(`Invalid configuration: ${issues.join("; ")}`);
		this.name = "ConfigError";
		this.issues = issues;
	}
}

export function isAppError(
	error: unknown,
	code?: AppErrorCode,
): error is AppError {
	return (
		error instanceof AppError && (code === undefined || error.code === code)
	);
}
