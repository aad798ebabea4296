/**
 * WatcherError hierarchy: structured error classification.
 *
 * Every error carries a `kind` which callers match on instead of the message
 * or the prototype chain. The kind drives logging and back-off in the watcher.
 */

/** Error kinds that drive logging and retry behavior. */
export const ErrorKind = {
	KeyNotPresent: "key_not_present",
	Transport: "transport",
	Cancelled: "cancelled",
	Dispatch: "dispatch",
	Config: "config",
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

/** Options for constructing WatcherError subclasses with optional cause chain. */
interface WatcherErrorOptions {
	readonly cause?: unknown;
}

/** Base error class for the watcher, tagged with a structural kind. */
export class WatcherError extends Error {
	readonly kind: ErrorKind;
	readonly code: string;
	readonly context: Record<string, unknown>;

	constructor(
		message: string,
		code: string,
		kind: ErrorKind,
		context: Record<string, unknown> = {},
	) {
		super(message);
		this.name = "WatcherError";
		this.kind = kind;
		this.code = code;
		this.context = context;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			kind: this.kind,
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/**
 * Failed metadata request. `status` is the HTTP status when the server
 * answered, undefined for network or body failures.
 */
export class MetadataRequestError extends WatcherError {
	readonly status: number | undefined;

	constructor(
		message: string,
		status: number | undefined,
		context: Record<string, unknown> & WatcherErrorOptions = {},
	) {
		const { cause, ...rest } = context;
		super(
			message,
			status === 404 ? "METADATA_NOT_FOUND" : "METADATA_REQUEST_FAILED",
			status === 404 ? ErrorKind.KeyNotPresent : ErrorKind.Transport,
			{ ...rest, status },
		);
		this.name = "MetadataRequestError";
		this.status = status;
		if (cause !== undefined) this.cause = cause;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			status: this.status,
		};
	}
}

/** Raised when the caller's abort signal fired while waiting. */
export class CancelledError extends WatcherError {
	readonly reason: unknown;

	constructor(message: string, reason: unknown) {
		super(message, "CANCELLED", ErrorKind.Cancelled);
		this.name = "CancelledError";
		this.reason = reason;
	}
}

/** Failure to start or run the local shutdown-script facility. */
export class DispatchError extends WatcherError {
	constructor(message: string, context: Record<string, unknown> & WatcherErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "DISPATCH_FAILED", ErrorKind.Dispatch, rest);
		this.name = "DispatchError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Invalid or missing configuration. */
export class ConfigError extends WatcherError {
	constructor(message: string, context: Record<string, unknown> & WatcherErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "CONFIG_ERROR", ErrorKind.Config, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Helpers ──────────────────────────────────────────────────────────

/** Render an unknown thrown value as a message suitable for logs. */
export function describeError(error: unknown): string {
	if (error instanceof Error) return error.message;
	return String(error);
}

/**
 * Wrap a thrown transport failure (fetch rejection, body read failure, local
 * deadline) as a MetadataRequestError without an HTTP status.
 */
export function toMetadataRequestError(
	error: unknown,
	context: Record<string, unknown> = {},
): MetadataRequestError {
	if (error instanceof MetadataRequestError) return error;
	return new MetadataRequestError(`Metadata request failed: ${describeError(error)}`, undefined, {
		...context,
		cause: error,
	});
}

/** Whether the metadata error means the key simply does not exist. */
export function isKeyNotPresent(e: unknown): e is MetadataRequestError {
	return e instanceof MetadataRequestError && e.kind === ErrorKind.KeyNotPresent;
}

/** Type guard for CancelledError. */
export function isCancelledError(e: unknown): e is CancelledError {
	return e instanceof CancelledError;
}

/** Type guard for DispatchError. */
export function isDispatchError(e: unknown): e is DispatchError {
	return e instanceof DispatchError;
}

/** Type guard for ConfigError. */
export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}
