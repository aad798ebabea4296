/**
 * Logger wrapper: structured JSON logging backed by pino.
 *
 * Watcher components depend on the `Logger` interface only; tests pass a
 * capturing destination and assert on the emitted lines. Errors go under the
 * `err` key so pino's standard error serializer picks them up.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	/** Fields bound to every line, e.g. `{ watcher: "graceful-shutdown-watcher" }`. */
	readonly base?: Record<string, unknown>;
	readonly destination?: { write(msg: string): void };
}

/** Structured logger interface. */
export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

// ── Factory ─────────────────────────────────────────────────────────

type LogMethod = "info" | "warn" | "error" | "debug";

function emit(target: pino.Logger, level: LogMethod, msgOrObj: unknown, msg?: string): void {
	if (typeof msgOrObj === "string" || msgOrObj === undefined || msgOrObj === null) {
		target[level](String(msgOrObj ?? ""));
		return;
	}
	if (typeof msgOrObj === "object") {
		target[level](msgOrObj, msg ?? "");
		return;
	}
	target[level]({ value: msgOrObj }, msg ?? "");
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		info(msgOrObj: unknown, msg?: string): void {
			emit(pinoLogger, "info", msgOrObj, msg);
		},
		warn(msgOrObj: unknown, msg?: string): void {
			emit(pinoLogger, "warn", msgOrObj, msg);
		},
		error(msgOrObj: unknown, msg?: string): void {
			emit(pinoLogger, "error", msgOrObj, msg);
		},
		debug(msgOrObj: unknown, msg?: string): void {
			emit(pinoLogger, "debug", msgOrObj, msg);
		},
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(bindings));
		},
	};
}

/**
 * Creates a Logger backed by pino with an optional custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info" });
 * logger.info({ key: "instance/shutdown-details/stop-state" }, "Watching key");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};
	if (config.base) {
		pinoOptions.base = { ...config.base };
	}

	const pinoLogger = config.destination ? pino(pinoOptions, config.destination) : pino(pinoOptions);
	return wrapPino(pinoLogger);
}

/** Logger that discards everything; for callers that don't want output. */
export function createSilentLogger(): Logger {
	return createLogger({ level: "fatal", destination: { write: () => {} } });
}
