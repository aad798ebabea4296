/**
 * Watcher configuration: defaults, environment overrides and validation.
 */

import { type ValidationError, validate, z } from "../lib/validation/index.js";
import { ConfigError } from "./errors.js";
import type { Result } from "./result.js";
import { Duration } from "./time.js";

export interface WatcherConfig {
	/** Metadata service root, e.g. `http://169.254.169.254/computeMetadata/v1` */
	readonly metadataBaseUrl: string;
	/** Server-side hold for one long-poll request (`timeout_sec`) */
	readonly watchTimeoutSec: number;
	/** Extra seconds allowed past `watchTimeoutSec` before the request is aborted locally */
	readonly requestSlackSec: number;
	/** Wait after the key was reported absent */
	readonly notPresentDelayMs: number;
	/** Wait after a transport failure */
	readonly transportErrorDelayMs: number;
	readonly logLevel: "trace" | "debug" | "info" | "warn" | "error" | "fatal";
}

export const DEFAULT_METADATA_HOST = "169.254.169.254";

export const DEFAULT_WATCHER_CONFIG: WatcherConfig = {
	metadataBaseUrl: `http://${DEFAULT_METADATA_HOST}/computeMetadata/v1`,
	watchTimeoutSec: 60,
	requestSlackSec: 10,
	notPresentDelayMs: Duration.minutes(1),
	transportErrorDelayMs: Duration.seconds(5),
	logLevel: "info",
};

const watcherConfigSchema = z.object({
	metadataBaseUrl: z.string().url(),
	watchTimeoutSec: z.number().int().positive(),
	requestSlackSec: z.number().int().nonnegative(),
	notPresentDelayMs: z.number().int().nonnegative(),
	transportErrorDelayMs: z.number().int().nonnegative(),
	logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]),
});

/** Settings read from the environment; the log level is still unvalidated here. */
export interface EnvWatcherConfig {
	metadataBaseUrl?: string;
	watchTimeoutSec?: number;
	requestSlackSec?: number;
	notPresentDelayMs?: number;
	transportErrorDelayMs?: number;
	logLevel?: string;
}

type NumericKey =
	| "watchTimeoutSec"
	| "requestSlackSec"
	| "notPresentDelayMs"
	| "transportErrorDelayMs";

/**
 * Reads config values from environment variables.
 * Supported: SHUTDOWN_WATCHER_METADATA_URL, GCE_METADATA_HOST,
 * SHUTDOWN_WATCHER_TIMEOUT_SEC, SHUTDOWN_WATCHER_REQUEST_SLACK_SEC,
 * SHUTDOWN_WATCHER_NOT_PRESENT_DELAY_MS, SHUTDOWN_WATCHER_RETRY_DELAY_MS,
 * SHUTDOWN_WATCHER_LOG_LEVEL.
 * @throws ConfigError if a numeric env var contains an invalid value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): EnvWatcherConfig {
	const result: EnvWatcherConfig = {};

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const url = env["SHUTDOWN_WATCHER_METADATA_URL"];
	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const host = env["GCE_METADATA_HOST"];
	if (url) {
		result.metadataBaseUrl = url.replace(/\/+$/, "");
	} else if (host) {
		result.metadataBaseUrl = `http://${host}/computeMetadata/v1`;
	}

	parseNonNegativeIntEnv(env, "SHUTDOWN_WATCHER_TIMEOUT_SEC", "watchTimeoutSec", result);
	parseNonNegativeIntEnv(env, "SHUTDOWN_WATCHER_REQUEST_SLACK_SEC", "requestSlackSec", result);
	parseNonNegativeIntEnv(env, "SHUTDOWN_WATCHER_NOT_PRESENT_DELAY_MS", "notPresentDelayMs", result);
	parseNonNegativeIntEnv(env, "SHUTDOWN_WATCHER_RETRY_DELAY_MS", "transportErrorDelayMs", result);

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const level = env["SHUTDOWN_WATCHER_LOG_LEVEL"];
	if (level) {
		result.logLevel = level.trim().toLowerCase();
	}

	return result;
}

/**
 * Merges defaults, environment and explicit overrides (in that order) and
 * validates the result as a whole.
 */
export function loadConfig(
	overrides: Partial<WatcherConfig> = {},
	env: NodeJS.ProcessEnv = process.env,
): Result<WatcherConfig, ValidationError> {
	return validate(watcherConfigSchema, {
		...DEFAULT_WATCHER_CONFIG,
		...configFromEnv(env),
		...overrides,
	});
}

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}

function parseNonNegativeIntEnv(
	env: NodeJS.ProcessEnv,
	envKey: string,
	configKey: NumericKey,
	result: EnvWatcherConfig,
): void {
	const raw = env[envKey];
	if (!raw) return;
	const parsed = strictParseInt(raw);
	if (Number.isNaN(parsed) || parsed < 0) {
		throw new ConfigError(`Invalid ${envKey}: "${raw}" must be a non-negative integer`, {
			envKey,
		});
	}
	result[configKey] = parsed;
}
