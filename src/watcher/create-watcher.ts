/**
 * Production wiring for the graceful shutdown watcher.
 */

import { createScriptDispatcher } from "../dispatch/create-dispatcher.js";
import type { CommandRunner, ScriptDispatcher } from "../dispatch/types.js";
import { type Logger, createLogger } from "../lib/logger/index.js";
import { MetadataClient } from "../metadata/watch-client.js";
import type { FetchLike } from "../metadata/types.js";
import type { WatcherConfig } from "../shared/config.js";
import type { Clock } from "../shared/time.js";
import { GracefulShutdownWatcher } from "./graceful-shutdown-watcher.js";
import { STOP_STATE_KEY } from "./types.js";

export interface WatcherDeps {
	readonly logger?: Logger;
	readonly fetch?: FetchLike;
	readonly dispatcher?: ScriptDispatcher;
	readonly runner?: CommandRunner;
	readonly platform?: NodeJS.Platform;
	readonly clock?: Clock;
}

/**
 * Builds a watcher for the stop-state key from validated config.
 *
 * @example
 * ```ts
 * const config = unwrap(loadConfig());
 * const watcher = createGracefulShutdownWatcher(config);
 * const { continuePolling } = await watcher.run(signal, RUN_SCRIPT_EVENT);
 * ```
 */
export function createGracefulShutdownWatcher(
	config: WatcherConfig,
	deps: WatcherDeps = {},
): GracefulShutdownWatcher {
	const logger = deps.logger ?? createLogger({ level: config.logLevel });

	const metadata = new MetadataClient(
		{
			baseUrl: config.metadataBaseUrl,
			watchTimeoutSec: config.watchTimeoutSec,
			requestSlackSec: config.requestSlackSec,
		},
		deps.fetch ? { logger, fetch: deps.fetch } : { logger },
	);

	const dispatcher =
		deps.dispatcher ??
		createScriptDispatcher({
			logger,
			...(deps.platform !== undefined && { platform: deps.platform }),
			...(deps.runner !== undefined && { runner: deps.runner }),
		});

	return new GracefulShutdownWatcher({
		client: metadata.watcher(STOP_STATE_KEY),
		dispatcher,
		logger,
		notPresentDelayMs: config.notPresentDelayMs,
		transportErrorDelayMs: config.transportErrorDelayMs,
		...(deps.clock !== undefined && { clock: deps.clock }),
	});
}
