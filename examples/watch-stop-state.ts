/**
 * Stop-State Watch Example
 *
 * Drives the graceful shutdown watcher the way a host agent's event loop does:
 * - Loads config from SHUTDOWN_WATCHER_* environment variables
 * - Calls `run` until the watcher asks to stop
 * - Cancels the in-flight watch on SIGINT / SIGTERM
 *
 * Point SHUTDOWN_WATCHER_METADATA_URL at a metadata server (or run on a VM),
 * then: tsx examples/watch-stop-state.ts
 */

import {
	RUN_SCRIPT_EVENT,
	createGracefulShutdownWatcher,
	createLogger,
	describeError,
	loadConfig,
} from "../src/index.js";

const loaded = loadConfig();
if (!loaded.ok) {
	console.error(`Invalid configuration: ${loaded.error.describe()}`);
	process.exit(1);
}

const config = loaded.value;
const logger = createLogger({ level: config.logLevel, base: { service: "stop-state-example" } });
const watcher = createGracefulShutdownWatcher(config, { logger });

const controller = new AbortController();
for (const sig of ["SIGINT", "SIGTERM"] as const) {
	process.once(sig, () => controller.abort(new Error(`received ${sig}`)));
}

async function runLoop() {
	let polls = 0;
	for (;;) {
		polls++;
		const result = await watcher.run(controller.signal, RUN_SCRIPT_EVENT);
		if (!result.continuePolling) {
			const reason =
				result.error === undefined ? "scripts dispatched" : describeError(result.error);
			logger.info({ polls, state: watcher.state(), reason }, "Watcher finished");
			return;
		}
	}
}

runLoop().catch((err) => {
	console.error("Error:", err);
	process.exit(1);
});
