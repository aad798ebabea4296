export {
	WATCHER_ID,
	RUN_SCRIPT_EVENT,
	STOP_STATE_KEY,
	PENDING_STOP,
	WatcherState,
	type EventWatcher,
	type WatcherRunResult,
	type WatcherSnapshot,
} from "./types.js";

export {
	GracefulShutdownWatcher,
	DEFAULT_NOT_PRESENT_DELAY_MS,
	DEFAULT_TRANSPORT_ERROR_DELAY_MS,
	type GracefulShutdownWatcherOptions,
} from "./graceful-shutdown-watcher.js";

export { createGracefulShutdownWatcher, type WatcherDeps } from "./create-watcher.js";
