// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type WatchKey,
	type ChangeToken,
	watchKey,
	changeToken,
	INITIAL_CHANGE_TOKEN,
	type Result,
	ok,
	err,
	map,
	flatMap,
	unwrap,
	isOk,
	isErr,
	ErrorKind,
	WatcherError,
	MetadataRequestError,
	CancelledError,
	DispatchError,
	ConfigError,
	describeError,
	toMetadataRequestError,
	isKeyNotPresent,
	isCancelledError,
	isDispatchError,
	isConfigError,
	type Clock,
	SystemClock,
	FakeClock,
	Duration,
	delay,
	type WatcherConfig,
	type EnvWatcherConfig,
	DEFAULT_WATCHER_CONFIG,
	DEFAULT_METADATA_HOST,
	configFromEnv,
	loadConfig,
} from "./shared/index.js";

// ── Infrastructure ───────────────────────────────────────────────────
export {
	type Logger,
	type LogLevel,
	createLogger,
	createSilentLogger,
} from "./lib/logger/index.js";
export { ValidationError, type ValidationIssue, validate } from "./lib/validation/index.js";

// ── Metadata ─────────────────────────────────────────────────────────
export {
	MetadataClient,
	ChangeWatchClient,
	WatchOutcomeType,
	WatchParam,
	METADATA_FLAVOR_HEADER,
	METADATA_FLAVOR_VALUE,
	type WatchOutcome,
	type FetchLike,
	type KeyWatchClient,
	type MetadataClientConfig,
} from "./metadata/index.js";

// ── Script Dispatch ──────────────────────────────────────────────────
export {
	type ScriptDispatcher,
	type CommandRunner,
	type CommandOutcome,
	type ExecutableResolver,
	type DispatcherOptions,
	NodeCommandRunner,
	requireSuccess,
	processExecutable,
	scriptRunnerPath,
	SystemdServiceDispatcher,
	ScriptRunnerDispatcher,
	NoopDispatcher,
	createScriptDispatcher,
	GRACEFUL_SHUTDOWN_ACTION,
	GRACEFUL_SHUTDOWN_UNIT,
	SCRIPT_RUNNER_EXECUTABLE,
} from "./dispatch/index.js";

// ── Watcher ──────────────────────────────────────────────────────────
export {
	GracefulShutdownWatcher,
	createGracefulShutdownWatcher,
	DEFAULT_NOT_PRESENT_DELAY_MS,
	DEFAULT_TRANSPORT_ERROR_DELAY_MS,
	type GracefulShutdownWatcherOptions,
	type WatcherDeps,
	WATCHER_ID,
	RUN_SCRIPT_EVENT,
	STOP_STATE_KEY,
	PENDING_STOP,
	WatcherState,
	type EventWatcher,
	type WatcherRunResult,
	type WatcherSnapshot,
} from "./watcher/index.js";
