export {
	type WatchKey,
	type ChangeToken,
	watchKey,
	changeToken,
	INITIAL_CHANGE_TOKEN,
} from "./identifiers.js";

export {
	type Result,
	ok,
	err,
	map,
	flatMap,
	unwrap,
	isOk,
	isErr,
} from "./result.js";

export {
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
} from "./errors.js";

export { type Clock, SystemClock, FakeClock, Duration, delay } from "./time.js";
export {
	type WatcherConfig,
	type EnvWatcherConfig,
	DEFAULT_WATCHER_CONFIG,
	DEFAULT_METADATA_HOST,
	configFromEnv,
	loadConfig,
} from "./config.js";
