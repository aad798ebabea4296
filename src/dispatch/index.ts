export {
	GRACEFUL_SHUTDOWN_ACTION,
	GRACEFUL_SHUTDOWN_UNIT,
	SCRIPT_RUNNER_EXECUTABLE,
	type ScriptDispatcher,
	type CommandOutcome,
	type CommandRunner,
	type ExecutableResolver,
} from "./types.js";

export { NodeCommandRunner, requireSuccess } from "./command-runner.js";
export { SystemdServiceDispatcher } from "./systemd-dispatcher.js";
export {
	ScriptRunnerDispatcher,
	processExecutable,
	scriptRunnerPath,
} from "./script-runner-dispatcher.js";
export {
	NoopDispatcher,
	createScriptDispatcher,
	type DispatcherOptions,
} from "./create-dispatcher.js";
