/**
 * Script dispatch types.
 *
 * A ScriptDispatcher starts the local shutdown-script facility. It never
 * rejects: failures are logged where they happen and the caller proceeds.
 */

import type { DispatchError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";

/** Action argument the script runner understands. */
export const GRACEFUL_SHUTDOWN_ACTION = "graceful-shutdown";
/** Service unit that runs the shutdown scripts on systemd hosts. */
export const GRACEFUL_SHUTDOWN_UNIT = "google-graceful-shutdown-scripts.service";
/** Script runner executable shipped next to the agent on Windows. */
export const SCRIPT_RUNNER_EXECUTABLE = "GCEMetadataScriptRunner.exe";

export interface ScriptDispatcher {
	/** Human-readable variant name, bound to log lines. */
	readonly name: string;
	dispatch(): Promise<void>;
}

// ── Process execution ────────────────────────────────────────────────

export interface CommandOutcome {
	/** Exit code, or null when the process was terminated by a signal */
	readonly exitCode: number | null;
	readonly signal: NodeJS.Signals | null;
	/** Last bytes of stderr, for log context */
	readonly stderr: string;
}

/** Runs a command to completion. Spawn failures come back as `err`. */
export interface CommandRunner {
	run(command: string, args: readonly string[]): Promise<Result<CommandOutcome, DispatchError>>;
}

/** Resolves the path of the running agent executable. */
export type ExecutableResolver = () => Result<string, DispatchError>;
