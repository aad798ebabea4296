/**
 * Script runner dispatcher: runs the script runner that sits next to the
 * agent executable, for hosts without a service supervisor.
 *
 * Waits for the runner to exit. Not cancellable; it runs once per instance.
 */

import { win32 } from "node:path";
import type { Logger } from "../lib/logger/index.js";
import { DispatchError } from "../shared/errors.js";
import { err, flatMap, ok } from "../shared/result.js";
import { requireSuccess } from "./command-runner.js";
import {
	type CommandRunner,
	type ExecutableResolver,
	GRACEFUL_SHUTDOWN_ACTION,
	SCRIPT_RUNNER_EXECUTABLE,
	type ScriptDispatcher,
} from "./types.js";

/** Resolves the running executable from `process.execPath`. */
export const processExecutable: ExecutableResolver = () => {
	const path = process.execPath;
	if (path.length === 0) {
		return err(new DispatchError("Agent executable path is empty"));
	}
	return ok(path);
};

/** Path of the script runner in the same directory as `executablePath`. */
export function scriptRunnerPath(executablePath: string): string {
	return win32.join(win32.dirname(executablePath), SCRIPT_RUNNER_EXECUTABLE);
}

export class ScriptRunnerDispatcher implements ScriptDispatcher {
	readonly name = "script-runner";
	private readonly runner: CommandRunner;
	private readonly logger: Logger;
	private readonly resolveExecutable: ExecutableResolver;

	constructor(
		runner: CommandRunner,
		logger: Logger,
		resolveExecutable: ExecutableResolver = processExecutable,
	) {
		this.runner = runner;
		this.logger = logger;
		this.resolveExecutable = resolveExecutable;
	}

	async dispatch(): Promise<void> {
		const executable = this.resolveExecutable();
		if (!executable.ok) {
			this.logger.error({ err: executable.error }, "Failed to get agent executable path");
			return;
		}

		const runnerPath = scriptRunnerPath(executable.value);
		const result = flatMap(
			await this.runner.run(runnerPath, [GRACEFUL_SHUTDOWN_ACTION]),
			(outcome) => requireSuccess(runnerPath, outcome),
		);
		if (!result.ok) {
			this.logger.error(
				{ err: result.error, runner: runnerPath },
				"Failed to run graceful shutdown script",
			);
			return;
		}
		this.logger.info({ runner: runnerPath }, "Graceful shutdown scripts finished");
	}
}
