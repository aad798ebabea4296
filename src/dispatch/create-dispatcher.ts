/**
 * Platform selection for the script dispatcher.
 */

import type { Logger } from "../lib/logger/index.js";
import { NodeCommandRunner } from "./command-runner.js";
import { ScriptRunnerDispatcher } from "./script-runner-dispatcher.js";
import { SystemdServiceDispatcher } from "./systemd-dispatcher.js";
import type { CommandRunner, ExecutableResolver, ScriptDispatcher } from "./types.js";

/** Used where no shutdown-script facility is known; logs and returns. */
export class NoopDispatcher implements ScriptDispatcher {
	readonly name = "noop";
	private readonly logger: Logger;
	private readonly platform: string;

	constructor(logger: Logger, platform: string) {
		this.logger = logger;
		this.platform = platform;
	}

	async dispatch(): Promise<void> {
		this.logger.warn(
			{ platform: this.platform },
			"No graceful shutdown script facility on this platform",
		);
	}
}

export interface DispatcherOptions {
	readonly logger: Logger;
	readonly platform?: NodeJS.Platform;
	readonly runner?: CommandRunner;
	readonly resolveExecutable?: ExecutableResolver;
}

/**
 * Picks the dispatcher for `platform` (default: the current one).
 * Linux starts the systemd unit; Windows runs the script runner directly.
 */
export function createScriptDispatcher(options: DispatcherOptions): ScriptDispatcher {
	const platform = options.platform ?? process.platform;
	const runner = options.runner ?? new NodeCommandRunner();
	const logger = options.logger.child({ component: "script-dispatcher", platform });

	switch (platform) {
		case "linux":
			return new SystemdServiceDispatcher(runner, logger);
		case "win32":
			return new ScriptRunnerDispatcher(runner, logger, options.resolveExecutable);
		default:
			return new NoopDispatcher(logger, platform);
	}
}
