/**
 * Systemd dispatcher: starts the shutdown-scripts service unit.
 *
 * The unit itself invokes the script runner with the graceful-shutdown
 * action. We wait for `systemctl` only, never for the scripts.
 */

import type { Logger } from "../lib/logger/index.js";
import { flatMap } from "../shared/result.js";
import { requireSuccess } from "./command-runner.js";
import { type CommandRunner, GRACEFUL_SHUTDOWN_UNIT, type ScriptDispatcher } from "./types.js";

export class SystemdServiceDispatcher implements ScriptDispatcher {
	readonly name = "systemd";
	private readonly runner: CommandRunner;
	private readonly logger: Logger;
	private readonly unit: string;

	constructor(runner: CommandRunner, logger: Logger, unit: string = GRACEFUL_SHUTDOWN_UNIT) {
		this.runner = runner;
		this.logger = logger;
		this.unit = unit;
	}

	async dispatch(): Promise<void> {
		const result = flatMap(await this.runner.run("systemctl", ["start", this.unit]), (outcome) =>
			requireSuccess("systemctl", outcome),
		);
		if (!result.ok) {
			this.logger.error(
				{ err: result.error, unit: this.unit },
				"Failed to run graceful shutdown script",
			);
			return;
		}
		this.logger.info({ unit: this.unit }, "Graceful shutdown service started");
	}
}
