/**
 * Node.js CommandRunner implementation using child_process.
 */

import { spawn } from "node:child_process";
import { DispatchError } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import type { CommandOutcome, CommandRunner } from "./types.js";

const MAX_STDERR_CHARS = 2_048;

export class NodeCommandRunner implements CommandRunner {
	run(command: string, args: readonly string[]): Promise<Result<CommandOutcome, DispatchError>> {
		return new Promise((resolve) => {
			let stderr = "";
			let settled = false;
			const settle = (result: Result<CommandOutcome, DispatchError>): void => {
				if (settled) return;
				settled = true;
				resolve(result);
			};

			const child = spawn(command, [...args], {
				stdio: ["ignore", "ignore", "pipe"],
				windowsHide: true,
			});

			child.stderr?.setEncoding("utf8");
			child.stderr?.on("data", (chunk: string) => {
				stderr = (stderr + chunk).slice(-MAX_STDERR_CHARS);
			});

			child.on("error", (error) => {
				settle(
					err(
						new DispatchError(`Failed to start ${command}: ${error.message}`, {
							command,
							args: [...args],
							cause: error,
						}),
					),
				);
			});

			child.on("close", (exitCode, signal) => {
				settle(ok({ exitCode, signal, stderr: stderr.trim() }));
			});
		});
	}
}

/** Turn a non-zero exit into a DispatchError; zero exit passes through. */
export function requireSuccess(
	command: string,
	outcome: CommandOutcome,
): Result<CommandOutcome, DispatchError> {
	if (outcome.exitCode === 0) return ok(outcome);
	const how =
		outcome.signal !== null ? `was killed by ${outcome.signal}` : `exited with ${outcome.exitCode}`;
	return err(
		new DispatchError(`${command} ${how}`, {
			exitCode: outcome.exitCode,
			signal: outcome.signal,
			stderr: outcome.stderr,
		}),
	);
}
