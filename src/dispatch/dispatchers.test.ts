import { describe, expect, it } from "vitest";
import { createCapturingLogger } from "../lib/logger/logger-test-helpers.js";
import { DispatchError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import { NoopDispatcher, createScriptDispatcher } from "./create-dispatcher.js";
import { ScriptRunnerDispatcher, scriptRunnerPath } from "./script-runner-dispatcher.js";
import { SystemdServiceDispatcher } from "./systemd-dispatcher.js";
import type { CommandOutcome, CommandRunner } from "./types.js";

// ── Fakes ────────────────────────────────────────────────────────────

class FakeRunner implements CommandRunner {
	readonly calls: Array<{ command: string; args: string[] }> = [];
	private readonly reply: Result<CommandOutcome, DispatchError>;

	constructor(reply: Result<CommandOutcome, DispatchError> = ok(exited(0))) {
		this.reply = reply;
	}

	async run(
		command: string,
		args: readonly string[],
	): Promise<Result<CommandOutcome, DispatchError>> {
		this.calls.push({ command, args: [...args] });
		return this.reply;
	}
}

function exited(exitCode: number, stderr = ""): CommandOutcome {
	return { exitCode, signal: null, stderr };
}

const AGENT_EXE = "C:\\Program Files\\Google\\Compute Engine\\agent\\GCEWindowsAgent.exe";
const RUNNER_EXE = "C:\\Program Files\\Google\\Compute Engine\\agent\\GCEMetadataScriptRunner.exe";

// ── Systemd ──────────────────────────────────────────────────────────

describe("SystemdServiceDispatcher", () => {
	it("starts the graceful shutdown unit through systemctl", async () => {
		const runner = new FakeRunner();
		const { logger, find } = createCapturingLogger();

		await new SystemdServiceDispatcher(runner, logger).dispatch();

		expect(runner.calls).toEqual([
			{ command: "systemctl", args: ["start", "google-graceful-shutdown-scripts.service"] },
		]);
		expect(find("Graceful shutdown service started")).toHaveLength(1);
		expect(find("Starting graceful shutdown scripts")).toHaveLength(0);
	});

	it("uses the unit it was given", async () => {
		const runner = new FakeRunner();
		const { logger } = createCapturingLogger();

		await new SystemdServiceDispatcher(runner, logger, "other.service").dispatch();

		expect(runner.calls[0]?.args).toEqual(["start", "other.service"]);
	});

	it("logs a non-zero systemctl exit and resolves", async () => {
		const runner = new FakeRunner(ok(exited(5, "Unit not found.")));
		const { logger, find } = createCapturingLogger();

		await expect(new SystemdServiceDispatcher(runner, logger).dispatch()).resolves.toBeUndefined();

		const [failure] = find("Failed to run graceful shutdown script");
		expect(failure).toMatchObject({
			level: 50,
			unit: "google-graceful-shutdown-scripts.service",
			err: { type: "DispatchError", message: "systemctl exited with 5" },
		});
		expect(find("Graceful shutdown service started")).toHaveLength(0);
	});

	it("reports a signal kill", async () => {
		const runner = new FakeRunner(ok({ exitCode: null, signal: "SIGKILL", stderr: "" }));
		const { logger, find } = createCapturingLogger();

		await new SystemdServiceDispatcher(runner, logger).dispatch();

		expect(find("Failed to run graceful shutdown script")[0]).toMatchObject({
			err: { message: "systemctl was killed by SIGKILL" },
		});
	});

	it("logs a spawn failure", async () => {
		const runner = new FakeRunner(err(new DispatchError("Failed to start systemctl: ENOENT")));
		const { logger, find } = createCapturingLogger();

		await new SystemdServiceDispatcher(runner, logger).dispatch();

		expect(find("Failed to run graceful shutdown script")[0]).toMatchObject({
			err: { message: "Failed to start systemctl: ENOENT" },
		});
	});
});

// ── Script runner ────────────────────────────────────────────────────

describe("scriptRunnerPath", () => {
	it("places the runner beside the agent executable", () => {
		expect(scriptRunnerPath(AGENT_EXE)).toBe(RUNNER_EXE);
	});
});

describe("ScriptRunnerDispatcher", () => {
	it("runs the script runner with the graceful-shutdown action", async () => {
		const runner = new FakeRunner();
		const { logger, find } = createCapturingLogger();

		await new ScriptRunnerDispatcher(runner, logger, () => ok(AGENT_EXE)).dispatch();

		expect(runner.calls).toEqual([{ command: RUNNER_EXE, args: ["graceful-shutdown"] }]);
		expect(find("Graceful shutdown scripts finished")[0]).toMatchObject({ runner: RUNNER_EXE });
	});

	it("skips the run when the executable path cannot be resolved", async () => {
		const runner = new FakeRunner();
		const { logger, find } = createCapturingLogger();

		await new ScriptRunnerDispatcher(runner, logger, () =>
			err(new DispatchError("Agent executable path is empty")),
		).dispatch();

		expect(runner.calls).toHaveLength(0);
		expect(find("Failed to get agent executable path")[0]).toMatchObject({
			level: 50,
			err: { message: "Agent executable path is empty" },
		});
	});

	it("logs a failing runner and resolves", async () => {
		const runner = new FakeRunner(ok(exited(1)));
		const { logger, find } = createCapturingLogger();

		await new ScriptRunnerDispatcher(runner, logger, () => ok(AGENT_EXE)).dispatch();

		expect(find("Failed to run graceful shutdown script")[0]).toMatchObject({
			runner: RUNNER_EXE,
			err: { message: `${RUNNER_EXE} exited with 1` },
		});
	});
});

// ── Platform selection ───────────────────────────────────────────────

describe("createScriptDispatcher", () => {
	it.each([
		["linux", "systemd"],
		["win32", "script-runner"],
		["darwin", "noop"],
		["freebsd", "noop"],
	] as const)("picks the %s dispatcher", (platform, name) => {
		const dispatcher = createScriptDispatcher({
			logger: createCapturingLogger().logger,
			platform,
			runner: new FakeRunner(),
		});

		expect(dispatcher.name).toBe(name);
	});

	it("passes the executable resolver to the script runner", async () => {
		const runner = new FakeRunner();
		const dispatcher = createScriptDispatcher({
			logger: createCapturingLogger().logger,
			platform: "win32",
			runner,
			resolveExecutable: () => ok(AGENT_EXE),
		});

		await dispatcher.dispatch();

		expect(runner.calls[0]?.command).toBe(RUNNER_EXE);
	});

	it("binds component and platform to dispatcher logs", async () => {
		const { logger, find } = createCapturingLogger();
		const dispatcher = createScriptDispatcher({
			logger,
			platform: "linux",
			runner: new FakeRunner(),
		});

		await dispatcher.dispatch();

		expect(find("Graceful shutdown service started")[0]).toMatchObject({
			component: "script-dispatcher",
			platform: "linux",
		});
	});
});

describe("NoopDispatcher", () => {
	it("warns and does nothing else", async () => {
		const { logger, records } = createCapturingLogger();

		await new NoopDispatcher(logger, "darwin").dispatch();

		expect(records()).toHaveLength(1);
		expect(records()[0]).toMatchObject({
			level: 40,
			platform: "darwin",
			msg: "No graceful shutdown script facility on this platform",
		});
	});
});
