import { describe, expect, it } from "vitest";
import { MetadataRequestError } from "../../shared/errors.js";
import { createLogger, createSilentLogger } from "./index.js";

function capture(level: "debug" | "info" | "warn" = "info") {
	const lines: string[] = [];
	const logger = createLogger({
		level,
		destination: {
			write(msg: string) {
				lines.push(msg);
			},
		},
	});
	const records = (): Array<Record<string, unknown>> =>
		lines.map((l) => JSON.parse(l) as Record<string, unknown>);
	return { logger, records };
}

describe("Logger", () => {
	describe("createLogger", () => {
		it("writes one JSON line per call with msg and numeric level", () => {
			const { logger, records } = capture();

			logger.info({ key: "instance/shutdown-details/stop-state" }, "Watching");

			expect(records()).toHaveLength(1);
			expect(records()[0]).toMatchObject({
				level: 30,
				msg: "Watching",
				key: "instance/shutdown-details/stop-state",
			});
		});

		it("binds child fields to every line", () => {
			const { logger, records } = capture();

			logger.child({ watcher: "graceful-shutdown-watcher" }).warn("careful");

			expect(records()[0]).toMatchObject({
				level: 40,
				msg: "careful",
				watcher: "graceful-shutdown-watcher",
			});
		});

		it("adds base fields when configured", () => {
			const lines: string[] = [];
			const logger = createLogger({
				level: "info",
				base: { service: "shutdown-watcher" },
				destination: { write: (m: string) => lines.push(m) },
			});

			logger.info("hello");

			const record = JSON.parse(lines[0] ?? "{}") as Record<string, unknown>;
			expect(record["service"]).toBe("shutdown-watcher");
			expect(record["pid"]).toBeUndefined();
		});
	});

	describe("error serialization", () => {
		it("serializes Error fields with message and custom properties", () => {
			const { logger, records } = capture();

			const failure = new MetadataRequestError("Metadata server returned 503", 503);
			logger.error({ err: failure }, "failed");

			const err = records()[0]?.["err"] as Record<string, unknown>;
			expect(err["message"]).toBe("Metadata server returned 503");
			expect(err["type"]).toBe("MetadataRequestError");
			expect(err["status"]).toBe(503);
			expect(err["kind"]).toBe("transport");
		});
	});

	describe("log levels", () => {
		it("respects configured log level", () => {
			const { logger, records } = capture("warn");

			logger.debug("should not appear");
			logger.info("should not appear either");
			logger.warn("should appear");

			expect(records().map((r) => r["msg"])).toEqual(["should appear"]);
		});

		it("silent logger writes nothing and still supports child()", () => {
			const logger = createSilentLogger();
			expect(() => logger.child({ a: 1 }).error("ignored")).not.toThrow();
		});
	});

	describe("adversarial", () => {
		it("does not throw when logging undefined or null values", () => {
			const { logger } = capture();
			expect(() => logger.info(undefined as unknown as string)).not.toThrow();
			expect(() => logger.info(null as unknown as string)).not.toThrow();
		});

		it("handles circular references", () => {
			const { logger } = capture();
			const circular: Record<string, unknown> = { name: "test" };
			circular["self"] = circular;

			expect(() => logger.info(circular, "circular test")).not.toThrow();
		});
	});
});
