import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CancelledError } from "./errors.js";
import { Duration, FakeClock, SystemClock, delay } from "./time.js";

describe("Clock", () => {
	it("SystemClock returns current time", () => {
		const before = Date.now();
		const now = SystemClock.now();
		expect(now).toBeGreaterThanOrEqual(before);
		expect(now).toBeLessThanOrEqual(Date.now());
	});

	it("FakeClock starts at given time and advances", () => {
		const clock = new FakeClock(1000);
		expect(clock.now()).toBe(1000);
		clock.advance(250);
		expect(clock.now()).toBe(1250);
	});

	it("Duration converts to milliseconds", () => {
		expect(Duration.ms(7)).toBe(7);
		expect(Duration.seconds(5)).toBe(5_000);
		expect(Duration.minutes(1)).toBe(60_000);
	});
});

describe("delay", () => {
	beforeEach(() => {
		vi.useFakeTimers();
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	it("resolves ok after the full duration", async () => {
		let settled = false;
		const pending = delay(5_000).then((r) => {
			settled = true;
			return r;
		});

		await vi.advanceTimersByTimeAsync(4_999);
		expect(settled).toBe(false);

		await vi.advanceTimersByTimeAsync(1);
		expect(await pending).toEqual({ ok: true, value: undefined });
	});

	it("resolves err(CancelledError) with the abort reason when the signal fires", async () => {
		const controller = new AbortController();
		const reason = new Error("driver stopping");
		const pending = delay(60_000, controller.signal);

		await vi.advanceTimersByTimeAsync(1_000);
		controller.abort(reason);

		const result = await pending;
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(CancelledError);
			expect(result.error.reason).toBe(reason);
		}
		expect(vi.getTimerCount()).toBe(0);
	});

	it("returns immediately for an already-aborted signal", async () => {
		const controller = new AbortController();
		controller.abort("gone");

		const result = await delay(60_000, controller.signal);

		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.reason).toBe("gone");
		expect(vi.getTimerCount()).toBe(0);
	});

	it("treats negative durations as zero", async () => {
		const pending = delay(-5);
		await vi.runAllTimersAsync();
		expect((await pending).ok).toBe(true);
	});
});
