/**
 * Time utilities: injectable clock and abortable delays.
 *
 * Watcher code uses Clock.now() instead of Date.now() directly and
 * delay() instead of a bare setTimeout, so tests can control both.
 */

import { CancelledError } from "./errors.js";
import { err, ok } from "./result.js";
import type { Result } from "./result.js";

/** Injectable time source -- watcher code depends on this instead of `Date.now()`. */
export interface Clock {
	now(): number;
}

/** Production clock backed by `Date.now()`. */
export const SystemClock: Clock = {
	now: () => Date.now(),
};

/** Controllable clock for deterministic testing -- advance time manually with `advance()`. */
export class FakeClock implements Clock {
	private time: number;

	constructor(startMs = 0) {
		this.time = startMs;
	}

	now(): number {
		return this.time;
	}

	advance(ms: number): void {
		this.time += ms;
	}
}

// ── Duration helpers ─────────────────────────────────────────────────

/** Helpers to convert human-readable durations to milliseconds. */
export const Duration = {
	ms: (n: number) => n,
	seconds: (n: number) => n * 1_000,
	minutes: (n: number) => n * 60_000,
} as const;

// ── Abortable delay ──────────────────────────────────────────────────

/**
 * Wait `ms` milliseconds unless `signal` fires first.
 *
 * Resolves `ok` once the time elapsed, or `err(CancelledError)` carrying
 * `signal.reason` as soon as the signal aborts (immediately if it already has).
 * Never rejects, and never leaves a timer or listener behind.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<Result<void, CancelledError>> {
	if (signal?.aborted) {
		return Promise.resolve(err(new CancelledError("Delay cancelled", signal.reason)));
	}

	return new Promise((resolve) => {
		const onAbort = (): void => {
			clearTimeout(timer);
			resolve(err(new CancelledError("Delay cancelled", signal?.reason)));
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve(ok(undefined));
		}, Math.max(0, ms));
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}
