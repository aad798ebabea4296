/**
 * GracefulShutdownWatcher: turns the instance stop state into a one-time
 * run of the local shutdown scripts.
 *
 * One `run` call is one long-poll attempt:
 * - key absent: wait 60s, poll again
 * - transport failure: log, wait 5s, poll again
 * - PENDING_STOP: dispatch scripts, stop
 * - anything else: poll again immediately
 *
 * Both waits race the driver's signal; when it fires the watcher stops and
 * hands the signal's reason back as the error.
 *
 * Once the scripts were dispatched the watcher is Stopped for good: later
 * `run` calls return `continuePolling: false` without polling or dispatching,
 * whether or not the driver honors the first answer, and overlapping runs
 * cannot dispatch twice. A dispatcher that rejects is logged, not propagated.
 */

import type { ScriptDispatcher } from "../dispatch/types.js";
import type { Logger } from "../lib/logger/index.js";
import type { KeyWatchClient } from "../metadata/types.js";
import type { Clock } from "../shared/time.js";
import { Duration, SystemClock, delay } from "../shared/time.js";
import {
	type EventWatcher,
	PENDING_STOP,
	RUN_SCRIPT_EVENT,
	WATCHER_ID,
	type WatcherRunResult,
	type WatcherSnapshot,
	WatcherState,
} from "./types.js";

export interface GracefulShutdownWatcherOptions {
	readonly client: KeyWatchClient;
	readonly dispatcher: ScriptDispatcher;
	readonly logger: Logger;
	readonly notPresentDelayMs?: number;
	readonly transportErrorDelayMs?: number;
	readonly clock?: Clock;
}

export const DEFAULT_NOT_PRESENT_DELAY_MS = Duration.minutes(1);
export const DEFAULT_TRANSPORT_ERROR_DELAY_MS = Duration.seconds(5);

export class GracefulShutdownWatcher implements EventWatcher {
	private readonly client: KeyWatchClient;
	private readonly dispatcher: ScriptDispatcher;
	private readonly logger: Logger;
	private readonly notPresentDelayMs: number;
	private readonly transportErrorDelayMs: number;
	private readonly clock: Clock;
	private current: WatcherState = WatcherState.IdleWaiting;
	private enteredAt: number;
	private lastValue: string | undefined;

	constructor(options: GracefulShutdownWatcherOptions) {
		this.client = options.client;
		this.dispatcher = options.dispatcher;
		this.logger = options.logger.child({ watcher: WATCHER_ID, key: options.client.key });
		this.notPresentDelayMs = options.notPresentDelayMs ?? DEFAULT_NOT_PRESENT_DELAY_MS;
		this.transportErrorDelayMs = options.transportErrorDelayMs ?? DEFAULT_TRANSPORT_ERROR_DELAY_MS;
		this.clock = options.clock ?? SystemClock;
		this.enteredAt = this.clock.now();
	}

	id(): string {
		return WATCHER_ID;
	}

	events(): readonly string[] {
		return [RUN_SCRIPT_EVENT];
	}

	state(): WatcherState {
		return this.current;
	}

	snapshot(): WatcherSnapshot {
		return { state: this.current, enteredAt: this.enteredAt, lastValue: this.lastValue };
	}

	/** Perform one watch attempt and tell the driver whether to call again. */
	async run(signal: AbortSignal, eventType: string = RUN_SCRIPT_EVENT): Promise<WatcherRunResult> {
		if (this.current !== WatcherState.IdleWaiting) {
			return this.alreadyFired(eventType);
		}

		const outcome = await this.client.watch(signal);

		switch (outcome.type) {
			case "not_present":
				// Feature not exposed for this instance; check back rarely.
				return this.waitAndRenew(this.notPresentDelayMs, signal);

			case "transport_error":
				this.logger.error(
					{ err: outcome.error, eventType, status: outcome.error.status },
					"Error watching graceful shutdown metadata",
				);
				return this.waitAndRenew(this.transportErrorDelayMs, signal);

			case "cancelled":
				return { continuePolling: false, error: outcome.reason };

			case "found":
				this.lastValue = outcome.value;
				if (outcome.value.trim() !== PENDING_STOP) {
					this.logger.debug({ value: outcome.value }, "Stop state changed, no action");
					return { continuePolling: true };
				}
				// An overlapping run may have fired while this one was waiting.
				if (this.current !== WatcherState.IdleWaiting) {
					return this.alreadyFired(eventType);
				}
				await this.fire(eventType);
				return { continuePolling: false };
		}
	}

	private async fire(eventType: string): Promise<void> {
		this.enter(WatcherState.Acting);
		this.logger.info(
			{ eventType, dispatcher: this.dispatcher.name },
			"Instance is stopping, running graceful shutdown scripts",
		);
		try {
			await this.dispatcher.dispatch();
		} catch (error) {
			this.logger.error(
				{ err: error, eventType, dispatcher: this.dispatcher.name },
				"Failed to run graceful shutdown script",
			);
		} finally {
			this.enter(WatcherState.Stopped);
		}
	}

	private alreadyFired(eventType: string): WatcherRunResult {
		this.logger.debug({ eventType, state: this.current }, "Watcher already fired, not renewing");
		return { continuePolling: false };
	}

	private async waitAndRenew(ms: number, signal: AbortSignal): Promise<WatcherRunResult> {
		const waited = await delay(ms, signal);
		if (!waited.ok) {
			return { continuePolling: false, error: waited.error.reason };
		}
		return { continuePolling: true };
	}

	private enter(state: WatcherState): void {
		this.current = state;
		this.enteredAt = this.clock.now();
	}
}
