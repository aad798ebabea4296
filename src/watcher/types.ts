/**
 * Watcher types: the contract between an event watcher and the host
 * agent's dispatch loop, plus the graceful-shutdown constants.
 */

import { watchKey } from "../shared/identifiers.js";

/** The graceful shutdown watcher's ID. */
export const WATCHER_ID = "graceful-shutdown-watcher";
/** The graceful shutdown watcher's event type. */
export const RUN_SCRIPT_EVENT = "graceful-shutdown-watcher,run-script";
/** Metadata attribute carrying the instance stop state. */
export const STOP_STATE_KEY = watchKey("instance/shutdown-details/stop-state");
/** Stop-state value announcing an imminent stop. */
export const PENDING_STOP = "PENDING_STOP";

// ── Driver contract ──────────────────────────────────────────────────

export interface WatcherRunResult {
	/** Whether the driver should call `run` again */
	readonly continuePolling: boolean;
	/** Set only when the driver's signal fired; it is the signal's own reason */
	readonly error?: unknown;
}

/**
 * A pluggable watcher as seen by the dispatch loop. The loop calls `run`
 * repeatedly while it returns `continuePolling: true`.
 */
export interface EventWatcher {
	id(): string;
	events(): readonly string[];
	run(signal: AbortSignal, eventType: string): Promise<WatcherRunResult>;
}

// ── States ───────────────────────────────────────────────────────────

export const WatcherState = {
	/** Waiting for the stop state to change; initial and recurring */
	IdleWaiting: "idle_waiting",
	/** Shutdown signal seen, scripts being dispatched */
	Acting: "acting",
	/** Terminal; scripts were dispatched */
	Stopped: "stopped",
} as const;

export type WatcherState = (typeof WatcherState)[keyof typeof WatcherState];

export interface WatcherSnapshot {
	readonly state: WatcherState;
	readonly enteredAt: number;
	/** Last value the metadata server reported, untrimmed */
	readonly lastValue: string | undefined;
}
