/**
 * Fakes for driving GracefulShutdownWatcher without a metadata server.
 */

import type { ScriptDispatcher } from "../dispatch/types.js";
import { MetadataRequestError } from "../shared/errors.js";
import { changeToken } from "../shared/identifiers.js";
import type { KeyWatchClient, WatchOutcome } from "../metadata/types.js";
import { STOP_STATE_KEY } from "./types.js";

/** Answers each `watch` with the next scripted outcome. */
export class ScriptedWatchClient implements KeyWatchClient {
	readonly key = STOP_STATE_KEY;
	readonly signals: Array<AbortSignal | undefined> = [];
	private readonly outcomes: WatchOutcome[];

	constructor(outcomes: readonly WatchOutcome[]) {
		this.outcomes = [...outcomes];
	}

	get calls(): number {
		return this.signals.length;
	}

	async watch(signal?: AbortSignal): Promise<WatchOutcome> {
		this.signals.push(signal);
		const next = this.outcomes.shift();
		if (next === undefined) {
			throw new Error(`No outcome scripted for watch call #${this.signals.length}`);
		}
		return next;
	}
}

export class RecordingDispatcher implements ScriptDispatcher {
	readonly name = "recording";
	dispatches = 0;
	private readonly onDispatch: () => void | Promise<void>;

	constructor(onDispatch: () => void | Promise<void> = () => {}) {
		this.onDispatch = onDispatch;
	}

	async dispatch(): Promise<void> {
		this.dispatches += 1;
		await this.onDispatch();
	}
}

let etagSeq = 0;

export function found(value: string): WatchOutcome {
	etagSeq += 1;
	return { type: "found", value, token: changeToken(`etag-${etagSeq}`) };
}

export const notPresent: WatchOutcome = { type: "not_present" };

export function transportError(status?: number): WatchOutcome {
	return {
		type: "transport_error",
		error: new MetadataRequestError("Metadata server returned an error", status),
	};
}

export function cancelled(reason: unknown): WatchOutcome {
	return { type: "cancelled", reason };
}
