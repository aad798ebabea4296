/**
 * Metadata long-poll types.
 *
 * A watch attempt ends in exactly one WatchOutcome. Callers switch on `type`;
 * none of the variants is thrown.
 */

import type { MetadataRequestError } from "../shared/errors.js";
import type { ChangeToken, WatchKey } from "../shared/identifiers.js";

// ── Outcomes ─────────────────────────────────────────────────────────

export const WatchOutcomeType = {
	Found: "found",
	NotPresent: "not_present",
	TransportError: "transport_error",
	Cancelled: "cancelled",
} as const;

export type WatchOutcomeType = (typeof WatchOutcomeType)[keyof typeof WatchOutcomeType];

export type WatchOutcome =
	| { readonly type: "found"; readonly value: string; readonly token: ChangeToken }
	| { readonly type: "not_present" }
	| { readonly type: "transport_error"; readonly error: MetadataRequestError }
	| { readonly type: "cancelled"; readonly reason: unknown };

// ── Transport ────────────────────────────────────────────────────────

/** The subset of the global `fetch` the client uses; tests pass their own. */
export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface MetadataClientConfig {
	/** Metadata service root without trailing slash */
	readonly baseUrl: string;
	/** Server-side hold per request, sent as `timeout_sec` */
	readonly watchTimeoutSec: number;
	/** Seconds past `watchTimeoutSec` before the request is aborted locally */
	readonly requestSlackSec: number;
}

/** Query parameter names understood by the metadata server. */
export const WatchParam = {
	WaitForChange: "wait_for_change",
	LastEtag: "last_etag",
	TimeoutSec: "timeout_sec",
} as const;

/** Header every metadata request must carry. */
export const METADATA_FLAVOR_HEADER = "Metadata-Flavor";
export const METADATA_FLAVOR_VALUE = "Google";

/** Contract the watcher depends on; one instance per watched key. */
export interface KeyWatchClient {
	readonly key: WatchKey;
	watch(signal?: AbortSignal): Promise<WatchOutcome>;
}
