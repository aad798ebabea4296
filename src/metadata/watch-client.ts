/**
 * Change-watch client: long-polls one metadata key.
 *
 * Each request asks the server to hold the connection until the value differs
 * from the last ETag we saw. `wait_for_change`, `last_etag` and `timeout_sec`
 * travel in the query string; the metadata server ignores them as headers.
 */

import type { Logger } from "../lib/logger/index.js";
import {
	MetadataRequestError,
	describeError,
	isKeyNotPresent,
	toMetadataRequestError,
} from "../shared/errors.js";
import {
	type ChangeToken,
	INITIAL_CHANGE_TOKEN,
	type WatchKey,
	changeToken,
} from "../shared/identifiers.js";
import { Duration } from "../shared/time.js";
import {
	type FetchLike,
	type KeyWatchClient,
	METADATA_FLAVOR_HEADER,
	METADATA_FLAVOR_VALUE,
	type MetadataClientConfig,
	type WatchOutcome,
	WatchParam,
} from "./types.js";

/**
 * Shared transport for all keys: base URL, fetch and logger.
 *
 * Holds no per-key state. Every call to `watcher()` returns a fresh
 * ChangeWatchClient that owns its own change token.
 *
 * @example
 * ```ts
 * const metadata = new MetadataClient(config, { logger });
 * const stopState = metadata.watcher(watchKey("instance/shutdown-details/stop-state"));
 * const outcome = await stopState.watch(signal);
 * ```
 */
export class MetadataClient {
	private readonly config: MetadataClientConfig;
	private readonly fetchFn: FetchLike;
	private readonly logger: Logger;

	constructor(config: MetadataClientConfig, deps: { logger: Logger; fetch?: FetchLike }) {
		this.config = { ...config, baseUrl: config.baseUrl.replace(/\/+$/, "") };
		this.fetchFn = deps.fetch ?? ((input, init) => fetch(input, init));
		this.logger = deps.logger;
	}

	watcher(key: WatchKey): ChangeWatchClient {
		return new ChangeWatchClient(key, this.config, this.fetchFn, this.logger.child({ key }));
	}
}

export class ChangeWatchClient implements KeyWatchClient {
	readonly key: WatchKey;
	private token: ChangeToken = INITIAL_CHANGE_TOKEN;
	private readonly config: MetadataClientConfig;
	private readonly fetchFn: FetchLike;
	private readonly logger: Logger;

	constructor(key: WatchKey, config: MetadataClientConfig, fetchFn: FetchLike, logger: Logger) {
		this.key = key;
		this.config = config;
		this.fetchFn = fetchFn;
		this.logger = logger;
	}

	/** Token the next request will send as `last_etag`. */
	lastToken(): ChangeToken {
		return this.token;
	}

	/** Full URL of the next long-poll request. */
	requestUrl(): string {
		const params = new URLSearchParams({
			[WatchParam.WaitForChange]: "true",
			[WatchParam.LastEtag]: this.token,
			[WatchParam.TimeoutSec]: String(this.config.watchTimeoutSec),
		});
		return `${this.config.baseUrl}/${this.key}?${params.toString()}`;
	}

	/**
	 * Blocks until the server reports a value for the key, the key turns out
	 * to be absent, the request fails, or `signal` fires.
	 *
	 * Never rejects. The stored token is replaced only on `found`.
	 */
	async watch(signal?: AbortSignal): Promise<WatchOutcome> {
		if (signal?.aborted) {
			return { type: "cancelled", reason: signal.reason };
		}

		const deadlineSec = this.config.watchTimeoutSec + this.config.requestSlackSec;
		const controller = new AbortController();
		const onAbort = (): void => controller.abort(signal?.reason);
		signal?.addEventListener("abort", onAbort, { once: true });
		const timer = setTimeout(() => {
			controller.abort(
				new MetadataRequestError(`No response within ${deadlineSec}s`, undefined, {
					key: this.key,
				}),
			);
		}, Duration.seconds(deadlineSec));

		const url = this.requestUrl();
		this.logger.debug({ lastEtag: this.token }, "Watching metadata key");

		try {
			const response = await this.fetchFn(url, {
				method: "GET",
				headers: { [METADATA_FLAVOR_HEADER]: METADATA_FLAVOR_VALUE },
				signal: controller.signal,
			});

			const body = await response.text();

			if (!response.ok) {
				const failure = new MetadataRequestError(
					`Metadata server returned ${response.status} for ${this.key}`,
					response.status,
					{ key: this.key, body: body.slice(0, 256) },
				);
				if (isKeyNotPresent(failure)) {
					this.logger.debug("Metadata key not present");
					return { type: "not_present" };
				}
				return { type: "transport_error", error: failure };
			}

			const etag = response.headers.get("etag");
			if (etag === null || etag.trim().length === 0) {
				return {
					type: "transport_error",
					error: new MetadataRequestError(
						`Metadata response for ${this.key} carried no ETag`,
						response.status,
						{ key: this.key },
					),
				};
			}

			this.token = changeToken(etag);
			this.logger.debug({ etag: this.token }, "Metadata key changed");
			return { type: "found", value: body, token: this.token };
		} catch (error) {
			if (signal?.aborted) {
				return { type: "cancelled", reason: signal.reason };
			}
			this.logger.debug({ reason: describeError(error) }, "Metadata request failed");
			return { type: "transport_error", error: toMetadataRequestError(error, { key: this.key }) };
		} finally {
			clearTimeout(timer);
			signal?.removeEventListener("abort", onAbort);
		}
	}
}
