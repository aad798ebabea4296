/**
 * In-process fake metadata server for contract and integration tests.
 *
 * Behaves like the real service where the watcher depends on it:
 * - requires `Metadata-Flavor: Google`
 * - reads `wait_for_change`, `last_etag`, `timeout_sec` from the query only,
 *   and answers 400 when any of them arrives as a header
 * - holds a waiting request while `last_etag` matches the current ETag, until
 *   the value changes or `timeout_sec` elapses
 * - answers 404 for unknown keys
 */

import {
	type IncomingMessage,
	type Server,
	type ServerResponse,
	createServer,
} from "node:http";
import type { AddressInfo } from "node:net";

const PATH_PREFIX = "/computeMetadata/v1/";
const HEADER_PARAMS = [
	"wait_for_change",
	"last_etag",
	"timeout_sec",
	"wait-for-change",
	"last-etag",
];
const DEFAULT_TIMEOUT_SEC = 60;

interface Entry {
	readonly value: string;
	readonly etag: string;
}

interface Waiter {
	readonly key: string;
	readonly res: ServerResponse;
	readonly timer: NodeJS.Timeout;
}

export interface ObservedRequest {
	readonly key: string;
	readonly waitForChange: boolean;
	readonly lastEtag: string | null;
	readonly timeoutSec: string | null;
	readonly flavor: string | undefined;
	/** Watch parameters that arrived as headers instead of query parameters */
	readonly headerParams: readonly string[];
}

export class FakeMetadataServer {
	readonly requests: ObservedRequest[] = [];
	private readonly server: Server;
	private readonly entries = new Map<string, Entry>();
	private waiters: Waiter[] = [];
	private etagCounter = 0;

	private constructor(server: Server) {
		this.server = server;
	}

	static async start(): Promise<FakeMetadataServer> {
		const server = createServer();
		const fake = new FakeMetadataServer(server);
		server.on("request", (req: IncomingMessage, res: ServerResponse) => fake.handle(req, res));
		await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
		return fake;
	}

	get baseUrl(): string {
		const address: AddressInfo | string | null = this.server.address();
		if (address === null || typeof address === "string") {
			throw new Error("Fake metadata server is not listening on a TCP port");
		}
		return `http://127.0.0.1:${address.port}/computeMetadata/v1`;
	}

	/** Set a value under a fresh ETag and release requests waiting on the key. */
	set(key: string, value: string): string {
		this.etagCounter += 1;
		const entry = { value, etag: `etag-${this.etagCounter}` };
		this.entries.set(key, entry);
		this.release(key, (res) => this.sendEntry(res, entry));
		return entry.etag;
	}

	/** Remove a key; waiting requests get 404. */
	remove(key: string): void {
		this.entries.delete(key);
		this.release(key, (res) => this.send(res, 404, "Not Found"));
	}

	/** Number of requests currently held open. */
	waiting(): number {
		return this.waiters.length;
	}

	async close(): Promise<void> {
		for (const waiter of this.waiters) clearTimeout(waiter.timer);
		this.waiters = [];
		this.server.closeAllConnections();
		await new Promise<void>((resolve, reject) =>
			this.server.close((error) => (error ? reject(error) : resolve())),
		);
	}

	private handle(req: IncomingMessage, res: ServerResponse): void {
		const url = new URL(req.url ?? "/", "http://fake-metadata");
		const key = url.pathname.startsWith(PATH_PREFIX) ? url.pathname.slice(PATH_PREFIX.length) : "";
		const headerParams = HEADER_PARAMS.filter((h) => req.headers[h] !== undefined);
		const flavor = req.headers["metadata-flavor"];

		this.requests.push({
			key,
			waitForChange: url.searchParams.get("wait_for_change") === "true",
			lastEtag: url.searchParams.get("last_etag"),
			timeoutSec: url.searchParams.get("timeout_sec"),
			flavor: typeof flavor === "string" ? flavor : undefined,
			headerParams,
		});

		if (headerParams.length > 0) {
			this.send(res, 400, `watch parameters must be query parameters: ${headerParams.join(",")}`);
			return;
		}
		if (flavor !== "Google") {
			this.send(res, 403, "Missing Metadata-Flavor:Google header.");
			return;
		}

		const entry = this.entries.get(key);
		if (entry === undefined) {
			this.send(res, 404, "Not Found");
			return;
		}

		const waitForChange = url.searchParams.get("wait_for_change") === "true";
		if (!waitForChange || url.searchParams.get("last_etag") !== entry.etag) {
			this.sendEntry(res, entry);
			return;
		}

		const timeoutSec = Number(url.searchParams.get("timeout_sec") ?? DEFAULT_TIMEOUT_SEC);
		const timer = setTimeout(() => {
			this.drop(res);
			const current = this.entries.get(key);
			if (current === undefined) this.send(res, 404, "Not Found");
			else this.sendEntry(res, current);
		}, timeoutSec * 1_000);
		this.waiters.push({ key, res, timer });
		res.on("close", () => this.drop(res));
	}

	private release(key: string, reply: (res: ServerResponse) => void): void {
		const released = this.waiters.filter((w) => w.key === key);
		this.waiters = this.waiters.filter((w) => w.key !== key);
		for (const waiter of released) {
			clearTimeout(waiter.timer);
			reply(waiter.res);
		}
	}

	private drop(res: ServerResponse): void {
		const waiter = this.waiters.find((w) => w.res === res);
		if (waiter === undefined) return;
		clearTimeout(waiter.timer);
		this.waiters = this.waiters.filter((w) => w !== waiter);
	}

	private sendEntry(res: ServerResponse, entry: Entry): void {
		res.writeHead(200, { "Content-Type": "text/plain", ETag: entry.etag });
		res.end(entry.value);
	}

	private send(res: ServerResponse, status: number, body: string): void {
		res.writeHead(status, { "Content-Type": "text/plain" });
		res.end(body);
	}
}
