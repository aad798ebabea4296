/**
 * Domain primitive identifiers: branded types for compile-time safety.
 *
 * A WatchKey can't be passed where a ChangeToken is expected and vice versa,
 * even though both are plain strings on the wire.
 */

// ── Brand infrastructure ─────────────────────────────────────────────

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ── Identifier types ─────────────────────────────────────────────────

/** Path of one metadata attribute, relative to the metadata base URL. */
export type WatchKey = Brand<string, "WatchKey">;
/** Server-issued version marker (the response ETag) for a watched value. */
export type ChangeToken = Brand<string, "ChangeToken">;

// ── Factory functions with validation ────────────────────────────────

/** Create a validated WatchKey. Surrounding slashes are dropped. Throws if empty. */
export function watchKey(value: string): WatchKey {
	const trimmed = value.trim().replace(/^\/+|\/+$/g, "");
	if (trimmed.length === 0) {
		throw new Error("WatchKey cannot be empty");
	}
	return trimmed as WatchKey;
}

/** Create a ChangeToken from a raw header value. Throws if empty. */
export function changeToken(value: string): ChangeToken {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new Error("ChangeToken cannot be empty");
	}
	return trimmed as ChangeToken;
}

/** Token sent before any response was seen; the server never issues it. */
export const INITIAL_CHANGE_TOKEN: ChangeToken = changeToken("NONE");
