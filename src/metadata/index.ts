export {
	WatchOutcomeType,
	WatchParam,
	METADATA_FLAVOR_HEADER,
	METADATA_FLAVOR_VALUE,
	type WatchOutcome,
	type FetchLike,
	type KeyWatchClient,
	type MetadataClientConfig,
} from "./types.js";

export { MetadataClient, ChangeWatchClient } from "./watch-client.js";
