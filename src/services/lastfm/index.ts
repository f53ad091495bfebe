export { LastfmClient, RETRY_STATUS_CODES, type LastfmClientOptions } from './client.js';
export type { TrackRecord, FetchResult, TrackSource } from './types.js';
