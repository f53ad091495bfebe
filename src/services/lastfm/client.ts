import got, { HTTPError, ParseError, RequestError, type Got } from 'got';
import { FetchError } from '../../errors.js';
import type { Logger } from '../../logger.js';
import {
  lastfmErrorSchema,
  recentTrackSchema,
  recentTracksResponseSchema,
  type FetchResult,
  type TrackRecord,
  type TrackSource,
} from './types.js';

export const RETRY_STATUS_CODES = [500, 502, 503, 504];

export interface LastfmClientOptions {
  apiKey: string;
  username: string;
  apiUrl: string;
  timeoutMs: number;
  retryLimit: number;
  retryBackoffMs: number;
}

export class LastfmClient implements TrackSource {
  private http: Got;
  private options: LastfmClientOptions;
  private logger: Logger;

  constructor(options: LastfmClientOptions, logger: Logger) {
    this.options = options;
    this.logger = logger;

    this.http = got.extend({
      timeout: { request: options.timeoutMs },
      retry: {
        limit: options.retryLimit,
        methods: ['GET'],
        statusCodes: RETRY_STATUS_CODES,
        // got hands us 0 when the error is not retryable or the limit is spent
        calculateDelay: ({ attemptCount, computedValue }) =>
          computedValue === 0 ? 0 : Math.max(1, options.retryBackoffMs * 2 ** (attemptCount - 1)),
      },
      hooks: {
        beforeRetry: [
          (error, retryCount) => {
            this.logger.warn(`Last.fm request failed (${describeRequestError(error)}), retry ${retryCount}/${options.retryLimit}`);
          },
        ],
      },
    });
  }

  /**
   * Fetch the most recent scrobble for the configured user.
   * Never throws: failures come back as `{ ok: false }` and are logged here.
   */
  async fetchCurrentTrack(): Promise<FetchResult> {
    let body: unknown;
    try {
      body = await this.http
        .get(this.options.apiUrl, {
          searchParams: {
            method: 'user.getrecenttracks',
            user: this.options.username,
            api_key: this.options.apiKey,
            format: 'json',
            limit: 1,
          },
        })
        .json<unknown>();
    } catch (error) {
      return this.settle(classifyRequestError(error));
    }

    const envelope = lastfmErrorSchema.safeParse(body);
    if (envelope.success) {
      return this.settle(
        new FetchError('permanent', `Last.fm error ${envelope.data.error}: ${envelope.data.message}`)
      );
    }

    return this.settle(mapRecentTracks(body));
  }

  private settle(outcome: FetchError | TrackRecord): FetchResult {
    if (outcome instanceof FetchError) {
      this.logger.error(`Error fetching data from Last.fm (${outcome.kind}): ${outcome.message}`);
      return { ok: false, error: outcome };
    }
    return { ok: true, track: outcome };
  }
}

function mapRecentTracks(body: unknown): FetchError | TrackRecord {
  const parsed = recentTracksResponseSchema.safeParse(body);
  if (!parsed.success) {
    return new FetchError('permanent', 'Unexpected response shape: recenttracks.track is missing');
  }

  const { track } = parsed.data.recenttracks;
  const events = Array.isArray(track) ? track : [track];
  if (events.length === 0) {
    return new FetchError('permanent', 'No recent tracks for user');
  }

  const first = recentTrackSchema.safeParse(events[0]);
  if (!first.success) {
    const fields = [...new Set(first.error.issues.map((issue) => issue.path.join('.')))];
    return new FetchError('permanent', `Track is missing fields: ${fields.join(', ')}`);
  }

  return {
    artist: first.data.artist['#text'],
    name: first.data.name,
    album: first.data.album['#text'],
    url: first.data.url,
  };
}

function describeRequestError(error: RequestError): string {
  if (error instanceof HTTPError) {
    return `HTTP ${error.response.statusCode}`;
  }
  return error.code || error.name;
}

function parseErrorBody(body: unknown): unknown {
  const text = Buffer.isBuffer(body) ? body.toString('utf-8') : body;
  if (typeof text !== 'string') {
    return text;
  }
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function classifyRequestError(error: unknown): FetchError {
  if (error instanceof HTTPError) {
    const statusCode = error.response.statusCode;
    const kind = RETRY_STATUS_CODES.includes(statusCode) ? 'transient' : 'permanent';
    // Last.fm explains most 4xx answers (bad key, unknown user) in the body
    const envelope = lastfmErrorSchema.safeParse(parseErrorBody(error.response.body));
    if (envelope.success) {
      return new FetchError(kind, `Last.fm error ${envelope.data.error}: ${envelope.data.message}`, {
        statusCode,
        cause: error,
      });
    }
    const reason = error.response.statusMessage ? ` ${error.response.statusMessage}` : '';
    return new FetchError(kind, `HTTP ${statusCode}${reason}`, { statusCode, cause: error });
  }
  if (error instanceof ParseError) {
    // got's own message carries the request URL, api_key included
    return new FetchError('permanent', 'Malformed response body', { cause: error });
  }
  if (error instanceof RequestError) {
    return new FetchError('transient', `${error.code || error.name}: ${error.message}`, { cause: error });
  }
  return new FetchError('transient', error instanceof Error ? error.message : String(error), { cause: error });
}
