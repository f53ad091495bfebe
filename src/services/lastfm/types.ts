import { z } from 'zod';
import type { FetchError } from '../../errors.js';

export interface TrackRecord {
  readonly artist: string;
  readonly name: string;
  readonly album: string;
  readonly url: string;
}

export type FetchResult =
  | { ok: true; track: TrackRecord }
  | { ok: false; error: FetchError };

export interface TrackSource {
  fetchCurrentTrack(): Promise<FetchResult>;
}

// Last.fm answers some failures with HTTP 200 and this body
export const lastfmErrorSchema = z.object({
  error: z.number(),
  message: z.string(),
});

export const recentTrackSchema = z.object({
  artist: z.object({ '#text': z.string() }),
  name: z.string(),
  album: z.object({ '#text': z.string() }),
  url: z.string(),
});

export const recentTracksResponseSchema = z.object({
  recenttracks: z.object({
    // a single event comes back as an object rather than a one-element list
    track: z.union([z.array(z.unknown()), z.record(z.unknown())]),
  }),
});
