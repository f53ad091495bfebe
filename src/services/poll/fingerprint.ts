import { createHash } from 'crypto';
import type { TrackRecord } from '../lastfm/types.js';

export type Fingerprint = string;

// Cannot collide with a 64-character hex digest
export const NO_TRACK_FINGERPRINT: Fingerprint = 'none';

export function fingerprintTrack(track: TrackRecord | null): Fingerprint {
  if (!track) {
    return NO_TRACK_FINGERPRINT;
  }
  return createHash('sha256')
    .update(JSON.stringify([track.artist, track.name, track.album]))
    .digest('hex');
}
