import type { TrackRecord } from '../lastfm/types.js';
import { formatTimestamp } from '../../utils/index.js';

export const STATUS_MARKER = '> **Now Playing:**';
export const CALLOUT_PREFIX = '>';

/**
 * Render the callout shown in the document, e.g.
 *
 *   > **Now Playing:** Song - Artist [Album]
 *   >
 *   > [Last.fm](https://www.last.fm/...) | Updated: 2024-01-01 00:00:00 UTC
 */
export function renderStatusBlock(track: TrackRecord, updatedAt: Date, timeZone: string): string {
  return [
    `${STATUS_MARKER} ${track.name} - ${track.artist} [${track.album}]`,
    `${CALLOUT_PREFIX} `,
    `${CALLOUT_PREFIX} [Last.fm](${track.url}) | Updated: ${formatTimestamp(updatedAt, timeZone)}`,
  ].join('\n');
}
