import { describe, test, expect } from 'vitest';
import { renderStatusBlock } from './status-block.js';

const track = {
  artist: 'NewArtist',
  name: 'NewSong',
  album: 'NewAlbum',
  url: 'https://www.last.fm/music/NewArtist/_/NewSong',
};

describe('Status block', () => {
  test('renders the three callout lines', () => {
    const block = renderStatusBlock(track, new Date('2024-05-01T12:34:56Z'), 'UTC');
    expect(block).toBe(
      '> **Now Playing:** NewSong - NewArtist [NewAlbum]\n' +
        '> \n' +
        '> [Last.fm](https://www.last.fm/music/NewArtist/_/NewSong) | Updated: 2024-05-01 12:34:56 UTC'
    );
  });

  test('stamps the time in the configured zone', () => {
    const block = renderStatusBlock(track, new Date('2024-05-01T20:00:05Z'), 'Asia/Kolkata');
    expect(block.split('\n')[2]).toBe(
      '> [Last.fm](https://www.last.fm/music/NewArtist/_/NewSong) | Updated: 2024-05-02 01:30:05 Asia/Kolkata'
    );
  });
});
