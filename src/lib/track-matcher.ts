/**
 * Track matching
 * Turns a local song record plus the top search hit into a report row.
 */

import { getConfidence, levenshteinDistance, type Confidence } from './fuzzy.js';
import type { SongRecord } from './import-file.js';
import type { ColumnDef } from '../utils/output.js';
import type { SpotifyTrack } from '../types/api.js';

export interface MatchRow {
  title: string;
  artist: string;
  matchedTitle: string;
  matchedArtist: string;
  distance: number | null;
  confidence: Confidence | null;
  uri: string | null;
}

export const MATCH_COLUMNS: ColumnDef<MatchRow>[] = [
  { key: 'title', label: 'title' },
  { key: 'artist', label: 'artist' },
  { key: 'matchedTitle', label: 'matched_title' },
  { key: 'matchedArtist', label: 'matched_artist' },
  { key: 'distance', label: 'distance' },
  { key: 'confidence', label: 'confidence' },
];

/**
 * Drop parenthesised fragments such as "(Remastered 2011)"
 */
export function cleanTitle(title: string): string {
  return title.replace(/\(.*?\)/g, '').trim();
}

export function buildSearchQuery(song: SongRecord): string {
  return `${song.artist} ${cleanTitle(song.title)}`;
}

export function toMatchRow(song: SongRecord, track: SpotifyTrack | null): MatchRow {
  const title = cleanTitle(song.title);

  if (!track) {
    return {
      title,
      artist: song.artist,
      matchedTitle: '',
      matchedArtist: '',
      distance: null,
      confidence: null,
      uri: null,
    };
  }

  const distance = levenshteinDistance(title, track.name);
  return {
    title,
    artist: song.artist,
    matchedTitle: track.name,
    matchedArtist: track.artists[0]?.name ?? '',
    distance,
    confidence: getConfidence(distance),
    uri: track.uri,
  };
}
