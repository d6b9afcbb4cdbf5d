/**
 * Playlist Importer
 * Searches Spotify for each song, reports the best hit, and optionally
 * adds the hits to a playlist.
 */

import type { SpotifyApi } from './api.js';
import { formatDuration, type Logger } from '../lib/logger.js';
import type { SongRecord } from '../lib/import-file.js';
import { buildSearchQuery, toMatchRow, type MatchRow } from '../lib/track-matcher.js';
import type {
  PlaylistTrackItem,
  SearchResponse,
  SnapshotResponse,
  SpotifyUser,
} from '../types/api.js';

// Spotify accepts at most 100 URIs per add request
export const ADD_BATCH_SIZE = 100;
export const SEARCH_LIMIT = 1;

export interface ImportOptions {
  playlistId: string;
  /** Add matches to the playlist (otherwise report only) */
  apply: boolean;
  /** Leave out tracks the playlist already has */
  skipExisting: boolean;
}

export interface ImportSummary {
  songs: number;
  matched: number;
  added: number;
  skipped: number;
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (size < 1) {
    throw new RangeError('Chunk size must be at least 1');
  }
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

function playlistPath(playlistId: string): string {
  return `playlists/${encodeURIComponent(playlistId)}/tracks`;
}

export class PlaylistImporter {
  private client: SpotifyApi;
  private logger: Logger;
  private now: () => number;

  constructor(client: SpotifyApi, logger: Logger, now: () => number = Date.now) {
    this.client = client;
    this.logger = logger;
    this.now = now;
  }

  async whoAmI(): Promise<SpotifyUser> {
    this.logger.info('Loading user info...');
    const me = await this.client.get<SpotifyUser>('me');
    this.logger.info(`Logged in as ${me.display_name ?? me.id} (${me.id})`);
    return me;
  }

  async matchSong(song: SongRecord): Promise<MatchRow> {
    const result = await this.client.get<SearchResponse>('search', {
      q: buildSearchQuery(song),
      type: 'track',
      limit: SEARCH_LIMIT,
    });
    return toMatchRow(song, result.tracks.items[0] ?? null);
  }

  /**
   * URIs already in the playlist, read through every page
   */
  async existingUris(playlistId: string): Promise<Set<string>> {
    const items = await this.client.list<PlaylistTrackItem>(playlistPath(playlistId), {
      fields: 'items(track(uri)),next,total',
      limit: 100,
    });

    const uris = new Set<string>();
    for (const item of items) {
      if (item.track) {
        uris.add(item.track.uri);
      }
    }
    return uris;
  }

  /**
   * Add tracks in batches
   * @returns Number of URIs sent
   */
  async addTracks(playlistId: string, uris: readonly string[]): Promise<number> {
    let added = 0;
    for (const batch of chunk(uris, ADD_BATCH_SIZE)) {
      await this.client.post<SnapshotResponse>(playlistPath(playlistId), { uris: batch });
      added += batch.length;
      this.logger.info(`Added ${added}/${uris.length} tracks`);
    }
    return added;
  }

  async run(
    songs: readonly SongRecord[],
    options: ImportOptions,
    onRow: (row: MatchRow) => void
  ): Promise<ImportSummary> {
    const startTime = this.now();
    const toImport: string[] = [];

    for (const song of songs) {
      const row = await this.matchSong(song);
      onRow(row);
      if (row.uri) {
        toImport.push(row.uri);
      }
    }

    const summary: ImportSummary = {
      songs: songs.length,
      matched: toImport.length,
      added: 0,
      skipped: 0,
    };

    if (options.apply) {
      let pending = toImport;
      if (options.skipExisting) {
        const seen = await this.existingUris(options.playlistId);
        pending = [];
        for (const uri of toImport) {
          if (!seen.has(uri)) {
            seen.add(uri);
            pending.push(uri);
          }
        }
        summary.skipped = toImport.length - pending.length;
      }
      summary.added = await this.addTracks(options.playlistId, pending);
    }

    this.logger.info(
      `Matched ${summary.matched}/${summary.songs} songs, added ${summary.added}, skipped ${summary.skipped} ` +
        `in ${formatDuration(this.now() - startTime)}`
    );
    return summary;
  }
}
