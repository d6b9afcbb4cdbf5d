/**
 * Spotify Web API types
 * Only the fields the importer reads are modelled.
 */

export type HttpMethod = 'GET' | 'POST';

export type QueryValue = string | number | boolean;

/** Ordered query parameters; insertion order is kept on the wire */
export type QueryParams = Readonly<Record<string, QueryValue>>;

export interface ApiRequest {
  path: string;
  query?: QueryParams;
  method: HttpMethod;
  body?: unknown;
}

/**
 * Cursor-style page returned by every list endpoint
 */
export interface Paging<T> {
  items: T[];
  next: string | null;
  total: number;
}

export interface SpotifyUser {
  id: string;
  display_name: string | null;
}

export interface SpotifyArtist {
  id: string;
  name: string;
}

export interface SpotifyTrack {
  id: string;
  name: string;
  uri: string;
  artists: SpotifyArtist[];
}

export interface SearchResponse {
  tracks: Paging<SpotifyTrack>;
}

export interface PlaylistTrackItem {
  track: Pick<SpotifyTrack, 'uri'> | null;
}

export interface SnapshotResponse {
  snapshot_id: string;
}
