/**
 * Import file reader
 * The input is a JSON array of `{ "title": ..., "artist": ... }` records.
 */

import fs from 'node:fs';

export interface SongRecord {
  title: string;
  artist: string;
}

export class ImportFileError extends Error {
  public readonly code = 'INVALID_IMPORT_FILE';

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ImportFileError';
  }
}

function isSongRecord(value: unknown): value is SongRecord {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  const record: Record<string, unknown> = { ...value };
  return typeof record.title === 'string' && typeof record.artist === 'string';
}

/**
 * Validate parsed JSON as a list of songs
 * @throws ImportFileError naming the first bad entry
 */
export function parseSongRecords(content: string): SongRecord[] {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ImportFileError('Invalid JSON file provided.', error);
  }

  if (!Array.isArray(data)) {
    throw new ImportFileError('Import file must contain a JSON array of songs.');
  }

  return data.map((entry: unknown, index) => {
    if (!isSongRecord(entry)) {
      throw new ImportFileError(`Entry ${index} needs string "title" and "artist" fields.`);
    }
    return { title: entry.title, artist: entry.artist };
  });
}

export function readSongRecords(filePath: string): SongRecord[] {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ImportFileError(`Cannot read import file ${filePath}`, error);
  }
  return parseSongRecords(content);
}
