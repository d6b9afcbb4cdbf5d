import { describe, it, expect, beforeEach, afterEach, afterAll, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

vi.mock('ofetch', () => ({
  ofetch: vi.fn(),
}));

import { ofetch } from 'ofetch';
import { cli } from '../../src/cli.js';

const mockedFetch = vi.mocked(ofetch);

describe('import command', () => {
  const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
  const stderrSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  const previousExitCode = process.exitCode;
  let tmpDir: string;

  function stdout(): string {
    return stdoutSpy.mock.calls.map(([chunk]) => String(chunk)).join('');
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'spotify-import-cmd-'));
    mockedFetch.mockReset();
    stdoutSpy.mockClear();
    stderrSpy.mockClear();
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
    process.exitCode = previousExitCode;
  });

  afterAll(() => {
    stdoutSpy.mockRestore();
    stderrSpy.mockRestore();
  });

  it('should print a CSV report for a supplied token', async () => {
    const file = path.join(tmpDir, 'songs.json');
    fs.writeFileSync(file, JSON.stringify([{ title: 'Karma Police (Remastered)', artist: 'Radiohead' }]));

    mockedFetch
      .mockResolvedValueOnce({ id: 'user-1', display_name: 'Test User' })
      .mockResolvedValueOnce({
        tracks: {
          items: [{ id: 't1', name: 'Karma Police', uri: 'spotify:track:t1', artists: [{ id: 'a1', name: 'Radiohead' }] }],
          next: null,
          total: 1,
        },
      });

    await cli.parseAsync(['-f', 'csv', 'import', 'playlist-1', file, '--token', 'test-token'], { from: 'user' });

    expect(stdout()).toBe(
      'title,artist,matched_title,matched_artist,distance,confidence\n' +
        'Karma Police,Radiohead,Karma Police,Radiohead,0,exact\n'
    );
    expect(mockedFetch).toHaveBeenCalledTimes(2);
    expect(mockedFetch.mock.calls[0]?.[0]).toBe('https://api.spotify.com/v1/me');
    expect(mockedFetch.mock.calls[1]?.[0]).toBe(
      'https://api.spotify.com/v1/search?q=Radiohead+Karma+Police&type=track&limit=1'
    );
    expect(process.exitCode).toBe(previousExitCode);
  });

  it('should exit 1 before any request when the import file is unreadable', async () => {
    const file = path.join(tmpDir, 'missing.json');

    await cli.parseAsync(['import', 'playlist-1', file, '--token', 'test-token'], { from: 'user' });

    expect(process.exitCode).toBe(1);
    expect(mockedFetch).not.toHaveBeenCalled();
    expect(stdout()).toBe('');
  });

  it('should warn that --skip-existing needs --import', async () => {
    const file = path.join(tmpDir, 'missing.json');

    await cli.parseAsync(['import', 'playlist-1', file, '--token', 'test-token', '--skip-existing'], { from: 'user' });

    const lines = stderrSpy.mock.calls.map(([line]) => String(line).replace(/^\[\d{2}:\d{2}:\d{2}\] /, ''));
    expect(lines[0]).toBe('--skip-existing has no effect without --import');
    expect(process.exitCode).toBe(1);
  });
});
