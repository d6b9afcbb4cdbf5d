/**
 * Import Command
 * Match each song of a JSON file on Spotify, print the report, and with
 * --import add the matches to the playlist.
 */

import { Command } from 'commander';
import { ConfigService } from '../services/config.js';
import { PlaylistImporter } from '../services/importer.js';
import { createApiClient, resolveSession } from '../lib/api-client.js';
import { reportFatal } from '../lib/exit.js';
import { readSongRecords } from '../lib/import-file.js';
import { createLogger } from '../lib/logger.js';
import { MATCH_COLUMNS } from '../lib/track-matcher.js';
import { ReportWriter } from '../utils/output.js';
import { parseSeconds, readGlobalOptions } from './options.js';

interface ImportCommandOptions {
  token?: string;
  import?: boolean;
  skipExisting?: boolean;
  authTimeout?: number;
}

export const importCommand = new Command('import')
  .description('Search Spotify for every song in FILE and report the matches')
  .argument('<playlist>', 'playlist ID')
  .argument('<file>', 'input filename (JSON array of { title, artist })')
  .option('-t, --token <token>', 'use a Spotify OAuth token instead of logging in through the browser')
  .option('--import', 'add the matched tracks to the playlist instead of only reporting them')
  .option('--skip-existing', 'with --import, leave out tracks the playlist already contains')
  .option('--auth-timeout <seconds>', 'stop waiting for the browser login after this many seconds', parseSeconds)
  .action(async (playlist: string, file: string, options: ImportCommandOptions, command: Command) => {
    const globals = readGlobalOptions(command);
    const logger = createLogger({ verbose: globals.verbose, quiet: globals.quiet, format: globals.logFormat });

    if (options.skipExisting && !options.import) {
      logger.warn('--skip-existing has no effect without --import');
    }

    try {
      const config = new ConfigService();
      logger.debug('Using config', { path: config.getConfigPath() });
      const format = globals.format ?? config.get('format') ?? 'csv';

      // Read input before any network traffic
      const songs = readSongRecords(file);

      const session = await resolveSession({
        config,
        logger,
        token: options.token,
        authTimeoutMs: options.authTimeout === undefined ? undefined : options.authTimeout * 1000,
      });

      const importer = new PlaylistImporter(createApiClient(session, logger), logger.child('import'));
      await importer.whoAmI();

      const writer = new ReportWriter(format, MATCH_COLUMNS);
      await importer.run(
        songs,
        {
          playlistId: playlist,
          apply: options.import === true,
          skipExisting: options.skipExisting === true,
        },
        (row) => writer.push(row)
      );
      writer.end();
    } catch (error) {
      reportFatal('Import', error, logger);
    }
  });
