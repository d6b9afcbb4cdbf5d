import { Command, Option } from 'commander';
import { importCommand } from './commands/import.js';
import { tokenCommand } from './commands/token.js';
import { OUTPUT_FORMATS } from './utils/output.js';

export const cli = new Command();

cli
  .name('spotify-import')
  .description(
    'Imports a JSON list of songs to a Spotify playlist. By default, opens a browser window ' +
      'to authorize the Spotify Web API, but you can also pass an OAuth token with --token.'
  )
  .version('0.1.0');

// Global options
cli
  .addOption(new Option('-f, --format <format>', 'report format (default: csv)').choices([...OUTPUT_FORMATS]))
  .addOption(new Option('--log-format <format>', 'log line format').choices(['text', 'json']).default('text'))
  .option('-q, --quiet', 'only log warnings and errors')
  .option('-v, --verbose', 'log debug details');

cli.addCommand(importCommand, { isDefault: true });
cli.addCommand(tokenCommand);
