/**
 * Token Command
 * Run only the browser login and print the token for later --token use.
 * Nothing is stored.
 */

import { Command } from 'commander';
import { ConfigService } from '../services/config.js';
import { Authorizer } from '../services/authorize.js';
import { reportFatal } from '../lib/exit.js';
import { createLogger } from '../lib/logger.js';
import { parseSeconds, readGlobalOptions } from './options.js';

export const tokenCommand = new Command('token')
  .description('Log in through the browser and print the access token')
  .option('--auth-timeout <seconds>', 'stop waiting for the browser login after this many seconds', parseSeconds)
  .action(async (options: { authTimeout?: number }, command: Command) => {
    const globals = readGlobalOptions(command);
    const logger = createLogger({ verbose: globals.verbose, quiet: globals.quiet, format: globals.logFormat });

    try {
      const config = new ConfigService();
      const authorizer = new Authorizer({ logger: logger.child('auth') });
      const session = await authorizer.authorize(config.getClientId(), config.getScopes(), {
        timeoutMs: options.authTimeout === undefined ? config.getAuthTimeoutMs() : options.authTimeout * 1000,
      });
      process.stdout.write(`${session.token}\n`);
    } catch (error) {
      reportFatal('Login', error, logger);
    }
  });
