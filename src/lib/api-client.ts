/**
 * API Client Helper
 * Resolves the bearer session (supplied token or browser login) and
 * builds the SpotifyApiClient on top of it.
 */

import { SpotifyApiClient } from '../services/api.js';
import { Authorizer } from '../services/authorize.js';
import { BearerSession } from '../services/session.js';
import type { ConfigService } from '../services/config.js';
import type { Logger } from './logger.js';

export interface SessionSource {
  config: ConfigService;
  logger: Logger;
  /** `--token` value; wins over SPOTIFY_TOKEN */
  token?: string;
  /** `--auth-timeout` in milliseconds; wins over the config file */
  authTimeoutMs?: number;
  authorizer?: Pick<Authorizer, 'authorize'>;
}

/**
 * A supplied token skips the browser entirely
 * @throws AuthorizationError when the browser login fails
 */
export async function resolveSession(source: SessionSource): Promise<BearerSession> {
  const { config, logger } = source;

  const token = source.token ?? config.getToken();
  if (token !== undefined) {
    logger.debug('Using supplied access token');
    return new BearerSession(token);
  }

  const authorizer = source.authorizer ?? new Authorizer({ logger: logger.child('auth') });
  return authorizer.authorize(config.getClientId(), config.getScopes(), {
    timeoutMs: source.authTimeoutMs ?? config.getAuthTimeoutMs(),
  });
}

export function createApiClient(session: BearerSession, logger: Logger): SpotifyApiClient {
  return new SpotifyApiClient(session, { logger: logger.child('api') });
}
