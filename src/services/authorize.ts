/**
 * Authorization
 * Drives the implicit grant: builds the authorize URL, opens the browser,
 * waits for the capture server and hands back a BearerSession.
 */

import {
  AuthorizationCaptureServer,
  DEFAULT_HOST,
  REDIRECT_PATH,
  REDIRECT_PORT,
} from './capture-server.js';
import { BearerSession } from './session.js';
import { openBrowser as defaultOpenBrowser } from '../lib/browser.js';
import type { Logger } from '../lib/logger.js';
import type { AuthorizeOptions, AuthorizeRequest } from '../types/auth.js';

export const AUTHORIZE_ENDPOINT = 'https://accounts.spotify.com/authorize';

export function buildRedirectUri(port: number = REDIRECT_PORT): string {
  return `http://127.0.0.1:${port}${REDIRECT_PATH}`;
}

export function buildAuthorizeUrl(request: AuthorizeRequest): string {
  const query = new URLSearchParams({
    response_type: 'token',
    client_id: request.clientId,
    scope: request.scopes.join(' '),
    redirect_uri: request.redirectUri,
  });
  return `${AUTHORIZE_ENDPOINT}?${query.toString()}`;
}

export interface AuthorizerOptions {
  logger: Logger;
  host?: string;
  port?: number;
  openBrowser?: (url: string) => Promise<boolean>;
}

export class Authorizer {
  private logger: Logger;
  private host: string;
  private port: number;
  private openBrowser: (url: string) => Promise<boolean>;

  constructor(options: AuthorizerOptions) {
    this.logger = options.logger;
    this.host = options.host ?? DEFAULT_HOST;
    this.port = options.port ?? REDIRECT_PORT;
    this.openBrowser = options.openBrowser ?? defaultOpenBrowser;
  }

  /**
   * Log the user in through the browser
   * @throws AuthorizationError on denial, timeout or listener failure
   */
  async authorize(
    clientId: string,
    scopes: readonly string[],
    options: AuthorizeOptions = {}
  ): Promise<BearerSession> {
    const server = new AuthorizationCaptureServer({
      logger: this.logger,
      host: this.host,
      port: this.port,
    });

    // Listen before the browser can come back
    const address = await server.listen();

    try {
      const url = buildAuthorizeUrl({
        clientId,
        scopes,
        redirectUri: buildRedirectUri(address.port),
      });
      this.logger.info(`Logging in (click if it doesn't open automatically): ${url}`);

      const opened = await this.openBrowser(url);
      if (!opened) {
        // warn, so --quiet still shows it
        this.logger.warn(`Could not open a browser, open this URL to log in: ${url}`);
      }

      const capture = await server.waitForToken({ timeoutMs: options.timeoutMs });
      return new BearerSession(capture.accessToken);
    } finally {
      await server.close();
    }
  }
}
