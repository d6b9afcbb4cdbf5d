import { describe, it, expect, vi } from 'vitest';
import { createLogger } from '../../src/lib/logger.js';
import { createRecordingLogger } from '../helpers/logger.js';
import {
  Authorizer,
  AUTHORIZE_ENDPOINT,
  buildAuthorizeUrl,
  buildRedirectUri,
} from '../../src/services/authorize.js';
import { AuthorizationError } from '../../src/services/capture-server.js';
import { BearerSession } from '../../src/services/session.js';

/**
 * Plays the browser: follows the redirect hop, then the token hop
 */
async function completeLogin(authorizeUrl: string, fragment: string): Promise<void> {
  const redirectUri = new URL(authorizeUrl).searchParams.get('redirect_uri');
  if (!redirectUri) {
    throw new Error('authorize URL has no redirect_uri');
  }
  const redirect = await fetch(redirectUri);
  await redirect.text();
  const token = await fetch(new URL(`/token?${fragment}`, redirectUri));
  await token.text();
}

describe('buildRedirectUri', () => {
  it('should point at the loopback /redirect route on the fixed port', () => {
    expect(buildRedirectUri()).toBe('http://127.0.0.1:43019/redirect');
  });
});

describe('buildAuthorizeUrl', () => {
  const url = buildAuthorizeUrl({
    clientId: 'X',
    scopes: ['a', 'b'],
    redirectUri: buildRedirectUri(),
  });

  it('should target the provider authorize endpoint', () => {
    expect(url.startsWith(`${AUTHORIZE_ENDPOINT}?`)).toBe(true);
  });

  it('should ask for the implicit grant with space-joined scopes', () => {
    expect(url).toContain('response_type=token&client_id=X&scope=a+b');
  });

  it('should carry the redirect URI', () => {
    expect(new URL(url).searchParams.get('redirect_uri')).toBe('http://127.0.0.1:43019/redirect');
    expect(url).toContain('redirect_uri=http%3A%2F%2F127.0.0.1%3A43019%2Fredirect');
  });
});

describe('Authorizer', () => {
  it('should open the browser and return a session from the captured token', async () => {
    const logger = createRecordingLogger();
    const openBrowser = vi.fn(async (url: string) => {
      await completeLogin(url, 'access_token=TOKEN-1&token_type=Bearer&expires_in=3600');
      return true;
    });
    const authorizer = new Authorizer({ logger, host: '127.0.0.1', port: 0, openBrowser });

    const session = await authorizer.authorize('test-client', ['playlist-read-private']);

    expect(session).toBeInstanceOf(BearerSession);
    expect(session.token).toBe('TOKEN-1');
    expect(openBrowser).toHaveBeenCalledTimes(1);
    const url = new URL(openBrowser.mock.calls[0][0]);
    expect(url.searchParams.get('client_id')).toBe('test-client');
    expect(url.searchParams.get('scope')).toBe('playlist-read-private');
    expect(logger.messages('info')).toEqual([
      `Logging in (click if it doesn't open automatically): ${openBrowser.mock.calls[0][0]}`,
    ]);
  });

  it('should keep going when no browser could be opened', async () => {
    const logger = createRecordingLogger();
    let login: Promise<void> | undefined;
    const openBrowser = vi.fn(async (url: string) => {
      // the user pastes the URL by hand
      login = completeLogin(url, 'access_token=TOKEN-2');
      return false;
    });
    const authorizer = new Authorizer({ logger, host: '127.0.0.1', port: 0, openBrowser });

    const session = await authorizer.authorize('test-client', ['a']);
    await login;

    expect(session.token).toBe('TOKEN-2');
    expect(logger.messages('warn')).toEqual([
      `Could not open a browser, open this URL to log in: ${openBrowser.mock.calls[0][0]}`,
    ]);
  });

  it('should give up after the timeout', async () => {
    const authorizer = new Authorizer({
      logger: createRecordingLogger(),
      host: '127.0.0.1',
      port: 0,
      openBrowser: async () => true,
    });

    const error = await authorizer.authorize('test-client', ['a'], { timeoutMs: 50 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthorizationError);
    if (!(error instanceof AuthorizationError)) return;
    expect(error.code).toBe('AUTHORIZATION_TIMEOUT');
  });

  it('should show the login URL under --quiet when no browser opens', async () => {
    const stderrSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const openBrowser = vi.fn(async (_url: string) => false);
    const authorizer = new Authorizer({ logger: createLogger({ quiet: true }), host: '127.0.0.1', port: 0, openBrowser });

    try {
      await authorizer.authorize('test-client', ['a'], { timeoutMs: 100 }).catch((e: unknown) => e);

      const url = openBrowser.mock.calls[0][0];
      const lines = stderrSpy.mock.calls.map(([line]) => String(line).replace(/^\[\d{2}:\d{2}:\d{2}\] /, ''));
      expect(lines).toEqual([`Could not open a browser, open this URL to log in: ${url}`]);
      expect(url.startsWith('https://accounts.spotify.com/authorize?')).toBe(true);
    } finally {
      stderrSpy.mockRestore();
    }
  });
});
