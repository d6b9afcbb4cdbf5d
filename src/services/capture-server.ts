/**
 * Authorization Capture Server
 * Short-lived loopback listener for the implicit grant. The provider puts
 * the token in the URL fragment, which browsers never send, so the flow
 * takes two hops:
 *
 *   GET /redirect#access_token=...  -> page script re-navigates to
 *   GET /token?access_token=...     -> token read from the query string
 *
 * The `/token` hit settles a single-slot result; nothing else stops the
 * server except a failure or an explicit timeout.
 */

import http from 'node:http';
import type { AddressInfo } from 'node:net';
import type { AuthorizationCapture } from '../types/auth.js';
import { maskToken, type Logger } from '../lib/logger.js';
import { describeError } from './retry.js';

// Spotify only redirects to pre-registered URIs. This must match the
// application's registered redirect URI, do not change it on its own.
export const REDIRECT_PORT = 43019;
export const DEFAULT_HOST = '0.0.0.0';
export const REDIRECT_PATH = '/redirect';
export const TOKEN_PATH = '/token';

export const REDIRECT_PAGE =
  '<script>location.replace("token?" + location.hash.slice(1));</script>';
export const DONE_PAGE = '<script>close()</script>Thanks! You may now close this window.';
export const DENIED_PAGE = 'Authorization was not granted. You may now close this window.';

export type CaptureState = 'idle' | 'listening' | 'delivered' | 'failed' | 'closed';

export type AuthorizationErrorCode =
  | 'AUTHORIZATION_DENIED'
  | 'AUTHORIZATION_TIMEOUT'
  | 'CAPTURE_SERVER_ERROR';

export class AuthorizationError extends Error {
  public readonly code: AuthorizationErrorCode;

  constructor(message: string, code: AuthorizationErrorCode, cause?: unknown) {
    super(message, { cause });
    this.name = 'AuthorizationError';
    this.code = code;
  }
}

/**
 * Pull a raw query parameter out of a request path
 */
function readParam(path: string, name: string): string | null {
  const match = new RegExp(`[?&]${name}=([^&#]*)`).exec(path);
  return match ? match[1] : null;
}

function decodeParam(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    // malformed escapes are shown as sent
    return value;
  }
}

/**
 * `/token?access_token=ABC&token_type=Bearer` -> `ABC`
 */
export function extractAccessToken(path: string): string | null {
  const token = readParam(path, 'access_token');
  return token ? token : null;
}

export interface CaptureServerOptions {
  logger: Logger;
  /** Bind address (default: 0.0.0.0) */
  host?: string;
  /** Bind port (default: REDIRECT_PORT; 0 picks a free port) */
  port?: number;
}

export interface WaitOptions {
  /** Fail with AUTHORIZATION_TIMEOUT after this many milliseconds */
  timeoutMs?: number;
}

type Outcome =
  | { ok: true; capture: AuthorizationCapture }
  | { ok: false; error: AuthorizationError };

export class AuthorizationCaptureServer {
  private logger: Logger;
  private host: string;
  private port: number;
  private server: http.Server | null = null;
  private state: CaptureState = 'idle';
  private outcome: Outcome | null = null;
  private waiters: Array<(outcome: Outcome) => void> = [];
  private closing: Promise<void> | null = null;

  constructor(options: CaptureServerOptions) {
    this.logger = options.logger;
    this.host = options.host ?? DEFAULT_HOST;
    this.port = options.port ?? REDIRECT_PORT;
  }

  getState(): CaptureState {
    return this.state;
  }

  /**
   * Bind the listener
   * @returns The bound address (the real port when 0 was requested)
   */
  listen(): Promise<AddressInfo> {
    if (this.server) {
      return Promise.reject(new Error('Capture server already started'));
    }

    const server = http.createServer((req, res) => this.dispatch(req, res));
    this.server = server;

    // A malformed request gets a 400 and nothing more; it never settles the capture.
    server.on('clientError', (error, socket) => {
      this.logger.debug('Malformed request on capture server', { error: describeError(error) });
      if (socket.writable) {
        socket.end('HTTP/1.1 400 Bad Request\r\nConnection: close\r\n\r\n');
      } else {
        socket.destroy();
      }
    });

    return new Promise((resolve, reject) => {
      const onStartupError = (error: Error) => {
        this.state = 'failed';
        reject(
          new AuthorizationError(
            `Cannot listen on ${this.host}:${this.port}: ${error.message}`,
            'CAPTURE_SERVER_ERROR',
            error
          )
        );
      };

      server.once('error', onStartupError);
      server.listen(this.port, this.host, () => {
        server.off('error', onStartupError);
        server.on('error', (error) => {
          this.fail(new AuthorizationError(`Capture server failed: ${error.message}`, 'CAPTURE_SERVER_ERROR', error));
        });

        const address = server.address();
        if (address === null || typeof address === 'string') {
          onStartupError(new Error('listener has no TCP address'));
          return;
        }

        this.state = 'listening';
        this.logger.debug('Capture server listening', { host: address.address, port: address.port });
        resolve(address);
      });
    });
  }

  /**
   * Resolve with the captured token, or reject with an AuthorizationError
   */
  waitForToken(options: WaitOptions = {}): Promise<AuthorizationCapture> {
    return new Promise((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;

      const onOutcome = (outcome: Outcome) => {
        if (timer) clearTimeout(timer);
        if (outcome.ok) {
          resolve(outcome.capture);
        } else {
          reject(outcome.error);
        }
      };

      if (this.outcome) {
        onOutcome(this.outcome);
        return;
      }

      this.waiters.push(onOutcome);

      if (options.timeoutMs !== undefined) {
        const seconds = Math.round(options.timeoutMs / 1000);
        timer = setTimeout(() => {
          this.fail(
            new AuthorizationError(`No authorization received within ${seconds}s`, 'AUTHORIZATION_TIMEOUT')
          );
        }, options.timeoutMs);
      }
    });
  }

  /**
   * Stop listening once in-flight responses are written. Safe to call more than once.
   */
  close(): Promise<void> {
    if (!this.closing) {
      const server = this.server;
      this.closing = new Promise((resolve, reject) => {
        if (!server || !server.listening) {
          resolve();
          return;
        }
        // every response is sent with `Connection: close`, so requests in
        // flight finish and only idle sockets need dropping
        server.close((error) => (error ? reject(error) : resolve()));
        server.closeIdleConnections();
      });
      this.closing = this.closing.then(() => {
        if (this.state === 'listening') {
          this.state = 'closed';
        }
      });
    }
    return this.closing;
  }

  private dispatch(req: http.IncomingMessage, res: http.ServerResponse): void {
    try {
      this.route(req, res);
    } catch (error) {
      if (!res.headersSent) {
        this.send(res, 500, 'text/plain', 'Internal Server Error');
      }
      this.fail(
        new AuthorizationError(`Capture handler failed: ${describeError(error)}`, 'CAPTURE_SERVER_ERROR', error),
        res
      );
    }
  }

  private route(req: http.IncomingMessage, res: http.ServerResponse): void {
    const path = req.url ?? '/';

    if (req.method !== 'GET') {
      this.send(res, 501, 'text/plain', 'Not Implemented');
      return;
    }

    if (path.startsWith(REDIRECT_PATH)) {
      this.send(res, 200, 'text/html', REDIRECT_PAGE);
      return;
    }

    if (path.startsWith(`${TOKEN_PATH}?`)) {
      const accessToken = extractAccessToken(path);
      if (accessToken) {
        this.send(res, 200, 'text/html', DONE_PAGE);
        this.deliver({ accessToken }, res);
        return;
      }

      const reason = readParam(path, 'error');
      if (reason) {
        this.send(res, 200, 'text/html', DENIED_PAGE);
        this.fail(
          new AuthorizationError(`Authorization was denied: ${decodeParam(reason)}`, 'AUTHORIZATION_DENIED'),
          res
        );
        return;
      }

      this.send(res, 400, 'text/plain', 'Missing access_token');
      return;
    }

    this.send(res, 404, 'text/plain', 'Not Found');
  }

  private send(res: http.ServerResponse, status: number, contentType: string, body: string): void {
    res.writeHead(status, {
      'Content-Type': contentType,
      'Content-Length': Buffer.byteLength(body),
      Connection: 'close',
    });
    res.end(body);
  }

  /**
   * `pending` is the response still being written; the listener goes
   * down once it is done.
   */
  private deliver(capture: AuthorizationCapture, pending?: http.ServerResponse): void {
    if (this.settle({ ok: true, capture })) {
      this.state = 'delivered';
      this.logger.debug(`Received access token from Spotify: ${maskToken(capture.accessToken)}`);
      this.shutdownAfter(pending);
    }
  }

  private fail(error: AuthorizationError, pending?: http.ServerResponse): void {
    if (this.settle({ ok: false, error })) {
      this.state = 'failed';
      this.shutdownAfter(pending);
    }
  }

  /**
   * Fill the result slot once and wake waiters
   */
  private settle(outcome: Outcome): boolean {
    if (this.outcome) {
      return false;
    }
    this.outcome = outcome;

    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) {
      wake(outcome);
    }
    return true;
  }

  private shutdownAfter(pending?: http.ServerResponse): void {
    const shutdown = () => {
      this.close().catch((error: unknown) => {
        this.logger.error('Failed to stop capture server', error);
      });
    };

    if (pending && !pending.writableFinished) {
      pending.once('close', shutdown);
    } else {
      shutdown();
    }
  }
}
