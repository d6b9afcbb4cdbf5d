/**
 * Bearer Session
 * Immutable holder of an access token for the lifetime of the process.
 */

export class BearerSession {
  readonly token: string;

  constructor(token: string) {
    const trimmed = token.trim();
    if (trimmed.length === 0) {
      throw new TypeError('Access token must not be empty');
    }
    this.token = trimmed;
    Object.freeze(this);
  }

  /**
   * Headers with the Authorization header stamped on
   */
  authorize(headers: Record<string, string> = {}): Record<string, string> {
    return {
      ...headers,
      Authorization: `Bearer ${this.token}`,
    };
  }

  /**
   * Keeps the token out of accidental `${session}` and JSON logging
   */
  toString(): string {
    return 'BearerSession(****)';
  }

  toJSON(): { token: string } {
    return { token: '****' };
  }
}
