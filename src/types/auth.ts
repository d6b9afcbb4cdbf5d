/**
 * Implicit-grant authorization types
 */

/**
 * Single-use delivery of the token captured from the browser redirect
 */
export interface AuthorizationCapture {
  accessToken: string;
}

/**
 * Inputs for building the provider's authorize URL
 */
export interface AuthorizeRequest {
  clientId: string;
  scopes: readonly string[];
  redirectUri: string;
}

export interface AuthorizeOptions {
  /** Give up after this many milliseconds (default: wait forever) */
  timeoutMs?: number;
}
