import type { OutputFormat } from '../utils/output.js';

/**
 * Config file shape (~/.config/spotify-import/config.json)
 */
export interface AppConfig {
  /** Spotify application client ID */
  clientId?: string;
  /** Default report format */
  format?: OutputFormat;
  /** Give up waiting for the browser after this many seconds */
  authTimeoutSec?: number;
}

export type ConfigKey = keyof AppConfig;
