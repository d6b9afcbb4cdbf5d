/**
 * Config Service
 * Reads the optional config file and environment overrides.
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import type { AppConfig, ConfigKey } from '../types/config.js';
import { isOutputFormat } from '../utils/output.js';

const DEFAULT_CONFIG_DIR = path.join(os.homedir(), '.config', 'spotify-import');
const DEFAULT_CONFIG_FILE = 'config.json';

// Client ID of the registered application whose redirect URI points at
// http://127.0.0.1:43019/redirect
export const DEFAULT_CLIENT_ID = 'f273705a8fa44a1f9b962c355c5ee6e5';

export const DEFAULT_SCOPES: readonly string[] = [
  'playlist-read-private',
  'playlist-read-collaborative',
  'user-library-read',
  'playlist-modify-public',
  'playlist-modify-private',
];

export class ConfigError extends Error {
  public readonly code = 'INVALID_CONFIG';

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ConfigError';
  }
}

export class ConfigService {
  private configPath: string;
  private env: NodeJS.ProcessEnv;
  private config: AppConfig;

  constructor(configPath?: string, env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath || path.join(DEFAULT_CONFIG_DIR, DEFAULT_CONFIG_FILE);
    this.env = env;
    this.config = this.load();
  }

  /**
   * Load the config file; a missing file is an empty config
   * @throws ConfigError when the file is not a JSON object
   */
  private load(): AppConfig {
    if (!fs.existsSync(this.configPath)) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.configPath, 'utf-8'));
    } catch (error) {
      throw new ConfigError(`Cannot read config file ${this.configPath}`, error);
    }

    if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
      throw new ConfigError(`Config file ${this.configPath} must contain a JSON object`);
    }

    const raw: Record<string, unknown> = { ...parsed };
    const config: AppConfig = {};
    if (typeof raw.clientId === 'string' && raw.clientId.length > 0) {
      config.clientId = raw.clientId;
    }
    if (typeof raw.format === 'string' && isOutputFormat(raw.format)) {
      config.format = raw.format;
    }
    if (typeof raw.authTimeoutSec === 'number' && raw.authTimeoutSec > 0) {
      config.authTimeoutSec = raw.authTimeoutSec;
    }
    return config;
  }

  get<K extends ConfigKey>(key: K): AppConfig[K] {
    return this.config[key];
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Client ID (environment first, then file, then the registered default)
   */
  getClientId(): string {
    const envValue = this.env.SPOTIFY_CLIENT_ID;
    if (envValue && envValue.length > 0) {
      return envValue;
    }
    return this.config.clientId ?? DEFAULT_CLIENT_ID;
  }

  /**
   * Out-of-band bearer token, if one is set in the environment
   */
  getToken(): string | undefined {
    const envValue = this.env.SPOTIFY_TOKEN;
    return envValue && envValue.trim().length > 0 ? envValue : undefined;
  }

  getScopes(): readonly string[] {
    return DEFAULT_SCOPES;
  }

  getAuthTimeoutMs(): number | undefined {
    const seconds = this.config.authTimeoutSec;
    return seconds === undefined ? undefined : seconds * 1000;
  }
}
