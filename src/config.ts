import dotenv from 'dotenv';
import { ConfigError } from './errors';

dotenv.config();

export const APP_NAME = 'jellykeep';
export const APP_VERSION = '1.0.0';
export const DEFAULT_BACKUP_FILE = './backup.json';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface JellyfinConfig {
  serverUrl: string;
  apiKey: string;
  userName: string;
}

export interface AppConfig {
  jellyfin: JellyfinConfig;
  tvdbApiKey: string;
  backupFile: string;
  requestTimeoutMs: number;
}

export interface ConfigOverrides {
  server?: string;
  apiKey?: string;
  user?: string;
  tvdbApiKey?: string;
  file?: string;
}

type Env = Record<string, string | undefined>;

export function parseLogLevel(value: string | undefined): LogLevel {
  switch ((value || '').trim().toLowerCase()) {
    case 'debug':
      return 'debug';
    case 'warn':
    case 'warning':
      return 'warn';
    case 'error':
      return 'error';
    default:
      return 'info';
  }
}

function parseTimeout(value: string | undefined): number {
  const parsed = parseInt(value || '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : 30000;
}

/**
 * Merge command-line values over environment variables.
 * Throws ConfigError naming every missing Jellyfin setting.
 */
export function resolveConfig(overrides: ConfigOverrides = {}, env: Env = process.env): AppConfig {
  const serverUrl = (overrides.server || env.JELLYFIN_SERVER || '').trim().replace(/\/+$/, '');
  const apiKey = (overrides.apiKey || env.JELLYFIN_API_KEY || '').trim();
  const userName = (overrides.user || env.JELLYFIN_USER || '').trim();

  const missing: string[] = [];
  if (!serverUrl) missing.push('server URL (--server or JELLYFIN_SERVER)');
  if (!apiKey) missing.push('API key (--apikey or JELLYFIN_API_KEY)');
  if (!userName) missing.push('user name (--user or JELLYFIN_USER)');

  if (missing.length > 0) {
    throw new ConfigError(`Missing required Jellyfin configuration: ${missing.join(', ')}`);
  }

  return {
    jellyfin: { serverUrl, apiKey, userName },
    tvdbApiKey: (overrides.tvdbApiKey || env.TVDB_API_KEY || '').trim(),
    backupFile: overrides.file || env.BACKUP_FILE || DEFAULT_BACKUP_FILE,
    requestTimeoutMs: parseTimeout(env.REQUEST_TIMEOUT_MS),
  };
}

export const config = {
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
};
