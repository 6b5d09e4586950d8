import axios from 'axios';

/**
 * Base error class for jellykeep
 */
export class JellykeepError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'JellykeepError';
  }
}

/**
 * Missing or invalid connection settings
 */
export class ConfigError extends JellykeepError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Snapshot file could not be read, parsed or written
 */
export class SnapshotError extends JellykeepError {
  constructor(
    message: string,
    public readonly filePath?: string
  ) {
    super(message);
    this.name = 'SnapshotError';
  }
}

/**
 * A remote catalog (Jellyfin or TVDB) request failed
 */
export class CatalogRequestError extends JellykeepError {
  constructor(
    message: string,
    public readonly service: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'CatalogRequestError';
  }
}

export class SeriesNotFoundError extends JellykeepError {
  constructor(public readonly seriesName: string) {
    super(`Series not found: ${seriesName}`);
    this.name = 'SeriesNotFoundError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function serverMessage(data: unknown): string | undefined {
  if (typeof data === 'string' && data.trim()) {
    return data.trim();
  }
  if (data && typeof data === 'object' && 'message' in data && typeof data.message === 'string') {
    return data.message;
  }
  return undefined;
}

/**
 * Wrap any failure from an axios call into a CatalogRequestError with a hint
 * about the most likely misconfiguration.
 */
export function toCatalogRequestError(service: string, error: unknown): CatalogRequestError {
  if (error instanceof CatalogRequestError) {
    return error;
  }

  if (!axios.isAxiosError(error)) {
    return new CatalogRequestError(`${service} request failed: ${errorMessage(error)}`, service);
  }

  const status = error.response?.status;
  let message: string;
  if (status === 401) {
    message = `Unauthorized - Invalid API key. Please check your ${service} API key.`;
  } else if (status === 404) {
    message = `Not found - ${error.config?.url || 'resource'} does not exist on ${service}.`;
  } else if (error.code === 'ECONNREFUSED' || error.code === 'ENOTFOUND') {
    message = `Connection failed - Cannot reach ${service} at ${error.config?.baseURL || 'the configured URL'}.`;
  } else {
    const fromServer = serverMessage(error.response?.data);
    if (status && fromServer) {
      message = `API returned status ${status}: ${fromServer}`;
    } else if (status) {
      message = `API returned status ${status}`;
    } else {
      message = error.message || 'Unknown error';
    }
  }

  return new CatalogRequestError(`${service} request failed: ${message}`, service, status);
}
