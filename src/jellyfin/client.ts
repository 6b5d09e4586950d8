import axios, { AxiosInstance } from 'axios';
import { APP_NAME, APP_VERSION, JellyfinConfig } from '../config';
import { ConfigError, toCatalogRequestError } from '../errors';
import { logger } from '../services/structuredLogging';
import { ItemKind, ProviderIds, SeriesSummary, TargetItem, WatchedRecord } from '../types/Catalog';
import { JellyfinItem, JellyfinItemsResponse, JellyfinUser } from './types';

// RunTimeTicks are 100ns units
const TICKS_PER_MINUTE = 60 * 10 * 1000 * 1000;

export function ticksToMinutes(ticks: number | null | undefined): number {
  if (!ticks || ticks < 0) {
    return 0;
  }
  return Math.floor(ticks / TICKS_PER_MINUTE);
}

function kindFromType(type: string | undefined): ItemKind {
  switch (type) {
    case 'Movie':
      return 'Movie';
    case 'Episode':
      return 'Episode';
    default:
      return 'Unknown';
  }
}

function providerIdsOf(item: JellyfinItem): ProviderIds {
  return item.ProviderIds ? { ...item.ProviderIds } : {};
}

export class JellyfinClient {
  private client: AxiosInstance;
  private userId: string | null = null;

  constructor(
    private readonly config: JellyfinConfig,
    options: { timeoutMs?: number; http?: AxiosInstance } = {}
  ) {
    this.client =
      options.http ??
      axios.create({
        baseURL: config.serverUrl,
        timeout: options.timeoutMs ?? 30000,
      });

    // Preferred MediaBrowser header plus the legacy token header
    this.client.defaults.headers.common['Authorization'] =
      `MediaBrowser Client="${APP_NAME}", Device="Node", DeviceId="${APP_NAME}-cli", Version="${APP_VERSION}", Token="${config.apiKey}"`;
    this.client.defaults.headers.common['X-Emby-Token'] = config.apiKey;
    this.client.defaults.headers.common['Accept'] = 'application/json';
  }

  getConfig(): JellyfinConfig {
    return this.config;
  }

  getUserId(): string {
    if (!this.userId) {
      throw new ConfigError('Jellyfin user not resolved yet - call resolveUserId() first');
    }
    return this.userId;
  }

  /**
   * Look up the configured user name (case-insensitive) and remember its id.
   */
  async resolveUserId(): Promise<string> {
    const users = await this.get<JellyfinUser[]>('/Users');
    const wanted = this.config.userName.toLowerCase();
    const user = (users || []).find((u) => u.Name.toLowerCase() === wanted);
    if (!user) {
      throw new ConfigError(`Jellyfin user not found: ${this.config.userName}`);
    }
    this.userId = user.Id;
    logger.debug('jellyfin', `Resolved user ${user.Name}`, { details: { userId: user.Id } });
    return user.Id;
  }

  private async get<T>(url: string, params?: Record<string, string | number | boolean>): Promise<T> {
    try {
      const response = await this.client.get<T>(url, { params });
      return response.data;
    } catch (error) {
      throw toCatalogRequestError('Jellyfin', error);
    }
  }

  private async getItems(params: Record<string, string | number | boolean>): Promise<JellyfinItem[]> {
    const data = await this.get<JellyfinItemsResponse>('/Items', { userId: this.getUserId(), ...params });
    return data?.Items || [];
  }

  async getWatchedItems(): Promise<WatchedRecord[]> {
    const items = await this.getItems({
      Filters: 'IsPlayed',
      Recursive: true,
      IncludeItemTypes: 'Movie,Episode',
      Fields: 'Path,ProviderIds,SeriesName,SeasonName',
    });

    return items.map((item) => ({
      id: item.Id,
      kind: kindFromType(item.Type),
      name: item.Name,
      seriesName: item.SeriesName || '',
      seasonName: item.SeasonName || '',
      playedDate: item.UserData?.LastPlayedDate || null,
      providerIds: providerIdsOf(item),
    }));
  }

  async getAllMovies(): Promise<TargetItem[]> {
    const items = await this.getItems({
      Recursive: true,
      IncludeItemTypes: 'Movie',
      Fields: 'ProviderIds,UserData',
    });

    return items.map((item) => ({
      id: item.Id,
      name: item.Name,
      played: item.UserData?.Played === true,
      providerIds: providerIdsOf(item),
    }));
  }

  async getAllSeries(): Promise<SeriesSummary[]> {
    const items = await this.getItems({
      Recursive: true,
      IncludeItemTypes: 'Series',
      Fields: 'ProviderIds',
    });
    return items.map((item) => ({ id: item.Id, name: item.Name, providerIds: providerIdsOf(item) }));
  }

  async searchSeries(seriesName: string): Promise<SeriesSummary[]> {
    const items = await this.getItems({
      SearchTerm: seriesName,
      IncludeItemTypes: 'Series',
      Recursive: true,
      Limit: 10,
    });
    return items.map((item) => ({ id: item.Id, name: item.Name, providerIds: providerIdsOf(item) }));
  }

  async getSeriesEpisodes(seriesId: string): Promise<TargetItem[]> {
    const items = await this.getItems({
      ParentId: seriesId,
      Recursive: true,
      IncludeItemTypes: 'Episode',
      Fields: 'ProviderIds,SeriesName,SeasonName,UserData',
    });

    return items.map((item) => ({
      id: item.Id,
      name: item.Name,
      played: item.UserData?.Played === true,
      providerIds: providerIdsOf(item),
      seriesName: item.SeriesName || '',
      seasonName: item.SeasonName || '',
      seasonNumber: item.ParentIndexNumber ?? undefined,
      episodeNumber: item.IndexNumber ?? undefined,
      runtimeMinutes: ticksToMinutes(item.RunTimeTicks),
    }));
  }

  async markAsWatched(itemId: string): Promise<void> {
    try {
      await this.client.post(`/UserPlayedItems/${encodeURIComponent(itemId)}`, null, {
        params: { userId: this.getUserId() },
      });
    } catch (error) {
      throw toCatalogRequestError('Jellyfin', error);
    }
  }
}

/**
 * Create a client and resolve the configured user, failing fast on bad credentials.
 */
export async function connectJellyfin(config: JellyfinConfig, timeoutMs?: number): Promise<JellyfinClient> {
  const client = new JellyfinClient(config, { timeoutMs });
  await client.resolveUserId();
  return client;
}
