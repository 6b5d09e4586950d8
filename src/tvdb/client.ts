import axios, { AxiosInstance } from 'axios';
import { CatalogRequestError, toCatalogRequestError } from '../errors';
import { logger } from '../services/structuredLogging';
import { CatalogEpisode } from '../types/Catalog';
import { TvdbEpisode, TvdbEpisodesPage, TvdbLoginData, TvdbResponse } from './types';

export const TVDB_BASE_URL = 'https://api4.thetvdb.com/v4';

// Safety stop for a links.next that never empties
const MAX_EPISODE_PAGES = 500;

export function toCatalogEpisode(episode: TvdbEpisode): CatalogEpisode {
  return {
    seriesId: String(episode.seriesId),
    seasonNumber: episode.seasonNumber,
    episodeNumber: episode.number,
    name: episode.name || '',
    overview: episode.overview || '',
    airDate: episode.aired || null,
    runtimeMinutes: episode.runtime && episode.runtime > 0 ? Math.floor(episode.runtime) : 0,
  };
}

export class TvdbClient {
  private client: AxiosInstance;
  private token: string | null = null;

  constructor(
    private readonly apiKey: string,
    options: { timeoutMs?: number; http?: AxiosInstance } = {}
  ) {
    this.client =
      options.http ??
      axios.create({
        baseURL: TVDB_BASE_URL,
        timeout: options.timeoutMs ?? 30000,
      });
  }

  async login(): Promise<void> {
    try {
      const response = await this.client.post<TvdbResponse<TvdbLoginData>>(
        '/login',
        { apikey: this.apiKey },
        { headers: { 'Content-Type': 'application/json' } }
      );
      const token = response.data?.data?.token;
      if (!token) {
        throw new CatalogRequestError('TVDB login failed: no token in response', 'TVDB', response.status);
      }
      this.token = token;
      logger.debug('tvdb', 'Authenticated with TVDB');
    } catch (error) {
      throw toCatalogRequestError('TVDB', error);
    }
  }

  private async get<T>(url: string, params?: Record<string, string | number>): Promise<TvdbResponse<T>> {
    if (!this.token) {
      throw new CatalogRequestError('TVDB request failed: not authenticated - call login() first', 'TVDB');
    }
    try {
      const response = await this.client.get<TvdbResponse<T>>(url, {
        params,
        headers: { Authorization: `Bearer ${this.token}` },
      });
      return response.data;
    } catch (error) {
      throw toCatalogRequestError('TVDB', error);
    }
  }

  /**
   * All episodes of a series in the default season order, following links.next
   * until the last page.
   */
  async getSeriesEpisodes(seriesId: string): Promise<CatalogEpisode[]> {
    const episodes: CatalogEpisode[] = [];

    for (let page = 0; page < MAX_EPISODE_PAGES; page++) {
      const response = await this.get<TvdbEpisodesPage>(`/series/${encodeURIComponent(seriesId)}/episodes/default`, { page });
      for (const episode of response.data?.episodes || []) {
        episodes.push(toCatalogEpisode(episode));
      }
      if (!response.links?.next) {
        return episodes;
      }
    }

    logger.warn('tvdb', `Stopped paging episodes for series ${seriesId} after ${MAX_EPISODE_PAGES} pages`);
    return episodes;
  }
}
