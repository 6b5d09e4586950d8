export type ItemKind = 'Movie' | 'Episode' | 'Unknown';
export type ProviderIds = Record<string, string>;

// Episode as listed by the authoritative remote catalog (TVDB)
export interface CatalogEpisode {
  seriesId: string;
  seasonNumber: number;
  episodeNumber: number;
  name: string;
  overview: string;
  airDate: string | null;
  runtimeMinutes: number;
}

export interface LocalEpisodeObservation {
  seasonNumber: number;
  episodeNumber: number;
  runtimeMinutes: number;
}

/**
 * On-disk runtime of every locally present episode, keyed by episodeKey().
 * A missing key means the episode is not in the local library.
 */
export type LocalRuntimeIndex = Map<string, number>;

export interface MissingEpisode {
  seasonNumber: number;
  episodeNumber: number;
  name: string;
  airDate: string;
  overview: string;
}

export interface WatchedRecord {
  id: string;
  kind: ItemKind;
  name: string;
  seriesName: string;
  seasonName: string;
  playedDate: string | null;
  providerIds: ProviderIds;
}

export interface TargetItem {
  id: string;
  name: string;
  played: boolean;
  providerIds: ProviderIds;
  seriesName?: string;
  seasonName?: string;
  seasonNumber?: number;
  episodeNumber?: number;
  runtimeMinutes?: number;
}

export interface SeriesSummary {
  id: string;
  name: string;
  providerIds: ProviderIds;
}

export function episodeKey(seasonNumber: number, episodeNumber: number): string {
  return `${seasonNumber}:${episodeNumber}`;
}

export function buildLocalRuntimeIndex(observations: LocalEpisodeObservation[]): LocalRuntimeIndex {
  const index: LocalRuntimeIndex = new Map();
  for (const observation of observations) {
    index.set(episodeKey(observation.seasonNumber, observation.episodeNumber), Math.max(0, observation.runtimeMinutes));
  }
  return index;
}
