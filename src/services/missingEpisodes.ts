import { errorMessage } from '../errors';
import {
  buildLocalRuntimeIndex,
  CatalogEpisode,
  LocalEpisodeObservation,
  MissingEpisode,
  SeriesSummary,
  TargetItem,
} from '../types/Catalog';
import { detectMissing } from './mergeDetector';

export const TVDB_PROVIDER = 'Tvdb';

export interface LocalSeriesLibrary {
  getAllSeries(): Promise<SeriesSummary[]>;
  getSeriesEpisodes(seriesId: string): Promise<TargetItem[]>;
}

export interface EpisodeCatalog {
  getSeriesEpisodes(seriesId: string): Promise<CatalogEpisode[]>;
}

export interface SeriesMissingResult {
  seriesName: string;
  tvdbId: string;
  catalogEpisodeCount: number;
  missing: MissingEpisode[];
}

export interface MissingEpisodesSummary {
  seriesChecked: number;
  seriesSkipped: number;
  seriesFailed: number;
  totalMissing: number;
  results: SeriesMissingResult[];
}

export type MissingEpisodesEvent =
  | { type: 'series-loaded'; count: number }
  | { type: 'series-skipped'; seriesName: string; position: number; total: number }
  | { type: 'series-failed'; seriesName: string; tvdbId: string; position: number; total: number; source: 'TVDB' | 'Jellyfin'; error: string }
  | { type: 'series-missing'; position: number; total: number; result: SeriesMissingResult }
  | { type: 'series-complete'; seriesName: string; position: number; total: number }
  | { type: 'missing-finished'; summary: MissingEpisodesSummary };

export interface MissingEpisodesReporter {
  report(event: MissingEpisodesEvent): void;
}

export interface FindMissingOptions {
  now?: Date;
}

export function compareEpisodes(a: CatalogEpisode, b: CatalogEpisode): number {
  return a.seasonNumber - b.seasonNumber || a.episodeNumber - b.episodeNumber;
}

// Local episodes without both numbers cannot be placed in the catalog order
function toObservations(items: TargetItem[]): LocalEpisodeObservation[] {
  const observations: LocalEpisodeObservation[] = [];
  for (const item of items) {
    if (item.seasonNumber === undefined || item.episodeNumber === undefined) {
      continue;
    }
    observations.push({
      seasonNumber: item.seasonNumber,
      episodeNumber: item.episodeNumber,
      runtimeMinutes: item.runtimeMinutes ?? 0,
    });
  }
  return observations;
}

/**
 * Check every local series that carries a TVDB id against the TVDB episode list.
 * A failed fetch only affects the series it belongs to.
 */
export async function findMissingEpisodes(
  library: LocalSeriesLibrary,
  catalog: EpisodeCatalog,
  includeSpecials: boolean,
  reporter: MissingEpisodesReporter,
  options: FindMissingOptions = {}
): Promise<MissingEpisodesSummary> {
  const series = await library.getAllSeries();
  reporter.report({ type: 'series-loaded', count: series.length });

  const summary: MissingEpisodesSummary = {
    seriesChecked: 0,
    seriesSkipped: 0,
    seriesFailed: 0,
    totalMissing: 0,
    results: [],
  };

  for (let i = 0; i < series.length; i++) {
    const show = series[i];
    const position = i + 1;
    const total = series.length;
    const tvdbId = show.providerIds[TVDB_PROVIDER];

    if (!tvdbId) {
      summary.seriesSkipped++;
      reporter.report({ type: 'series-skipped', seriesName: show.name, position, total });
      continue;
    }

    summary.seriesChecked++;

    let catalogEpisodes: CatalogEpisode[];
    try {
      catalogEpisodes = await catalog.getSeriesEpisodes(tvdbId);
    } catch (error) {
      summary.seriesFailed++;
      reporter.report({ type: 'series-failed', seriesName: show.name, tvdbId, position, total, source: 'TVDB', error: errorMessage(error) });
      continue;
    }

    let localEpisodes: TargetItem[];
    try {
      localEpisodes = await library.getSeriesEpisodes(show.id);
    } catch (error) {
      summary.seriesFailed++;
      reporter.report({ type: 'series-failed', seriesName: show.name, tvdbId, position, total, source: 'Jellyfin', error: errorMessage(error) });
      continue;
    }

    const localRuntimes = buildLocalRuntimeIndex(toObservations(localEpisodes));
    const ordered = [...catalogEpisodes].sort(compareEpisodes);
    const missing = detectMissing(ordered, localRuntimes, includeSpecials, { now: options.now });

    if (missing.length > 0) {
      const result: SeriesMissingResult = {
        seriesName: show.name,
        tvdbId,
        catalogEpisodeCount: catalogEpisodes.length,
        missing,
      };
      summary.results.push(result);
      summary.totalMissing += missing.length;
      reporter.report({ type: 'series-missing', position, total, result });
    } else {
      reporter.report({ type: 'series-complete', seriesName: show.name, position, total });
    }
  }

  reporter.report({ type: 'missing-finished', summary });
  return summary;
}
