import { errorMessage, SeriesNotFoundError } from '../errors';
import { SeriesSummary, TargetItem, WatchedRecord } from '../types/Catalog';
import {
  buildIdentityIndex,
  IdentityIndex,
  IdentityKind,
  IndexCollision,
  MatchSource,
  pickSeries,
  resolveIdentity,
} from './identityResolver';

export interface WatchMarker {
  markAsWatched(itemId: string): Promise<void>;
}

export interface MovieLibrary {
  getAllMovies(): Promise<TargetItem[]>;
}

export interface SeriesDirectory {
  searchSeries(seriesName: string): Promise<SeriesSummary[]>;
  getSeriesEpisodes(seriesId: string): Promise<TargetItem[]>;
}

export interface SeasonGroup {
  seasonName: string;
  episodes: WatchedRecord[];
}

export interface SeriesGroup {
  seriesName: string;
  seasons: SeasonGroup[];
}

export interface GroupedSnapshot {
  movies: WatchedRecord[];
  series: SeriesGroup[];
  skipped: WatchedRecord[];
}

export interface RestoreTally {
  successful: number;
  failed: number;
}

export interface RestoreSummary extends RestoreTally {
  skipped: number;
  total: number;
}

export type RestoreEvent =
  | { type: 'movies-started'; count: number }
  | { type: 'movies-failed'; count: number; error: string }
  | { type: 'shows-started'; count: number }
  | { type: 'series-started'; seriesName: string; position: number; total: number; episodeCount: number }
  | { type: 'series-resolved'; seriesName: string; seriesId: string; matchedName: string }
  | { type: 'series-failed'; seriesName: string; stage: 'search' | 'episodes'; episodeCount: number; error: string }
  | { type: 'season-started'; seriesName: string; seasonName: string; episodeCount: number }
  | { type: 'season-finished'; seriesName: string; seasonName: string; episodeCount: number }
  | { type: 'item-started'; kind: IdentityKind; name: string; position: number; total: number }
  | { type: 'item-resolved'; kind: IdentityKind; name: string; itemId: string; matchedBy: MatchSource; key: string }
  | { type: 'item-not-found'; kind: IdentityKind; name: string }
  | { type: 'item-already-played'; kind: IdentityKind; name: string; itemId: string }
  | { type: 'item-marked'; kind: IdentityKind; name: string; itemId: string }
  | { type: 'item-mark-failed'; kind: IdentityKind; name: string; itemId: string; error: string }
  | { type: 'index-collision'; kind: IdentityKind; collision: IndexCollision }
  | { type: 'restore-finished'; summary: RestoreSummary };

export interface RestoreReporter {
  report(event: RestoreEvent): void;
}

export const silentReporter: RestoreReporter = {
  report: () => undefined,
};

export interface RestoreCollaborators {
  movies: MovieLibrary;
  series: SeriesDirectory;
  marker: WatchMarker;
  reporter?: RestoreReporter;
}

/**
 * Split a snapshot into movies and series → season → episode groups.
 * Groups keep the order in which their first record appears in the snapshot.
 */
export function groupWatchedRecords(records: WatchedRecord[]): GroupedSnapshot {
  const movies: WatchedRecord[] = [];
  const skipped: WatchedRecord[] = [];
  const seriesMap = new Map<string, Map<string, WatchedRecord[]>>();

  for (const record of records) {
    if (record.kind === 'Movie') {
      movies.push(record);
    } else if (record.kind === 'Episode') {
      let seasons = seriesMap.get(record.seriesName);
      if (!seasons) {
        seasons = new Map();
        seriesMap.set(record.seriesName, seasons);
      }
      const episodes = seasons.get(record.seasonName);
      if (episodes) {
        episodes.push(record);
      } else {
        seasons.set(record.seasonName, [record]);
      }
    } else {
      skipped.push(record);
    }
  }

  const series: SeriesGroup[] = Array.from(seriesMap, ([seriesName, seasons]) => ({
    seriesName,
    seasons: Array.from(seasons, ([seasonName, episodes]) => ({ seasonName, episodes })),
  }));

  return { movies, series, skipped };
}

export function countEpisodes(group: SeriesGroup): number {
  return group.seasons.reduce((sum, season) => sum + season.episodes.length, 0);
}

function reportCollisions(index: IdentityIndex, reporter: RestoreReporter) {
  for (const collision of index.collisions) {
    reporter.report({ type: 'index-collision', kind: index.kind, collision });
  }
}

/**
 * Resolve one record and mark it watched when needed.
 * Returns true when the item counts as restored.
 */
async function restoreItem(
  record: WatchedRecord,
  index: IdentityIndex,
  marker: WatchMarker,
  reporter: RestoreReporter
): Promise<boolean> {
  const kind = index.kind;
  const result = resolveIdentity(record, index);

  if (!result.found) {
    reporter.report({ type: 'item-not-found', kind, name: record.name });
    return false;
  }

  const { item } = result;
  reporter.report({
    type: 'item-resolved',
    kind,
    name: record.name,
    itemId: item.id,
    matchedBy: result.matchedBy,
    key: result.key,
  });

  if (item.played) {
    reporter.report({ type: 'item-already-played', kind, name: record.name, itemId: item.id });
    return true;
  }

  try {
    await marker.markAsWatched(item.id);
  } catch (error) {
    reporter.report({ type: 'item-mark-failed', kind, name: record.name, itemId: item.id, error: errorMessage(error) });
    return false;
  }

  reporter.report({ type: 'item-marked', kind, name: record.name, itemId: item.id });
  return true;
}

export async function restoreMovies(
  watchedMovies: WatchedRecord[],
  targetMovies: TargetItem[],
  marker: WatchMarker,
  reporter: RestoreReporter = silentReporter
): Promise<RestoreTally> {
  const tally: RestoreTally = { successful: 0, failed: 0 };
  const index = buildIdentityIndex(targetMovies, 'movie');
  reportCollisions(index, reporter);

  for (let i = 0; i < watchedMovies.length; i++) {
    const movie = watchedMovies[i];
    reporter.report({ type: 'item-started', kind: 'movie', name: movie.name, position: i + 1, total: watchedMovies.length });

    if (await restoreItem(movie, index, marker, reporter)) {
      tally.successful++;
    } else {
      tally.failed++;
    }
  }

  return tally;
}

async function resolveSeries(seriesName: string, directory: SeriesDirectory): Promise<SeriesSummary> {
  const candidates = await directory.searchSeries(seriesName);
  const match = pickSeries(seriesName, candidates);
  if (!match) {
    throw new SeriesNotFoundError(seriesName);
  }
  return match;
}

export async function restoreEpisodes(
  groups: SeriesGroup[],
  directory: SeriesDirectory,
  marker: WatchMarker,
  reporter: RestoreReporter = silentReporter
): Promise<RestoreTally> {
  const tally: RestoreTally = { successful: 0, failed: 0 };

  for (let i = 0; i < groups.length; i++) {
    const group = groups[i];
    const episodeCount = countEpisodes(group);
    reporter.report({
      type: 'series-started',
      seriesName: group.seriesName,
      position: i + 1,
      total: groups.length,
      episodeCount,
    });

    let series: SeriesSummary;
    try {
      series = await resolveSeries(group.seriesName, directory);
    } catch (error) {
      reporter.report({ type: 'series-failed', seriesName: group.seriesName, stage: 'search', episodeCount, error: errorMessage(error) });
      tally.failed += episodeCount;
      continue;
    }
    reporter.report({ type: 'series-resolved', seriesName: group.seriesName, seriesId: series.id, matchedName: series.name });

    let targets: TargetItem[];
    try {
      targets = await directory.getSeriesEpisodes(series.id);
    } catch (error) {
      reporter.report({ type: 'series-failed', seriesName: group.seriesName, stage: 'episodes', episodeCount, error: errorMessage(error) });
      tally.failed += episodeCount;
      continue;
    }

    const index = buildIdentityIndex(targets, 'episode');
    reportCollisions(index, reporter);

    for (const season of group.seasons) {
      reporter.report({
        type: 'season-started',
        seriesName: group.seriesName,
        seasonName: season.seasonName,
        episodeCount: season.episodes.length,
      });

      for (let j = 0; j < season.episodes.length; j++) {
        const episode = season.episodes[j];
        reporter.report({ type: 'item-started', kind: 'episode', name: episode.name, position: j + 1, total: season.episodes.length });

        if (await restoreItem(episode, index, marker, reporter)) {
          tally.successful++;
        } else {
          tally.failed++;
        }
      }

      reporter.report({
        type: 'season-finished',
        seriesName: group.seriesName,
        seasonName: season.seasonName,
        episodeCount: season.episodes.length,
      });
    }
  }

  return tally;
}

/**
 * Restore a whole snapshot: movies first, then every series group.
 */
export async function restoreSnapshot(records: WatchedRecord[], collaborators: RestoreCollaborators): Promise<RestoreSummary> {
  const reporter = collaborators.reporter ?? silentReporter;
  const grouped = groupWatchedRecords(records);
  const summary: RestoreSummary = {
    successful: 0,
    failed: 0,
    skipped: grouped.skipped.length,
    total: 0,
  };

  if (grouped.movies.length > 0) {
    reporter.report({ type: 'movies-started', count: grouped.movies.length });
    summary.total += grouped.movies.length;

    let targetMovies: TargetItem[] | null = null;
    try {
      targetMovies = await collaborators.movies.getAllMovies();
    } catch (error) {
      reporter.report({ type: 'movies-failed', count: grouped.movies.length, error: errorMessage(error) });
      summary.failed += grouped.movies.length;
    }

    if (targetMovies) {
      const tally = await restoreMovies(grouped.movies, targetMovies, collaborators.marker, reporter);
      summary.successful += tally.successful;
      summary.failed += tally.failed;
    }
  }

  if (grouped.series.length > 0) {
    reporter.report({ type: 'shows-started', count: grouped.series.length });
    const tally = await restoreEpisodes(grouped.series, collaborators.series, collaborators.marker, reporter);
    summary.successful += tally.successful;
    summary.failed += tally.failed;
    summary.total += grouped.series.reduce((sum, group) => sum + countEpisodes(group), 0);
  }

  reporter.report({ type: 'restore-finished', summary });
  return summary;
}
