import { MissingEpisode } from '../types/Catalog';
import { MissingEpisodesEvent, MissingEpisodesReporter } from './missingEpisodes';
import { RestoreEvent, RestoreReporter } from './restoreCoordinator';
import { logger } from './structuredLogging';

type Writer = (line: string) => void;

const pad2 = (value: number) => String(value).padStart(2, '0');

export function formatMissingEpisode(episode: MissingEpisode): string {
  return `    - S${pad2(episode.seasonNumber)}E${pad2(episode.episodeNumber)}: ${episode.name} (Aired: ${episode.airDate})`;
}

/**
 * Turn restore events into the progress lines printed during `restore`.
 * Returns null for events that print nothing.
 */
export function formatRestoreEvent(event: RestoreEvent): string | null {
  switch (event.type) {
    case 'movies-started':
      return `\n=== Processing ${event.count} Movies ===`;
    case 'movies-failed':
      return `Error fetching movies from server: ${event.error}`;
    case 'shows-started':
      return `\n=== Processing ${event.count} TV Shows ===`;
    case 'series-started':
      return `\n[${event.position}/${event.total}] Processing show: ${event.seriesName} (${event.episodeCount} episodes)`;
    case 'series-failed':
      return event.stage === 'search'
        ? `  ✗ Error finding series: ${event.error}`
        : `  ✗ Error fetching episodes: ${event.error}`;
    case 'season-started':
      return `  Season: ${event.seasonName} (${event.episodeCount} episodes)`;
    case 'season-finished':
      return `    ✓ Processed ${event.episodeCount} episodes`;
    case 'item-started':
      return event.kind === 'movie' ? `[${event.position}/${event.total}] Processing movie: ${event.name}` : null;
    case 'item-not-found':
      return event.kind === 'movie' ? '  ✗ Could not find movie' : `    ✗ ${event.name} - not found`;
    case 'item-already-played':
      return event.kind === 'movie' ? '  ○ Already watched, skipping' : null;
    case 'item-marked':
      return event.kind === 'movie' ? '  ✓ Marked as watched' : null;
    case 'item-mark-failed':
      return event.kind === 'movie'
        ? `  ✗ Failed to mark as watched: ${event.error}`
        : `    ✗ ${event.name} - failed to mark: ${event.error}`;
    case 'restore-finished':
      return [
        '\n=== Restore Complete ===',
        `Successful: ${event.summary.successful}`,
        `Failed: ${event.summary.failed}`,
        `Total: ${event.summary.total}`,
      ].join('\n');
    default:
      return null;
  }
}

export function formatMissingEvent(event: MissingEpisodesEvent): string | null {
  switch (event.type) {
    case 'series-loaded':
      return `✓ Found ${event.count} series in Jellyfin\nChecking for missing episodes...`;
    case 'series-failed':
      return [
        `\n[${event.position}/${event.total}] ${event.seriesName} (TVDB: ${event.tvdbId})`,
        `  ⚠ Could not fetch ${event.source} episodes: ${event.error}`,
      ].join('\n');
    case 'series-missing': {
      const { result } = event;
      return [
        `\n[${event.position}/${event.total}] ${result.seriesName} (TVDB: ${result.tvdbId})`,
        `  ⚠ Missing ${result.missing.length} episodes (of ${result.catalogEpisodeCount} total):`,
        ...result.missing.map(formatMissingEpisode),
      ].join('\n');
    }
    case 'missing-finished':
      return [
        '\n=== Summary ===',
        `Total series checked: ${event.summary.seriesChecked + event.summary.seriesSkipped}`,
        `Total missing episodes: ${event.summary.totalMissing}`,
      ].join('\n');
    default:
      return null;
  }
}

export class ConsoleRestoreReporter implements RestoreReporter {
  constructor(private readonly write: Writer = (line) => console.log(line)) {}

  report(event: RestoreEvent): void {
    if (event.type === 'index-collision') {
      const { collision } = event;
      logger.warn('restore', `Duplicate ${collision.scope} key "${collision.key}" in ${event.kind} library, using the last item`, {
        details: { previousId: collision.previousId, itemId: collision.itemId },
      });
      return;
    }
    if (event.type === 'item-resolved') {
      logger.debug('restore', `Resolved ${event.name} via ${event.matchedBy} key ${event.key}`, { details: { itemId: event.itemId } });
    }
    const line = formatRestoreEvent(event);
    if (line !== null) {
      this.write(line);
    }
  }
}

export class ConsoleMissingReporter implements MissingEpisodesReporter {
  constructor(private readonly write: Writer = (line) => console.log(line)) {}

  report(event: MissingEpisodesEvent): void {
    if (event.type === 'series-skipped') {
      logger.debug('missing', `Skipping ${event.seriesName}: no TVDB id`);
      return;
    }
    const line = formatMissingEvent(event);
    if (line !== null) {
      this.write(line);
    }
  }
}
