import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  ConsoleMissingReporter,
  ConsoleRestoreReporter,
  formatMissingEpisode,
  formatRestoreEvent,
} from '../../../src/services/consoleReporter';
import { logger } from '../../../src/services/structuredLogging';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('formatMissingEpisode', () => {
  it('should pad season and episode numbers', () => {
    expect(
      formatMissingEpisode({ seasonNumber: 1, episodeNumber: 5, name: 'Ep5', airDate: '2020-02-03', overview: '' })
    ).toBe('    - S01E05: Ep5 (Aired: 2020-02-03)');
  });
});

describe('formatRestoreEvent', () => {
  it('should print movie progress lines', () => {
    expect(formatRestoreEvent({ type: 'item-started', kind: 'movie', name: 'Heat', position: 2, total: 7 })).toBe(
      '[2/7] Processing movie: Heat'
    );
    expect(formatRestoreEvent({ type: 'item-already-played', kind: 'movie', name: 'Heat', itemId: 'm1' })).toBe(
      '  ○ Already watched, skipping'
    );
  });

  it('should only print failures for single episodes', () => {
    expect(formatRestoreEvent({ type: 'item-marked', kind: 'episode', name: 'Ep5', itemId: 'e5' })).toBeNull();
    expect(formatRestoreEvent({ type: 'item-not-found', kind: 'episode', name: 'Ep5' })).toBe('    ✗ Ep5 - not found');
  });

  it('should name the stage at which a series failed', () => {
    expect(
      formatRestoreEvent({ type: 'series-failed', seriesName: 'Gone', stage: 'search', episodeCount: 3, error: 'Series not found: Gone' })
    ).toBe('  ✗ Error finding series: Series not found: Gone');
    expect(
      formatRestoreEvent({ type: 'series-failed', seriesName: 'Show', stage: 'episodes', episodeCount: 2, error: 'HTTP 500' })
    ).toBe('  ✗ Error fetching episodes: HTTP 500');
  });

  it('should print the final summary', () => {
    expect(
      formatRestoreEvent({ type: 'restore-finished', summary: { successful: 3, failed: 1, skipped: 0, total: 4 } })
    ).toBe('\n=== Restore Complete ===\nSuccessful: 3\nFailed: 1\nTotal: 4');
  });
});

describe('ConsoleRestoreReporter', () => {
  it('should write formatted lines and send collisions to the logger', () => {
    const lines: string[] = [];
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
    const reporter = new ConsoleRestoreReporter((line) => lines.push(line));

    reporter.report({ type: 'season-started', seriesName: 'Show', seasonName: 'Season 1', episodeCount: 3 });
    reporter.report({
      type: 'index-collision',
      kind: 'episode',
      collision: { key: 'Tvdb:1', scope: 'provider', previousId: 'a', itemId: 'b' },
    });

    expect(lines).toEqual(['  Season: Season 1 (3 episodes)']);
    expect(warn).toHaveBeenCalledWith(
      'restore',
      'Duplicate provider key "Tvdb:1" in episode library, using the last item',
      { details: { previousId: 'a', itemId: 'b' } }
    );
  });
});

describe('ConsoleMissingReporter', () => {
  it('should list the missing episodes of a series', () => {
    const lines: string[] = [];
    const reporter = new ConsoleMissingReporter((line) => lines.push(line));

    reporter.report({
      type: 'series-missing',
      position: 3,
      total: 10,
      result: {
        seriesName: 'Show',
        tvdbId: '81189',
        catalogEpisodeCount: 62,
        missing: [{ seasonNumber: 2, episodeNumber: 13, name: 'ABQ', airDate: '2009-05-31', overview: '' }],
      },
    });
    reporter.report({ type: 'series-complete', seriesName: 'Other', position: 4, total: 10 });

    expect(lines).toEqual([
      '\n[3/10] Show (TVDB: 81189)\n  ⚠ Missing 1 episodes (of 62 total):\n    - S02E13: ABQ (Aired: 2009-05-31)',
    ]);
  });

  it('should print the summary with skipped series counted as checked', () => {
    const lines: string[] = [];
    const reporter = new ConsoleMissingReporter((line) => lines.push(line));

    reporter.report({
      type: 'missing-finished',
      summary: { seriesChecked: 4, seriesSkipped: 2, seriesFailed: 1, totalMissing: 9, results: [] },
    });

    expect(lines).toEqual(['\n=== Summary ===\nTotal series checked: 6\nTotal missing episodes: 9']);
  });
});
