import { CatalogEpisode, episodeKey, LocalRuntimeIndex, MissingEpisode } from '../types/Catalog';

/**
 * A file on disk is taken to contain the following missing episodes when its
 * runtime covers at least this share of their combined expected runtime.
 */
export const MERGE_RUNTIME_RATIO = 0.85;

/**
 * Fold accumulator for the multi-part episode scan.
 * observedRuntime is the on-disk runtime of the local file anchoring the chain,
 * expectedAccum the summed catalog runtime of every episode folded into it so far.
 */
export interface ChainState {
  active: boolean;
  season: number;
  observedRuntime: number;
  expectedAccum: number;
}

export interface ChainContext {
  localRuntimes: LocalRuntimeIndex;
  includeSpecials: boolean;
  now: Date;
}

export interface ChainStep {
  state: ChainState;
  missing: MissingEpisode | null;
}

export interface DetectMissingOptions {
  now?: Date;
}

export const INITIAL_CHAIN: ChainState = {
  active: false,
  season: 0,
  observedRuntime: 0,
  expectedAccum: 0,
};

const AIR_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parse a YYYY-MM-DD air date as a UTC calendar day. Returns null for anything
 * else, including impossible dates such as 2023-02-30.
 */
export function parseAirDate(airDate: string | null | undefined): Date | null {
  if (!airDate) {
    return null;
  }
  const match = AIR_DATE_PATTERN.exec(airDate.trim());
  if (!match) {
    return null;
  }
  const year = parseInt(match[1], 10);
  const month = parseInt(match[2], 10);
  const day = parseInt(match[3], 10);
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

// True only when the air date is a calendar day strictly before today (UTC)
export function isAiredBefore(airDate: string | null | undefined, now: Date): boolean {
  const aired = parseAirDate(airDate);
  if (!aired) {
    return false;
  }
  const today = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
  return aired.getTime() < today;
}

function toMissing(episode: CatalogEpisode): MissingEpisode {
  return {
    seasonNumber: episode.seasonNumber,
    episodeNumber: episode.episodeNumber,
    name: episode.name,
    airDate: episode.airDate || '',
    overview: episode.overview,
  };
}

/**
 * One transition of the scan. Never mutates the incoming state.
 */
export function advanceChain(state: ChainState, episode: CatalogEpisode, context: ChainContext): ChainStep {
  const localRuntime = context.localRuntimes.get(episodeKey(episode.seasonNumber, episode.episodeNumber));

  if (localRuntime !== undefined) {
    return {
      state: {
        active: true,
        season: episode.seasonNumber,
        observedRuntime: localRuntime,
        expectedAccum: episode.runtimeMinutes,
      },
      missing: null,
    };
  }

  if (episode.seasonNumber === 0 && !context.includeSpecials) {
    return { state, missing: null };
  }

  // Not aired yet (or no usable date): neither reported nor allowed to break a chain
  if (!isAiredBefore(episode.airDate, context.now)) {
    return { state, missing: null };
  }

  if (state.active && state.season === episode.seasonNumber) {
    const expectedAccum = state.expectedAccum + episode.runtimeMinutes;
    if (state.observedRuntime >= MERGE_RUNTIME_RATIO * expectedAccum) {
      return { state: { ...state, expectedAccum }, missing: null };
    }
  }

  return {
    state: { ...state, active: false },
    missing: toMissing(episode),
  };
}

/**
 * Find catalog episodes absent from the local library.
 * `episodes` must be ordered by (season, episode); the scan is a single forward fold.
 */
export function detectMissing(
  episodes: CatalogEpisode[],
  localRuntimes: LocalRuntimeIndex,
  includeSpecials: boolean,
  options: DetectMissingOptions = {}
): MissingEpisode[] {
  const context: ChainContext = {
    localRuntimes,
    includeSpecials,
    now: options.now ?? new Date(),
  };

  const missing: MissingEpisode[] = [];
  let state = INITIAL_CHAIN;

  for (const episode of episodes) {
    const step = advanceChain(state, episode, context);
    state = step.state;
    if (step.missing) {
      missing.push(step.missing);
    }
  }

  return missing;
}
