import { JellyfinClient } from '../jellyfin/client';
import { ConsoleMissingReporter } from '../services/consoleReporter';
import { findMissingEpisodes, MissingEpisodesSummary } from '../services/missingEpisodes';
import { TvdbClient } from '../tvdb/client';

export async function performFindMissing(
  jellyfin: JellyfinClient,
  tvdb: TvdbClient,
  includeSpecials: boolean
): Promise<MissingEpisodesSummary> {
  console.log('Initializing TVDB client...');
  await tvdb.login();
  console.log('✓ TVDB authentication successful');

  console.log('\nFetching all series from Jellyfin...');
  return findMissingEpisodes(jellyfin, tvdb, includeSpecials, new ConsoleMissingReporter());
}
