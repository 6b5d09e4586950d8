import { JellyfinClient } from '../jellyfin/client';
import { ConsoleRestoreReporter } from '../services/consoleReporter';
import { groupWatchedRecords, restoreSnapshot, RestoreSummary } from '../services/restoreCoordinator';
import { readSnapshot } from '../services/snapshot';

export async function performRestore(client: JellyfinClient, filePath: string): Promise<RestoreSummary> {
  const snapshot = await readSnapshot(filePath);
  const { userName } = client.getConfig();

  console.log(
    `Restoring ${snapshot.items.length} watched items for ${userName} from backup created at ${snapshot.createdAt}`
  );

  const grouped = groupWatchedRecords(snapshot.items);
  console.log(`Found ${grouped.movies.length} movies and ${grouped.series.length} TV shows`);

  return restoreSnapshot(snapshot.items, {
    movies: client,
    series: client,
    marker: client,
    reporter: new ConsoleRestoreReporter(),
  });
}
