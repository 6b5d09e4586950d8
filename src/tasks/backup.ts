import { JellyfinClient } from '../jellyfin/client';
import { createSnapshot, writeSnapshot } from '../services/snapshot';

export interface BackupResult {
  filePath: string;
  itemCount: number;
}

export async function performBackup(client: JellyfinClient, filePath: string): Promise<BackupResult> {
  const { serverUrl, userName } = client.getConfig();
  console.log(`Fetching watched items from Jellyfin for user ${userName}...`);

  const items = await client.getWatchedItems();
  const snapshot = createSnapshot(items, { serverUrl, userId: client.getUserId(), userName });
  await writeSnapshot(filePath, snapshot);

  console.log(`✓ Backed up ${items.length} watched items to ${filePath}`);
  return { filePath, itemCount: items.length };
}
