import fs from 'fs/promises';
import { z } from 'zod';
import { APP_VERSION } from '../config';
import { errorMessage, SnapshotError } from '../errors';
import { ItemKind, WatchedRecord } from '../types/Catalog';

// Numeric item types used in the snapshot file
export const ITEM_TYPE_UNKNOWN = 0;
export const ITEM_TYPE_MOVIE = 1;
export const ITEM_TYPE_EPISODE = 2;

const WatchedItemSchema = z.object({
  id: z.string(),
  name: z.string(),
  type: z.number().int(),
  series_name: z.string().optional(),
  season_name: z.string().optional(),
  played_date: z.string().nullable().optional(),
  provider_ids: z.record(z.string()).nullable().optional(),
});

const SnapshotFileSchema = z.object({
  created_at: z.string(),
  server_url: z.string(),
  user_id: z.string(),
  user_name: z.string(),
  version: z.string(),
  watched_items: z.array(WatchedItemSchema).nullable(),
});

export type SnapshotFile = z.infer<typeof SnapshotFileSchema>;
type SnapshotFileItem = z.infer<typeof WatchedItemSchema>;

export interface Snapshot {
  createdAt: string;
  serverUrl: string;
  userId: string;
  userName: string;
  version: string;
  items: WatchedRecord[];
}

export interface SnapshotMeta {
  serverUrl: string;
  userId: string;
  userName: string;
}

function kindFromType(type: number): ItemKind {
  if (type === ITEM_TYPE_MOVIE) return 'Movie';
  if (type === ITEM_TYPE_EPISODE) return 'Episode';
  return 'Unknown';
}

function typeFromKind(kind: ItemKind): number {
  if (kind === 'Movie') return ITEM_TYPE_MOVIE;
  if (kind === 'Episode') return ITEM_TYPE_EPISODE;
  return ITEM_TYPE_UNKNOWN;
}

function fromFileItem(item: SnapshotFileItem): WatchedRecord {
  return {
    id: item.id,
    kind: kindFromType(item.type),
    name: item.name,
    seriesName: item.series_name || '',
    seasonName: item.season_name || '',
    playedDate: item.played_date || null,
    providerIds: item.provider_ids || {},
  };
}

function toFileItem(record: WatchedRecord): SnapshotFileItem {
  const item: SnapshotFileItem = {
    id: record.id,
    name: record.name,
    type: typeFromKind(record.kind),
    played_date: record.playedDate,
  };
  if (record.seriesName) item.series_name = record.seriesName;
  if (record.seasonName) item.season_name = record.seasonName;
  if (Object.keys(record.providerIds).length > 0) item.provider_ids = record.providerIds;
  return item;
}

export function createSnapshot(items: WatchedRecord[], meta: SnapshotMeta, now: Date = new Date()): Snapshot {
  return {
    createdAt: now.toISOString(),
    serverUrl: meta.serverUrl,
    userId: meta.userId,
    userName: meta.userName,
    version: APP_VERSION,
    items,
  };
}

export function parseSnapshot(raw: string, filePath?: string): Snapshot {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new SnapshotError(`Snapshot is not valid JSON: ${errorMessage(error)}`, filePath);
  }

  const parsed = SnapshotFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new SnapshotError(`Invalid snapshot: ${issues.join('; ')}`, filePath);
  }

  const file = parsed.data;
  return {
    createdAt: file.created_at,
    serverUrl: file.server_url,
    userId: file.user_id,
    userName: file.user_name,
    version: file.version,
    items: (file.watched_items || []).map(fromFileItem),
  };
}

export function serializeSnapshot(snapshot: Snapshot): string {
  const file: SnapshotFile = {
    created_at: snapshot.createdAt,
    server_url: snapshot.serverUrl,
    user_id: snapshot.userId,
    user_name: snapshot.userName,
    version: snapshot.version,
    watched_items: snapshot.items.map(toFileItem),
  };
  return JSON.stringify(file, null, 2);
}

export async function readSnapshot(filePath: string): Promise<Snapshot> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new SnapshotError(`Reading backup file failed: ${errorMessage(error)}`, filePath);
  }
  return parseSnapshot(raw, filePath);
}

export async function writeSnapshot(filePath: string, snapshot: Snapshot): Promise<void> {
  try {
    await fs.writeFile(filePath, serializeSnapshot(snapshot), { encoding: 'utf-8', mode: 0o644 });
  } catch (error) {
    throw new SnapshotError(`Writing backup file failed: ${errorMessage(error)}`, filePath);
  }
}
