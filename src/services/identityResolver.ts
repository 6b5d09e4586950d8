import { ProviderIds, SeriesSummary, TargetItem, WatchedRecord } from '../types/Catalog';

export type IdentityKind = 'movie' | 'episode';
export type MatchSource = 'provider' | 'secondary';

export interface IndexCollision {
  key: string;
  scope: MatchSource;
  previousId: string;
  itemId: string;
}

export interface IdentityIndex {
  kind: IdentityKind;
  byProvider: Map<string, TargetItem>;
  bySecondary: Map<string, TargetItem>;
  collisions: IndexCollision[];
}

export type ResolveResult =
  | { found: true; item: TargetItem; matchedBy: MatchSource; key: string }
  | { found: false };

export function providerKey(provider: string, id: string): string {
  return `${provider}:${id}`;
}

/**
 * Name-based fallback identity: the plain name for movies,
 * "seasonName:name" for episodes.
 */
export function secondaryKey(entry: { name: string; seasonName?: string }, kind: IdentityKind): string {
  if (kind === 'episode') {
    return `${entry.seasonName || ''}:${entry.name}`;
  }
  return entry.name;
}

export function providerKeys(providerIds: ProviderIds): string[] {
  return Object.entries(providerIds)
    .filter(([, id]) => id !== '')
    .map(([provider, id]) => providerKey(provider, id));
}

function insert(index: IdentityIndex, map: Map<string, TargetItem>, scope: MatchSource, key: string, item: TargetItem) {
  const previous = map.get(key);
  if (previous && previous.id !== item.id) {
    index.collisions.push({ key, scope, previousId: previous.id, itemId: item.id });
  }
  // Last write wins
  map.set(key, item);
}

export function buildIdentityIndex(items: TargetItem[], kind: IdentityKind): IdentityIndex {
  const index: IdentityIndex = {
    kind,
    byProvider: new Map(),
    bySecondary: new Map(),
    collisions: [],
  };

  for (const item of items) {
    for (const key of providerKeys(item.providerIds)) {
      insert(index, index.byProvider, 'provider', key, item);
    }
    insert(index, index.bySecondary, 'secondary', secondaryKey(item, kind), item);
  }

  return index;
}

/**
 * Provider IDs are tried in the record's own order and always win over the
 * name-based key.
 */
export function resolveIdentity(record: WatchedRecord, index: IdentityIndex): ResolveResult {
  for (const key of providerKeys(record.providerIds)) {
    const item = index.byProvider.get(key);
    if (item) {
      return { found: true, item, matchedBy: 'provider', key };
    }
  }

  const key = secondaryKey(record, index.kind);
  const item = index.bySecondary.get(key);
  if (item) {
    return { found: true, item, matchedBy: 'secondary', key };
  }

  return { found: false };
}

/**
 * Exact name match among search results, otherwise the first result.
 */
export function pickSeries(seriesName: string, candidates: SeriesSummary[]): SeriesSummary | null {
  const exact = candidates.find((candidate) => candidate.name === seriesName);
  return exact || candidates[0] || null;
}
