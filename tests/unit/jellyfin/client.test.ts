import { describe, it, expect } from 'vitest';
import { JellyfinConfig } from '../../../src/config';
import { CatalogRequestError, ConfigError } from '../../../src/errors';
import { JellyfinClient, ticksToMinutes } from '../../../src/jellyfin/client';
import { fakeHttp, header, on } from '../../helpers/fakeHttp';

const config: JellyfinConfig = {
  serverUrl: 'http://jellyfin.local:8096',
  apiKey: 'test-api-key',
  userName: 'Alice',
};

const usersRoute = on('GET', '/Users', {
  data: [
    { Id: 'u-bob', Name: 'bob' },
    { Id: 'u-alice', Name: 'alice' },
  ],
});

async function connectedClient(routes: Parameters<typeof fakeHttp>[0]) {
  const fake = fakeHttp([usersRoute, ...routes]);
  const client = new JellyfinClient(config, { http: fake.http });
  await client.resolveUserId();
  return { client, requests: fake.requests };
}

describe('ticksToMinutes', () => {
  it('should convert 100ns ticks to whole minutes', () => {
    expect(ticksToMinutes(27_000_000_000)).toBe(45);
    expect(ticksToMinutes(27_599_999_999)).toBe(45);
    expect(ticksToMinutes(null)).toBe(0);
    expect(ticksToMinutes(-5)).toBe(0);
  });
});

describe('JellyfinClient', () => {
  it('should resolve the user case-insensitively and send auth headers', async () => {
    const { client, requests } = await connectedClient([]);

    expect(client.getUserId()).toBe('u-alice');
    expect(header(requests[0], 'X-Emby-Token')).toBe('test-api-key');
    expect(String(header(requests[0], 'Authorization'))).toContain('Token="test-api-key"');
  });

  it('should fail with a ConfigError for an unknown user', async () => {
    const fake = fakeHttp([on('GET', '/Users', { data: [{ Id: 'u-bob', Name: 'bob' }] })]);
    const client = new JellyfinClient(config, { http: fake.http });

    await expect(client.resolveUserId()).rejects.toBeInstanceOf(ConfigError);
  });

  it('should refuse item requests before the user is resolved', async () => {
    const client = new JellyfinClient(config, { http: fakeHttp([]).http });
    await expect(client.getAllMovies()).rejects.toBeInstanceOf(ConfigError);
  });

  it('should map watched items to records', async () => {
    const { client, requests } = await connectedClient([
      on('GET', '/Items', {
        data: {
          Items: [
            {
              Id: 'm1',
              Name: 'Heat',
              Type: 'Movie',
              ProviderIds: { Imdb: 'tt1' },
              UserData: { Played: true, LastPlayedDate: '2024-12-24T21:00:00Z' },
            },
            { Id: 'e1', Name: 'Ep5', Type: 'Episode', SeriesName: 'Show', SeasonName: 'Season 1', UserData: { Played: true } },
            { Id: 'f1', Name: 'Folder', Type: 'Folder' },
          ],
        },
      }),
    ]);

    const records = await client.getWatchedItems();

    expect(records).toEqual([
      { id: 'm1', kind: 'Movie', name: 'Heat', seriesName: '', seasonName: '', playedDate: '2024-12-24T21:00:00Z', providerIds: { Imdb: 'tt1' } },
      { id: 'e1', kind: 'Episode', name: 'Ep5', seriesName: 'Show', seasonName: 'Season 1', playedDate: null, providerIds: {} },
      { id: 'f1', kind: 'Unknown', name: 'Folder', seriesName: '', seasonName: '', playedDate: null, providerIds: {} },
    ]);
    expect(requests[1].params).toMatchObject({
      userId: 'u-alice',
      Filters: 'IsPlayed',
      IncludeItemTypes: 'Movie,Episode',
    });
  });

  it('should map series episodes with numbers, runtime and played state', async () => {
    const { client, requests } = await connectedClient([
      on('GET', '/Items', {
        data: {
          Items: [
            {
              Id: 'ep-1',
              Name: 'Pilot',
              SeriesName: 'Show',
              SeasonName: 'Season 1',
              ParentIndexNumber: 1,
              IndexNumber: 1,
              RunTimeTicks: 54_000_000_000,
              ProviderIds: { Tvdb: '100' },
              UserData: { Played: false },
            },
            { Id: 'ep-x', Name: 'Extra', SeasonName: 'Specials', RunTimeTicks: null },
          ],
        },
      }),
    ]);

    const episodes = await client.getSeriesEpisodes('series-9');

    expect(episodes).toEqual([
      {
        id: 'ep-1',
        name: 'Pilot',
        played: false,
        providerIds: { Tvdb: '100' },
        seriesName: 'Show',
        seasonName: 'Season 1',
        seasonNumber: 1,
        episodeNumber: 1,
        runtimeMinutes: 90,
      },
      {
        id: 'ep-x',
        name: 'Extra',
        played: false,
        providerIds: {},
        seriesName: '',
        seasonName: 'Specials',
        seasonNumber: undefined,
        episodeNumber: undefined,
        runtimeMinutes: 0,
      },
    ]);
    expect(requests[1].params).toMatchObject({ ParentId: 'series-9', IncludeItemTypes: 'Episode' });
  });

  it('should search series by term', async () => {
    const { client, requests } = await connectedClient([
      on('GET', '/Items', { data: { Items: [{ Id: 's1', Name: 'The Office', ProviderIds: { Tvdb: '73244' } }] } }),
    ]);

    expect(await client.searchSeries('The Office')).toEqual([{ id: 's1', name: 'The Office', providerIds: { Tvdb: '73244' } }]);
    expect(requests[1].params).toMatchObject({ SearchTerm: 'The Office', IncludeItemTypes: 'Series', Limit: 10 });
  });

  it('should list movies with their played flag', async () => {
    const { client } = await connectedClient([
      on('GET', '/Items', { data: { Items: [{ Id: 'm1', Name: 'Heat', UserData: { Played: true } }, { Id: 'm2', Name: 'Ronin' }] } }),
    ]);

    expect(await client.getAllMovies()).toEqual([
      { id: 'm1', name: 'Heat', played: true, providerIds: {} },
      { id: 'm2', name: 'Ronin', played: false, providerIds: {} },
    ]);
  });

  it('should list all series', async () => {
    const { client } = await connectedClient([
      on('GET', '/Items', { data: { Items: [{ Id: 's1', Name: 'Show', ProviderIds: { Tvdb: '1' } }] } }),
    ]);

    expect(await client.getAllSeries()).toEqual([{ id: 's1', name: 'Show', providerIds: { Tvdb: '1' } }]);
  });

  it('should mark an item played for the resolved user', async () => {
    const { client, requests } = await connectedClient([on('POST', '/UserPlayedItems/ep-1', { data: { Played: true } })]);

    await client.markAsWatched('ep-1');

    expect(requests[1]).toMatchObject({ method: 'POST', url: '/UserPlayedItems/ep-1', params: { userId: 'u-alice' } });
  });

  it('should wrap HTTP failures in a CatalogRequestError', async () => {
    const { client } = await connectedClient([on('POST', '/UserPlayedItems/ep-1', { status: 500, data: 'boom' })]);

    const error = await client.markAsWatched('ep-1').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(CatalogRequestError);
    expect(error).toMatchObject({
      service: 'Jellyfin',
      status: 500,
      message: 'Jellyfin request failed: API returned status 500: boom',
    });
  });

  it('should explain a rejected API key', async () => {
    const fake = fakeHttp([on('GET', '/Users', { status: 401 })]);
    const client = new JellyfinClient(config, { http: fake.http });

    await expect(client.resolveUserId()).rejects.toThrow(
      'Jellyfin request failed: Unauthorized - Invalid API key. Please check your Jellyfin API key.'
    );
  });
});
