/**
 * YouTube Client Tests
 *
 * Exercises the client against the in-process fake API: request
 * parameters, quota charging, payload parsing and error classification.
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { YouTubeClient, YouTubeApiError, isYouTubeApiError, describeError } from './client.js';
import { createFakeApi, failure, listOf, ok, videoResource, videosById, type FakeApi } from './fake-api.js';
import { QuotaLedger, QuotaExhaustedError } from '../quota/ledger.js';
import { reported, UNREPORTED } from '../schemas/item.js';

const originalFetch = global.fetch;

function install(api: FakeApi): void {
  global.fetch = api.fetch;
}

describe('YouTubeClient', () => {
  let ledger: QuotaLedger;
  let client: YouTubeClient;

  beforeEach(() => {
    ledger = new QuotaLedger(['key-a', 'key-b'], { dailyQuota: 1000 });
    client = new YouTubeClient({ ledger, timeoutMs: 1000 });
  });

  afterEach(() => {
    global.fetch = originalFetch;
  });

  describe('searchVideoIds', () => {
    it('sends search parameters and returns video ids', async () => {
      const api = createFakeApi({
        search: () =>
          listOf([
            { id: { kind: 'youtube#video', videoId: 'vid-1' } },
            { id: { kind: 'youtube#channel' } },
            { id: { kind: 'youtube#video', videoId: 'vid-2' } },
          ]),
      });
      install(api);

      const ids = await client.searchVideoIds('Glass Skin', {
        maxResults: 20,
        publishedAfter: '2026-01-01T00:00:00.000Z',
      });

      expect(ids).toEqual(['vid-1', 'vid-2']);
      const params = api.calls[0].params;
      expect(params.get('q')).toBe('Glass Skin');
      expect(params.get('order')).toBe('viewCount');
      expect(params.get('type')).toBe('video');
      expect(params.get('maxResults')).toBe('20');
      expect(params.get('publishedAfter')).toBe('2026-01-01T00:00:00.000Z');
      expect(params.get('key')).toBe('key-a');
    });

    it('charges 100 units per search', async () => {
      install(createFakeApi({ search: () => listOf([]) }));

      await client.searchVideoIds('COSRX');

      expect(ledger.getTotalCharged()).toBe(100);
    });
  });

  describe('getVideoDetails', () => {
    it('parses statistics into counts, keeping missing ones unreported', async () => {
      install(
        createFakeApi({
          videos: videosById([
            {
              id: 'vid-1',
              title: 'Serum review',
              tags: ['serum'],
              publishedAt: '2026-01-01T00:00:00Z',
              duration: 'PT4M13S',
              viewCount: '1200',
              commentCount: '7',
            },
          ]),
        })
      );

      const [video] = await client.getVideoDetails(['vid-1']);

      expect(video.id).toBe('vid-1');
      expect(video.snippet.title).toBe('Serum review');
      expect(video.snippet.tags).toEqual(['serum']);
      expect(video.snippet.publishedAt).toBe('2026-01-01T00:00:00Z');
      expect(video.contentDetails.duration).toBe('PT4M13S');
      expect(video.statistics.viewCount).toEqual(reported(1200));
      expect(video.statistics.likeCount).toEqual(UNREPORTED);
      expect(video.statistics.commentCount).toEqual(reported(7));
    });

    it('defaults absent snippet fields', async () => {
      install(createFakeApi({ videos: () => listOf([{ id: 'bare' }]) }));

      const [video] = await client.getVideoDetails(['bare']);

      expect(video.snippet).toEqual({
        title: '',
        channelId: '',
        channelTitle: '',
        publishedAt: undefined,
        description: '',
        tags: [],
      });
      expect(video.contentDetails.duration).toBe('');
    });

    it('treats malformed counts as unreported', async () => {
      install(
        createFakeApi({
          videos: () => listOf([{ id: 'odd', statistics: { viewCount: 'lots', likeCount: '-3' } }]),
        })
      );

      const [video] = await client.getVideoDetails(['odd']);

      expect(video.statistics.viewCount).toEqual(UNREPORTED);
      expect(video.statistics.likeCount).toEqual(UNREPORTED);
    });

    it('splits more than 50 ids across calls', async () => {
      const ids = Array.from({ length: 120 }, (_, i) => `vid-${i}`);
      const api = createFakeApi({
        videos: (params) => listOf((params.get('id') ?? '').split(',').map((id) => videoResource({ id }))),
      });
      install(api);

      const videos = await client.getVideoDetails(ids);

      expect(videos).toHaveLength(120);
      expect(api.callsTo('videos')).toHaveLength(3);
      expect(ledger.getTotalCharged()).toBe(3);
    });

    it('makes no call for an empty id list', async () => {
      const api = createFakeApi({});
      install(api);

      await expect(client.getVideoDetails([])).resolves.toEqual([]);
      expect(api.calls).toHaveLength(0);
    });
  });

  describe('popular chart', () => {
    it('requests the chart for the region and category', async () => {
      const api = createFakeApi({ videos: () => listOf([{ id: 'a' }, { id: 'b' }]) });
      install(api);

      const ids = await client.listPopularVideoIds({ regionCode: 'US', categoryId: '26', maxResults: 50 });

      expect(ids).toEqual(['a', 'b']);
      const params = api.calls[0].params;
      expect(params.get('chart')).toBe('mostPopular');
      expect(params.get('part')).toBe('id');
      expect(params.get('regionCode')).toBe('US');
      expect(params.get('videoCategoryId')).toBe('26');
      expect(params.get('maxResults')).toBe('50');
    });
  });

  describe('channel lookups', () => {
    it('returns the uploads playlist id', async () => {
      install(
        createFakeApi({
          channels: () => listOf([{ id: 'UC1', contentDetails: { relatedPlaylists: { uploads: 'UU1' } } }]),
        })
      );

      await expect(client.getUploadsPlaylistId('UC1')).resolves.toBe('UU1');
    });

    it('returns undefined for an unknown channel', async () => {
      install(createFakeApi({ channels: () => ok({}) }));

      await expect(client.getUploadsPlaylistId('UC-missing')).resolves.toBeUndefined();
    });

    it('parses the subscriber count', async () => {
      install(createFakeApi({ channels: () => listOf([{ statistics: { subscriberCount: '1500' } }]) }));

      await expect(client.getSubscriberCount('UC1')).resolves.toBe(1500);
    });

    it('returns 0 for hidden subscriber counts', async () => {
      install(
        createFakeApi({
          channels: () => listOf([{ statistics: { subscriberCount: '1500', hiddenSubscriberCount: true } }]),
        })
      );

      await expect(client.getSubscriberCount('UC1')).resolves.toBe(0);
    });
  });

  describe('playlist and comments', () => {
    it('lists playlist video ids', async () => {
      const api = createFakeApi({
        playlistItems: () =>
          listOf([
            { snippet: { resourceId: { videoId: 'p1' } } },
            { snippet: { resourceId: {} } },
            { snippet: { resourceId: { videoId: 'p2' } } },
          ]),
      });
      install(api);

      await expect(client.listPlaylistVideoIds('UU1', 10)).resolves.toEqual(['p1', 'p2']);
      expect(api.calls[0].params.get('playlistId')).toBe('UU1');
      expect(api.calls[0].params.get('maxResults')).toBe('10');
    });

    it('returns top comment text ordered by relevance', async () => {
      const api = createFakeApi({
        commentThreads: () =>
          listOf([
            { snippet: { topLevelComment: { snippet: { textDisplay: 'First!' } } } },
            { snippet: { topLevelComment: { snippet: { textDisplay: 'Love it' } } } },
          ]),
      });
      install(api);

      await expect(client.listTopComments('vid-1', 30)).resolves.toEqual(['First!', 'Love it']);
      expect(api.calls[0].params.get('order')).toBe('relevance');
      expect(api.calls[0].params.get('maxResults')).toBe('30');
    });
  });

  describe('errors', () => {
    it('flags quota errors from the API and still charges the call', async () => {
      install(
        createFakeApi({ commentThreads: () => failure(403, 'The request cannot be completed', 'quotaExceeded') })
      );

      const error = await client.listTopComments('vid-1', 30).catch((e: unknown) => e);

      expect(isYouTubeApiError(error)).toBe(true);
      expect(error).toMatchObject({ statusCode: 403, isQuotaExceeded: true, isRetryable: false });
      expect(ledger.getTotalCharged()).toBe(1);
    });

    it('marks server errors retryable', async () => {
      install(createFakeApi({ channels: () => failure(503, 'Backend unavailable') }));

      const error = await client.getSubscriberCount('UC1').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(YouTubeApiError);
      expect(error).toMatchObject({ statusCode: 503, isRetryable: true, isQuotaExceeded: false });
      expect(describeError(error)).toBe('Server error (503): Backend unavailable [503]');
    });

    it('describes comments-disabled responses as forbidden', async () => {
      install(createFakeApi({ commentThreads: () => failure(403, 'Comments are disabled', 'commentsDisabled') }));

      await expect(client.listTopComments('vid-1', 30)).rejects.toThrow('Access forbidden: Comments are disabled');
    });
  });

  describe('timeouts', () => {
    it('aborts a response whose body never finishes', async () => {
      client = new YouTubeClient({ ledger, timeoutMs: 20 });
      global.fetch = jest.fn<typeof fetch>().mockImplementation(async (_input, init) => {
        const body = new ReadableStream<Uint8Array>({
          start(controller) {
            init?.signal?.addEventListener('abort', () => controller.error(new Error('aborted')));
          },
        });
        return new Response(body, { status: 200 });
      });

      const error = await client.getSubscriberCount('UC1').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(YouTubeApiError);
      expect(error).toMatchObject({ message: 'Request timed out after 20ms', statusCode: 408, isRetryable: true });
      expect(ledger.getTotalCharged()).toBe(1);
    });
  });

  describe('quota ledger integration', () => {
    it('switches keys once the first crosses the threshold', async () => {
      ledger = new QuotaLedger(['key-a', 'key-b'], { dailyQuota: 100 });
      client = new YouTubeClient({ ledger });
      const api = createFakeApi({ search: () => listOf([]) });
      install(api);

      await client.searchVideoIds('Anua');
      await client.searchVideoIds('Torriden');

      expect(api.calls.map((call) => call.params.get('key'))).toEqual(['key-a', 'key-b']);
    });

    it('refuses to issue requests once every key is spent', async () => {
      ledger = new QuotaLedger(['only-key'], { dailyQuota: 100 });
      client = new YouTubeClient({ ledger });
      const api = createFakeApi({ search: () => listOf([]) });
      install(api);

      await client.searchVideoIds('Anua');
      await expect(client.searchVideoIds('Torriden')).rejects.toBeInstanceOf(QuotaExhaustedError);
      expect(api.calls).toHaveLength(1);
    });
  });
});
