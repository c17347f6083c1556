/**
 * In-process stand-in for the YouTube Data API, for tests.
 *
 * Routes requests by endpoint to handler functions and records every call,
 * so tests exercise the real client (URL building, charging, parsing)
 * without a network.
 *
 * @module youtube/fake-api
 */

export type FakeEndpoint = 'videos' | 'search' | 'channels' | 'playlistItems' | 'commentThreads';

export interface FakeReply {
  status: number;
  body: unknown;
}

export type FakeHandler = (params: URLSearchParams) => FakeReply;

export interface RecordedCall {
  endpoint: string;
  params: URLSearchParams;
}

export interface FakeApi {
  fetch: typeof fetch;
  calls: RecordedCall[];
  /** Calls to one endpoint, in order */
  callsTo(endpoint: FakeEndpoint): RecordedCall[];
}

/**
 * Video fields a test cares about; everything else gets a neutral default.
 * Counts are strings, as the API sends them; omit one to make it unreported.
 */
export interface FakeVideo {
  id: string;
  title?: string;
  description?: string;
  tags?: string[];
  channelId?: string;
  channelTitle?: string;
  publishedAt?: string;
  duration?: string;
  viewCount?: string;
  likeCount?: string;
  commentCount?: string;
}

export function ok(body: unknown): FakeReply {
  return { status: 200, body };
}

export function listOf(items: unknown[]): FakeReply {
  return ok({ items });
}

/**
 * Error reply in the API's error envelope.
 */
export function failure(status: number, message: string, reason?: string): FakeReply {
  return {
    status,
    body: { error: { code: status, message, errors: reason ? [{ reason }] : [] } },
  };
}

export function videoResource(video: FakeVideo): Record<string, unknown> {
  const statistics: Record<string, string> = {};
  if (video.viewCount !== undefined) statistics.viewCount = video.viewCount;
  if (video.likeCount !== undefined) statistics.likeCount = video.likeCount;
  if (video.commentCount !== undefined) statistics.commentCount = video.commentCount;

  return {
    kind: 'youtube#video',
    id: video.id,
    snippet: {
      title: video.title ?? `Video ${video.id}`,
      description: video.description ?? '',
      channelId: video.channelId ?? 'UC-test-channel',
      channelTitle: video.channelTitle ?? 'Test Channel',
      publishedAt: video.publishedAt,
      tags: video.tags,
    },
    statistics,
    contentDetails: { duration: video.duration ?? 'PT1M' },
  };
}

/**
 * Reply to videos.list?id=... with the requested subset of `videos`.
 */
export function videosById(videos: FakeVideo[]): FakeHandler {
  return (params) => {
    const ids = (params.get('id') ?? '').split(',');
    return listOf(videos.filter((video) => ids.includes(video.id)).map(videoResource));
  };
}

function requestUrl(input: string | URL | Request): URL {
  if (typeof input === 'string') {
    return new URL(input);
  }
  if (input instanceof URL) {
    return input;
  }
  return new URL(input.url);
}

/**
 * Build a fetch implementation answering from `handlers`.
 * Endpoints without a handler answer 404.
 */
export function createFakeApi(handlers: Partial<Record<FakeEndpoint, FakeHandler>>): FakeApi {
  const calls: RecordedCall[] = [];

  const fakeFetch: typeof fetch = async (input) => {
    const url = requestUrl(input);
    const endpoint = url.pathname.split('/').pop() ?? '';
    calls.push({ endpoint, params: url.searchParams });

    const handler = Object.entries(handlers).find(([name]) => name === endpoint)?.[1];
    const reply = handler ? handler(url.searchParams) : failure(404, `No handler for ${endpoint}`);

    return new Response(JSON.stringify(reply.body), {
      status: reply.status,
      headers: { 'Content-Type': 'application/json' },
    });
  };

  return {
    fetch: fakeFetch,
    calls,
    callsTo: (endpoint) => calls.filter((call) => call.endpoint === endpoint),
  };
}
