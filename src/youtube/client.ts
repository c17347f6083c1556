/**
 * YouTube Data API Client
 *
 * Low-level client for the six YouTube Data API v3 calls the harvester
 * uses. Every request takes its key from the shared quota ledger and charges
 * the ledger as soon as a response is observed. Payloads are parsed with
 * Zod at this boundary; nothing past the client handles untyped JSON.
 *
 * @module youtube/client
 */

import { z } from 'zod';
import { QUOTA_COSTS, type QuotaCallType } from '../config/quota.js';
import type { QuotaLedger } from '../quota/ledger.js';
import { reported, UNREPORTED, type Count, type VideoItem } from '../schemas/item.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for keyword search
 */
export interface SearchOptions {
  /** Maximum results to return (1-50, default 20) */
  maxResults?: number;
  /** Result ordering (default: viewCount) */
  order?: 'relevance' | 'date' | 'viewCount';
  /** Only videos published after this instant (ISO8601) */
  publishedAfter?: string;
}

/**
 * Options for the most-popular chart
 */
export interface ChartOptions {
  regionCode: string;
  categoryId: string;
  /** Page size (1-50) */
  maxResults: number;
}

export interface YouTubeClientOptions {
  /** Shared ledger supplying keys and receiving charges */
  ledger: QuotaLedger;
  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
  /** API root, overridable for tests */
  baseUrl?: string;
}

/**
 * YouTube API error with additional context
 */
export class YouTubeApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly isRetryable: boolean,
    public readonly isQuotaExceeded: boolean = false
  ) {
    super(message);
    this.name = 'YouTubeApiError';
  }
}

// ============================================================================
// API Response Schemas (Internal)
// ============================================================================

/** Statistics arrive as decimal strings; absent means the owner hid them */
const CountFieldSchema = z
  .union([z.string(), z.number()])
  .optional()
  .transform((value): Count => {
    if (value === undefined) {
      return UNREPORTED;
    }
    const parsed = typeof value === 'number' ? value : Number(value);
    return Number.isInteger(parsed) && parsed >= 0 ? reported(parsed) : UNREPORTED;
  });

const VideoResourceSchema = z.object({
  id: z.string().default(''),
  snippet: z
    .object({
      title: z.string().default(''),
      channelId: z.string().default(''),
      channelTitle: z.string().default(''),
      publishedAt: z.string().optional(),
      description: z.string().default(''),
      tags: z.array(z.string()).default([]),
    })
    .default({}),
  statistics: z
    .object({
      viewCount: CountFieldSchema,
      likeCount: CountFieldSchema,
      commentCount: CountFieldSchema,
    })
    .default({}),
  contentDetails: z
    .object({
      duration: z.string().default(''),
    })
    .default({}),
});

const ChartIdsSchema = z.object({ id: z.string() });

const SearchItemSchema = z.object({
  id: z.object({ videoId: z.string().optional() }),
});

const ChannelResourceSchema = z.object({
  id: z.string().optional(),
  contentDetails: z
    .object({
      relatedPlaylists: z.object({ uploads: z.string().optional() }).default({}),
    })
    .optional(),
  statistics: z
    .object({
      subscriberCount: z.union([z.string(), z.number()]).optional(),
      hiddenSubscriberCount: z.boolean().optional(),
    })
    .optional(),
});

const PlaylistItemSchema = z.object({
  snippet: z.object({
    resourceId: z.object({ videoId: z.string().optional() }).default({}),
  }),
});

const CommentThreadSchema = z.object({
  snippet: z.object({
    topLevelComment: z.object({
      snippet: z.object({ textDisplay: z.string().default('') }),
    }),
  }),
});

/** Envelope shared by every list endpoint; items are validated one by one */
const ListEnvelopeSchema = z.object({
  items: z.array(z.unknown()).default([]),
});

// ============================================================================
// Constants
// ============================================================================

const DEFAULTS = {
  timeoutMs: 10000,
  searchResults: 20,
  order: 'viewCount' as const,
} as const;

/** Maximum ids per videos.list call */
const MAX_IDS_PER_CALL = 50;

const DEFAULT_BASE_URL = 'https://www.googleapis.com/youtube/v3';

// ============================================================================
// Client Implementation
// ============================================================================

/**
 * YouTubeClient provides the harvester's view of the YouTube Data API v3.
 *
 * | Method | Endpoint | Units |
 * |---|---|---|
 * | listPopularVideos / listPopularVideoIds | videos (chart) | 1 |
 * | searchVideoIds | search | 100 |
 * | getVideoDetails | videos (ids) | 1 per 50 ids |
 * | getUploadsPlaylistId / getSubscriberCount | channels | 1 |
 * | listPlaylistVideoIds | playlistItems | 1 |
 * | listTopComments | commentThreads | 1 |
 *
 * @example
 * ```typescript
 * const client = new YouTubeClient({ ledger });
 * const ids = await client.searchVideoIds('Glass Skin', { maxResults: 20 });
 * const videos = await client.getVideoDetails(ids);
 * ```
 */
export class YouTubeClient {
  private readonly ledger: QuotaLedger;
  private readonly timeoutMs: number;
  private readonly baseUrl: string;

  constructor(options: YouTubeClientOptions) {
    this.ledger = options.ledger;
    this.timeoutMs = options.timeoutMs ?? DEFAULTS.timeoutMs;
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
  }

  /**
   * Most-popular chart with snippet, statistics and duration.
   */
  async listPopularVideos(options: ChartOptions): Promise<VideoItem[]> {
    const data = await this.request('videos', 'videos', {
      part: 'snippet,statistics,contentDetails',
      chart: 'mostPopular',
      regionCode: options.regionCode,
      videoCategoryId: options.categoryId,
      maxResults: String(Math.min(options.maxResults, MAX_IDS_PER_CALL)),
    });
    return parseItems(data, VideoResourceSchema);
  }

  /**
   * Identifiers on the most-popular chart (part=id only).
   */
  async listPopularVideoIds(options: ChartOptions): Promise<string[]> {
    const data = await this.request('videos', 'videos', {
      part: 'id',
      chart: 'mostPopular',
      regionCode: options.regionCode,
      videoCategoryId: options.categoryId,
      maxResults: String(Math.min(options.maxResults, MAX_IDS_PER_CALL)),
    });
    return parseItems(data, ChartIdsSchema).map((item) => item.id);
  }

  /**
   * Search for video ids matching a query.
   *
   * Costs 100 quota units per call.
   */
  async searchVideoIds(query: string, options: SearchOptions = {}): Promise<string[]> {
    const params: Record<string, string> = {
      part: 'snippet',
      q: query,
      type: 'video',
      maxResults: String(Math.min(options.maxResults ?? DEFAULTS.searchResults, MAX_IDS_PER_CALL)),
      order: options.order ?? DEFAULTS.order,
    };
    if (options.publishedAfter) {
      params.publishedAfter = options.publishedAfter;
    }

    const data = await this.request('search', 'search', params);
    return parseItems(data, SearchItemSchema)
      .map((item) => item.id.videoId)
      .filter((videoId): videoId is string => typeof videoId === 'string' && videoId.length > 0);
  }

  /**
   * Hydrate video ids with snippet, statistics and duration.
   *
   * Costs 1 quota unit per 50 ids.
   */
  async getVideoDetails(videoIds: string[]): Promise<VideoItem[]> {
    const videos: VideoItem[] = [];

    for (let offset = 0; offset < videoIds.length; offset += MAX_IDS_PER_CALL) {
      const chunk = videoIds.slice(offset, offset + MAX_IDS_PER_CALL);
      const data = await this.request('videos', 'videos', {
        part: 'snippet,statistics,contentDetails',
        id: chunk.join(','),
      });
      videos.push(...parseItems(data, VideoResourceSchema));
    }

    return videos;
  }

  /**
   * Uploads playlist id of a channel, or undefined if the channel is unknown.
   */
  async getUploadsPlaylistId(channelId: string): Promise<string | undefined> {
    const data = await this.request('channels', 'channels', {
      part: 'contentDetails',
      id: channelId,
    });
    const [channel] = parseItems(data, ChannelResourceSchema);
    return channel?.contentDetails?.relatedPlaylists.uploads;
  }

  /**
   * Subscriber count of a channel; 0 when unknown or hidden.
   */
  async getSubscriberCount(channelId: string): Promise<number> {
    const data = await this.request('channels', 'channels', {
      part: 'statistics',
      id: channelId,
    });
    const [channel] = parseItems(data, ChannelResourceSchema);
    const stats = channel?.statistics;
    if (!stats || stats.hiddenSubscriberCount === true || stats.subscriberCount === undefined) {
      return 0;
    }
    const count = Number(stats.subscriberCount);
    return Number.isInteger(count) && count > 0 ? count : 0;
  }

  /**
   * Most recent video ids in a playlist.
   */
  async listPlaylistVideoIds(playlistId: string, maxResults: number): Promise<string[]> {
    const data = await this.request('playlistItems', 'playlistItems', {
      part: 'snippet',
      playlistId,
      maxResults: String(Math.min(maxResults, MAX_IDS_PER_CALL)),
    });
    return parseItems(data, PlaylistItemSchema)
      .map((item) => item.snippet.resourceId.videoId)
      .filter((videoId): videoId is string => typeof videoId === 'string' && videoId.length > 0);
  }

  /**
   * Display text of the top-ranked comment threads on a video.
   */
  async listTopComments(videoId: string, maxResults: number): Promise<string[]> {
    const data = await this.request('commentThreads', 'commentThreads', {
      part: 'snippet',
      videoId,
      maxResults: String(Math.min(maxResults, 100)),
      order: 'relevance',
      textFormat: 'plainText',
    });
    return parseItems(data, CommentThreadSchema).map(
      (item) => item.snippet.topLevelComment.snippet.textDisplay
    );
  }

  // ==========================================================================
  // Transport
  // ==========================================================================

  /**
   * Issue one GET request, charging the ledger once the response arrives.
   *
   * The timeout covers the whole exchange, body included: a response whose
   * body stalls is aborted like one whose headers never arrive.
   *
   * @throws QuotaExhaustedError before the request if no key has capacity
   * @throws YouTubeApiError on non-2xx responses, unreadable bodies and timeouts
   */
  private async request(
    endpoint: string,
    callType: QuotaCallType,
    params: Record<string, string>
  ): Promise<unknown> {
    const key = this.ledger.currentCredential();
    const query = new URLSearchParams({ ...params, key });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(`${this.baseUrl}/${endpoint}?${query.toString()}`, {
        method: 'GET',
        signal: controller.signal,
      });
      this.ledger.recordUsage(QUOTA_COSTS[callType]);

      if (!response.ok) {
        await this.handleError(response);
      }

      return await this.readJson(response, endpoint);
    } catch (error) {
      if (controller.signal.aborted && !isYouTubeApiError(error)) {
        throw new YouTubeApiError(`Request timed out after ${this.timeoutMs}ms`, 408, true, false);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async readJson(response: Response, endpoint: string): Promise<unknown> {
    const text = await response.text();
    const data = safeJsonParse(text);
    if (data === undefined) {
      throw new YouTubeApiError(`Invalid JSON from ${endpoint}`, response.status, false);
    }
    return data;
  }

  /**
   * Handle API error responses.
   *
   * Detects quota exceeded (403) errors and marks them appropriately.
   */
  private async handleError(response: Response): Promise<never> {
    const text = await response.text().catch(() => 'Unknown error');

    let errorMessage = text;
    let isQuotaExceeded = false;

    const parsed = ApiErrorBodySchema.safeParse(safeJsonParse(text));
    if (parsed.success && parsed.data.error) {
      if (parsed.data.error.message) {
        errorMessage = parsed.data.error.message;
      }
      const reasons = parsed.data.error.errors.map((e) => e.reason);
      isQuotaExceeded = reasons.some(
        (r) => r === 'quotaExceeded' || r === 'dailyLimitExceeded' || r === 'rateLimitExceeded'
      );
    }

    if (response.status === 403) {
      const lowerMessage = errorMessage.toLowerCase();
      if (
        lowerMessage.includes('quota') ||
        lowerMessage.includes('limit exceeded') ||
        lowerMessage.includes('daily limit')
      ) {
        isQuotaExceeded = true;
      }
    }

    const isRetryable = !isQuotaExceeded && (response.status === 429 || response.status >= 500);

    let message: string;
    if (isQuotaExceeded) {
      message = `YouTube API quota exceeded: ${errorMessage}`;
    } else if (response.status === 429) {
      message = `Rate limit exceeded: ${errorMessage}`;
    } else if (response.status >= 500) {
      message = `Server error (${response.status}): ${errorMessage}`;
    } else if (response.status === 401) {
      message = `Authentication failed: Invalid API key`;
    } else if (response.status === 403) {
      message = `Access forbidden: ${errorMessage}`;
    } else {
      message = `API error (${response.status}): ${errorMessage}`;
    }

    throw new YouTubeApiError(message, response.status, isRetryable, isQuotaExceeded);
  }
}

// ============================================================================
// Parsing Helpers
// ============================================================================

const ApiErrorBodySchema = z.object({
  error: z
    .object({
      message: z.string().optional(),
      errors: z.array(z.object({ reason: z.string().optional() })).default([]),
    })
    .optional(),
});

function safeJsonParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Validate each item of a list response, dropping the ones that don't fit.
 *
 * @throws YouTubeApiError if the envelope itself is malformed
 */
function parseItems<S extends z.ZodTypeAny>(data: unknown, schema: S): Array<z.output<S>> {
  const envelope = ListEnvelopeSchema.safeParse(data);
  if (!envelope.success) {
    throw new YouTubeApiError('Malformed list response', 200, false);
  }

  const items: Array<z.output<S>> = [];
  for (const raw of envelope.data.items) {
    const item = schema.safeParse(raw);
    if (item.success) {
      items.push(item.data);
    }
  }
  return items;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Check if an error is a YouTube API error
 */
export function isYouTubeApiError(error: unknown): error is YouTubeApiError {
  return error instanceof YouTubeApiError;
}

/**
 * Short description of any thrown value for log lines.
 */
export function describeError(error: unknown): string {
  if (error instanceof YouTubeApiError) {
    return `${error.message} [${error.statusCode}]`;
  }
  return error instanceof Error ? error.message : String(error);
}
