import { z } from 'zod';
import type { CommentRecord, CommentSource, ListCommentsRequest } from './types.js';
import { CancelledError, HarvestError, RemoteError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export const DEFAULT_YOUTUBE_BASE_URL = 'https://www.googleapis.com/youtube/v3';

// commentThreads.list accepts 1..100 per page
const MAX_PAGE_SIZE = 100;

const CommentThreadListSchema = z.object({
  nextPageToken: z.string().optional(),
  items: z
    .array(
      z.object({
        snippet: z.object({
          topLevelComment: z.object({
            snippet: z.object({
              authorDisplayName: z.string().default(''),
              textDisplay: z.string().default(''),
            }),
          }),
        }),
      }),
    )
    .default([]),
});

type CommentThreadList = z.infer<typeof CommentThreadListSchema>;

const ApiErrorSchema = z.object({
  error: z.object({
    message: z.string().optional(),
    errors: z.array(z.object({ reason: z.string().optional() })).optional(),
  }),
});

function parseApiError(body: string): { message?: string; reason?: string } {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err) {
    logger.debug({ error: errorMessage(err) }, 'YouTube error body is not JSON');
    return {};
  }
  const parsed = ApiErrorSchema.safeParse(json);
  if (!parsed.success) return {};
  return {
    message: parsed.data.error.message,
    reason: parsed.data.error.errors?.[0]?.reason,
  };
}

/**
 * Top-level comments from the YouTube Data API v3 commentThreads endpoint.
 */
export class YouTubeCommentSource implements CommentSource {
  readonly name = 'youtube';

  constructor(
    private readonly baseUrl: string = DEFAULT_YOUTUBE_BASE_URL,
    private readonly timeoutMs: number = 15000,
  ) {}

  async list(request: ListCommentsRequest): Promise<CommentRecord[]> {
    const records: CommentRecord[] = [];
    if (request.maxResults < 1) return records;
    let pageToken: string | undefined;

    do {
      const pageSize = Math.min(MAX_PAGE_SIZE, request.maxResults - records.length);
      const page = await this.fetchPage(request, pageSize, pageToken);

      for (const item of page.items) {
        if (records.length >= request.maxResults) break;
        const snippet = item.snippet.topLevelComment.snippet;
        records.push({ authorDisplayName: snippet.authorDisplayName, text: snippet.textDisplay });
      }
      pageToken = page.nextPageToken;
    } while (pageToken && records.length < request.maxResults);

    logger.debug({ videoId: request.videoId, count: records.length }, 'Comments fetched');
    return records;
  }

  private buildUrl(request: ListCommentsRequest, pageSize: number, pageToken?: string): string {
    const url = new URL(`${this.baseUrl.replace(/\/+$/, '')}/commentThreads`);
    url.searchParams.set('part', 'snippet');
    url.searchParams.set('videoId', request.videoId);
    url.searchParams.set('maxResults', String(pageSize));
    url.searchParams.set('textFormat', 'plainText');
    url.searchParams.set('key', request.apiKey);
    if (pageToken) url.searchParams.set('pageToken', pageToken);
    return url.toString();
  }

  private async fetchPage(
    request: ListCommentsRequest,
    pageSize: number,
    pageToken?: string,
  ): Promise<CommentThreadList> {
    const { videoId, signal } = request;
    if (signal?.aborted) {
      throw new CancelledError('Comment fetch cancelled', { videoId });
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(this.buildUrl(request, pageSize, pageToken), {
        headers: { Accept: 'application/json' },
        signal: controller.signal,
      });

      if (!response.ok) {
        const body = await response.text().catch(() => '');
        const apiError = parseApiError(body);
        throw new RemoteError(
          `YouTube API error: ${response.status} ${apiError.message ?? response.statusText}`.trim(),
          { videoId, status: response.status, reason: apiError.reason },
        );
      }

      let json: unknown;
      try {
        json = await response.json();
      } catch (err) {
        throw new RemoteError(`YouTube response is not valid JSON: ${errorMessage(err)}`, { videoId });
      }

      const parsed = CommentThreadListSchema.safeParse(json);
      if (!parsed.success) {
        throw new RemoteError('Unexpected YouTube response shape', {
          videoId,
          errors: parsed.error.flatten().fieldErrors,
        });
      }
      return parsed.data;
    } catch (err) {
      if (err instanceof HarvestError) throw err;
      if (signal?.aborted) {
        throw new CancelledError('Comment fetch cancelled', { videoId });
      }
      if (err instanceof Error && err.name === 'AbortError') {
        throw new RemoteError(`Comment fetch timed out after ${this.timeoutMs}ms`, {
          videoId,
          timeout: this.timeoutMs,
        });
      }
      throw new RemoteError(`Comment fetch failed: ${errorMessage(err)}`, { videoId });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
