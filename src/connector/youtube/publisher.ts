/**
 * YouTube publisher.
 * Uploads an approved artifact with the resumable upload API: one request to
 * register the metadata, one PUT with the file body.
 */
import { openAsBlob } from 'node:fs';
import { z } from 'zod';
import { CancelledError, PublisherError, errorMessage } from '../../shared/errors.js';
import { logger } from '../../shared/logger.js';
import type { Artifact } from '../../queue/types.js';
import type { Publisher, PublishResult } from '../../scheduler/types.js';
import { refreshYouTubeToken, type YouTubeCredentials } from './auth.js';

const YOUTUBE_UPLOAD_API = 'https://www.googleapis.com/upload/youtube/v3/videos';

export type FetchLike = (url: string | URL, init?: RequestInit) => Promise<Response>;

export type YouTubePrivacy = 'public' | 'private' | 'unlisted';

export interface YouTubePublisherOptions extends YouTubeCredentials {
  privacy?: YouTubePrivacy;
  categoryId?: string;
  fetch?: FetchLike;
}

const UploadResponseSchema = z.object({
  id: z.string().min(1),
  snippet: z.object({ title: z.string().optional() }).optional(),
  status: z.object({ uploadStatus: z.string().optional() }).optional(),
});

export function youtubeWatchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

export class YouTubePublisher implements Publisher {
  private readonly http: FetchLike;

  constructor(private readonly opts: YouTubePublisherOptions) {
    this.http = opts.fetch ?? fetch;
  }

  async publish(artifact: Artifact, signal?: AbortSignal): Promise<PublishResult> {
    try {
      return await this.upload(artifact, signal);
    } catch (err) {
      if (signal?.aborted) throw new CancelledError('upload cancelled');
      if (err instanceof PublisherError) throw err;
      throw new PublisherError(`YouTube upload failed: ${errorMessage(err)}`);
    }
  }

  private async upload(artifact: Artifact, signal?: AbortSignal): Promise<PublishResult> {
    const tokens = await refreshYouTubeToken(this.opts, this.http, signal);

    const init = await this.http(`${YOUTUBE_UPLOAD_API}?uploadType=resumable&part=snippet,status`, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${tokens.access_token}`,
        'Content-Type': 'application/json',
        'X-Upload-Content-Type': 'video/*',
      },
      body: JSON.stringify({
        snippet: {
          title: artifact.title,
          description: artifact.script,
          tags: artifact.tags,
          categoryId: this.opts.categoryId ?? '22', // People & Blogs
        },
        status: {
          privacyStatus: this.opts.privacy ?? 'private',
        },
      }),
      signal,
    });

    if (!init.ok) {
      throw new PublisherError(`YouTube upload initiation failed: ${init.status}`, init.status);
    }

    const uploadUri = init.headers.get('Location');
    if (!uploadUri) throw new PublisherError('No upload URI returned by YouTube');

    const body = await openAsBlob(artifact.video_path);
    logger.debug('Uploading video body', { title: artifact.title, bytes: body.size });

    const uploadResp = await this.http(uploadUri, {
      method: 'PUT',
      headers: {
        Authorization: `Bearer ${tokens.access_token}`,
        'Content-Type': 'video/*',
      },
      body,
      signal,
    });

    if (!uploadResp.ok) {
      throw new PublisherError(`YouTube video upload failed: ${uploadResp.status}`, uploadResp.status);
    }

    const data = UploadResponseSchema.safeParse(await uploadResp.json());
    if (!data.success) {
      throw new PublisherError('YouTube upload returned no video id');
    }

    logger.info('YouTube upload complete', {
      video_id: data.data.id,
      status: data.data.status?.uploadStatus ?? 'uploaded',
    });
    return { url: youtubeWatchUrl(data.data.id), video_id: data.data.id };
  }
}
