/**
 * YouTube OAuth token refresh.
 * The refresh token is obtained out of band; only the refresh grant runs here.
 */
import { z } from 'zod';
import { PublisherError } from '../../shared/errors.js';
import type { FetchLike } from './publisher.js';

const YOUTUBE_TOKEN_URI = 'https://oauth2.googleapis.com/token';

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().optional(),
  token_type: z.string().optional(),
  scope: z.string().optional(),
});

export type YouTubeAuthTokens = z.infer<typeof TokenResponseSchema>;

export interface YouTubeCredentials {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
}

/**
 * Exchange the refresh token for a short-lived access token.
 */
export async function refreshYouTubeToken(
  creds: YouTubeCredentials,
  http: FetchLike = fetch,
  signal?: AbortSignal,
): Promise<YouTubeAuthTokens> {
  const resp = await http(YOUTUBE_TOKEN_URI, {
    method: 'POST',
    headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    body: new URLSearchParams({
      client_id: creds.clientId,
      client_secret: creds.clientSecret,
      refresh_token: creds.refreshToken,
      grant_type: 'refresh_token',
    }).toString(),
    signal,
  });

  if (!resp.ok) {
    throw new PublisherError(`YouTube token refresh failed: ${resp.status}`, resp.status);
  }

  const parsed = TokenResponseSchema.safeParse(await resp.json());
  if (!parsed.success) {
    throw new PublisherError('YouTube token refresh returned no access token');
  }
  return parsed.data;
}
