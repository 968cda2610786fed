import axios from 'axios';
import { z } from 'zod';
import type { TrendProvider } from './trendProvider';
import type { RawTrendItem } from '../types/candidate';
import { SingleFlight } from '../utils/singleFlight';
import { logger } from '../utils/logger';
import { PipelineError } from '../utils/errorHandler';

const PUBLIC_BASE = 'https://www.reddit.com';
const OAUTH_BASE = 'https://oauth.reddit.com';
const TOKEN_URL = 'https://www.reddit.com/api/v1/access_token';

// Tokens are renewed this long before Reddit says they expire
const TOKEN_EXPIRY_MARGIN_MS = 60 * 1000;

const PostSchema = z.object({
  name: z.string().min(1),
  title: z.string(),
  url: z.string(),
  score: z.number(),
  over_18: z.boolean().optional(),
});

const ListingSchema = z.object({
  data: z.object({
    children: z.array(z.object({ data: z.unknown() })),
  }),
});

const TokenSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive(),
});

export interface RedditClientOptions {
  userAgent: string;
  timeoutMs: number;
  clientId?: string;
  clientSecret?: string;
  now?: () => number;
}

interface AccessToken {
  value: string;
  expiresAt: number;
}

/**
 * Reddit listings as a trend provider. Uses app-only OAuth when client
 * credentials are configured, the public JSON endpoints otherwise.
 */
export class RedditClient implements TrendProvider {
  readonly name = 'reddit';
  private token: AccessToken | null = null;
  private readonly tokenFlight = new SingleFlight<AccessToken>();
  private readonly now: () => number;

  constructor(private readonly options: RedditClientOptions) {
    this.now = options.now ?? Date.now;
  }

  get usesOAuth(): boolean {
    return Boolean(this.options.clientId && this.options.clientSecret);
  }

  async hot(group: string, limit: number, signal?: AbortSignal): Promise<RawTrendItem[]> {
    return this.listing(`/r/${encodeURIComponent(group)}/hot`, { limit }, signal);
  }

  async search(group: string, query: string, limit: number, signal?: AbortSignal): Promise<RawTrendItem[]> {
    return this.listing(
      `/r/${encodeURIComponent(group)}/search`,
      { q: query, restrict_sr: 1, sort: 'relevance', limit },
      signal
    );
  }

  private async listing(
    pathname: string,
    params: Record<string, string | number>,
    signal?: AbortSignal
  ): Promise<RawTrendItem[]> {
    const headers: Record<string, string> = { 'User-Agent': this.options.userAgent };
    let url = `${PUBLIC_BASE}${pathname}.json`;

    if (this.usesOAuth) {
      const token = await this.accessToken();
      headers.Authorization = `bearer ${token.value}`;
      url = `${OAUTH_BASE}${pathname}`;
    }

    const response = await axios.get(url, {
      params: { ...params, raw_json: 1 },
      headers,
      timeout: this.options.timeoutMs,
      signal,
    });

    const listing = ListingSchema.safeParse(response.data);
    if (!listing.success) {
      throw new PipelineError(`Unexpected listing shape from ${pathname}`, 'SOURCE_UNAVAILABLE', 502, true);
    }

    const items: RawTrendItem[] = [];
    for (const child of listing.data.data.children) {
      const post = PostSchema.safeParse(child.data);
      if (!post.success) {
        logger.debug(`Skipping malformed post in ${pathname}`);
        continue;
      }
      items.push({
        identityKey: post.data.name,
        title: post.data.title,
        url: post.data.url,
        score: post.data.score,
        flagged: post.data.over_18 ?? false,
      });
    }
    return items;
  }

  private async accessToken(): Promise<AccessToken> {
    if (this.token && this.token.expiresAt > this.now()) {
      return this.token;
    }
    return this.tokenFlight.run(async () => {
      const response = await axios.post(TOKEN_URL, 'grant_type=client_credentials', {
        auth: {
          username: this.options.clientId ?? '',
          password: this.options.clientSecret ?? '',
        },
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          'User-Agent': this.options.userAgent,
        },
        timeout: this.options.timeoutMs,
      });

      const parsed = TokenSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new PipelineError('Reddit token response was not understood', 'SOURCE_UNAVAILABLE', 502, true);
      }

      const token: AccessToken = {
        value: parsed.data.access_token,
        expiresAt: this.now() + parsed.data.expires_in * 1000 - TOKEN_EXPIRY_MARGIN_MS,
      };
      this.token = token;
      logger.info(`Obtained Reddit app token (valid ${Math.round(parsed.data.expires_in / 60)} min)`);
      return token;
    });
  }
}
