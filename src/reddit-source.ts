import { z } from 'zod';
import { logger } from './utils/logger.js';
import { sleep } from './utils/sleep.js';
import { FetchError } from './errors.js';
import { Post, PostSource, RateLimits, RawPayload, TrackedEntity, UNKNOWN_AUTHOR } from './types.js';

const TOKEN_URL = 'https://www.reddit.com/api/v1/access_token';
const API_BASE = 'https://oauth.reddit.com';
const MAX_PAGE_SIZE = 100;
const DEFAULT_STREAM_POLL_INTERVAL = 5;

export interface RedditCredentials {
  clientId: string;
  clientSecret: string;
  username?: string;
  password?: string;
}

export interface RedditSourceOptions {
  credentials: RedditCredentials;
  userAgent: string;
  // seconds the client may wait for a rate-limit window to reset
  rateLimitMaxWait: number;
  // seconds between polls of a 'stream' listing
  streamPollInterval?: number;
  fetchImpl?: typeof fetch;
}

const tokenSchema = z.object({
  access_token: z.string(),
  expires_in: z.number()
});

const listingSchema = z.object({
  kind: z.literal('Listing'),
  data: z.object({
    after: z.string().nullish(),
    children: z.array(z.object({
      kind: z.string(),
      data: z.record(z.unknown())
    }))
  })
});

const submissionSchema = z.object({
  id: z.string(),
  title: z.string().default(''),
  author: z.string().nullish(),
  subreddit: z.string(),
  url: z.string().nullish(),
  selftext: z.string().nullish(),
  created_utc: z.number(),
  over_18: z.boolean().nullish()
});

const aboutSchema = z.object({
  kind: z.string(),
  data: z.object({
    id: z.string().optional(),
    name: z.string().optional(),
    display_name: z.string().optional(),
    over18: z.boolean().nullish()
  }).passthrough()
});

type Listing = z.infer<typeof listingSchema>;

export function buildUserAgent(app: string, version: string, username: string): string {
  return `node:${app}:${version} (by /u/${username})`;
}

/** Snapshot of a listing child; null when it is not a usable submission. */
export function toPost(raw: RawPayload): Post | null {
  const parsed = submissionSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }

  const submission = parsed.data;
  const author = submission.author?.trim();

  return {
    id: submission.id,
    title: submission.title,
    author: author && author !== '[deleted]' ? author : UNKNOWN_AUTHOR,
    subreddit: submission.subreddit.trim(),
    url: (submission.url ?? '').trim(),
    selftext: submission.selftext ?? '',
    createdAt: new Date(submission.created_utc * 1000),
    over18: submission.over_18 ?? false,
    raw
  };
}

function parseHeaderNumber(value: string | null): number | undefined {
  if (value === null) return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Reads submissions from the Reddit OAuth API. Uses the password grant when
 * a username and password are configured, otherwise application-only auth.
 */
export class RedditSource implements PostSource {
  private token: { value: string; expiresAt: number } | null = null;
  private limits: RateLimits = {};
  private fetchImpl: typeof fetch;

  constructor(private options: RedditSourceOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  rateLimits(): RateLimits {
    return { ...this.limits };
  }

  async validate(entity: TrackedEntity): Promise<boolean> {
    const pathname = entity.kind === 'redditor'
      ? `/user/${encodeURIComponent(entity.name)}/about`
      : `/r/${encodeURIComponent(entity.name)}/about`;

    logger.info(`Attempting to get ${entity.kind} '${entity.name}'`);
    try {
      const about = aboutSchema.parse(await this.get(pathname, {}));
      const { id, name, display_name: displayName, over18 } = about.data;
      logger.debug(`${entity.kind}: ${displayName ?? name ?? entity.name} (id: ${id ?? 'n/a'}, over18: ${over18 ?? false})`);
      return true;
    } catch (error) {
      if (error instanceof FetchError && error.status !== undefined && error.status >= 400 && error.status < 500 && error.status !== 429) {
        logger.warn(`Could not resolve ${entity.kind} '${entity.name}': ${error.message}`);
        return false;
      }
      throw error;
    }
  }

  async *posts(entity: TrackedEntity, signal?: AbortSignal): AsyncGenerator<Post> {
    const { sortType, sortToggle, postLimit } = entity.criteria;
    logger.info(`Searching submissions from '${entity.name}' by ${sortType}/${sortToggle ?? '-'}`);

    if (sortType === 'stream') {
      yield* this.stream(entity, signal);
      return;
    }

    if (entity.kind === 'subreddit' && sortType === 'random') {
      const listings = z.union([listingSchema, z.array(listingSchema)])
        .parse(await this.get(`/r/${encodeURIComponent(entity.name)}/random`, {}));
      const first = Array.isArray(listings) ? listings[0] : listings;
      const post = first ? this.postsFrom(first)[0] : undefined;
      if (post) {
        yield post;
      }
      return;
    }

    const name = encodeURIComponent(entity.name);
    const params: Record<string, string> = {};
    let pathname = `/r/${name}/${sortType === 'random_rising' ? 'randomrising' : sortType}`;
    if (entity.kind === 'redditor') {
      pathname = `/user/${name}/submitted`;
      params.sort = sortType;
    }
    if (sortToggle) {
      params.t = sortToggle;
    }

    let yielded = 0;
    let after: string | undefined;
    while (yielded < postLimit) {
      const page = listingSchema.parse(await this.get(pathname, {
        ...params,
        limit: String(Math.min(MAX_PAGE_SIZE, postLimit - yielded)),
        ...(after ? { after } : {})
      }));

      const posts = this.postsFrom(page);
      for (const post of posts) {
        if (yielded >= postLimit) return;
        yielded++;
        yield post;
      }

      after = page.data.after ?? undefined;
      if (!after || page.data.children.length === 0) {
        return;
      }
    }
  }

  /**
   * Polls the newest submissions, oldest first, until the post limit is
   * reached or the signal aborts. Each poll asks only for posts newer than the
   * newest one already seen.
   */
  private async *stream(entity: TrackedEntity, signal?: AbortSignal): AsyncGenerator<Post> {
    const name = encodeURIComponent(entity.name);
    const pathname = entity.kind === 'redditor' ? `/user/${name}/submitted` : `/r/${name}/new`;
    const params: Record<string, string> = entity.kind === 'redditor' ? { sort: 'new' } : {};
    const pollMs = (this.options.streamPollInterval ?? DEFAULT_STREAM_POLL_INTERVAL) * 1000;
    const { postLimit } = entity.criteria;

    let yielded = 0;
    let before: string | undefined;
    let first = true;
    while (yielded < postLimit) {
      if (!first && !(await sleep(pollMs, signal))) {
        return;
      }
      first = false;
      if (signal?.aborted) {
        return;
      }

      const page = listingSchema.parse(await this.get(pathname, {
        ...params,
        limit: String(MAX_PAGE_SIZE),
        ...(before ? { before } : {})
      }));

      const posts = this.postsFrom(page);
      const newest = posts[0];
      if (newest) {
        before = `t3_${newest.id}`;
      }

      for (const post of posts.reverse()) {
        if (yielded >= postLimit) return;
        yielded++;
        yield post;
      }
    }
  }

  private postsFrom(listing: Listing): Post[] {
    const posts: Post[] = [];
    for (const child of listing.data.children) {
      if (child.kind !== 't3') continue;
      const post = toPost(child.data);
      if (post) {
        posts.push(post);
      } else {
        logger.debug(`Skipping malformed submission in listing: ${String(child.data.id)}`);
      }
    }
    return posts;
  }

  private async get(pathname: string, params: Record<string, string>): Promise<unknown> {
    await this.waitForRateLimit();

    const query = new URLSearchParams({ ...params, raw_json: '1' });
    const url = `${API_BASE}${pathname}?${query.toString()}`;
    const response = await this.fetchImpl(url, {
      headers: {
        Authorization: `Bearer ${await this.accessToken()}`,
        'User-Agent': this.options.userAgent
      }
    });

    this.recordRateLimits(response.headers);

    if (!response.ok) {
      throw new FetchError(`HTTP ${response.status} ${response.statusText} for ${url}`, url, response.status);
    }
    return response.json();
  }

  private async accessToken(): Promise<string> {
    if (this.token && this.token.expiresAt > Date.now()) {
      return this.token.value;
    }

    const { clientId, clientSecret, username, password } = this.options.credentials;
    const body = username && password
      ? new URLSearchParams({ grant_type: 'password', username, password })
      : new URLSearchParams({ grant_type: 'client_credentials' });

    const response = await this.fetchImpl(TOKEN_URL, {
      method: 'POST',
      headers: {
        Authorization: `Basic ${Buffer.from(`${clientId}:${clientSecret}`).toString('base64')}`,
        'Content-Type': 'application/x-www-form-urlencoded',
        'User-Agent': this.options.userAgent
      },
      body
    });

    if (!response.ok) {
      throw new FetchError(`Authentication failed: HTTP ${response.status}`, TOKEN_URL, response.status);
    }

    const token = tokenSchema.parse(await response.json());
    // Refresh a minute early.
    this.token = { value: token.access_token, expiresAt: Date.now() + (token.expires_in - 60) * 1000 };
    return this.token.value;
  }

  private recordRateLimits(headers: Headers): void {
    const remaining = parseHeaderNumber(headers.get('x-ratelimit-remaining'));
    const used = parseHeaderNumber(headers.get('x-ratelimit-used'));
    const reset = parseHeaderNumber(headers.get('x-ratelimit-reset'));

    this.limits = {
      remaining: remaining ?? this.limits.remaining,
      used: used ?? this.limits.used,
      resetAt: reset !== undefined ? new Date(Date.now() + reset * 1000) : this.limits.resetAt
    };
  }

  private async waitForRateLimit(): Promise<void> {
    const { remaining, resetAt } = this.limits;
    if (remaining === undefined || remaining >= 1 || !resetAt) {
      return;
    }

    const waitMs = resetAt.getTime() - Date.now();
    if (waitMs <= 0) {
      return;
    }
    if (waitMs > this.options.rateLimitMaxWait * 1000) {
      throw new FetchError(`Rate limit resets in ${Math.ceil(waitMs / 1000)}s, beyond the configured maximum wait`, API_BASE, 429);
    }

    logger.warn(`Rate limit exhausted, waiting ${Math.ceil(waitMs / 1000)}s`);
    await sleep(waitMs);
  }
}
