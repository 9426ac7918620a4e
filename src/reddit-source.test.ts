import { describe, expect, it, vi } from 'vitest';
import { FetchError } from './errors.js';
import { RedditSource, RedditSourceOptions, buildUserAgent, toPost } from './reddit-source.js';
import { makeRedditor, makeSubreddit } from './test-helpers.js';
import { Post, RawPayload } from './types.js';

const TOKEN_URL = 'https://www.reddit.com/api/v1/access_token';

function json(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers }
  });
}

function submission(id: string, overrides: RawPayload = {}): RawPayload {
  return {
    id,
    title: `post ${id}`,
    author: 'alice',
    subreddit: 'pics',
    url: `https://i.test/${id}.jpg`,
    created_utc: 1700000000,
    over_18: false,
    ...overrides
  };
}

function listing(children: RawPayload[], after: string | null = null) {
  return { kind: 'Listing', data: { after, children: children.map(data => ({ kind: 't3', data })) } };
}

function urlOf(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  return input instanceof URL ? input.href : input.url;
}

function stubFetch(route: (url: URL) => Response) {
  return vi.fn<typeof fetch>(async input => {
    const url = urlOf(input);
    if (url === TOKEN_URL) {
      return json({ access_token: 'test-token', expires_in: 3600 });
    }
    return route(new URL(url));
  });
}

function sourceWith(fetchImpl: typeof fetch, overrides: Partial<RedditSourceOptions> = {}): RedditSource {
  return new RedditSource({
    credentials: { clientId: 'test-id', clientSecret: 'test-secret' },
    userAgent: 'node:test:1.0 (by /u/tester)',
    rateLimitMaxWait: 120,
    fetchImpl,
    ...overrides
  });
}

const apiCalls = (fetchImpl: ReturnType<typeof stubFetch>) =>
  fetchImpl.mock.calls.map(([input]) => urlOf(input)).filter(url => url !== TOKEN_URL);

async function collect(posts: AsyncIterable<Post>): Promise<Post[]> {
  const collected: Post[] = [];
  for await (const post of posts) {
    collected.push(post);
  }
  return collected;
}

describe('toPost', () => {
  it('maps a submission payload', () => {
    const raw = submission('a1', { author: '[deleted]', over_18: null, url: ' https://i.test/a1.jpg ' });

    expect(toPost(raw)).toEqual({
      id: 'a1',
      title: 'post a1',
      author: 'unknown',
      subreddit: 'pics',
      url: 'https://i.test/a1.jpg',
      selftext: '',
      createdAt: new Date('2023-11-14T22:13:20Z'),
      over18: false,
      raw
    });
  });

  it('rejects payloads without an id', () => {
    const { id: _id, ...rest } = submission('a1');
    expect(toPost(rest)).toBeNull();
  });
});

describe('buildUserAgent', () => {
  it('follows the platform:app:version format', () => {
    expect(buildUserAgent('redd-harvest', '1.0.0', 'tester')).toBe('node:redd-harvest:1.0.0 (by /u/tester)');
  });
});

describe('RedditSource', () => {
  it('authenticates once with application-only credentials', async () => {
    const fetchImpl = stubFetch(() => json(listing([submission('a1')])));
    const source = sourceWith(fetchImpl);

    await collect(source.posts(makeSubreddit()));
    await collect(source.posts(makeSubreddit()));

    const tokenCalls = fetchImpl.mock.calls.filter(([input]) => urlOf(input) === TOKEN_URL);
    expect(tokenCalls).toHaveLength(1);
    expect(String(tokenCalls[0]?.[1]?.body)).toBe('grant_type=client_credentials');
    expect(fetchImpl.mock.calls[1]?.[1]?.headers).toMatchObject({ Authorization: 'Bearer test-token' });
  });

  it('uses the password grant when a username and password are set', async () => {
    const fetchImpl = stubFetch(() => json(listing([])));
    const source = sourceWith(fetchImpl, {
      credentials: { clientId: 'test-id', clientSecret: 'test-secret', username: 'tester', password: 'test-password' }
    });

    await collect(source.posts(makeSubreddit()));

    expect(String(fetchImpl.mock.calls[0]?.[1]?.body)).toBe('grant_type=password&username=tester&password=test-password');
  });

  it('pages a subreddit listing up to the post limit', async () => {
    const fetchImpl = stubFetch(url => url.searchParams.has('after')
      ? json(listing([submission('c'), submission('d')], 't3_d'))
      : json(listing([submission('a'), submission('b')], 't3_b')));
    const entity = makeSubreddit({ criteria: { sortType: 'top', sortToggle: 'week', postLimit: 3 } });

    const posts = await collect(sourceWith(fetchImpl).posts(entity));

    expect(posts.map(post => post.id)).toEqual(['a', 'b', 'c']);
    expect(apiCalls(fetchImpl)).toEqual([
      'https://oauth.reddit.com/r/pics/top?t=week&limit=3&raw_json=1',
      'https://oauth.reddit.com/r/pics/top?t=week&limit=1&after=t3_b&raw_json=1'
    ]);
  });

  it('stops when the listing runs out', async () => {
    const fetchImpl = stubFetch(() => json(listing([submission('a')])));

    const posts = await collect(sourceWith(fetchImpl).posts(makeRedditor()));

    expect(posts).toHaveLength(1);
    expect(apiCalls(fetchImpl)).toEqual(['https://oauth.reddit.com/user/alice/submitted?sort=new&limit=5&raw_json=1']);
  });

  it('skips children that are not submissions', async () => {
    const page = listing([submission('a')]);
    page.data.children.unshift({ kind: 't1', data: { id: 'comment' } });
    const fetchImpl = stubFetch(() => json(page));

    const posts = await collect(sourceWith(fetchImpl).posts(makeSubreddit()));

    expect(posts.map(post => post.id)).toEqual(['a']);
  });

  it('takes a single post from a random subreddit listing', async () => {
    const fetchImpl = stubFetch(() => json([listing([submission('r1'), submission('r2')]), listing([])]));
    const entity = makeSubreddit({ criteria: { sortType: 'random', postLimit: 5 } });

    const posts = await collect(sourceWith(fetchImpl).posts(entity));

    expect(posts.map(post => post.id)).toEqual(['r1']);
    expect(apiCalls(fetchImpl)).toEqual(['https://oauth.reddit.com/r/pics/random?raw_json=1']);
  });

  describe('stream sort', () => {
    it('yields new submissions oldest first, polling past the newest seen', async () => {
      const fetchImpl = stubFetch(url => url.searchParams.get('before') === 't3_b'
        ? json(listing([submission('d'), submission('c')]))
        : json(listing([submission('b'), submission('a')])));
      const entity = makeSubreddit({ criteria: { sortType: 'stream', postLimit: 3 } });

      const posts = await collect(sourceWith(fetchImpl, { streamPollInterval: 0 }).posts(entity));

      expect(posts.map(post => post.id)).toEqual(['a', 'b', 'c']);
      expect(apiCalls(fetchImpl)).toEqual([
        'https://oauth.reddit.com/r/pics/new?limit=100&raw_json=1',
        'https://oauth.reddit.com/r/pics/new?limit=100&before=t3_b&raw_json=1'
      ]);
    });

    it('stops polling a redditor stream once the signal aborts', async () => {
      const controller = new AbortController();
      let calls = 0;
      const fetchImpl = stubFetch(() => {
        calls++;
        if (calls === 1) {
          return json(listing([submission('a')]));
        }
        controller.abort();
        return json(listing([]));
      });
      const entity = makeRedditor({ criteria: { sortType: 'stream', postLimit: 5 } });

      const posts = await collect(sourceWith(fetchImpl, { streamPollInterval: 0 }).posts(entity, controller.signal));

      expect(posts.map(post => post.id)).toEqual(['a']);
      expect(apiCalls(fetchImpl)).toEqual([
        'https://oauth.reddit.com/user/alice/submitted?sort=new&limit=100&raw_json=1',
        'https://oauth.reddit.com/user/alice/submitted?sort=new&limit=100&before=t3_a&raw_json=1'
      ]);
    });
  });

  describe('validate', () => {
    it('accepts entities the api can describe', async () => {
      const fetchImpl = stubFetch(() => json({ kind: 't5', data: { id: 'x1', display_name: 'pics' } }));

      expect(await sourceWith(fetchImpl).validate(makeSubreddit())).toBe(true);
      expect(apiCalls(fetchImpl)).toEqual(['https://oauth.reddit.com/r/pics/about?raw_json=1']);
    });

    it('reports missing entities as invalid', async () => {
      const fetchImpl = stubFetch(() => json({ message: 'Not Found' }, 404));

      expect(await sourceWith(fetchImpl).validate(makeRedditor({ name: 'ghost' }))).toBe(false);
      expect(apiCalls(fetchImpl)).toEqual(['https://oauth.reddit.com/user/ghost/about?raw_json=1']);
    });

    it('propagates server errors', async () => {
      const fetchImpl = stubFetch(() => json({}, 503));

      await expect(sourceWith(fetchImpl).validate(makeSubreddit())).rejects.toBeInstanceOf(FetchError);
    });
  });

  describe('rate limits', () => {
    it('records the rate limit headers', async () => {
      const fetchImpl = stubFetch(() => json(listing([]), 200, {
        'x-ratelimit-remaining': '42.0',
        'x-ratelimit-used': '558',
        'x-ratelimit-reset': '30'
      }));
      const source = sourceWith(fetchImpl);
      const before = Date.now();

      await collect(source.posts(makeSubreddit()));

      const { remaining, used, resetAt } = source.rateLimits();
      expect(remaining).toBe(42);
      expect(used).toBe(558);
      expect(resetAt?.getTime()).toBeGreaterThanOrEqual(before + 30_000);
    });

    it('refuses to wait past the configured maximum', async () => {
      const fetchImpl = stubFetch(() => json(listing([]), 200, {
        'x-ratelimit-remaining': '0',
        'x-ratelimit-reset': '600'
      }));
      const source = sourceWith(fetchImpl, { rateLimitMaxWait: 120 });

      await collect(source.posts(makeSubreddit()));

      await expect(collect(source.posts(makeSubreddit()))).rejects.toThrow(/Rate limit resets in 600s/);
      expect(apiCalls(fetchImpl)).toHaveLength(1);
    });
  });
});
