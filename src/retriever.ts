import PQueue from 'p-queue';
import { logger } from './utils/logger.js';
import { describeError } from './errors.js';
import { resolveDownloadUrls } from './link-matcher.js';
import { PathConfig, resolvePath } from './path-resolver.js';
import { shouldIgnorePost } from './ignore.js';
import { ContentStore } from './content-store.js';
import { Fetcher, IgnoreEntries, LinkRule, Post, RetrievalOutcome, TrackedEntity } from './types.js';

export interface RetrieverConfig extends PathConfig {
  readonly links: readonly LinkRule[];
  readonly ignored: IgnoreEntries;
  readonly allowAdultContent: boolean;
  readonly concurrency: number;
}

function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return `${(bytes / Math.pow(k, i)).toFixed(1)} ${sizes[i]}`;
}

/**
 * Turns a post into retrieval outcomes: filters ignored and age-restricted
 * posts, resolves candidate URLs, then downloads and stores each one on a
 * bounded queue.
 */
export class Retriever {
  private queue: PQueue;

  constructor(
    private config: RetrieverConfig,
    private fetcher: Fetcher,
    private store: ContentStore
  ) {
    this.queue = new PQueue({ concurrency: Math.max(1, config.concurrency) });
  }

  async retrieve(entity: TrackedEntity, post: Post): Promise<RetrievalOutcome[]> {
    if (shouldIgnorePost(post, this.config.ignored)) {
      return [{ status: 'ignored', sourceUrl: post.url }];
    }

    if (post.over18 && !this.config.allowAdultContent) {
      return [{ status: 'age-restricted', sourceUrl: post.url }];
    }

    const urls = await resolveDownloadUrls(post, this.config.links, this.fetcher);
    if (urls.length === 0) {
      return [{ status: 'not-saved', sourceUrl: post.url }];
    }

    const subFolder = resolvePath(entity, post, this.config);
    return Promise.all(urls.map(url =>
      this.queue.add(() => this.download(url, subFolder, post), { throwOnTimeout: true })
    ));
  }

  private async download(url: string, subFolder: string, post: Post): Promise<RetrievalOutcome> {
    let lastLogged = 0;

    try {
      const data = await this.fetcher.fetchBytes(url, ({ received, total }) => {
        if (received - lastLogged >= 1024 * 1024 || received === total) {
          lastLogged = received;
          logger.debug(`${url}: ${formatBytes(received)}${total ? ` / ${formatBytes(total)}` : ''}`);
        }
      });
      return await this.store.save(data, { sourceUrl: url, subFolder });
    } catch (error) {
      logger.error(`Error fetching ${url} from post ${post.id} (${post.url}): ${describeError(error)}`);
      return { status: 'not-saved', sourceUrl: url };
    }
  }
}

export interface RetrievalDeps {
  fetcher: Fetcher;
  store: ContentStore;
}

/** One-shot form of {@link Retriever.retrieve} for callers without a long-lived retriever. */
export function resolveAndFetch(
  entity: TrackedEntity,
  post: Post,
  rules: readonly LinkRule[],
  config: Omit<RetrieverConfig, 'links'>,
  deps: RetrievalDeps
): Promise<RetrievalOutcome[]> {
  return new Retriever({ ...config, links: rules }, deps.fetcher, deps.store).retrieve(entity, post);
}
