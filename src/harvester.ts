import { logger } from './utils/logger.js';
import { sleep } from './utils/sleep.js';
import { describeError } from './errors.js';
import { pruneIgnorables, trackedEntities } from './ignore.js';
import { Retriever } from './retriever.js';
import { HarvestConfig, PostSource, RetrievalStatus, TrackedEntity } from './types.js';

export interface HarvestOptions {
  signal?: AbortSignal;
  subredditsOnly?: boolean;
  redditorsOnly?: boolean;
  onlyName?: string;
  // Asked before pruning; pruning is skipped when it resolves false.
  confirmPrune?: () => Promise<boolean>;
}

export interface HarvestSummary {
  entities: number;
  posts: number;
  outcomes: Record<RetrievalStatus, number>;
  pruned: string[];
  interrupted: boolean;
}

function emptyTally(): Record<RetrievalStatus, number> {
  return {
    'new-saved': 0,
    'already-saved': 0,
    'not-saved': 0,
    'ignored': 0,
    'age-restricted': 0
  };
}

export class Harvester {
  constructor(
    private config: HarvestConfig,
    private source: PostSource,
    private retriever: Retriever
  ) {}

  private skipReason(entity: TrackedEntity, options: HarvestOptions): string | null {
    if (entity.kind === 'redditor' && options.subredditsOnly) {
      return 'configured to skip redditors';
    }
    if (entity.kind === 'subreddit' && options.redditorsOnly) {
      return 'configured to skip subreddits';
    }
    if (options.onlyName && entity.name !== options.onlyName) {
      return `configured to only retrieve from '${options.onlyName}'`;
    }
    return null;
  }

  private logRateLimits(): void {
    const { remaining, used, resetAt } = this.source.rateLimits();
    logger.debug(
      `Current rate limits: remaining - ${remaining ?? 'n/a'}, used - ${used ?? 'n/a'}, reset - ${resetAt?.toISOString() ?? 'n/a'}`
    );
  }

  async harvest(options: HarvestOptions = {}): Promise<HarvestSummary> {
    const { signal } = options;
    const summary: HarvestSummary = {
      entities: 0,
      posts: 0,
      outcomes: emptyTally(),
      pruned: [],
      interrupted: false
    };
    const interrupted = (): boolean => {
      if (signal?.aborted) {
        if (!summary.interrupted) {
          logger.warn('Interrupted, quitting early...');
        }
        summary.interrupted = true;
      }
      return summary.interrupted;
    };

    if (this.config.pruneIgnorables) {
      const confirmed = options.confirmPrune ? await options.confirmPrune() : true;
      if (confirmed) {
        logger.info('Pruning detectable content for ignored entities');
        summary.pruned = await pruneIgnorables(this.config);
      } else {
        logger.info('Pruning skipped');
      }
    }

    for (const entity of trackedEntities(this.config)) {
      if (interrupted()) break;

      const reason = this.skipReason(entity, options);
      if (reason) {
        logger.debug(`Skipping ${entity.kind} '${entity.name}': ${reason}`);
        continue;
      }

      // No backoff before the first entity.
      if (summary.entities > 0) {
        this.logRateLimits();
        logger.debug(`Sleeping for ${this.config.backoffSleep}s before next entity`);
        await sleep(this.config.backoffSleep * 1000, signal);
      }
      summary.entities++;
      if (interrupted()) break;

      try {
        if (!(await this.source.validate(entity))) {
          logger.warn(`Trouble fetching submissions from '${entity.name}'; continuing...`);
          continue;
        }
      } catch (error) {
        logger.error(`Error validating ${entity.kind} '${entity.name}': ${describeError(error)}`);
        continue;
      }

      try {
        const count = await this.harvestEntity(entity, summary, interrupted, signal);
        logger.info(`Processed ${count} posts from '${entity.name}'`);
      } catch (error) {
        logger.error(`Error fetching submissions from '${entity.name}': ${describeError(error)}`);
      }
    }

    return summary;
  }

  private async harvestEntity(
    entity: TrackedEntity,
    summary: HarvestSummary,
    interrupted: () => boolean,
    signal?: AbortSignal
  ): Promise<number> {
    let count = 0;

    for await (const post of this.source.posts(entity, signal)) {
      if (interrupted()) break;

      logger.info(`Processing post ${count} '${post.id}' from ${post.author} in ${post.subreddit}: ${post.url}`);
      const outcomes = await this.retriever.retrieve(entity, post);

      for (const outcome of outcomes) {
        if (interrupted()) break;
        summary.outcomes[outcome.status]++;
        const message = `Status: ${outcome.status}; source: ${outcome.sourceUrl}${outcome.localFile ? ` -> ${outcome.localFile}` : ''}`;
        if (outcome.status === 'new-saved') {
          logger.success(message);
        } else {
          logger.debug(message);
        }
      }

      summary.posts++;
      count++;
      if (count >= entity.criteria.postLimit) break;
    }

    return count;
  }
}
