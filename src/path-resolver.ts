import path from 'path';
import { FavorEntity, Post, Redditor, Subreddit, TrackedEntity } from './types.js';

export interface PathConfig {
  readonly favorEntity: FavorEntity;
  readonly redditors: readonly Redditor[];
  readonly subreddits: readonly Subreddit[];
}

/** Sub-folder for a post under the entity's own store type, ignoring favoring. */
export function resolveSubFolder(entity: TrackedEntity, post: Post): string {
  switch (entity.storeType) {
    case 'really-flat':
      return '.';
    case 'flat':
      return entity.alias;
    case 'nested': {
      const counterpart = entity.kind === 'redditor' ? post.subreddit : post.author;
      return path.join(entity.alias, counterpart);
    }
  }
}

function favoredEntity(entity: TrackedEntity, post: Post, config: PathConfig): TrackedEntity | undefined {
  switch (entity.kind) {
    case 'subreddit':
      return config.favorEntity === 'redditor'
        ? config.redditors.find(redditor => redditor.name === post.author)
        : undefined;
    case 'redditor':
      return config.favorEntity === 'subreddit'
        ? config.subreddits.find(subreddit => subreddit.name === post.subreddit)
        : undefined;
  }
}

/**
 * Sub-folder a post's content is stored under. When the configuration favors
 * the opposite entity type and the post's author (or subreddit) is tracked,
 * that tracked entity's layout wins, so the same file lands in the same place
 * whichever entity surfaced it.
 */
export function resolvePath(entity: TrackedEntity, post: Post, config: PathConfig): string {
  return resolveSubFolder(favoredEntity(entity, post, config) ?? entity, post);
}
