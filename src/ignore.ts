import { promises as fs } from 'fs';
import path from 'path';
import { logger } from './utils/logger.js';
import { pathExists } from './utils/file-utils.js';
import { HarvestConfig, IgnoreEntries, MEDIA_KINDS, Post, TrackedEntity } from './types.js';

export function shouldIgnorePost(post: Post, ignored: IgnoreEntries): boolean {
  return ignored.redditors.includes(post.author) || ignored.subreddits.includes(post.subreddit);
}

function isIgnored(entity: TrackedEntity, ignored: IgnoreEntries): boolean {
  const names = entity.kind === 'redditor' ? ignored.redditors : ignored.subreddits;
  const name = entity.name.trim();
  return names.some(ignoredName => ignoredName.trim() === name);
}

/** Configured redditors then subreddits, minus any that are also ignored. */
export function trackedEntities(config: HarvestConfig): TrackedEntity[] {
  const entities: TrackedEntity[] = [];

  for (const entity of [...config.redditors, ...config.subreddits]) {
    if (isIgnored(entity, config.ignored)) {
      logger.info(`Ignoring ${entity.kind} '${entity.name}'`);
      continue;
    }
    entities.push(entity);
  }

  return entities;
}

/**
 * Folders a nested layout would have produced for ignored content: an ignored
 * redditor under a tracked subreddit, or a tracked redditor's posts in an
 * ignored subreddit. Each is listed with and without a media-kind segment.
 */
export function ignorableFolders(config: HarvestConfig): string[] {
  const relative: string[] = [];
  const named = (names: readonly string[]) => names.map(name => name.trim()).filter(name => name.length > 0);

  for (const subreddit of config.subreddits) {
    for (const redditor of named(config.ignored.redditors)) {
      relative.push(path.join(subreddit.alias, redditor));
    }
  }
  for (const redditor of config.redditors) {
    for (const subreddit of named(config.ignored.subreddits)) {
      relative.push(path.join(redditor.alias, subreddit));
    }
  }

  const roots = [config.downloadFolder, ...MEDIA_KINDS.map(kind => path.join(config.downloadFolder, kind))];
  return roots.flatMap(root => relative.map(folder => path.join(root, folder)));
}

export async function pruneIgnorables(config: HarvestConfig): Promise<string[]> {
  const removed: string[] = [];

  for (const folder of ignorableFolders(config)) {
    logger.debug(`Checking for folder: ${folder}`);
    if (await pathExists(folder)) {
      logger.info(`Removing folder: ${folder}`);
      await fs.rm(folder, { recursive: true, force: true });
      removed.push(folder);
    }
  }

  return removed;
}
