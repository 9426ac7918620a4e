import { promises as fs } from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { parseConfig } from './config.js';
import { ignorableFolders, pruneIgnorables, shouldIgnorePost, trackedEntities } from './ignore.js';
import { makePost, makeTempDir } from './test-helpers.js';
import { HarvestConfig } from './types.js';

function configFor(root: string): HarvestConfig {
  return parseConfig({
    globals: { download_folder: root },
    redditors: [{ name: 'alice' }, { name: 'mallory' }],
    subreddits: [{ name: 'pics', alias: 'pictures' }, { name: 'spam' }],
    ignored_redditors: [{ name: 'mallory' }, { name: 'troll' }],
    ignored_subreddits: [{ name: 'spam' }]
  });
}

describe('shouldIgnorePost', () => {
  const ignored = { redditors: ['troll'], subreddits: ['spam'] };

  it('ignores posts by ignored redditors', () => {
    expect(shouldIgnorePost(makePost({ author: 'troll' }), ignored)).toBe(true);
  });

  it('ignores posts in ignored subreddits', () => {
    expect(shouldIgnorePost(makePost({ subreddit: 'spam' }), ignored)).toBe(true);
  });

  it('requires an exact match', () => {
    expect(shouldIgnorePost(makePost({ author: 'Troll', subreddit: 'spammy' }), ignored)).toBe(false);
  });
});

describe('trackedEntities', () => {
  it('drops tracked entities that are also ignored', () => {
    const names = trackedEntities(configFor('/data')).map(entity => `${entity.kind}:${entity.name}`);
    expect(names).toEqual(['redditor:alice', 'subreddit:pics']);
  });
});

describe('pruneIgnorables', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('lists every tracked and ignored pairing with and without a media kind', () => {
    const folders = ignorableFolders(configFor(root));
    expect(folders).toContain(path.join(root, 'pictures', 'troll'));
    expect(folders).toContain(path.join(root, 'videos', 'alice', 'spam'));
    expect(folders).toHaveLength(4 * 6);
  });

  it('removes existing folders and leaves the rest alone', async () => {
    const config = configFor(root);
    const prunable = [
      path.join(root, 'pictures', 'troll'),
      path.join(root, 'images', 'alice', 'spam')
    ];
    const kept = path.join(root, 'pictures', 'bob');
    for (const folder of [...prunable, kept]) {
      await fs.mkdir(folder, { recursive: true });
      await fs.writeFile(path.join(folder, 'file.jpg'), 'x');
    }

    const removed = await pruneIgnorables(config);

    expect(removed.sort()).toEqual([...prunable].sort());
    await expect(fs.access(prunable[0] ?? '')).rejects.toThrow();
    await expect(fs.readdir(kept)).resolves.toEqual(['file.jpg']);
  });

  it('never prunes a tracked folder because of a blank ignore entry', async () => {
    const config = parseConfig({
      globals: { download_folder: root },
      subreddits: [{ name: 'pics' }],
      ignored_redditors: ['  ', { name: '' }]
    });
    const saved = path.join(root, 'pics', 'alice');
    await fs.mkdir(saved, { recursive: true });
    await fs.writeFile(path.join(saved, 'file.jpg'), 'x');

    expect(config.ignored.redditors).toEqual([]);
    expect(await pruneIgnorables(config)).toEqual([]);
    await expect(fs.readdir(saved)).resolves.toEqual(['file.jpg']);
  });

  it('skips blank names in a hand-built configuration', async () => {
    const config: HarvestConfig = {
      ...configFor(root),
      redditors: [],
      ignored: { redditors: [' ', 'troll'], subreddits: [''] }
    };

    expect(ignorableFolders(config)).toEqual([
      path.join(root, 'pictures', 'troll'),
      path.join(root, 'spam', 'troll'),
      path.join(root, 'images', 'pictures', 'troll'),
      path.join(root, 'images', 'spam', 'troll'),
      path.join(root, 'videos', 'pictures', 'troll'),
      path.join(root, 'videos', 'spam', 'troll'),
      path.join(root, 'unknown', 'pictures', 'troll'),
      path.join(root, 'unknown', 'spam', 'troll')
    ]);
  });
});
