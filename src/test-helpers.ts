import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { DownloadProgress, Fetcher, Post, Redditor, Subreddit } from './types.js';

export function makePost(overrides: Partial<Post> = {}): Post {
  return {
    id: 'abc123',
    title: 'a post',
    author: 'alice',
    subreddit: 'pics',
    url: 'https://i.example.test/photo.jpg',
    selftext: '',
    createdAt: new Date('2024-01-01T00:00:00Z'),
    over18: false,
    raw: {},
    ...overrides
  };
}

export function makeRedditor(overrides: Partial<Omit<Redditor, 'kind'>> = {}): Redditor {
  const name = overrides.name ?? 'alice';
  return {
    kind: 'redditor',
    name,
    alias: name,
    storeType: 'flat',
    criteria: { sortType: 'new', postLimit: 5 },
    ...overrides
  };
}

export function makeSubreddit(overrides: Partial<Omit<Subreddit, 'kind'>> = {}): Subreddit {
  const name = overrides.name ?? 'pics';
  return {
    kind: 'subreddit',
    name,
    alias: name,
    storeType: 'nested',
    criteria: { sortType: 'new', postLimit: 5 },
    ...overrides
  };
}

/** In-memory fetcher keyed by URL; unknown URLs fail like a 404. */
export class FakeFetcher implements Fetcher {
  readonly byteRequests: string[] = [];
  readonly pageRequests: string[] = [];

  constructor(
    private files: Record<string, Buffer> = {},
    private pages: Record<string, string> = {}
  ) {}

  async fetchBytes(url: string, onProgress?: (progress: DownloadProgress) => void): Promise<Buffer> {
    this.byteRequests.push(url);
    const data = this.files[url];
    if (!data) {
      throw new Error(`404 for ${url}`);
    }
    onProgress?.({ received: data.length, total: data.length });
    return data;
  }

  async fetchText(url: string): Promise<string> {
    this.pageRequests.push(url);
    const page = this.pages[url];
    if (page === undefined) {
      throw new Error(`404 for ${url}`);
    }
    return page;
  }
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'harvest-test-'));
}

// Smallest byte sequences the file type sniffer recognises.
export const JPEG_BYTES = Buffer.from([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10, 0x4a, 0x46, 0x49, 0x46, 0x00, 0x01]);
export const GIF_BYTES = Buffer.from('GIF89a\x01\x00\x01\x00\x00\x00\x00;', 'latin1');
