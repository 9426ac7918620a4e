import { promises as fs } from 'fs';
import path from 'path';
import PQueue from 'p-queue';
import { logger } from './utils/logger.js';
import { detectMedia, getContentHash } from './utils/file-utils.js';
import { RetrievalOutcome } from './types.js';

export interface ContentStoreOptions {
  root: string;
  separateMedia: boolean;
}

export interface SaveRequest {
  sourceUrl: string;
  subFolder: string;
}

function isFileExistsError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

/**
 * Writes downloads as `<sha256><ext>` and treats any file in the target
 * directory with the same stem as already saved. Saves into one directory are
 * serialized so the lookup and the write act as a unit.
 */
export class ContentStore {
  private locks = new Map<string, PQueue>();

  constructor(private options: ContentStoreOptions) {}

  async save(data: Buffer, request: SaveRequest): Promise<RetrievalOutcome> {
    const digest = getContentHash(data);
    const media = await detectMedia(data, request.sourceUrl);

    const directory = this.options.separateMedia
      ? path.join(this.options.root, media.kind, request.subFolder)
      : path.join(this.options.root, request.subFolder);

    const lock = this.lockFor(directory);
    try {
      return await lock.add(
        () => this.write(directory, digest, media.extension, data, request.sourceUrl),
        { throwOnTimeout: true }
      );
    } finally {
      if (lock.size === 0 && lock.pending === 0) {
        this.locks.delete(directory);
      }
    }
  }

  get lockedDirectories(): number {
    return this.locks.size;
  }

  private lockFor(directory: string): PQueue {
    let lock = this.locks.get(directory);
    if (!lock) {
      lock = new PQueue({ concurrency: 1 });
      this.locks.set(directory, lock);
    }
    return lock;
  }

  private async write(
    directory: string,
    digest: string,
    extension: string,
    data: Buffer,
    sourceUrl: string
  ): Promise<RetrievalOutcome> {
    await fs.mkdir(directory, { recursive: true });

    const existing = await findByDigest(directory, digest);
    if (existing) {
      logger.debug(`Already saved: ${sourceUrl} -> ${existing}`);
      return { status: 'already-saved', sourceUrl, localFile: existing, digest };
    }

    const filepath = path.join(directory, `${digest}${extension}`);
    try {
      await fs.writeFile(filepath, data, { flag: 'wx' });
    } catch (error) {
      if (isFileExistsError(error)) {
        return { status: 'already-saved', sourceUrl, localFile: filepath, digest };
      }
      throw error;
    }

    return { status: 'new-saved', sourceUrl, localFile: filepath, digest };
  }
}

export async function findByDigest(directory: string, digest: string): Promise<string | undefined> {
  const entries = await fs.readdir(directory, { withFileTypes: true });
  const match = entries.find(entry => {
    if (!entry.isFile()) return false;
    const ext = path.extname(entry.name);
    return entry.name.slice(0, entry.name.length - ext.length) === digest;
  });
  return match ? path.join(directory, match.name) : undefined;
}
