import { logger } from './utils/logger.js';
import { endsWithExtension, escapeRegExp, isAbsoluteUrl, stripQuery } from './utils/url-utils.js';
import { describeError } from './errors.js';
import { Fetcher, LinkRule, Post, RawPayload, SubSearch } from './types.js';

function isRecord(value: unknown): value is RawPayload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function getRecord(source: RawPayload, key: string): RawPayload {
  const value = source[key];
  if (!isRecord(value)) {
    throw new Error(`missing object '${key}'`);
  }
  return value;
}

function getString(source: RawPayload, key: string): string {
  const value = source[key];
  if (typeof value !== 'string') {
    throw new Error(`missing string '${key}'`);
  }
  return value;
}

/**
 * Rewrites the post URL into a direct download URL for each configured
 * extension it matches. Handles imgur-style `_d.jpg?maxwidth=...` thumbnails
 * and plain `.jpg?query` variants.
 */
export function extractDirectUrls(url: string, rule: LinkRule): string[] {
  const urls: string[] = [];
  const lowerUrl = url.toLowerCase();

  for (const rawExt of rule.directExtensions) {
    const ext = rawExt.toLowerCase();
    const escaped = escapeRegExp(ext);

    if (endsWithExtension(lowerUrl, ext)) {
      urls.push(url);
      continue;
    }

    const thumbnail = new RegExp(`^.+_d\\.${escaped}\\?.*$`);
    if (thumbnail.test(lowerUrl)) {
      const markerIndex = lowerUrl.lastIndexOf(`_d.${ext}?`);
      urls.push(`${url.slice(0, markerIndex)}.${ext}`);
      continue;
    }

    const withQuery = new RegExp(`^.+\\.${escaped}\\?.*$`);
    if (withQuery.test(lowerUrl)) {
      urls.push(stripQuery(url));
    }
  }

  return urls;
}

function galleryUrls(payload: RawPayload): string[] {
  const metadata = getRecord(payload, 'media_metadata');
  const urls: string[] = [];

  for (const key of Object.keys(metadata)) {
    const item = getRecord(metadata, key);
    const source = getRecord(item, 's');
    const candidate = source.u ?? source.mp4 ?? source.gif;
    if (typeof candidate !== 'string') {
      throw new Error(`gallery item '${key}' has no source url`);
    }
    urls.push(candidate.trim());
  }

  return urls;
}

function videoUrls(payload: RawPayload): string[] {
  const video = getRecord(getRecord(payload, 'media'), 'reddit_video');
  return [getString(video, 'fallback_url').trim()];
}

function crosspostParents(payload: RawPayload): RawPayload[] {
  if (!payload.crosspost_parent) return [];
  const parents = payload.crosspost_parent_list;
  return Array.isArray(parents) ? parents.filter(isRecord) : [];
}

function extractFlagged(
  post: Post,
  flag: 'is_gallery' | 'is_video',
  extract: (payload: RawPayload) => string[]
): string[] {
  const label = flag === 'is_gallery' ? 'gallery items' : 'video';

  try {
    if (post.raw[flag] === true) {
      return extract(post.raw);
    }

    const parents = crosspostParents(post.raw);
    if (parents.length > 0) {
      logger.debug(`Post ${post.id} is a crosspost of '${String(post.raw.crosspost_parent)}'`);
    }

    const urls: string[] = [];
    for (const parent of parents) {
      if (parent[flag] === true) {
        urls.push(...extract(parent));
      }
    }
    return urls;
  } catch (error) {
    logger.warn(`Error getting ${label} from post ${post.id} at ${post.url}: ${describeError(error)}`);
    return [];
  }
}

/** Galleries first, then hosted video; both look through crosspost parents. */
export function extractStructuredUrls(post: Post): string[] {
  const gallery = extractFlagged(post, 'is_gallery', galleryUrls);
  if (gallery.length > 0) {
    return gallery;
  }
  return extractFlagged(post, 'is_video', videoUrls);
}

function compilePattern(search: SubSearch): RegExp | null {
  try {
    return new RegExp(search.pattern, 'g');
  } catch (error) {
    logger.warn(`Invalid page search regex '${search.pattern}': ${describeError(error)}`);
    return null;
  }
}

export function findUrlInPage(page: string, search: SubSearch): string | null {
  const pattern = compilePattern(search);
  if (!pattern) {
    return null;
  }

  let matched = false;
  for (const match of page.matchAll(pattern)) {
    matched = true;
    const candidate = match[0];
    if (isAbsoluteUrl(candidate)) {
      return candidate.replaceAll('&amp;', '&');
    }
    logger.debug(`Not a valid url: ${candidate}`);
  }

  if (!matched) {
    logger.debug(`No matches for regex '${search.pattern}'`);
  }
  return null;
}

export async function extractPageUrls(url: string, rule: LinkRule, fetcher: Fetcher): Promise<string[]> {
  if (rule.subSearches.length === 0) {
    return [];
  }

  let page: string;
  try {
    page = await fetcher.fetchText(url);
  } catch (error) {
    logger.warn(`Error fetching page ${url} for rule ${rule.baseUrl}: ${describeError(error)}`);
    return [];
  }

  const urls: string[] = [];
  for (const search of rule.subSearches) {
    if (search.extension && !endsWithExtension(url, search.extension)) {
      continue;
    }

    const found = findUrlInPage(page, search);
    if (found && !urls.includes(found)) {
      urls.push(found);
    }
  }

  return urls;
}
