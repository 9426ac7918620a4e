import { logger } from './utils/logger.js';
import { extractDirectUrls, extractPageUrls, extractStructuredUrls } from './extractors.js';
import { Fetcher, LinkRule, Post } from './types.js';

export function findLinkRule(url: string, rules: readonly LinkRule[]): LinkRule | undefined {
  const lowerUrl = url.toLowerCase();
  return rules.find(rule => lowerUrl.startsWith(rule.baseUrl.toLowerCase()));
}

/**
 * Resolves the download URLs for a post. Only the first rule whose base URL
 * prefixes the post URL is consulted; its strategies run cheapest first and
 * the first non-empty result wins.
 */
export async function resolveDownloadUrls(
  post: Post,
  rules: readonly LinkRule[],
  fetcher: Fetcher
): Promise<string[]> {
  const rule = findLinkRule(post.url, rules);
  if (!rule) {
    logger.debug(`No link rule matches ${post.url} (post ${post.id})`);
    return [];
  }

  const direct = extractDirectUrls(post.url, rule);
  if (direct.length > 0) {
    return direct;
  }

  const structured = extractStructuredUrls(post);
  if (structured.length > 0) {
    return structured;
  }

  const scraped = await extractPageUrls(post.url, rule, fetcher);
  if (scraped.length === 0) {
    logger.debug(`Rule ${rule.baseUrl} found nothing for ${post.url} (post ${post.id})`);
  }
  return scraped;
}
