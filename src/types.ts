export const SORT_TYPES = ['hot', 'new', 'top', 'controversial', 'rising', 'random', 'random_rising', 'stream'] as const;
export const REDDITOR_SORT_TYPES = ['hot', 'new', 'top', 'controversial', 'stream'] as const;
export const SORT_TOGGLES = ['hour', 'day', 'week', 'month', 'year', 'all'] as const;
export const STORE_TYPES = ['nested', 'flat', 'really-flat'] as const;
export const FAVOR_ENTITIES = ['redditor', 'subreddit', 'disabled'] as const;
export const MEDIA_KINDS = ['images', 'videos', 'unknown'] as const;

export type SortType = (typeof SORT_TYPES)[number];
export type SortToggle = (typeof SORT_TOGGLES)[number];
export type StoreType = (typeof STORE_TYPES)[number];
export type FavorEntity = (typeof FAVOR_ENTITIES)[number];
export type MediaKind = (typeof MEDIA_KINDS)[number];

export const UNKNOWN_AUTHOR = 'unknown';

export type RawPayload = Record<string, unknown>;

export interface Post {
  readonly id: string;
  readonly title: string;
  readonly author: string;
  readonly subreddit: string;
  readonly url: string;
  readonly selftext: string;
  readonly createdAt: Date;
  readonly over18: boolean;
  readonly raw: RawPayload;
}

export interface SubSearch {
  readonly extension?: string;
  readonly pattern: string;
}

export interface LinkRule {
  readonly baseUrl: string;
  readonly directExtensions: readonly string[];
  readonly subSearches: readonly SubSearch[];
}

export interface SearchCriteria {
  readonly sortType: SortType;
  // Only set for 'top' and 'controversial'
  readonly sortToggle?: SortToggle;
  readonly postLimit: number;
}

interface EntityBase {
  readonly name: string;
  readonly alias: string;
  readonly storeType: StoreType;
  readonly criteria: SearchCriteria;
}

export interface Redditor extends EntityBase {
  readonly kind: 'redditor';
}

export interface Subreddit extends EntityBase {
  readonly kind: 'subreddit';
}

export type TrackedEntity = Redditor | Subreddit;

export interface IgnoreEntries {
  readonly redditors: readonly string[];
  readonly subreddits: readonly string[];
}

export interface HarvestConfig {
  app: string;
  username: string;
  password?: string;
  clientId?: string;
  clientSecret?: string;
  postLimit: number;
  rateLimitMaxWait: number;
  backoffSleep: number;
  downloadFolder: string;
  separateMedia: boolean;
  allowAdultContent: boolean;
  pruneIgnorables: boolean;
  favorEntity: FavorEntity;
  concurrency: number;
  timeout: number;
  redditors: Redditor[];
  subreddits: Subreddit[];
  ignored: IgnoreEntries;
  links: LinkRule[];
}

export type RetrievalStatus = 'new-saved' | 'already-saved' | 'not-saved' | 'ignored' | 'age-restricted';

export interface RetrievalOutcome {
  status: RetrievalStatus;
  sourceUrl: string;
  localFile?: string;
  digest?: string;
}

export interface DownloadProgress {
  received: number;
  total?: number;
}

export interface Fetcher {
  fetchBytes(url: string, onProgress?: (progress: DownloadProgress) => void): Promise<Buffer>;
  fetchText(url: string): Promise<string>;
}

export interface RateLimits {
  remaining?: number;
  used?: number;
  resetAt?: Date;
}

export interface PostSource {
  validate(entity: TrackedEntity): Promise<boolean>;
  // `signal` ends open-ended listings such as the 'stream' sort.
  posts(entity: TrackedEntity, signal?: AbortSignal): AsyncIterable<Post>;
  rateLimits(): RateLimits;
}
