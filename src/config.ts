import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigError, describeError } from './errors.js';
import {
  FAVOR_ENTITIES,
  HarvestConfig,
  LinkRule,
  REDDITOR_SORT_TYPES,
  Redditor,
  SORT_TOGGLES,
  SORT_TYPES,
  STORE_TYPES,
  SearchCriteria,
  SortToggle,
  SortType,
  StoreType,
  Subreddit
} from './types.js';

export const DEFAULT_CONFIG_FILE = path.join('~', '.config', 'redd-harvest', 'config.yml');
export const DEFAULT_DOWNLOAD_FOLDER = path.join('~', '.redd-harvest', 'data');
export const DEFAULT_POST_LIMIT = 5;

export function expandHome(target: string): string {
  if (target === '~') return os.homedir();
  if (target.startsWith('~/') || target.startsWith(`~${path.sep}`)) {
    return path.join(os.homedir(), target.slice(2));
  }
  return target;
}

const lowerCased = (value: unknown) => (typeof value === 'string' ? value.trim().toLowerCase() : value);

// Unsupported or missing enum values fall back to a default instead of failing.
const sortTypeField = z.preprocess(lowerCased, z.enum(SORT_TYPES)).catch('new');
const redditorSortTypeField = z.preprocess(lowerCased, z.enum(REDDITOR_SORT_TYPES)).catch('new');
const sortToggleField = z.preprocess(lowerCased, z.enum(SORT_TOGGLES)).catch('week');
const favorEntityField = z.preprocess(lowerCased, z.enum(FAVOR_ENTITIES)).catch('redditor');
const storeTypeField = (fallback: StoreType) => z.preprocess(lowerCased, z.enum(STORE_TYPES)).catch(fallback);

const lenientBoolean = (fallback: boolean) => z.boolean().catch(fallback);

const globalsSchema = z.object({
  app: z.string().default('redd-harvest'),
  username: z.string().default('unknown'),
  password: z.string().nullish(),
  client_id: z.string().nullish(),
  client_secret: z.string().nullish(),
  post_limit: z.number().int().positive().default(DEFAULT_POST_LIMIT),
  rate_limit_max_wait: z.number().nonnegative().default(120),
  backoff_sleep: z.number().nonnegative().default(0.1),
  download_folder: z.string().min(1).default(DEFAULT_DOWNLOAD_FOLDER),
  separate_media: lenientBoolean(false),
  allow_adult_content: lenientBoolean(false),
  prune_ignorables: lenientBoolean(false),
  favor_entity: favorEntityField,
  concurrency: z.number().int().positive().default(1),
  timeout: z.number().positive().default(8)
});

const entityFields = {
  name: z.string().trim().min(1),
  alias: z.string().trim().min(1).nullish()
};

// Redditor listings only support a subset of the sort types.
const redditorSchema = z.object({
  ...entityFields,
  store_type: storeTypeField('flat'),
  search_criteria: z.object({
    post_limit: z.number().int().positive().optional(),
    sort_type: redditorSortTypeField,
    sort_toggle: sortToggleField
  }).nullish()
});

const subredditSchema = z.object({
  ...entityFields,
  store_type: storeTypeField('nested'),
  search_criteria: z.object({
    post_limit: z.number().int().positive().optional(),
    sort_type: sortTypeField,
    sort_toggle: sortToggleField
  }).nullish()
});

const ignoreSchema = z.union([z.string(), z.object({ name: z.string() })])
  .transform(entry => (typeof entry === 'string' ? entry : entry.name).trim());

// Blank entries are dropped: joined onto an alias they would name the tracked folder itself.
const ignoreList = z.array(ignoreSchema).nullish()
  .transform(names => (names ?? []).filter(name => name.length > 0));

const linkSchema = z.object({
  base_url: z.string().min(1),
  direct_dl_url_extensions: z.array(z.string()).nullish(),
  sub_searches: z.array(z.object({
    extension: z.string().nullish(),
    page_search_regex: z.string().nullish()
  })).nullish()
});

const list = <T extends z.ZodTypeAny>(item: T) =>
  z.array(item).nullish().transform(items => items ?? []);

const configSchema = z.object({
  globals: globalsSchema.nullish().transform(globals => globals ?? globalsSchema.parse({})),
  redditors: list(redditorSchema),
  subreddits: list(subredditSchema),
  ignored_redditors: ignoreList,
  ignored_subreddits: ignoreList,
  links: list(linkSchema)
});

type RawEntity = z.infer<typeof redditorSchema> | z.infer<typeof subredditSchema>;

function buildCriteria(raw: RawEntity['search_criteria'], defaultLimit: number, sortType: SortType): SearchCriteria {
  const toggled = sortType === 'top' || sortType === 'controversial';
  let sortToggle: SortToggle | undefined;
  if (toggled) {
    sortToggle = raw?.sort_toggle ?? 'week';
  }
  return {
    sortType,
    sortToggle,
    postLimit: raw?.post_limit ?? defaultLimit
  };
}

function stripDot(ext: string): string {
  return ext.trim().replace(/^\./, '').toLowerCase();
}

function buildLink(raw: z.infer<typeof linkSchema>): LinkRule {
  return {
    baseUrl: raw.base_url.trim(),
    directExtensions: (raw.direct_dl_url_extensions ?? []).map(stripDot).filter(ext => ext.length > 0),
    subSearches: (raw.sub_searches ?? []).flatMap(search => {
      if (!search.page_search_regex) return [];
      const extension = search.extension ? stripDot(search.extension) : undefined;
      return [{ pattern: search.page_search_regex, ...(extension ? { extension } : {}) }];
    })
  };
}

/** Builds a harvest configuration from an already-parsed YAML document. */
export function parseConfig(document: unknown, source?: string): HarvestConfig {
  const result = configSchema.safeParse(document ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration${source ? ` in ${source}` : ''}: ${issues}`, source);
  }

  const { globals, redditors, subreddits, ignored_redditors, ignored_subreddits, links } = result.data;
  const postLimit = globals.post_limit;

  return {
    app: globals.app,
    username: globals.username,
    password: globals.password ?? undefined,
    clientId: globals.client_id ?? undefined,
    clientSecret: globals.client_secret ?? undefined,
    postLimit,
    rateLimitMaxWait: globals.rate_limit_max_wait,
    backoffSleep: globals.backoff_sleep,
    downloadFolder: path.resolve(expandHome(globals.download_folder)),
    separateMedia: globals.separate_media,
    allowAdultContent: globals.allow_adult_content,
    pruneIgnorables: globals.prune_ignorables,
    favorEntity: globals.favor_entity,
    concurrency: globals.concurrency,
    timeout: globals.timeout,
    redditors: redditors.map((raw): Redditor => ({
      kind: 'redditor',
      name: raw.name,
      alias: raw.alias ?? raw.name,
      storeType: raw.store_type,
      criteria: buildCriteria(raw.search_criteria, postLimit, raw.search_criteria?.sort_type ?? 'new')
    })),
    subreddits: subreddits.map((raw): Subreddit => ({
      kind: 'subreddit',
      name: raw.name,
      alias: raw.alias ?? raw.name,
      storeType: raw.store_type,
      criteria: buildCriteria(raw.search_criteria, postLimit, raw.search_criteria?.sort_type ?? 'new')
    })),
    ignored: {
      redditors: ignored_redditors,
      subreddits: ignored_subreddits
    },
    links: links.map(buildLink)
  };
}

export async function loadConfig(file: string): Promise<HarvestConfig> {
  const resolved = path.resolve(expandHome(file));

  let text: string;
  try {
    text = await fs.readFile(resolved, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${resolved}: ${describeError(error)}`, resolved);
  }

  let document: unknown;
  try {
    document = YAML.parse(text);
  } catch (error) {
    throw new ConfigError(`Cannot parse config file ${resolved}: ${describeError(error)}`, resolved);
  }

  return parseConfig(document, resolved);
}
