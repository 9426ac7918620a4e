#!/usr/bin/env node

import { Command } from 'commander';
import { promises as fs } from 'fs';
import path from 'path';
import { createInterface } from 'readline/promises';
import { fileURLToPath } from 'url';
import { DEFAULT_CONFIG_FILE, expandHome, loadConfig } from './config.js';
import { ContentStore } from './content-store.js';
import { Downloader } from './downloader.js';
import { ConfigError, describeError } from './errors.js';
import { Harvester } from './harvester.js';
import { RedditSource, buildUserAgent } from './reddit-source.js';
import { Retriever } from './retriever.js';
import { logger } from './utils/logger.js';
import { pathExists } from './utils/file-utils.js';

const VERSION = '1.0.0';
const EXAMPLE_CONFIG = fileURLToPath(new URL('../assets/example.yml', import.meta.url));

interface RunOptions {
  config: string;
  subredditsOnly: boolean;
  redditorsOnly: boolean;
  onlyName?: string;
  interactive: boolean;
  verbose: boolean;
}

const program = new Command();

program
  .name('redd-harvest')
  .description('Download media from the posts of tracked redditors and subreddits')
  .version(VERSION);

program
  .command('run', { isDefault: true })
  .description('Run the harvester')
  .option('-c, --config <file>', 'Path to config file', DEFAULT_CONFIG_FILE)
  .option('-s, --subreddits-only', 'Only download from configured subreddits', false)
  .option('-r, --redditors-only', 'Only download from configured redditors', false)
  .option('-o, --only-name <name>', 'Only download from the configured entity with this name')
  .option('-i, --interactive', 'Ask before pruning and before quitting on Ctrl+C', false)
  .option('-v, --verbose', 'Verbose output', false)
  .action(runAction);

program
  .command('setup')
  .description('Write an example config to the default location')
  .action(setupAction);

await program.parseAsync();

async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  rl.on('SIGINT', () => {
    logger.warn('OK, quitting now');
    process.exit(1);
  });
  try {
    const answer = await rl.question(question);
    return answer.trim().toLowerCase().startsWith('y');
  } finally {
    rl.close();
  }
}

function handleInterrupts(controller: AbortController, interactive: boolean): void {
  process.on('SIGINT', () => {
    if (controller.signal.aborted) {
      logger.warn('Interrupted twice, quitting now');
      process.exit(1);
    }
    if (!interactive) {
      controller.abort();
      return;
    }
    confirm('Do you really want to exit? (y/n): ').then(
      (quit) => {
        if (quit) controller.abort();
      },
      (error: unknown) => {
        logger.error(`Prompt failed: ${describeError(error)}`);
        controller.abort();
      }
    );
  });
}

async function runAction(options: RunOptions) {
  logger.setVerbose(options.verbose);
  logger.info(`Using config file: ${expandHome(options.config)}`);

  try {
    const config = await loadConfig(options.config);
    if (!config.clientId || !config.clientSecret) {
      throw new ConfigError('client_id and client_secret are required configurations');
    }

    logger.info(`Download folder: ${config.downloadFolder}`);
    logger.info(`Tracking ${config.redditors.length} redditors and ${config.subreddits.length} subreddits`);
    logger.info(`Link rules: ${config.links.map(link => link.baseUrl).join(', ') || 'none'}`);
    if (config.separateMedia) {
      logger.info('Separating media by kind: enabled');
    }

    const userAgent = buildUserAgent(config.app, VERSION, config.username);
    logger.debug(`Constructed user-agent: '${userAgent}'`);
    if (!config.password) {
      logger.info('Password not defined, continuing with application-only auth');
    }

    const source = new RedditSource({
      credentials: {
        clientId: config.clientId,
        clientSecret: config.clientSecret,
        username: config.username,
        password: config.password
      },
      userAgent,
      rateLimitMaxWait: config.rateLimitMaxWait
    });
    const store = new ContentStore({ root: config.downloadFolder, separateMedia: config.separateMedia });
    const retriever = new Retriever(config, new Downloader({ timeout: config.timeout }), store);
    const harvester = new Harvester(config, source, retriever);

    const controller = new AbortController();
    handleInterrupts(controller, options.interactive);

    const summary = await harvester.harvest({
      signal: controller.signal,
      subredditsOnly: options.subredditsOnly,
      redditorsOnly: options.redditorsOnly,
      onlyName: options.onlyName,
      confirmPrune: options.interactive
        ? () => confirm('Configured to prune content from ignorable entities, continue? (y/n): ')
        : undefined
    });

    console.log('');
    logger.info('=== Summary ===');
    logger.info(`Entities: ${summary.entities}`);
    logger.info(`Posts: ${summary.posts}`);
    for (const [status, count] of Object.entries(summary.outcomes)) {
      logger.info(`${status}: ${count}`);
    }
    if (summary.pruned.length > 0) {
      logger.info(`Pruned folders: ${summary.pruned.length}`);
    }
    process.exit(0);
  } catch (error) {
    logger.error(`Fatal error: ${describeError(error)}`);
    process.exit(1);
  }
}

async function setupAction() {
  const configFile = expandHome(DEFAULT_CONFIG_FILE);

  if (await pathExists(configFile)) {
    logger.warn(`Config '${configFile}' already exists, no action taken`);
    process.exitCode = 1;
    return;
  }

  await fs.mkdir(path.dirname(configFile), { recursive: true, mode: 0o700 });
  await fs.copyFile(EXAMPLE_CONFIG, configFile);
  await fs.chmod(configFile, 0o600);
  logger.success(`Wrote example configuration to '${configFile}'`);
}
