import { Command } from 'commander';
import chalk from 'chalk';
import { resolve } from 'path';
import { readOpmlFile, writeOpmlFile } from '../services/opml.js';
import { rssService } from '../services/rss.js';
import { logger } from '../utils/logger.js';
import type { FeedWithCount } from '../models/feed.js';
import { formatDate, getWorkbench, parseId, printJson, reportError, spinner, type JsonOption } from './shared.js';

interface AddOptions extends JsonOption {
  name?: string;
  category?: string;
}

export function createFeedCommand(): Command {
  const feed = new Command('feed').description('Manage RSS feeds');

  feed
    .command('add')
    .description('Add a new RSS feed')
    .argument('<url>', 'Feed URL')
    .option('-n, --name <name>', 'Feed name (auto-detected if not provided)')
    .option('-c, --category <category>', 'Feed category')
    .option('--json', 'Output as JSON')
    .action(async (url: string, options: AddOptions) => {
      const spin = spinner('Adding feed...', options.json);

      try {
        const wb = getWorkbench();
        const existing = wb.store.getFeedByUrl(url);
        if (existing) {
          spin.fail('Feed already exists');
          if (options.json) {
            printJson({ error: 'Feed already exists', feed: existing });
          } else {
            logger.warn(`Feed already exists: ${existing.name} (id: ${existing.id})`);
          }
          return;
        }

        let name = options.name;
        if (!name) {
          spin.text = 'Detecting feed info...';
          const info = await rssService.detectFeedInfo(url);
          name = info?.title || new URL(url).hostname;
        }

        const added = wb.addFeed({ name, url, category: options.category });
        spin.succeed('Feed added successfully');

        if (options.json) {
          printJson(added);
        } else {
          console.log();
          console.log(`  ID:       ${chalk.cyan(added.id)}`);
          console.log(`  Name:     ${added.name}`);
          console.log(`  URL:      ${chalk.dim(added.url)}`);
          if (added.category) {
            console.log(`  Category: ${added.category}`);
          }
        }
      } catch (error) {
        reportError(error, options, spin);
      }
    });

  feed
    .command('remove')
    .description('Remove a feed with its articles and bookmarks')
    .argument('<id>', 'Feed ID')
    .option('--json', 'Output as JSON')
    .action((rawId: string, options: JsonOption) => {
      try {
        const success = getWorkbench().removeFeed(parseId(rawId, 'feed id'));
        if (options.json) {
          printJson({ success });
        } else if (success) {
          logger.success(`Feed removed: ${rawId}`);
        } else {
          logger.error(`Feed not found: ${rawId}`);
          process.exitCode = 1;
        }
      } catch (error) {
        reportError(error, options);
      }
    });

  feed
    .command('list')
    .description('List all RSS feeds')
    .option('-c, --category <category>', 'Filter by category')
    .option('--json', 'Output as JSON')
    .action((options: JsonOption & { category?: string }) => {
      const feeds = getWorkbench()
        .feeds()
        .filter((f) => !options.category || f.category === options.category);

      if (options.json) {
        printJson(feeds);
        return;
      }

      if (feeds.length === 0) {
        logger.info('No feeds found. Use "feedmind feed add <url>" to add one.');
        return;
      }

      console.log();
      console.log(chalk.bold(`RSS Feeds (${feeds.length}):`));
      console.log();

      const byCategory = new Map<string, FeedWithCount[]>();
      for (const f of feeds) {
        const cat = f.category || 'Uncategorized';
        const group = byCategory.get(cat) ?? [];
        group.push(f);
        byCategory.set(cat, group);
      }

      for (const [category, categoryFeeds] of byCategory) {
        console.log(chalk.yellow(`[${category}]`));
        for (const f of categoryFeeds) {
          console.log(`  ${chalk.cyan(f.id.toString().padStart(3))} ${f.name.padEnd(30)} ${chalk.dim(`${f.article_count} articles`)}`);
          console.log(`      ${chalk.dim(f.url)}`);
          console.log(`      Last fetch: ${chalk.dim(formatDate(f.last_fetched_at))}`);
        }
        console.log();
      }
    });

  feed
    .command('import')
    .description('Import feeds from an OPML file')
    .argument('<file>', 'OPML file path')
    .option('--json', 'Output as JSON')
    .action((file: string, options: JsonOption) => {
      try {
        const result = getWorkbench().importOpml(readOpmlFile(resolve(file)));
        if (options.json) {
          printJson(result);
          return;
        }
        logger.success(`Imported ${result.added.length} feeds (${result.skipped} already subscribed)`);
        for (const f of result.added) {
          console.log(`  ${chalk.cyan(f.id.toString().padStart(3))} ${f.name}`);
        }
        if (result.invalidated > 0) {
          logger.info(`Dropped ${result.invalidated} cached digests`);
        }
      } catch (error) {
        reportError(error, options);
      }
    });

  feed
    .command('export')
    .description('Export feeds as OPML 2.0')
    .argument('<file>', 'Output file path')
    .option('--json', 'Output as JSON')
    .action((file: string, options: JsonOption) => {
      try {
        const feeds = getWorkbench().feeds();
        const path = writeOpmlFile(resolve(file), feeds);
        if (options.json) {
          printJson({ path, count: feeds.length });
        } else {
          logger.success(`Exported ${feeds.length} feeds to ${path}`);
        }
      } catch (error) {
        reportError(error, options);
      }
    });

  return feed;
}
