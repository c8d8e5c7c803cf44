import { Command } from 'commander';
import chalk from 'chalk';
import { logger } from '../utils/logger.js';
import { awaitTask, getWorkbench, parseId, printJson, reportError, type JsonOption } from './shared.js';

interface UpdateOptions extends JsonOption {
  feed?: string;
}

export function createUpdateCommand(): Command {
  const update = new Command('update')
    .description('Fetch updates from RSS feeds')
    .option('-f, --feed <id>', 'Update specific feed by ID')
    .option('--json', 'Output as JSON')
    .action(async (options: UpdateOptions) => {
      try {
        const feedId = options.feed ? parseId(options.feed, 'feed id') : undefined;
        const results = await awaitTask(getWorkbench().refresh(feedId), 'Fetching updates', options);
        if (!results) return;

        if (options.json) {
          printJson(results);
          return;
        }

        console.log();
        console.log(chalk.bold('Update Results:'));
        console.log();

        let totalNew = 0;
        let hasErrors = false;

        for (const result of results) {
          if (result.error) {
            console.log(`  ${chalk.red('✗')} ${result.feedName}: ${chalk.red(result.error)}`);
            hasErrors = true;
          } else {
            totalNew += result.newCount;
            const countText =
              result.newCount > 0
                ? chalk.green(`+${result.newCount} new`)
                : chalk.dim('no new articles');
            console.log(`  ${chalk.green('✓')} ${result.feedName}: ${countText}`);
          }
        }

        console.log();
        if (totalNew > 0) {
          logger.success(`Total: ${totalNew} new articles`);
        } else if (results.length === 0) {
          logger.info('No feeds to update. Use "feedmind feed add <url>" first.');
        } else {
          logger.info('No new articles found');
        }

        if (hasErrors) {
          logger.warn('Some feeds failed to update');
          process.exitCode = 1;
        }
      } catch (error) {
        reportError(error, options);
      }
    });

  return update;
}
