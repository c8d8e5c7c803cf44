import { Command } from 'commander';
import chalk from 'chalk';
import { logger } from '../utils/logger.js';
import type { TagCount } from '../models/bookmark.js';
import { getWorkbench, parseId, printJson, reportError, type JsonOption } from './shared.js';

function displayTag(tag: TagCount): void {
  console.log(`  ${chalk.cyan(`#${tag.tag.padEnd(20)}`)} ${chalk.blue(`${tag.count} bookmarks`)}`);
}

export function createTagCommand(): Command {
  const tag = new Command('tag').description('Manage bookmark tags');

  tag
    .command('list')
    .description('List tags with their bookmark counts')
    .option('-n, --limit <limit>', 'Number of tags to show')
    .option('--json', 'Output as JSON')
    .action((options: JsonOption & { limit?: string }) => {
      try {
        let tags = getWorkbench().tags();
        if (options.limit) {
          tags = tags.slice(0, parseId(options.limit, 'limit'));
        }

        if (options.json) {
          printJson(tags);
          return;
        }

        if (tags.length === 0) {
          logger.info('No tags yet. Use "feedmind tag set <id> <tags...>" on a bookmark.');
          return;
        }

        console.log(chalk.bold.green('\nTags\n'));
        for (const t of tags) {
          displayTag(t);
        }
        console.log(chalk.gray(`\n${tags.length} tags`));
      } catch (error) {
        reportError(error, options);
      }
    });

  tag
    .command('set')
    .description('Replace the tags of a bookmarked article (no tags clears them)')
    .argument('<id>', 'Article ID')
    .argument('[tags...]', 'Tags, separated by spaces or commas')
    .option('--json', 'Output as JSON')
    .action((id: string, tags: string[], options: JsonOption) => {
      try {
        const stored = getWorkbench().setTags(id, tags.flatMap((t) => t.split(',')));
        if (options.json) {
          printJson({ id, tags: stored });
        } else if (stored.length > 0) {
          logger.success(`Tags for ${id}: ${stored.map((t) => `#${t}`).join(' ')}`);
        } else {
          logger.success(`Tags cleared for ${id}`);
        }
      } catch (error) {
        reportError(error, options);
      }
    });

  return tag;
}

export function createMemoCommand(): Command {
  return new Command('memo')
    .description('Set the memo of a bookmarked article (no text clears it)')
    .argument('<id>', 'Article ID')
    .argument('[text...]', 'Memo text')
    .option('--json', 'Output as JSON')
    .action((id: string, text: string[], options: JsonOption) => {
      try {
        const memo = text.join(' ').trim() || null;
        getWorkbench().setMemo(id, memo);
        if (options.json) {
          printJson({ id, memo });
        } else {
          logger.success(memo ? `Memo saved for ${id}` : `Memo cleared for ${id}`);
        }
      } catch (error) {
        reportError(error, options);
      }
    });
}
