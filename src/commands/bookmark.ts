import { Command } from 'commander';
import chalk from 'chalk';
import { logger } from '../utils/logger.js';
import { getWorkbench, printJson, reportError, type JsonOption } from './shared.js';

export function createBookmarkCommand(): Command {
  return new Command('bookmark')
    .description('Toggle a bookmark, or list bookmarks when no ID is given')
    .argument('[id]', 'Article ID')
    .option('--json', 'Output as JSON')
    .action((id: string | undefined, options: JsonOption) => {
      try {
        const wb = getWorkbench();

        if (id) {
          const bookmarked = wb.toggleBookmark(id);
          if (options.json) {
            printJson({ id, bookmarked });
          } else {
            logger.success(bookmarked ? `Bookmarked ${id}` : `Removed bookmark ${id}`);
          }
          return;
        }

        const bookmarks = wb.bookmarks();
        if (options.json) {
          printJson(bookmarks);
          return;
        }

        if (bookmarks.length === 0) {
          logger.info('No bookmarks yet. Use "feedmind bookmark <id>" to add one.');
          return;
        }

        console.log();
        console.log(chalk.bold(`Bookmarks (${bookmarks.length}):`));
        console.log();
        for (const article of bookmarks) {
          console.log(`  ${chalk.cyan(article.id)} ${article.translated_title ?? article.title}`);
          console.log(`       ${chalk.dim(`[${article.feed_name}]`)} ${chalk.dim(new Date(article.bookmark.bookmarked_at).toLocaleDateString())}`);
          if (article.bookmark.tags.length > 0) {
            console.log(`       ${article.bookmark.tags.map((t) => chalk.cyan(`#${t}`)).join(' ')}`);
          }
          if (article.bookmark.memo) {
            console.log(`       ${chalk.gray('Memo:')} ${article.bookmark.memo}`);
          }
          console.log();
        }
      } catch (error) {
        reportError(error, options);
      }
    });
}
