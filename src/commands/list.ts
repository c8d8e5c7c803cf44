import { Command } from 'commander';
import chalk from 'chalk';
import { logger } from '../utils/logger.js';
import type { ArticleFilter, ArticleWithFeed } from '../models/article.js';
import { getWorkbench, parseId, printJson, reportError, type JsonOption } from './shared.js';

interface ListOptions extends JsonOption {
  feed?: string;
  unread?: boolean;
  bookmarked?: boolean;
  tag?: string;
  search?: string;
  limit: string;
}

export function formatArticle(article: ArticleWithFeed, showDetail = false): void {
  const date = article.published_at
    ? new Date(article.published_at).toLocaleDateString()
    : 'Unknown date';

  let status = article.is_read ? chalk.dim(' ○') : chalk.green(' ●');
  if (article.is_bookmarked) {
    status += chalk.yellow(' ★');
  }

  const title = article.translated_title ?? article.title;
  console.log(`  ${chalk.cyan(article.id)} ${title}${status}`);
  console.log(`       ${chalk.dim(`[${article.feed_name}]`)} ${chalk.dim(date)}`);

  if (showDetail) {
    if (article.translated_title) {
      console.log(`       ${chalk.dim(article.title)}`);
    }
    console.log(`       ${chalk.blue(article.link)}`);
    const description = article.translated_description || article.description;
    if (description) {
      console.log(`       ${description}`);
    }
    if (article.insight) {
      console.log(`       ${chalk.yellow('Insight:')} ${article.insight}`);
    }
  }

  console.log();
}

export function createListCommand(): Command {
  return new Command('list')
    .description('List articles, newest first')
    .option('-f, --feed <id>', 'Only articles from this feed')
    .option('-u, --unread', 'Only unread articles')
    .option('-b, --bookmarked', 'Only bookmarked articles')
    .option('-t, --tag <tag>', 'Only bookmarks with this tag')
    .option('-s, --search <keyword>', 'Search title, description, insight and translations')
    .option('-l, --limit <n>', 'Maximum number of articles', '30')
    .option('--json', 'Output as JSON')
    .action((options: ListOptions) => {
      try {
        const filter: ArticleFilter = {
          feedId: options.feed ? parseId(options.feed, 'feed id') : undefined,
          unreadOnly: options.unread,
          bookmarkedOnly: options.bookmarked,
          tag: options.tag,
          search: options.search,
          limit: parseId(options.limit, 'limit'),
        };
        const articles = getWorkbench().articles(filter);

        if (options.json) {
          printJson(articles);
          return;
        }

        if (articles.length === 0) {
          logger.info('No articles found');
          return;
        }

        console.log();
        console.log(chalk.bold(`Articles (${articles.length}):`));
        console.log();
        for (const article of articles) {
          formatArticle(article);
        }
      } catch (error) {
        reportError(error, options);
      }
    });
}

export function createReadCommand(): Command {
  return new Command('read')
    .description('Show an article and mark it as read')
    .argument('<id>', 'Article ID')
    .option('--unread', 'Mark as unread instead')
    .option('--json', 'Output as JSON')
    .action((id: string, options: JsonOption & { unread?: boolean }) => {
      try {
        const wb = getWorkbench();
        wb.setRead(id, !options.unread);
        const article = wb.article(id);
        if (!article) {
          throw new Error(`Article not found: ${id}`);
        }

        if (options.json) {
          printJson(article);
          return;
        }

        console.log();
        formatArticle(article, true);
        if (article.translated_body) {
          console.log(chalk.bold('Translation:'));
          console.log(article.translated_body);
          console.log();
        }
      } catch (error) {
        reportError(error, options);
      }
    });
}
