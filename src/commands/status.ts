import { Command } from 'commander';
import chalk from 'chalk';
import { DB_PATH } from '../db/index.js';
import { getSchemaVersion } from '../db/migrations.js';
import type { StoreStats } from '../services/store.js';
import { getWorkbench, printJson, type JsonOption } from './shared.js';
import type { Workbench } from '../services/workbench.js';

interface StatusData {
  database: {
    path: string;
    schemaVersion: number;
  };
  store: StoreStats;
  lastFetchedAt: string | null;
  digests: { scopeKey: string; articleCount: number; generatedAt: string }[];
  ai: {
    provider: string;
    available: boolean;
    language: string;
    persona: boolean;
  };
  workers: {
    concurrency: number;
    timeoutMs: number;
  };
}

function getStatusData(wb: Workbench): StatusData {
  let lastFetchedAt: string | null = null;
  for (const feed of wb.feeds()) {
    if (feed.last_fetched_at && (!lastFetchedAt || feed.last_fetched_at > lastFetchedAt)) {
      lastFetchedAt = feed.last_fetched_at;
    }
  }

  return {
    database: {
      path: DB_PATH,
      schemaVersion: getSchemaVersion(wb.store.db),
    },
    store: wb.store.stats(),
    lastFetchedAt,
    digests: wb.cache.listDigests().map((d) => ({
      scopeKey: d.scope_key,
      articleCount: d.article_count,
      generatedAt: d.generated_at,
    })),
    ai: {
      provider: wb.llm.provider.name,
      available: wb.llm.isAvailable(),
      language: wb.settings.language,
      persona: Boolean(wb.settings.persona),
    },
    workers: {
      concurrency: wb.tasks.concurrency,
      timeoutMs: wb.settings.taskTimeoutMs,
    },
  };
}

function formatDateTime(isoString: string | null): string {
  if (!isoString) return 'never';
  return new Date(isoString).toLocaleString();
}

function printColoredStatus(data: StatusData): void {
  console.log(chalk.bold.cyan('\nfeedmind status'));
  console.log(chalk.gray('-'.repeat(60)));

  console.log(chalk.bold('\nStore'));
  console.log(`  Feeds:      ${chalk.yellow(data.store.feeds)}`);
  console.log(`  Articles:   ${chalk.yellow(data.store.articles)} (${chalk.green(data.store.unread)} unread)`);
  console.log(`  Bookmarks:  ${chalk.yellow(data.store.bookmarks)}`);
  console.log(`  Tags:       ${chalk.yellow(data.store.tags)}`);
  console.log(`  Last fetch: ${chalk.gray(formatDateTime(data.lastFetchedAt))}`);

  console.log(chalk.bold('\nCached digests'));
  if (data.digests.length === 0) {
    console.log(chalk.gray('  none'));
  }
  for (const digest of data.digests) {
    console.log(`  ${chalk.cyan(digest.scopeKey)}: ${digest.articleCount} articles, ${chalk.gray(formatDateTime(digest.generatedAt))}`);
  }

  console.log(chalk.bold('\nAI'));
  const availability = data.ai.available ? chalk.green('available') : chalk.red('not configured');
  console.log(`  Provider: ${data.ai.provider} (${availability})`);
  console.log(`  Language: ${data.ai.language}`);
  console.log(`  Persona:  ${data.ai.persona ? 'set' : chalk.gray('not set')}`);
  console.log(`  Workers:  ${data.workers.concurrency}, timeout ${data.workers.timeoutMs}ms`);

  console.log(chalk.bold('\nDatabase'));
  console.log(`  ${chalk.gray(data.database.path)} (schema v${data.database.schemaVersion})`);

  console.log(chalk.gray('\n' + '-'.repeat(60)));
  console.log(chalk.gray('Use --json for machine-readable output\n'));
}

export function createStatusCommand(): Command {
  return new Command('status')
    .description('Show store statistics, cached digests and AI configuration')
    .option('--json', 'Output as JSON')
    .action((options: JsonOption) => {
      const data = getStatusData(getWorkbench());

      if (options.json) {
        printJson(data);
      } else {
        printColoredStatus(data);
      }
    });
}
