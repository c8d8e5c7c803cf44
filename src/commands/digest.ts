import { Command } from 'commander';
import chalk from 'chalk';
import type { DigestScope } from '../models/digest.js';
import { awaitTask, getWorkbench, parseId, printJson, reportError, type JsonOption } from './shared.js';

interface DigestOptions extends JsonOption {
  tag?: string;
  recent?: string | boolean;
  force?: boolean;
}

export function createDigestCommand(): Command {
  return new Command('digest')
    .description('Summarize bookmarks (default) or recent articles with AI; reuses the cached digest while its articles are unchanged')
    .option('-t, --tag <tag>', 'Only bookmarks with this tag')
    .option('-r, --recent [days]', 'Digest articles from the last N days instead of bookmarks')
    .option('--force', 'Regenerate even if the cached digest is current')
    .option('--json', 'Output as JSON')
    .action(async (options: DigestOptions) => {
      try {
        const wb = getWorkbench();
        let scope: DigestScope;
        if (options.recent !== undefined && options.recent !== false) {
          const days = options.recent === true ? wb.settings.digestDays : parseId(options.recent, 'days');
          scope = { kind: 'recent', days };
        } else {
          scope = { kind: 'bookmarks', tag: options.tag };
        }

        const result = await awaitTask(wb.requestDigest(scope, { force: options.force }), 'Generating digest', options);
        if (!result) return;

        if (options.json) {
          printJson(result);
          return;
        }

        console.log();
        console.log(chalk.bold(`Digest ${chalk.cyan(result.scopeKey)}`) + chalk.dim(` (${result.articleCount} articles${result.fromCache ? ', cached' : ''})`));
        console.log();
        console.log(result.text);
        console.log();
      } catch (error) {
        reportError(error, options);
      }
    });
}
