import { Command } from 'commander';
import chalk from 'chalk';
import type { DigestScope } from '../models/digest.js';
import type { NotionSaveResult } from '../services/notion.js';
import { awaitTask, getWorkbench, parseId, printJson, reportError, spinner, type JsonOption } from './shared.js';

function printSaved(result: NotionSaveResult, options: JsonOption): void {
  if (options.json) {
    printJson(result);
    return;
  }
  console.log(`${chalk.green('Saved')} ${result.title} ${chalk.dim(`(page ${result.pageId})`)}`);
}

export function createNotionCommand(): Command {
  const notion = new Command('notion').description('Save articles and digests to Notion (notion_api_key plus a database or parent page)');

  notion
    .command('save')
    .description('Save an article, with its bookmark tags and memo, as a Notion page')
    .argument('<id>', 'Article ID')
    .option('--json', 'Output as JSON')
    .action(async (id: string, options: JsonOption) => {
      try {
        const result = await awaitTask(getWorkbench().saveToNotion(id), 'Saving to Notion', options);
        if (result) printSaved(result, options);
      } catch (error) {
        reportError(error, options);
      }
    });

  notion
    .command('digest')
    .description('Save the last generated digest of a scope as a Notion page')
    .option('-t, --tag <tag>', 'Digest of bookmarks with this tag')
    .option('-r, --recent [days]', 'Digest of recent articles instead of bookmarks')
    .option('--json', 'Output as JSON')
    .action(async (options: JsonOption & { tag?: string; recent?: string | boolean }) => {
      try {
        const wb = getWorkbench();
        let scope: DigestScope;
        if (options.recent !== undefined && options.recent !== false) {
          const days = options.recent === true ? wb.settings.digestDays : parseId(options.recent, 'days');
          scope = { kind: 'recent', days };
        } else {
          scope = { kind: 'bookmarks', tag: options.tag };
        }
        const result = await awaitTask(wb.saveDigestToNotion(scope), 'Saving digest to Notion', options);
        if (result) printSaved(result, options);
      } catch (error) {
        reportError(error, options);
      }
    });

  notion
    .command('check')
    .description('Check that the configured database or parent page is reachable')
    .option('--json', 'Output as JSON')
    .action(async (options: JsonOption) => {
      const spin = spinner('Checking Notion access...', options.json);
      try {
        const id = await getWorkbench().checkNotion();
        spin.succeed(`Notion target ${id} is reachable`);
        if (options.json) printJson({ ok: true, id });
      } catch (error) {
        reportError(error, options, spin);
      }
    });

  return notion;
}
