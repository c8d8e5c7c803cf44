import { Command } from 'commander';
import chalk from 'chalk';
import { awaitTask, getWorkbench, printJson, reportError, type JsonOption } from './shared.js';

interface ForceOptions extends JsonOption {
  force?: boolean;
}

export function createInsightCommand(): Command {
  return new Command('insight')
    .description('Generate an AI insight for an article')
    .argument('<id>', 'Article ID')
    .option('--force', 'Regenerate even if an insight exists')
    .option('--json', 'Output as JSON')
    .action(async (id: string, options: ForceOptions) => {
      try {
        const result = await awaitTask(getWorkbench().requestInsight(id, { force: options.force }), 'Generating insight', options);
        if (!result) return;

        if (options.json) {
          printJson({ id, ...result });
          return;
        }
        console.log();
        console.log(`${chalk.yellow('Insight:')} ${result.text}${result.fromCache ? chalk.dim(' (cached)') : ''}`);
      } catch (error) {
        reportError(error, options);
      }
    });
}

export function createTranslateCommand(): Command {
  return new Command('translate')
    .description('Translate an article title and description into the configured language')
    .argument('<id>', 'Article ID')
    .option('-b, --body', 'Fetch and translate the full article body')
    .option('--force', 'Translate again even if a translation exists')
    .option('--json', 'Output as JSON')
    .action(async (id: string, options: ForceOptions & { body?: boolean }) => {
      try {
        const wb = getWorkbench();

        if (options.body) {
          const result = await awaitTask(wb.requestBodyTranslation(id, { force: options.force }), 'Translating article body', options);
          if (!result) return;
          if (options.json) {
            printJson({ id, ...result });
          } else {
            console.log();
            console.log(result.text);
          }
          return;
        }

        const result = await awaitTask(wb.requestTranslation(id, { force: options.force }), 'Translating', options);
        if (!result) return;
        if (options.json) {
          printJson({ id, ...result });
          return;
        }
        console.log();
        console.log(chalk.bold(result.translation.title));
        if (result.translation.description) {
          console.log(result.translation.description);
        }
      } catch (error) {
        reportError(error, options);
      }
    });
}
