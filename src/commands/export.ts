import { Command } from 'commander';
import { resolve } from 'path';
import { exportMarkdown } from '../services/export.js';
import { logger } from '../utils/logger.js';
import { getWorkbench, printJson, reportError, spinner, type JsonOption } from './shared.js';

export function createExportCommand(): Command {
  return new Command('export')
    .description('Write bookmarks and cached digests as Markdown notes')
    .option('-d, --dir <dir>', 'Output directory (defaults to export_dir)')
    .option('--json', 'Output as JSON')
    .action((options: JsonOption & { dir?: string }) => {
      const spin = spinner('Exporting...', options.json);
      try {
        const wb = getWorkbench();
        const dir = resolve(options.dir ?? wb.settings.exportDir);
        const summary = exportMarkdown(wb.store, wb.cache, dir);
        spin.succeed(`Exported ${summary.bookmarks.length} bookmarks and ${summary.digests.length} digests to ${dir}`);

        if (options.json) {
          printJson(summary);
        } else if (summary.failed > 0) {
          logger.warn(`${summary.failed} files could not be written`);
        }
        if (summary.failed > 0) {
          process.exitCode = 1;
        }
      } catch (error) {
        reportError(error, options, spin);
      }
    });
}
