#!/usr/bin/env node

import 'dotenv/config';
import { Command, CommanderError } from 'commander';
import { createFeedCommand } from './commands/feed.js';
import { createUpdateCommand } from './commands/update.js';
import { createListCommand, createReadCommand } from './commands/list.js';
import { createBookmarkCommand } from './commands/bookmark.js';
import { createMemoCommand, createTagCommand } from './commands/tag.js';
import { createInsightCommand, createTranslateCommand } from './commands/insight.js';
import { createDigestCommand } from './commands/digest.js';
import { createExportCommand } from './commands/export.js';
import { createNotionCommand } from './commands/notion.js';
import { createConfigCommand } from './commands/config.js';
import { createStatusCommand } from './commands/status.js';
import { closeWorkbench } from './commands/shared.js';
import { closeDb } from './db/index.js';
import { SchemaFault, errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';

const program = new Command();

program
  .name('feedmind')
  .description('RSS reader with AI insights, translations and bookmark digests')
  .version('0.1.0')
  .option('--debug', 'Print debug logs to stderr')
  .hook('preAction', (thisCommand, actionCommand) => {
    if (thisCommand.opts<{ debug?: boolean }>().debug) {
      logger.setDebug(true);
    }
    if (actionCommand.opts<{ json?: boolean }>().json) {
      logger.setQuiet(true);
    }
  });

// 订阅与抓取
program.addCommand(createFeedCommand());
program.addCommand(createUpdateCommand());

// 阅读
program.addCommand(createListCommand());
program.addCommand(createReadCommand());
program.addCommand(createBookmarkCommand());
program.addCommand(createTagCommand());
program.addCommand(createMemoCommand());

// AI
program.addCommand(createInsightCommand());
program.addCommand(createTranslateCommand());
program.addCommand(createDigestCommand());

// 管理
program.addCommand(createExportCommand());
program.addCommand(createNotionCommand());
program.addCommand(createConfigCommand());
program.addCommand(createStatusCommand());

program.addHelpText('after', `
Command groups:
  Feeds      feed, update
  Reading    list, read, bookmark, tag, memo
  AI         insight, translate, digest
  Manage     export, notion, config, status
`);

// Handle errors
program.exitOverride();

try {
  await program.parseAsync(process.argv);
} catch (error) {
  if (error instanceof SchemaFault) {
    logger.error(`Database schema migration to v${error.version} failed: ${error.message}`);
    process.exitCode = 1;
  } else if (error instanceof CommanderError) {
    process.exitCode = error.exitCode;
  } else {
    logger.error(errorMessage(error));
    process.exitCode = 1;
  }
} finally {
  await closeWorkbench();
  closeDb();
}
