import { Command } from 'commander';
import chalk from 'chalk';
import { getDb } from '../db/index.js';
import { getConfig, setConfig, deleteConfig, getAllConfig } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import { CONFIG_KEYS, type ConfigKey } from '../models/config.js';
import { printJson, reportError, type JsonOption } from './shared.js';

const KNOWN_KEYS: readonly string[] = Object.values(CONFIG_KEYS);

function requireKnownKey(key: string): ConfigKey {
  const match = Object.values(CONFIG_KEYS).find((k) => k === key);
  if (!match) {
    throw new Error(`Unknown configuration key: ${key}. Known keys: ${KNOWN_KEYS.join(', ')}`);
  }
  return match;
}

// Mask sensitive values
export function maskValue(key: string, value: string): string {
  return key.includes('key') || key.includes('secret') ? `${value.slice(0, 4)}...` : value;
}

export function createConfigCommand(): Command {
  const config = new Command('config').description('Manage configuration (environment variables take precedence)');

  config
    .command('set')
    .description('Set a configuration value')
    .argument('<key>', 'Configuration key')
    .argument('<value>', 'Configuration value')
    .option('--json', 'Output as JSON')
    .action((key: string, value: string, options: JsonOption) => {
      try {
        setConfig(requireKnownKey(key), value, getDb());
        if (options.json) {
          printJson({ success: true, key, value: maskValue(key, value) });
        } else {
          logger.success(`Configuration set: ${key} = ${maskValue(key, value)}`);
        }
      } catch (error) {
        reportError(error, options);
      }
    });

  config
    .command('get')
    .description('Get the effective value of a configuration key')
    .argument('<key>', 'Configuration key')
    .option('--json', 'Output as JSON')
    .action((key: string, options: JsonOption) => {
      try {
        const value = getConfig(requireKnownKey(key), getDb());
        if (options.json) {
          printJson({ key, value: value === null ? null : maskValue(key, value) });
        } else if (value !== null) {
          console.log(`${key} = ${maskValue(key, value)}`);
        } else {
          logger.warn(`Configuration not set: ${key}`);
        }
      } catch (error) {
        reportError(error, options);
      }
    });

  config
    .command('delete')
    .description('Delete a stored configuration value')
    .argument('<key>', 'Configuration key')
    .option('--json', 'Output as JSON')
    .action((key: string, options: JsonOption) => {
      const success = deleteConfig(key, getDb());

      if (options.json) {
        printJson({ success });
      } else if (success) {
        logger.success(`Configuration deleted: ${key}`);
      } else {
        logger.warn(`Configuration not found: ${key}`);
      }
    });

  config
    .command('list')
    .description('List stored configuration values')
    .option('--json', 'Output as JSON')
    .action((options: JsonOption) => {
      const configs = getAllConfig(getDb()).map((cfg) => ({ key: cfg.key, value: maskValue(cfg.key, cfg.value) }));

      if (options.json) {
        printJson(configs);
        return;
      }

      if (configs.length === 0) {
        logger.info('No configurations found');
        console.log();
        console.log(chalk.dim('Available configuration keys:'));
        for (const key of KNOWN_KEYS) {
          console.log(chalk.dim(`  ${key}`));
        }
        return;
      }

      console.log();
      console.log(chalk.bold('Configurations:'));
      console.log();
      for (const cfg of configs) {
        console.log(`  ${chalk.cyan(cfg.key)} = ${cfg.value}`);
      }
      console.log();
    });

  return config;
}
