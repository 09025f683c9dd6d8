import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import { getConfigValue, loadConfig, resolveConfigPath, writeDefaultConfig } from '../../config/index.js';
import { printConfigError } from '../runtime.js';

export const configCommand = new Command('config')
  .description('Inspect or create the settings file');

// substrate config get [key]
configCommand
  .command('get')
  .argument('[key]', 'Config key (e.g., memory.stmCapacity)')
  .option('-c, --config <path>', 'Settings file to read')
  .description('Show the effective settings, or a single value')
  .action((key, options) => {
    const loaded = loadConfig(options.config);
    if (!loaded.ok) {
      printConfigError(loaded.error, (line) => console.error(chalk.red(line)));
      process.exit(1);
    }

    if (!key) {
      console.log(JSON.stringify(loaded.value, null, 2));
      return;
    }

    const value = getConfigValue(loaded.value, key);
    if (value === undefined) {
      console.error(chalk.red(`Unknown config key: ${key}`));
      process.exit(1);
    }
    console.log(formatValue(value));
  });

// substrate config init
configCommand
  .command('init')
  .option('-c, --config <path>', 'Where to write the settings file')
  .option('-f, --force', 'Overwrite an existing file')
  .description('Write a settings file with the defaults')
  .action((options) => {
    const written = writeDefaultConfig(options.config, options.force ?? false);
    if (!written.ok) {
      printConfigError(written.error, (line) => console.error(chalk.red(line)));
      process.exit(1);
    }
    console.log(chalk.green(`✓ Wrote ${written.value}`));
  });

// substrate config path
configCommand
  .command('path')
  .option('-c, --config <path>', 'Settings file')
  .description('Print where settings are read from')
  .action((options) => {
    console.log(resolveConfigPath(options.config));
  });

function formatValue(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(value, null, 2);
  }
  return String(value);
}
