import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import {
  loadConfig,
  setConfigValue,
  getConfigValue,
  findProjectRoot,
  initProject,
} from '../../config/index.js';

export const configCommand = new Command('config')
  .description('Manage parley configuration');

function requireProject(): string {
  const root = findProjectRoot();
  if (!root) {
    console.error(chalk.red('Not in a parley project. Run `parley init` first.'));
    process.exit(1);
  }
  return root;
}

// parley config get [key]
configCommand
  .command('get')
  .argument('[key]', 'Config key (e.g., memory.capacity)')
  .description('Get configuration value(s)')
  .action((key?: string) => {
    const root = requireProject();

    try {
      if (key) {
        const value = getConfigValue(key, root);
        if (value === undefined) {
          console.error(chalk.red(`Unknown config key: ${key}`));
          process.exit(1);
        }
        console.log(formatValue(value));
      } else {
        console.log(JSON.stringify(loadConfig(root), null, 2));
      }
    } catch (error) {
      if (error instanceof Error) {
        console.error(chalk.red(`Error: ${error.message}`));
      }
      process.exit(1);
    }
  });

// parley config set <key> <value>
configCommand
  .command('set')
  .argument('<key>', 'Config key (e.g., memory.capacity)')
  .argument('<value>', 'New value')
  .description('Set a configuration value')
  .action((key: string, value: string) => {
    const root = requireProject();

    try {
      setConfigValue(key, value, root);
      console.log(chalk.green(`✓ Set ${key} = ${value}`));
    } catch (error) {
      if (error instanceof Error) {
        console.error(chalk.red(`Error: ${error.message}`));
      }
      process.exit(1);
    }
  });

// parley config list
configCommand
  .command('list')
  .description('List all configuration values')
  .action(() => {
    const root = requireProject();
    printConfigTree(loadConfig(root), '');
  });

// parley config reset
configCommand
  .command('reset')
  .description('Reset configuration to defaults')
  .option('-y, --yes', 'Skip confirmation')
  .action((options) => {
    const root = requireProject();

    if (!options.yes) {
      console.log(chalk.yellow('This will reset all configuration to defaults.'));
      console.log(chalk.gray('Use --yes to skip this confirmation.'));
      return;
    }

    try {
      initProject(root, true);
      console.log(chalk.green('✓ Configuration reset to defaults'));
    } catch (error) {
      if (error instanceof Error) {
        console.error(chalk.red(`Error: ${error.message}`));
      }
      process.exit(1);
    }
  });

function formatValue(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(value, null, 2);
  }
  return String(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function printConfigTree(obj: Record<string, unknown>, prefix: string): void {
  for (const [key, value] of Object.entries(obj)) {
    const fullKey = prefix ? `${prefix}.${key}` : key;

    if (isRecord(value)) {
      console.log(chalk.bold(`${fullKey}:`));
      printConfigTree(value, fullKey);
    } else {
      console.log(`  ${chalk.cyan(fullKey)} = ${chalk.white(formatValue(value))}`);
    }
  }
}
