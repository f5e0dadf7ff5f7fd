import chalk from 'chalk';
import * as fs from 'fs';
import * as path from 'path';
import { initProject, loadConfig, saveConfig, PARLEY_DIR } from '../../config/index.js';
import { DOCTOR_SCRIPT_FILE, findPackageFile } from '../../script/paths.js';
import { success } from '../ui.js';

interface InitOptions {
  force?: boolean;
  doctor?: boolean;
}

export const PROJECT_SCRIPT = path.join(PARLEY_DIR, 'script.json');

export function initCommand(options: InitOptions): void {
  const cwd = process.cwd();

  try {
    initProject(cwd, options.force ?? false);
    console.log(success(`Created ${path.join(PARLEY_DIR, 'config.json')}`));

    if (options.doctor) {
      const bundled = findPackageFile(DOCTOR_SCRIPT_FILE);
      if (!bundled) {
        throw new Error('The bundled DOCTOR script could not be found.');
      }

      fs.copyFileSync(bundled, path.join(cwd, PROJECT_SCRIPT));

      const config = loadConfig(cwd);
      config.script.path = PROJECT_SCRIPT;
      saveConfig(config, cwd);
      console.log(success(`Copied the DOCTOR script to ${PROJECT_SCRIPT}`));
    }

    console.log();
    console.log(chalk.gray('Start a conversation with:'));
    console.log(chalk.cyan('  parley chat'));
    console.log();
  } catch (error) {
    if (error instanceof Error) {
      console.error(chalk.red(`Error: ${error.message}`));
    }
    process.exit(1);
  }
}
