import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import { findProjectRoot, loadConfig, resolveScriptPath } from '../../config/index.js';
import { loadScript } from '../../script/loader.js';
import type { LoadResult } from '../../script/types.js';
import { error, formatKeywordTable, formatLinks, header, keyValue, success, warning } from '../ui.js';

export const scriptCommand = new Command('script')
  .description('Inspect and validate conversation scripts');

function configuredScript(): string | undefined {
  const root = findProjectRoot();
  return resolveScriptPath(loadConfig(root), root);
}

function printSummary(result: LoadResult): void {
  const { ruleSet } = result;
  const label = result.source === 'file' ? result.path ?? 'file' : 'built-in';

  console.log(header(`Script: ${label}`));

  console.log(chalk.bold('Keywords') + chalk.gray(` (${ruleSet.keywords.length}, highest rank first)`));
  for (const line of formatKeywordTable(ruleSet)) {
    console.log(line);
  }

  const links = formatLinks(ruleSet.links);
  if (links.length > 0) {
    console.log();
    console.log(chalk.bold('Links') + chalk.gray(` (${links.length})`));
    for (const line of links) {
      console.log(line);
    }
  }

  console.log();
  console.log(keyValue('pre', `${ruleSet.preTransforms.length} transforms`));
  console.log(keyValue('post', `${ruleSet.postTransforms.length} transforms`));
  console.log(keyValue('synonyms', `${Object.keys(ruleSet.synonyms).length} groups`));
  console.log(keyValue('memory', `${ruleSet.memory.decomposition.length} patterns`));
  console.log(keyValue('defaults', `${ruleSet.defaultResponses.length} replies`));
  console.log(keyValue('greetings', `${ruleSet.initialPrompts.length}`));
  console.log(keyValue('quit words', ruleSet.quitWords.join(', ') || chalk.gray('(none)')));

  if (result.defaulted.length > 0) {
    console.log();
    console.log(chalk.gray(`Built-in tables used for: ${result.defaulted.join(', ')}`));
  }
  console.log();
}

// parley script check [path]
scriptCommand
  .command('check')
  .argument('[path]', 'Script file (defaults to the configured script)')
  .description('Validate a script file')
  .action((scriptPath?: string) => {
    const target = scriptPath ?? configuredScript();
    if (!target) {
      console.log(chalk.gray('No script configured; the built-in rules are in use.'));
      return;
    }

    const result = loadScript(target);
    if (result.source !== 'file') {
      console.error(error(chalk.red(`Script is not usable: ${result.path ?? target}`)));
      for (const issue of result.issues) {
        console.error(chalk.red(`  ${issue}`));
      }
      process.exit(1);
    }

    console.log(success(`${result.path ?? target} is valid (${result.ruleSet.keywords.length} keywords)`));
    if (result.defaulted.length > 0) {
      console.log(warning(chalk.gray(`Missing tables fall back to built-ins: ${result.defaulted.join(', ')}`)));
    }
  });

// parley script show [path]
scriptCommand
  .command('show')
  .argument('[path]', 'Script file (defaults to the configured script, then the built-in rules)')
  .description('Summarize a script: keywords by rank, links and tables')
  .action((scriptPath?: string) => {
    const result = loadScript(scriptPath ?? configuredScript());

    for (const issue of result.issues) {
      console.log(warning(chalk.yellow(issue)));
    }

    printSummary(result);
  });
