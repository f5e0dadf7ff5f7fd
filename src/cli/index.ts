import { Command } from '@commander-js/extra-typings';
import { chatCommand } from './commands/chat.js';
import { sayCommand } from './commands/say.js';
import { initCommand } from './commands/init.js';
import { configCommand } from './commands/config.js';
import { scriptCommand } from './commands/script.js';

export const program = new Command()
  .name('parley')
  .description('parley - a rule-driven conversation partner in the DOCTOR tradition')
  .version('0.1.0');

// Initialize a project config
program
  .command('init')
  .description('Create .parley/config.json in the current directory')
  .option('-f, --force', 'Overwrite existing configuration')
  .option('--doctor', 'Copy the bundled DOCTOR script into the project and use it')
  .action(initCommand);

// Interactive chat mode
program
  .command('chat')
  .description('Start an interactive conversation')
  .option('-s, --script <path>', 'Script file to load (JSON)')
  .option('--seed <n>', 'Seed reply selection for a reproducible session')
  .option('--debug', 'Show how each reply was chosen')
  .action(chatCommand);

// One-shot reply
program
  .command('say <utterance...>')
  .description('Reply to a single utterance')
  .option('-s, --script <path>', 'Script file to load (JSON)')
  .option('--seed <n>', 'Seed reply selection')
  .option('--debug', 'Show how the reply was chosen (on stderr)')
  .action(sayCommand);

program.addCommand(scriptCommand);
program.addCommand(configCommand);

// Default to help if no command specified
program.action(() => {
  program.help();
});
