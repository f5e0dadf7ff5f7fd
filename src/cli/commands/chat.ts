import chalk from 'chalk';
import { createEngine } from '../../engine/engine.js';
import { Repl } from '../repl.js';
import { resolveSession, type SessionFlags } from '../session.js';
import { warning } from '../ui.js';

export function chatCommand(options: SessionFlags): void {
  try {
    const settings = resolveSession(options);
    const rejected: string[] = [];

    const repl = new Repl(
      (onDebug) => createEngine({
        script: settings.scriptPath,
        random: settings.random,
        memoryCapacity: settings.config.memory.capacity,
        onDebug: (event) => {
          if (event.type === 'script-fallback') {
            rejected.push(...event.issues);
          }
          onDebug(event);
        },
      }),
      {
        showDebug: settings.showDebug,
        userLabel: settings.config.chat.userLabel,
        botLabel: settings.config.chat.botLabel,
      }
    );

    for (const issue of rejected) {
      console.log(warning(chalk.yellow(issue)));
    }
    if (rejected.length > 0) {
      console.log(chalk.gray('Continuing with the built-in rules.'));
    }

    repl.start();
  } catch (error) {
    if (error instanceof Error) {
      console.error(chalk.red(`Error: ${error.message}`));
    }
    process.exit(1);
  }
}
