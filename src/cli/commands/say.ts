import chalk from 'chalk';
import { createEngine } from '../../engine/engine.js';
import { resolveSession, type SessionFlags } from '../session.js';
import { formatDebugEvent, warning } from '../ui.js';

export function sayCommand(utterance: string[], options: SessionFlags): void {
  try {
    const settings = resolveSession(options);

    const engine = createEngine({
      script: settings.scriptPath,
      random: settings.random,
      memoryCapacity: settings.config.memory.capacity,
      onDebug: (event) => {
        if (event.type === 'script-fallback') {
          for (const issue of event.issues) {
            console.error(warning(chalk.yellow(issue)));
          }
        }
        if (settings.showDebug) {
          console.error(formatDebugEvent(event));
        }
      },
    });

    console.log(engine.respond(utterance.join(' ')));
  } catch (error) {
    if (error instanceof Error) {
      console.error(chalk.red(`Error: ${error.message}`));
    }
    process.exit(1);
  }
}
