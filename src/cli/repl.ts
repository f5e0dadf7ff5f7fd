/**
 * Interactive REPL for parley
 *
 * Reads one utterance per line and prints the engine's reply. Quit words from
 * the script end the session; lines starting with / are commands.
 */

import * as readline from 'readline';
import chalk from 'chalk';
import type { ResponseEngine } from '../engine/engine.js';
import type { DebugHook, EngineEvent } from '../engine/events.js';
import { formatDebugEvent, formatReply, numberedList } from './ui.js';

export interface ReplConfig {
  showDebug: boolean;
  userLabel: string;
  botLabel: string;
}

export interface Exchange {
  user: string;
  reply: string;
}

export interface LineResult {
  output: string[];
  exit: boolean;
}

const GOODBYE = 'Goodbye. It was nice talking to you.';

export class Repl {
  private rl: readline.Interface | null = null;
  private history: Exchange[] = [];
  private pendingDebug: string[] = [];
  private config: ReplConfig;
  readonly engine: ResponseEngine;

  /**
   * The engine is built through `createEngine` so that its debug events,
   * including those raised while loading the script, reach this REPL.
   */
  constructor(
    createEngine: (onDebug: DebugHook) => ResponseEngine,
    config: Partial<ReplConfig> = {}
  ) {
    this.config = {
      showDebug: false,
      userLabel: 'You',
      botLabel: 'Parley',
      ...config,
    };
    this.engine = createEngine(this.debugHook);
  }

  // Events are buffered and printed with the turn that produced them
  private readonly debugHook = (event: EngineEvent): void => {
    if (this.config.showDebug) {
      this.pendingDebug.push(formatDebugEvent(event));
    }
  };

  get debugEnabled(): boolean {
    return this.config.showDebug;
  }

  /**
   * Start the REPL on stdin/stdout
   */
  start(): void {
    this.rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: chalk.cyan(`${this.config.userLabel}: `),
      terminal: process.stdin.isTTY === true,
    });

    for (const line of this.welcome()) {
      console.log(line);
    }

    this.rl.on('line', (line) => {
      const result = this.handleLine(line);
      for (const out of result.output) {
        console.log(out);
      }

      if (result.exit) {
        this.rl?.close();
        return;
      }
      this.rl?.prompt();
    });

    this.rl.on('close', () => {
      process.exit(0);
    });

    this.rl.prompt();
  }

  welcome(): string[] {
    const origin = this.engine.origin;
    const script = origin.source === 'file' ? origin.path ?? 'file' : 'built-in';
    return [
      '',
      chalk.bold.cyan('parley') + chalk.gray(' v0.1.0'),
      chalk.gray(`Script: ${script}`),
      chalk.gray(`Type /help for commands, or ${this.engine.quitWords.join(', ') || '/quit'} to leave`),
      ...this.drainDebug(),
      '',
      formatReply(this.config.botLabel, this.engine.initialPrompt()),
      '',
    ];
  }

  /**
   * Process one input line. Exposed separately from start() so the loop can
   * be driven without a terminal.
   */
  handleLine(line: string): LineResult {
    const trimmed = line.trim();

    if (!trimmed) {
      return { output: [], exit: false };
    }

    if (trimmed.startsWith('/')) {
      return this.handleCommand(trimmed);
    }

    if (this.engine.quitWords.includes(trimmed.toLowerCase())) {
      return { output: ['', formatReply(this.config.botLabel, GOODBYE), ''], exit: true };
    }

    const reply = this.engine.respond(trimmed);
    this.history.push({ user: trimmed, reply });

    return {
      output: [...this.drainDebug(), formatReply(this.config.botLabel, reply), ''],
      exit: false,
    };
  }

  /**
   * Handle a slash command
   */
  private handleCommand(input: string): LineResult {
    const command = input.slice(1).split(/\s+/)[0].toLowerCase();

    switch (command) {
      case 'help':
      case 'h':
        return { output: this.helpLines(), exit: false };

      case 'quit':
      case 'exit':
      case 'q':
        return { output: ['', formatReply(this.config.botLabel, GOODBYE), ''], exit: true };

      case 'memory':
      case 'm':
        return { output: this.memoryLines(), exit: false };

      case 'forget':
        this.engine.memory.clear();
        return { output: [chalk.gray('Memory cleared.'), ''], exit: false };

      case 'history':
        return { output: this.historyLines(), exit: false };

      case 'debug':
        this.config.showDebug = !this.config.showDebug;
        return { output: [chalk.gray(`Debug mode: ${this.config.showDebug ? 'on' : 'off'}`), ''], exit: false };

      default:
        return {
          output: [chalk.yellow(`Unknown command: /${command}`), chalk.gray('Type /help for available commands.'), ''],
          exit: false,
        };
    }
  }

  private helpLines(): string[] {
    return [
      '',
      chalk.bold('Commands:'),
      '',
      chalk.cyan('  /help, /h') + chalk.gray('         Show this help'),
      chalk.cyan('  /quit, /exit, /q') + chalk.gray('  End the conversation'),
      chalk.cyan('  /history') + chalk.gray('          Show this session so far'),
      chalk.cyan('  /memory, /m') + chalk.gray('       Show remembered statements'),
      chalk.cyan('  /forget') + chalk.gray('           Clear remembered statements'),
      chalk.cyan('  /debug') + chalk.gray('            Toggle matching details'),
      '',
    ];
  }

  private memoryLines(): string[] {
    const entries = this.engine.memory.entries();
    if (entries.length === 0) {
      return [chalk.gray('Nothing remembered yet.'), ''];
    }

    return [
      '',
      chalk.bold(`Remembered (${entries.length}/${this.engine.memory.capacity}, oldest first):`),
      numberedList(entries),
      '',
    ];
  }

  private historyLines(): string[] {
    if (this.history.length === 0) {
      return [chalk.gray('No conversation history.'), ''];
    }

    const lines = ['', chalk.bold('Conversation History:'), ''];
    for (const exchange of this.history) {
      lines.push(chalk.cyan(`${this.config.userLabel}: `) + exchange.user);
      lines.push(formatReply(this.config.botLabel, exchange.reply));
    }
    lines.push('');
    return lines;
  }

  private drainDebug(): string[] {
    const lines = this.pendingDebug;
    this.pendingDebug = [];
    return lines;
  }
}
