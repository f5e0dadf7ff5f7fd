/**
 * Terminal formatting helpers
 */

import chalk from 'chalk';
import { describeEvent, type EngineEvent } from '../engine/events.js';
import type { RuleSet } from '../script/types.js';

export const icons = {
  arrow: '\u{279C}',      // right arrow
  link: '\u{1F517}',      // link
};

/**
 * Success message with green checkmark
 */
export function success(message: string): string {
  return chalk.green('✓') + ' ' + message;
}

export function error(message: string): string {
  return chalk.red('✗') + ' ' + message;
}

export function warning(message: string): string {
  return chalk.yellow('⚠') + ' ' + message;
}

/**
 * Styled header with decorative elements
 */
export function header(text: string): string {
  const decoration = chalk.gray('─'.repeat(40));
  return `\n${decoration}\n${chalk.bold.cyan(text)}\n${decoration}\n`;
}

export function keyValue(key: string, value: string, keyWidth?: number): string {
  const width = keyWidth ?? 15;
  return `${chalk.cyan(key.padEnd(width))} ${value}`;
}

/**
 * Render a numbered list
 */
export function numberedList(items: readonly string[], options?: { indent?: number }): string {
  const indent = ' '.repeat(options?.indent ?? 2);
  return items.map((item, i) => `${indent}${chalk.cyan(`${i + 1}.`)} ${item}`).join('\n');
}

export function formatDebugEvent(event: EngineEvent): string {
  return chalk.gray(`  [debug] ${describeEvent(event)}`);
}

/**
 * One line per keyword, highest rank first, as the resolver will try them.
 */
export function formatKeywordTable(ruleSet: RuleSet): string[] {
  const ranked = ruleSet.keywords
    .map((keyword, order) => ({ keyword, order }))
    .sort((a, b) => b.keyword.rank - a.keyword.rank || a.order - b.order);

  const width = Math.max(8, ...ranked.map(({ keyword }) => keyword.word.length));

  return ranked.map(({ keyword }) => {
    const rank = chalk.yellow(String(keyword.rank).padStart(3));
    const rules = keyword.decomposition.length;
    const templates = keyword.decomposition.reduce((sum, d) => sum + d.reassembly.length, 0);
    return `  ${rank}  ${chalk.white(keyword.word.padEnd(width))}  ${chalk.gray(`${rules} patterns, ${templates} replies`)}`;
  });
}

export function formatLinks(links: Record<string, string>): string[] {
  return Object.entries(links).map(
    ([word, target]) => `  ${icons.link} ${chalk.white(word)} ${chalk.gray(icons.arrow)} ${chalk.cyan(target)}`
  );
}

export function formatReply(label: string, text: string): string {
  return `${chalk.green(`${label}:`)} ${text}`;
}
