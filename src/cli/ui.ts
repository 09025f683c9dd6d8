/**
 * Terminal formatting helpers
 */

import chalk from 'chalk';
import type { MemoryItemView } from '../memory/types.js';
import { formatContent } from '../memory/item.js';

export const icons = {
  shortTerm: '\u{26A1}',  // high voltage - recent, volatile
  longTerm: '\u{1F4DA}',  // books - consolidated
  search: '\u{1F50D}',
  brain: '\u{1F9E0}',
  dot: '\u{2022}',
};

export const tierColors = {
  stm: chalk.cyan,
  ltm: chalk.magenta,
};

export type Tier = keyof typeof tierColors;

export function tierLabel(tier: Tier): string {
  return tier === 'stm' ? 'Short-term' : 'Long-term';
}

/**
 * One line per item, with importance and access count.
 */
export function formatItem(item: MemoryItemView, tier: Tier): string {
  const colorFn = tierColors[tier];
  let output = `${colorFn(icons.dot)} ${chalk.white(formatContent(item.content))}`;
  output += chalk.gray(
    `  importance ${item.importance.toFixed(2)} | accessed ${item.accessCount}x`
  );
  if (item.tags.length > 0) {
    output += chalk.gray(` | ${item.tags.map((t) => `#${t}`).join(' ')}`);
  }
  return output;
}

export function formatTier(tier: Tier, items: MemoryItemView[], capacity: number): string {
  const icon = tier === 'stm' ? icons.shortTerm : icons.longTerm;
  const colorFn = tierColors[tier];
  const lines = [
    `${icon} ${chalk.bold(colorFn(tierLabel(tier)))} ${chalk.gray(`(${items.length}/${capacity})`)}`,
    colorFn('─'.repeat(30)),
  ];

  if (items.length === 0) {
    lines.push(chalk.gray('   (empty)'));
  } else {
    lines.push(...items.map((item) => `   ${formatItem(item, tier)}`));
  }

  return lines.join('\n');
}

export function formatResults(query: string, results: string[]): string {
  if (results.length === 0) {
    return chalk.gray(`No memories match "${query}"`);
  }
  const header = `${icons.search} ${chalk.bold(`${results.length} match${results.length === 1 ? '' : 'es'} for "${query}"`)}`;
  return [header, ...results.map((r) => `   ${chalk.cyan(icons.dot)} ${r}`)].join('\n');
}

export function success(message: string): string {
  return chalk.green('✓') + ' ' + message;
}

export function warning(message: string): string {
  return chalk.yellow('⚠') + ' ' + message;
}

export function keyValue(key: string, value: string, keyWidth?: number): string {
  const width = keyWidth ?? 20;
  return `${chalk.cyan(key.padEnd(width))} ${value}`;
}

export function header(text: string): string {
  const decoration = chalk.gray('─'.repeat(40));
  return `\n${decoration}\n${chalk.bold.cyan(text)}\n${decoration}\n`;
}
