/**
 * Interactive sandbox over a single in-process memory module.
 *
 * Every line is one command; state lives only as long as the session.
 */

import * as readline from 'readline';
import chalk from 'chalk';
import type { MemorySystemModule } from '../memory/system.js';
import type { MemoryContent, MemoryScope, SimilarMemoriesContent } from '../memory/types.js';
import { formatContent } from '../memory/item.js';
import type { ModuleRegistry } from '../core/registry.js';
import type { Result } from '../core/result.js';
import { err, ok } from '../core/result.js';
import { formatResults, formatTier, icons, keyValue, success, warning } from './ui.js';

export type ReplCommand =
  | { kind: 'store'; content: string; importance?: number; tags: string[] }
  | { kind: 'process'; input: string }
  | { kind: 'retrieve'; query: string; scope: MemoryScope }
  | { kind: 'similar'; query: string; limit?: number }
  | { kind: 'reinforce' }
  | { kind: 'show'; tier: MemoryScope }
  | { kind: 'stats' }
  | { kind: 'modules' }
  | { kind: 'clear'; tier: 'stm' | 'ltm' }
  | { kind: 'help' }
  | { kind: 'quit' };

const SCOPES: readonly string[] = ['stm', 'ltm', 'all'];

function isSimilarMemoriesContent(content: unknown): content is SimilarMemoriesContent {
  return typeof content === 'object' && content !== null && 'similarMemories' in content
    && Array.isArray(content.similarMemories);
}

function similarMemoriesOf(content: unknown): MemoryContent[] {
  return isSimilarMemoriesContent(content) ? content.similarMemories : [];
}

function isScope(value: string): value is MemoryScope {
  return SCOPES.includes(value);
}

interface SplitArgs {
  flags: Map<string, string[]>;
  text: string;
}

// Leading `-x value` / `--name value` pairs, then free text.
function splitArgs(tokens: string[]): Result<SplitArgs, string> {
  const flags = new Map<string, string[]>();
  let i = 0;

  while (i < tokens.length && tokens[i].startsWith('-')) {
    const flag = tokens[i].replace(/^-+/, '');
    const value = tokens[i + 1];
    if (value === undefined) {
      return err(`Missing value for -${flag}`);
    }
    flags.set(flag, [...(flags.get(flag) ?? []), value]);
    i += 2;
  }

  return ok({ flags, text: tokens.slice(i).join(' ') });
}

function lastFlag(flags: Map<string, string[]>, ...names: string[]): string | undefined {
  for (const name of names) {
    const values = flags.get(name);
    if (values && values.length > 0) return values[values.length - 1];
  }
  return undefined;
}

export function parseReplCommand(line: string): Result<ReplCommand, string> {
  const tokens = line.trim().split(/\s+/).filter((t) => t.length > 0);
  if (tokens.length === 0) {
    return err('Empty command');
  }

  const name = tokens[0].toLowerCase();
  const split = splitArgs(tokens.slice(1));
  if (!split.ok) return split;
  const { flags, text } = split.value;

  switch (name) {
    case 'store':
    case 'add': {
      if (!text) return err('Usage: store [-i <importance>] [-t <tag>] <text>');
      const raw = lastFlag(flags, 'i', 'importance');
      const importance = raw === undefined ? undefined : Number(raw);
      if (importance !== undefined && (Number.isNaN(importance) || importance < 0 || importance > 1)) {
        return err(`Importance must be a number between 0 and 1, got "${raw}"`);
      }
      const tags = [...(flags.get('t') ?? []), ...(flags.get('tag') ?? [])];
      return ok<ReplCommand>(importance === undefined
        ? { kind: 'store', content: text, tags }
        : { kind: 'store', content: text, importance, tags });
    }

    case 'process':
    case 'p':
      if (!text) return err('Usage: process <text>');
      return ok<ReplCommand>({ kind: 'process', input: text });

    case 'retrieve':
    case 'r': {
      if (!text) return err('Usage: retrieve [-s stm|ltm|all] <query>');
      const scope = lastFlag(flags, 's', 'scope') ?? 'all';
      if (!isScope(scope)) return err(`Unknown scope "${scope}". Use stm, ltm or all.`);
      return ok<ReplCommand>({ kind: 'retrieve', query: text, scope });
    }

    case 'similar': {
      if (!text) return err('Usage: similar [-n <limit>] <query>');
      const raw = lastFlag(flags, 'n', 'limit');
      if (raw === undefined) return ok<ReplCommand>({ kind: 'similar', query: text });
      const limit = parseInt(raw, 10);
      if (Number.isNaN(limit)) return err(`Limit must be an integer, got "${raw}"`);
      return ok<ReplCommand>({ kind: 'similar', query: text, limit });
    }

    case 'reinforce':
      return ok<ReplCommand>({ kind: 'reinforce' });

    case 'stm':
    case 'ltm':
      return ok<ReplCommand>({ kind: 'show', tier: name === 'stm' ? 'stm' : 'ltm' });

    case 'show':
    case 'memory':
    case 'm':
      return ok<ReplCommand>({ kind: 'show', tier: 'all' });

    case 'stats':
      return ok<ReplCommand>({ kind: 'stats' });

    case 'modules':
      return ok<ReplCommand>({ kind: 'modules' });

    case 'clear':
      if (text !== 'stm' && text !== 'ltm') return err('Usage: clear stm|ltm');
      return ok<ReplCommand>({ kind: 'clear', tier: text });

    case 'help':
    case 'h':
      return ok<ReplCommand>({ kind: 'help' });

    case 'quit':
    case 'exit':
    case 'q':
      return ok<ReplCommand>({ kind: 'quit' });

    default:
      return err(`Unknown command: ${name}. Type help for available commands.`);
  }
}

export function helpText(): string {
  return [
    chalk.bold('Commands:'),
    '',
    chalk.cyan('  store [-i n] [-t tag] <text>') + chalk.gray('  Store into short-term memory'),
    chalk.cyan('  process <text>') + chalk.gray('                Store and list similar memories'),
    chalk.cyan('  retrieve [-s scope] <query>') + chalk.gray('   Search stm, ltm or all'),
    chalk.cyan('  similar [-n limit] <query>') + chalk.gray('    Search, stopping at limit'),
    chalk.cyan('  reinforce') + chalk.gray('                     Boost the newest short-term items'),
    chalk.cyan('  stm, ltm, show') + chalk.gray('                List memory contents'),
    chalk.cyan('  stats') + chalk.gray('                         Sizes and counters'),
    chalk.cyan('  modules') + chalk.gray('                       Registered modules and response stream'),
    chalk.cyan('  clear stm|ltm') + chalk.gray('                 Empty a tier'),
    chalk.cyan('  help, quit'),
  ].join('\n');
}

export class Repl {
  private rl: readline.Interface | null = null;

  constructor(
    private memory: MemorySystemModule,
    private registry: ModuleRegistry
  ) {}

  /**
   * Run one command and return what it prints.
   */
  execute(command: ReplCommand): string[] {
    const memory = this.memory;

    switch (command.kind) {
      case 'store':
        memory.store(command.content, command.importance, command.tags);
        return [success(`Stored "${command.content}"`)];

      case 'process': {
        const dispatched = this.registry.dispatch(command.input, memory.name);
        if (!dispatched.ok) {
          return [warning(dispatched.error.message)];
        }
        return dispatched.value.flatMap((response) => [
          success(`Stored "${command.input}"`),
          formatResults(command.input, similarMemoriesOf(response.content).map(formatContent)),
        ]);
      }

      case 'retrieve':
        return [formatResults(command.query, memory.retrieve(command.query, command.scope).map(formatContent))];

      case 'similar':
        return [formatResults(command.query, memory.findSimilar(command.query, command.limit).map(formatContent))];

      case 'reinforce':
        this.registry.broadcastFeedback({ reinforce: true });
        return [success('Reinforced the most recent short-term memories')];

      case 'show': {
        const stats = memory.getStats();
        const lines: string[] = [];
        if (command.tier !== 'ltm') lines.push(formatTier('stm', memory.getStmItems(), stats.stmCapacity));
        if (command.tier !== 'stm') lines.push(formatTier('ltm', memory.getLtmItems(), stats.ltmCapacity));
        return lines;
      }

      case 'stats': {
        const stats = memory.getStats();
        return [
          keyValue('Short-term', `${stats.stmSize}/${stats.stmCapacity}`),
          keyValue('Long-term', `${stats.ltmSize}/${stats.ltmCapacity}`),
          keyValue('Promotions', String(stats.promotions)),
          keyValue('Discards', String(stats.discards)),
          keyValue('Evictions', String(stats.evictions)),
        ];
      }

      case 'modules': {
        const status = this.registry.status();
        return [
          ...status.modules.map((m) => keyValue(m.name, m.state)),
          keyValue('Response stream', String(status.streamLength)),
        ];
      }

      case 'clear':
        if (command.tier === 'stm') {
          memory.clearStm();
        } else {
          memory.clearLtm();
        }
        return [success(`Cleared ${command.tier}`)];

      case 'help':
        return [helpText()];

      case 'quit':
        return [];
    }
  }

  start(): void {
    this.rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: chalk.cyan('memory> '),
      terminal: true,
    });

    this.printWelcome();

    this.rl.on('line', (line) => {
      if (line.trim().length > 0) {
        this.handleLine(line);
      }
      this.rl?.prompt();
    });

    this.rl.on('close', () => {
      console.log(chalk.gray('\nGoodbye!\n'));
    });

    this.rl.prompt();
  }

  private handleLine(line: string): void {
    const parsed = parseReplCommand(line);
    if (!parsed.ok) {
      console.log(warning(parsed.error));
      return;
    }

    if (parsed.value.kind === 'quit') {
      this.rl?.close();
      return;
    }

    for (const output of this.execute(parsed.value)) {
      console.log(output);
    }
    console.log();
  }

  private printWelcome(): void {
    const stats = this.memory.getStats();
    console.log();
    console.log(`${icons.brain} ${chalk.bold.cyan('Memory sandbox')}`);
    console.log(chalk.gray(`Short-term capacity ${stats.stmCapacity}, long-term capacity ${stats.ltmCapacity}`));
    console.log(chalk.gray('Type help for commands, quit to exit'));
    console.log();
  }
}
