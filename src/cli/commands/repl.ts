import chalk from 'chalk';
import { Repl } from '../repl.js';
import { createRuntime, printConfigError } from '../runtime.js';

interface ReplOptions {
  config?: string;
  verbose?: boolean;
  stm?: string;
  ltm?: string;
}

function parseCapacity(raw: string | undefined): number | undefined {
  return raw === undefined ? undefined : parseInt(raw, 10);
}

export function replCommand(options: ReplOptions): void {
  const stmCapacity = parseCapacity(options.stm);
  const ltmCapacity = parseCapacity(options.ltm);

  const runtime = createRuntime(options, {
    ...(stmCapacity !== undefined ? { stmCapacity } : {}),
    ...(ltmCapacity !== undefined ? { ltmCapacity } : {}),
  });

  if (!runtime.ok) {
    printConfigError(runtime.error, (line) => console.error(chalk.red(line)));
    process.exit(1);
  }

  new Repl(runtime.value.memory, runtime.value.registry).start();
}
