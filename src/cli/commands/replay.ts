import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import { formatContent } from '../../memory/item.js';
import { createRuntime, printConfigError } from '../runtime.js';
import { loadScript, runScript } from '../script.js';
import { formatTier, header, keyValue } from '../ui.js';

export const replayCommand = new Command('replay')
  .argument('<file>', 'JSON script of memory operations')
  .option('-c, --config <path>', 'Settings file')
  .option('--verbose', 'Log promotions and evictions')
  .option('--json', 'Print the result as JSON')
  .description('Run a script of operations against a fresh memory module')
  .addHelpText('after', `
${chalk.bold('Script format:')}
  { "memory": { "stmCapacity": 3 },
    "operations": [
      { "op": "store", "content": "A", "importance": 0.8 },
      { "op": "retrieve", "query": "a", "scope": "all" } ] }

${chalk.bold('Operations:')} store, process, retrieve, similar, update, clear
`);

replayCommand.action((file, options) => {
  const script = loadScript(file);
  if (!script.ok) {
    printConfigError(script.error, (line) => console.error(chalk.red(line)));
    process.exit(1);
  }

  const runtime = createRuntime(options, script.value.memory ?? {});
  if (!runtime.ok) {
    printConfigError(runtime.error, (line) => console.error(chalk.red(line)));
    process.exit(1);
  }

  const { memory } = runtime.value;
  const result = runScript(memory, script.value.operations);

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  console.log(header(`Replayed ${result.steps.length} operations`));

  for (const step of result.steps) {
    if (step.results === undefined) continue;
    const rendered = step.results.map(formatContent).join(', ');
    console.log(keyValue(`#${step.index} ${step.op}`, rendered.length > 0 ? rendered : chalk.gray('(no matches)')));
  }

  console.log();
  console.log(formatTier('stm', memory.getStmItems(), result.stats.stmCapacity));
  console.log();
  console.log(formatTier('ltm', memory.getLtmItems(), result.stats.ltmCapacity));
  console.log();
});
