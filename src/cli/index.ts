import { Command } from '@commander-js/extra-typings';
import { replCommand } from './commands/repl.js';
import { replayCommand } from './commands/replay.js';
import { configCommand } from './commands/config.js';

export const program = new Command()
  .name('substrate')
  .description('Two-tier memory sandbox for cognitive modules')
  .version('0.1.0');

// Interactive sandbox
program
  .command('repl')
  .description('Start an interactive memory sandbox')
  .option('-c, --config <path>', 'Settings file')
  .option('--stm <n>', 'Short-term capacity for this session')
  .option('--ltm <n>', 'Long-term capacity for this session')
  .option('--verbose', 'Log promotions and evictions')
  .action(replCommand);

// Run a saved script of operations
program.addCommand(replayCommand);

// Settings
program.addCommand(configCommand);

// Default to help if no command specified
program.action(() => {
  program.help();
});
