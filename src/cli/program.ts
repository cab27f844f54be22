import { Command } from 'commander';
import { setLoggerOptions } from '@shared/lib/logger.js';
import { registerStoreCommands } from './commands/store.js';
import { registerConfigCommand } from './commands/config.js';

const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('localkv')
    .description('File-backed JSON key-value stores, one file per named store')
    .version(VERSION)
    .option('--json', 'Output in JSON format')
    .option('--verbose', 'Enable verbose logging')
    .option('--home <path>', 'localkv home directory (default: $LOCALKV_HOME or ~/.localkv)')
    .option('--dir <path>', 'Directory holding store files (default: <home>/stores)');

  // Wire --verbose to logger before any command runs
  program.hook('preAction', (_thisCommand, actionCommand) => {
    const opts = actionCommand.optsWithGlobals();
    if (opts['verbose']) {
      setLoggerOptions({ level: 'debug' });
    }
  });

  registerStoreCommands(program);
  registerConfigCommand(program);

  return program;
}
