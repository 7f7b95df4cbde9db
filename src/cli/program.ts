import { Command } from 'commander';
import { setLoggerOptions } from '@shared/lib/logger.js';
import { registerEntryCommands } from './commands/entry.js';
import { registerMediaCommands } from './commands/media.js';

const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('klog')
    .description('Date-partitioned plain-text log with attachments')
    .version(VERSION)
    .option('--repo <path>', 'Log directory (overrides config and $KLOG_REPO)')
    .option('--config <path>', 'Configuration file')
    .option('--json', 'Output in JSON format')
    .option('--verbose', 'Enable verbose logging');

  // Wire --json/--verbose to logger before any command runs
  program.hook('preAction', (_thisCommand, actionCommand) => {
    const opts = actionCommand.optsWithGlobals<{ json?: boolean; verbose?: boolean }>();
    setLoggerOptions({
      ...(opts.verbose ? { level: 'debug' } : {}),
      ...(opts.json ? { json: true } : {}),
    });
  });

  registerEntryCommands(program);
  registerMediaCommands(program);

  return program;
}
