/**
 * Program definition: global options and subcommands.
 */

import { Command, Option } from 'commander';

import { extractCommand } from './commands/extract.js';
import { runCommand } from './commands/run.js';
import { runsCommand } from './commands/runs.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  return new Command('loopsmith')
    .description('Drive LLM agents to a source file and tests that pass together')
    .version(VERSION)
    .option('--json', 'Print machine-readable JSON on stdout')
    .addOption(new Option('--color <when>', 'Colorize output').choices(['auto', 'always', 'never']).default('auto'))
    .option('--quiet', 'Suppress progress output')
    .showHelpAfterError()
    .addCommand(runCommand)
    .addCommand(runsCommand)
    .addCommand(extractCommand);
}
