/**
 * Base class for command handlers.
 */

import type { Command } from 'commander';

import { OutputManager } from './output.js';

type GlobalOptions = {
  json?: boolean;
  color?: string;
  quiet?: boolean;
};

/** `--color auto|always|never`; auto follows the terminal and NO_COLOR. */
export function resolveColor(when: string | undefined): boolean {
  if (when === 'always') return true;
  if (when === 'never') return false;
  return process.stderr.isTTY === true && !process.env.NO_COLOR;
}

export abstract class BaseCommand {
  protected readonly output: OutputManager;
  protected readonly globals: GlobalOptions;

  constructor(command: Command) {
    this.globals = command.optsWithGlobals<GlobalOptions>();
    this.output = new OutputManager({
      json: this.globals.json === true,
      color: resolveColor(this.globals.color),
      quiet: this.globals.quiet === true,
    });
  }
}
