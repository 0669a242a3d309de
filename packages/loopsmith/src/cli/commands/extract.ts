/**
 * `loopsmith extract` - Run the extraction engine on a saved model reply.
 *
 * Useful for replaying a transcript from a run directory after changing
 * the parser.
 */

import { Command } from 'commander';
import { readFile } from 'node:fs/promises';

import { extract } from '../../lib/extract/parser.js';
import { summarizeResult } from '../../lib/extract/result.js';
import { ROLE_SCHEMAS } from '../../lib/extract/schemas.js';
import { AgentRole } from '../../lib/types.js';
import { BaseCommand } from '../lib/base-command.js';
import { errorMessage, LoopError } from '../lib/errors.js';

interface ExtractOptions {
  role: string;
}

class ExtractHandler extends BaseCommand {
  async run(file: string, options: ExtractOptions): Promise<void> {
    try {
      const role = AgentRole.safeParse(options.role);
      if (!role.success) {
        throw new LoopError(
          `Unknown role "${options.role}" (expected one of: ${AgentRole.options.join(', ')})`,
          'E_CONFIG_INVALID',
        );
      }

      let raw: string;
      try {
        raw = await readFile(file, 'utf-8');
      } catch (err: unknown) {
        throw new LoopError(`Cannot read ${file}: ${errorMessage(err)}`, 'E_INPUT_MISSING');
      }

      const result = extract(raw, ROLE_SCHEMAS[role.data]);

      this.output.data(result, () => {
        const colors = this.output.getColors();
        console.log(colors.bold(`${role.data} reply: ${result.ok ? colors.success('ok') : colors.error('not usable')}`));
        for (const line of summarizeResult(result)) {
          console.log(`  ${line}`);
        }
        if (result.diagnostics.length > 0) {
          console.log('');
          console.log(colors.bold('  Diagnostics:'));
          for (const d of result.diagnostics) {
            console.log(`    ${colors.dim(d)}`);
          }
        }
      });

      if (!result.ok) process.exitCode = 1;
    } catch (err: unknown) {
      if (err instanceof LoopError) {
        const code = err.code;
        const msg = err.message;
        this.output.data({ error: { code, message: msg } }, () => {
          console.error(this.output.getColors().error(`Error [${code}]: ${msg}`));
        });
        process.exitCode = err.exitCode;
        return;
      }
      throw err;
    }
  }
}

export const extractCommand = new Command('extract')
  .description('Extract the sections of a saved model reply for one agent role')
  .argument('<file>', 'Markdown reply to parse')
  .requiredOption('--role <role>', 'Agent role: planner, coder, tester, debugger')
  .action(async (file: string, options: ExtractOptions, command: Command) => {
    const handler = new ExtractHandler(command);
    await handler.run(file, options);
  });
