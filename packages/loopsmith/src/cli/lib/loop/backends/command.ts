/**
 * Command backend — configurable shell command for custom models.
 *
 * The system and user prompts are joined and passed as the final argument;
 * the reply is whatever the command prints on stdout.
 */

import type { GenerateOptions, ModelBackend, ModelReply } from '../../../../lib/types.js';
import { spawnProcess, splitCommand, toModelReply } from './backend.js';

export class CommandBackend implements ModelBackend {
  name = 'command';

  constructor(
    private readonly command: string,
    private readonly workdir: string = process.cwd(),
  ) {}

  async generate(opts: GenerateOptions): Promise<ModelReply> {
    const { executable, args } = splitCommand(this.command);
    const prompt = opts.system ? `${opts.system}\n\n${opts.prompt}` : opts.prompt;

    const result = await spawnProcess(executable, [...args, prompt], {
      cwd: this.workdir,
      timeout: opts.timeoutMs,
      env: { LOOPSMITH_ROLE: opts.role },
    });

    return toModelReply(this.name, result, opts.timeoutMs);
  }
}
