/**
 * Codex CLI backend implementation.
 *
 * Spawns `codex exec "..." --sandbox read-only --ask-for-approval never --ephemeral`.
 * Codex has no separate system prompt, so it is prepended.
 */

import type { GenerateOptions, ModelBackend, ModelReply } from '../../../../lib/types.js';
import { spawnProcess, toModelReply } from './backend.js';

export class CodexBackend implements ModelBackend {
  name = 'codex';

  constructor(private readonly workdir: string = process.cwd()) {}

  async generate(opts: GenerateOptions): Promise<ModelReply> {
    const prompt = opts.system ? `${opts.system}\n\n${opts.prompt}` : opts.prompt;

    const args = [
      'exec',
      prompt,
      '--cd',
      this.workdir,
      '--sandbox',
      'read-only',
      '--ask-for-approval',
      'never',
      '--ephemeral',
    ];

    const result = await spawnProcess('codex', args, {
      cwd: this.workdir,
      timeout: opts.timeoutMs,
    });

    return toModelReply(this.name, result, opts.timeoutMs);
  }
}
