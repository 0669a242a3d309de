/**
 * Claude Code backend implementation.
 *
 * Spawns `claude -p "..." --append-system-prompt "..." --output-format json`
 * and reads the final message and token usage from the JSON envelope.
 */

import { z } from 'zod';

import type { GenerateOptions, ModelBackend, ModelReply } from '../../../../lib/types.js';
import { spawnProcess, toModelReply } from './backend.js';

const ClaudeEnvelopeSchema = z.object({
  result: z.string(),
  usage: z
    .object({
      input_tokens: z.number().default(0),
      output_tokens: z.number().default(0),
    })
    .optional(),
});

/** Pull the reply out of the `--output-format json` envelope; raw stdout otherwise. */
export function readClaudeEnvelope(stdout: string): { text: string; tokens?: number } {
  try {
    const parsed = ClaudeEnvelopeSchema.safeParse(JSON.parse(stdout));
    if (parsed.success) {
      const usage = parsed.data.usage;
      return {
        text: parsed.data.result,
        ...(usage ? { tokens: usage.input_tokens + usage.output_tokens } : {}),
      };
    }
  } catch {
    // Not JSON: an older CLI or a text wrapper
  }
  return { text: stdout };
}

export class ClaudeCodeBackend implements ModelBackend {
  name = 'claude-code';

  constructor(private readonly workdir: string = process.cwd()) {}

  async generate(opts: GenerateOptions): Promise<ModelReply> {
    const args = ['-p', opts.prompt, '--output-format', 'json'];
    if (opts.system) {
      args.push('--append-system-prompt', opts.system);
    }

    const result = await spawnProcess('claude', args, {
      cwd: this.workdir,
      timeout: opts.timeoutMs,
    });

    const reply = toModelReply(this.name, result, opts.timeoutMs);
    return { ...reply, ...readClaudeEnvelope(reply.text) };
  }
}
