/**
 * Resolve the configured model backend.
 *
 * `auto` prefers an OpenAI-compatible endpoint when its key is set, then
 * `claude`, then `codex` on PATH.
 */

import { execFileSync } from 'node:child_process';

import type { LoopConfig } from '../../../../lib/config.js';
import type { ModelBackend } from '../../../../lib/types.js';
import { LoopError } from '../../errors.js';
import { ClaudeCodeBackend } from './claude-code.js';
import { CodexBackend } from './codex.js';
import { CommandBackend } from './command.js';
import { OpenAIBackend } from './openai.js';

export function isInPath(command: string): boolean {
  try {
    execFileSync('which', [command], { stdio: 'ignore' });
    return true;
  } catch {
    return false;
  }
}

export interface DetectOptions {
  env?: NodeJS.ProcessEnv;
  /** PATH probe, replaceable in tests. */
  which?: (command: string) => boolean;
  workdir?: string;
}

function unavailable(message: string): LoopError {
  return new LoopError(message, 'E_BACKEND_UNAVAILABLE');
}

/**
 * Detect and create the model backend.
 */
export function createModelBackend(config: LoopConfig, opts: DetectOptions = {}): ModelBackend {
  const env = opts.env ?? process.env;
  const which = opts.which ?? isInPath;
  const model = config.model;
  const apiKey = env[model.api_key_env];

  const openai = (key: string) =>
    new OpenAIBackend({ apiKey: key, model: model.name, baseURL: model.base_url, temperature: model.temperature });

  switch (model.backend) {
    case 'command':
      if (!model.command) {
        throw unavailable('The command backend requires model.command in config');
      }
      return new CommandBackend(model.command, opts.workdir);

    case 'openai':
      if (!apiKey) {
        throw unavailable(`The openai backend requires an API key in $${model.api_key_env}`);
      }
      return openai(apiKey);

    case 'claude-code':
      if (!which('claude')) {
        throw unavailable('Claude Code CLI not found in PATH. Install: npm install -g @anthropic-ai/claude-code');
      }
      return new ClaudeCodeBackend(opts.workdir);

    case 'codex':
      if (!which('codex')) {
        throw unavailable('Codex CLI not found in PATH. Install: npm install -g @openai/codex');
      }
      return new CodexBackend(opts.workdir);

    case 'auto':
      if (apiKey) return openai(apiKey);
      if (which('claude')) return new ClaudeCodeBackend(opts.workdir);
      if (which('codex')) return new CodexBackend(opts.workdir);
      throw unavailable(
        'No model backend available. Configure one of:\n' +
          `  - an OpenAI-compatible endpoint: export ${model.api_key_env}=...\n` +
          '  - Claude Code: npm install -g @anthropic-ai/claude-code\n' +
          '  - Codex: npm install -g @openai/codex',
      );
  }
}
