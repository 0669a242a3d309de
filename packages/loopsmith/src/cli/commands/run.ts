/**
 * `loopsmith run` - Generate a source file and its tests, then debug
 * them against each other until the tests pass.
 */

import { Command } from 'commander';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import { parseDuration } from '../../lib/config.js';
import { ERROR_CODE_EXIT_MAP } from '../../lib/types.js';
import { BaseCommand, resolveColor } from '../lib/base-command.js';
import { loadLoopConfig, type ConfigOverrides } from '../lib/config-loader.js';
import { errorMessage, LoopError } from '../lib/errors.js';
import { FileArtifactSink } from '../lib/loop/artifact-sink.js';
import { killAllActiveProcesses } from '../lib/loop/backends/backend.js';
import { createModelBackend } from '../lib/loop/backends/detect.js';
import { SubprocessSandbox } from '../lib/loop/backends/sandbox.js';
import { ConsoleReporter, silentReporter } from '../lib/loop/console-reporter.js';
import { Orchestrator, type LoopResult } from '../lib/loop/orchestrator.js';

// =============================================================================
// Options
// =============================================================================

interface RunOptions {
  file?: string;
  maxAttempts?: string;
  backend?: string;
  model?: string;
  out?: string;
  plan?: boolean; // Commander: --no-plan sets this to false
}

// =============================================================================
// Handler
// =============================================================================

class RunHandler extends BaseCommand {
  async run(words: string[], options: RunOptions): Promise<void> {
    const root = process.cwd();

    try {
      const requirement = await this.readRequirement(words, options);
      const config = await loadLoopConfig(root, this.overrides(options));

      const controller = new AbortController();
      const orchestrator = new Orchestrator({
        config,
        requirement,
        root,
        model: createModelBackend(config, { workdir: root }),
        sandbox: new SubprocessSandbox({
          command: config.sandbox.command,
          install: config.sandbox.install,
          installTimeoutMs: parseDuration(config.sandbox.install_timeout),
          testPrelude: config.sandbox.test_prelude,
        }),
        sink: new FileArtifactSink(resolve(root, config.artifacts.output_dir)),
        reporter: this.output.isJson || this.globals.quiet ? silentReporter : new ConsoleReporter(resolveColor(this.globals.color)),
        signal: controller.signal,
      });

      const onSignal = () => {
        controller.abort();
        killAllActiveProcesses();
      };
      process.once('SIGINT', onSignal);
      process.once('SIGTERM', onSignal);

      let result: LoopResult;
      try {
        result = await orchestrator.run();
      } finally {
        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);
      }

      this.output.data(result, () => {
        const colors = this.output.getColors();

        if (result.status === 'succeeded') {
          console.log(colors.bold(colors.success('Loop succeeded')));
        } else {
          console.log(colors.bold(colors.error(result.cancelled ? 'Loop cancelled' : 'Loop exhausted')));
        }
        console.log(`  Run ID:     ${result.runId}`);
        console.log(`  Attempts:   ${result.attempts}`);
        console.log(`  Model:      ${result.stats.modelCalls} calls, ${result.stats.tokens} tokens`);
        console.log(`  Message:    ${result.message}`);
        for (const path of result.persisted) {
          console.log(`  Wrote:      ${resolve(root, config.artifacts.output_dir, path)}`);
        }
        for (const err of result.persistErrors) {
          console.log(`  ${colors.warn('Not written:')} ${err}`);
        }

        if (result.history.length > 0) {
          console.log('');
          console.log(colors.bold('  History:'));
          for (const entry of result.history) {
            const status = entry.outcome.timedOut ? 'timed out' : `exit ${entry.outcome.exitCode}`;
            const applied = entry.applied.length > 0 ? ` → rewrote ${entry.applied.join(', ')}` : '';
            console.log(`    #${entry.attempt}: ${status}, ${colors.bold(entry.decision.verdict)}${applied}`);
            console.log(`      ${colors.dim(entry.decision.rationale)}`);
          }
        }
      });

      if (result.status === 'exhausted') {
        process.exitCode = result.cancelled ? ERROR_CODE_EXIT_MAP.E_CANCELLED : ERROR_CODE_EXIT_MAP.E_EXHAUSTED;
      }
    } catch (err: unknown) {
      if (err instanceof LoopError) {
        const code = err.code;
        const msg = err.message;
        this.output.data({ error: { code, message: msg } }, () => {
          const colors = this.output.getColors();
          console.error(colors.error(`Error [${code}]: ${msg}`));
        });
        process.exitCode = err.exitCode;
        return;
      }
      throw err;
    }
  }

  private async readRequirement(words: string[], options: RunOptions): Promise<string> {
    if (options.file) {
      try {
        const text = await readFile(options.file, 'utf-8');
        if (text.trim()) return text.trim();
      } catch (err: unknown) {
        throw new LoopError(`Cannot read requirement file ${options.file}: ${errorMessage(err)}`, 'E_INPUT_MISSING');
      }
    }
    const inline = words.join(' ').trim();
    if (inline) return inline;
    throw new LoopError('Provide a requirement as arguments or with --file <path>.', 'E_INPUT_MISSING');
  }

  // ===========================================================================
  // CLI Overrides
  // ===========================================================================

  private overrides(options: RunOptions): ConfigOverrides {
    const overrides: ConfigOverrides = {};
    const set = (section: string, key: string, value: unknown) => {
      overrides[section] = { ...overrides[section], [key]: value };
    };

    if (options.maxAttempts !== undefined) {
      const n = parseInt(options.maxAttempts, 10);
      if (isNaN(n) || n < 1) {
        throw new LoopError(`Invalid --max-attempts value: ${options.maxAttempts}`, 'E_CONFIG_INVALID');
      }
      set('loop', 'max_attempts', n);
    }
    if (options.plan === false) set('loop', 'plan', false);
    if (options.backend) set('model', 'backend', options.backend);
    if (options.model) set('model', 'name', options.model);
    if (options.out) set('artifacts', 'output_dir', options.out);

    return overrides;
  }
}

// =============================================================================
// Command Definition
// =============================================================================

export const runCommand = new Command('run')
  .description('Generate code and tests for a requirement, then debug until the tests pass')
  .argument('[requirement...]', 'Requirement text (or use --file)')
  .option('--file <path>', 'Read the requirement from a file')
  .option('--max-attempts <n>', 'Execution attempts before giving up')
  .option('--backend <name>', 'Model backend: auto, claude-code, codex, command, openai')
  .option('--model <name>', 'Model name for the openai backend')
  .option('--out <dir>', 'Directory for the final artifacts')
  .option('--no-plan', 'Use the requirement as the user story without a planning step')
  .action(async (words: string[], options: RunOptions, command: Command) => {
    const handler = new RunHandler(command);
    await handler.run(words, options);
  });
