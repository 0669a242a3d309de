/**
 * Subprocess execution sandbox.
 *
 * Each execution gets a fresh temp directory holding the source and test
 * files under their base names, optionally installs declared dependencies,
 * then runs the configured test command with a hard wall-clock cutoff.
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';

import { INSTALL_FAILURE_PREFIX } from '../../../../lib/arbitration/signals.js';
import type { CodeArtifact, ExecutionOutcome, SandboxBackend } from '../../../../lib/types.js';
import { TransportError } from '../../errors.js';
import { spawnProcess, splitCommand, type ProcessResult } from './backend.js';

/** Exit status reported for a run cut off by the timeout. */
export const TIMEOUT_EXIT_CODE = 124;

export interface SandboxOptions {
  /** Test command template: `{source}`, `{test}`, `{module}`. */
  command: string;
  /** Install command template: `{dependencies}` expands to one argument per package. */
  install: string | null;
  installTimeoutMs: number;
  /** Prepended to the test file; `{module}` is the source module name. */
  testPrelude: string;
}

// =============================================================================
// Templates
// =============================================================================

export function moduleName(path: string): string {
  return basename(path).replace(/\.[^.]+$/, '');
}

/** Prepend the rendered prelude unless the tests already start with it. */
export function withPrelude(content: string, prelude: string, module: string): string {
  if (prelude.trim() === '') return content;
  const rendered = prelude.replaceAll('{module}', module).replace(/\n*$/, '\n');
  return content.startsWith(rendered) ? content : `${rendered}${content}`;
}

/** Split a template into executable and arguments, then substitute placeholders per argument. */
export function renderCommand(
  template: string,
  vars: Record<string, string>,
  lists: Record<string, string[]> = {},
): { executable: string; args: string[] } {
  const { executable, args } = splitCommand(template);
  const sub = (token: string) => token.replace(/\{(\w+)\}/g, (whole, key: string) => vars[key] ?? whole);
  const expanded = args.flatMap((arg) => {
    const list = /^\{(\w+)\}$/.exec(arg)?.[1];
    const values = list === undefined ? undefined : lists[list];
    return values ?? [sub(arg)];
  });
  return { executable: sub(executable), args: expanded };
}

// =============================================================================
// Sandbox
// =============================================================================

export class SubprocessSandbox implements SandboxBackend {
  name = 'subprocess';

  constructor(private readonly opts: SandboxOptions) {}

  async execute(source: CodeArtifact, tests: CodeArtifact, timeoutSeconds: number): Promise<ExecutionOutcome> {
    const dir = await mkdtemp(join(tmpdir(), 'loopsmith-exec-'));
    try {
      const sourceFile = basename(source.path);
      let testFile = basename(tests.path);
      if (testFile === sourceFile) testFile = `test_${testFile}`;
      const module = moduleName(sourceFile);

      await writeFile(join(dir, sourceFile), source.content, 'utf-8');
      await writeFile(join(dir, testFile), withPrelude(tests.content, this.opts.testPrelude, module), 'utf-8');

      const dependencies = [...new Set([...source.dependencies, ...tests.dependencies])];
      if (dependencies.length > 0 && this.opts.install) {
        const install = renderCommand(this.opts.install, {}, { dependencies });
        const result = await this.run(install.executable, install.args, dir, this.opts.installTimeoutMs);
        if (result.timedOut || result.exitCode !== 0) {
          const reason = result.timedOut ? 'timed out' : `exit code ${result.exitCode}`;
          return {
            exitCode: result.exitCode === 0 ? 1 : result.exitCode,
            stdout: result.stdout,
            stderr: `${INSTALL_FAILURE_PREFIX} (${reason}): ${dependencies.join(' ')}\n${result.stderr}`,
            timedOut: false,
            passed: false,
          };
        }
      }

      const test = renderCommand(this.opts.command, { source: sourceFile, test: testFile, module });
      const result = await this.run(test.executable, test.args, dir, timeoutSeconds * 1000);
      const exitCode = result.timedOut ? TIMEOUT_EXIT_CODE : result.exitCode;
      return {
        exitCode,
        stdout: result.stdout,
        stderr: result.stderr,
        timedOut: result.timedOut,
        passed: !result.timedOut && exitCode === 0,
      };
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }

  private async run(executable: string, args: string[], cwd: string, timeout: number): Promise<ProcessResult> {
    const result = await spawnProcess(executable, args, { cwd, timeout });
    if (result.spawnError) {
      throw new TransportError(`sandbox command "${executable}" could not be started: ${result.spawnError}`, 'sandbox');
    }
    return result;
  }
}
