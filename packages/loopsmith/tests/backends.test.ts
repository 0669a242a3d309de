/**
 * Backend tests: command templating, process result conversion, backend
 * detection, and the subprocess sandbox running small Node scripts.
 */

import { describe, it, expect } from 'vitest';
import { tmpdir } from 'node:os';

import { parseLoopConfig } from '../src/lib/config.js';
import { GenerationTimeoutError, LoopError, TransportError } from '../src/cli/lib/errors.js';
import {
  spawnProcess,
  splitCommand,
  toModelReply,
  type ProcessResult,
} from '../src/cli/lib/loop/backends/backend.js';
import { readClaudeEnvelope } from '../src/cli/lib/loop/backends/claude-code.js';
import { createModelBackend } from '../src/cli/lib/loop/backends/detect.js';
import {
  moduleName,
  renderCommand,
  SubprocessSandbox,
  TIMEOUT_EXIT_CODE,
  withPrelude,
} from '../src/cli/lib/loop/backends/sandbox.js';
import type { CodeArtifact } from '../src/lib/types.js';

// =============================================================================
// Templates
// =============================================================================

describe('command templates', () => {
  it('splits a command line on whitespace', () => {
    expect(splitCommand('  python  -m unittest ')).toEqual({ executable: 'python', args: ['-m', 'unittest'] });
    expect(() => splitCommand('   ')).toThrow('Empty command');
  });

  it('substitutes placeholders per argument', () => {
    expect(renderCommand('python -m unittest {test}', { test: 'test_calc.py' })).toEqual({
      executable: 'python',
      args: ['-m', 'unittest', 'test_calc.py'],
    });
    expect(renderCommand('pytest {module}_check {other}', { module: 'calc' })).toEqual({
      executable: 'pytest',
      args: ['calc_check', '{other}'],
    });
  });

  it('expands a list placeholder into one argument per entry', () => {
    expect(renderCommand('pip install --quiet {dependencies}', {}, { dependencies: ['numpy', 'requests'] })).toEqual({
      executable: 'pip',
      args: ['install', '--quiet', 'numpy', 'requests'],
    });
  });

  it('prepends the prelude once', () => {
    expect(moduleName('/a/b/calc.py')).toBe('calc');
    const once = withPrelude('x = 1\n', 'from {module} import *', 'calc');
    expect(once).toBe('from calc import *\nx = 1\n');
    expect(withPrelude(once, 'from {module} import *', 'calc')).toBe(once);
    expect(withPrelude('x = 1\n', '  ', 'calc')).toBe('x = 1\n');
  });
});

// =============================================================================
// Process Spawn
// =============================================================================

describe('spawnProcess', () => {
  it('keeps a multibyte character written across two chunks', async () => {
    // "é" is 0xc3 0xa9; the halves go out in separate writes
    const script =
      'process.stdout.write(Buffer.from([0xc3]));' +
      'setTimeout(() => process.stdout.write(Buffer.from([0xa9, 0x0a])), 100);';
    const result = await spawnProcess(process.execPath, ['-e', script], { cwd: tmpdir(), timeout: 10_000 });
    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe('é\n');
  });
});

// =============================================================================
// Model Replies
// =============================================================================

describe('toModelReply', () => {
  const base: ProcessResult = { exitCode: 0, stdout: 'reply', stderr: '', duration: 42, timedOut: false };

  it('returns stdout on success', () => {
    expect(toModelReply('command', base, 1000)).toEqual({ text: 'reply', durationMs: 42 });
  });

  it('throws GenerationTimeoutError on timeout', () => {
    expect(() => toModelReply('command', { ...base, timedOut: true }, 1000)).toThrow(GenerationTimeoutError);
  });

  it('throws TransportError on a failed or unstartable process', () => {
    const failed = (): unknown => {
      try {
        return toModelReply('claude-code', { ...base, exitCode: 2, stderr: 'invalid api key\n' }, 1000);
      } catch (e) {
        return e;
      }
    };
    const error = failed();
    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ message: 'claude-code exited with code 2: invalid api key', collaborator: 'model' });

    expect(() => toModelReply('codex', { ...base, exitCode: 127, spawnError: 'spawn codex ENOENT' }, 1000)).toThrow(
      'codex could not be started: spawn codex ENOENT',
    );
  });

  it('reads the Claude JSON envelope', () => {
    expect(readClaudeEnvelope('{"result": "hi", "usage": {"input_tokens": 3, "output_tokens": 4}}')).toEqual({
      text: 'hi',
      tokens: 7,
    });
    expect(readClaudeEnvelope('plain text')).toEqual({ text: 'plain text' });
  });
});

// =============================================================================
// Detection
// =============================================================================

describe('createModelBackend', () => {
  const none = () => false;

  it('prefers an OpenAI-compatible endpoint when its key is set', () => {
    const backend = createModelBackend(parseLoopConfig({}), { env: { LLM_API_KEY: 'test-secret' }, which: none });
    expect(backend.name).toBe('openai');
  });

  it('falls back to CLIs found on PATH', () => {
    const config = parseLoopConfig({});
    expect(createModelBackend(config, { env: {}, which: (c) => c === 'claude' }).name).toBe('claude-code');
    expect(createModelBackend(config, { env: {}, which: (c) => c === 'codex' }).name).toBe('codex');
  });

  it('throws E_BACKEND_UNAVAILABLE when nothing is available', () => {
    expect(() => createModelBackend(parseLoopConfig({}), { env: {}, which: none })).toThrow(LoopError);
    try {
      createModelBackend(parseLoopConfig({ model: { backend: 'openai' } }), { env: {}, which: none });
    } catch (e) {
      expect(e).toMatchObject({ code: 'E_BACKEND_UNAVAILABLE', exitCode: 2 });
    }
  });

  it('requires a command for the command backend', () => {
    expect(() => createModelBackend(parseLoopConfig({ model: { backend: 'command' } }), { env: {} })).toThrow(
      'The command backend requires model.command in config',
    );
    const backend = createModelBackend(parseLoopConfig({ model: { backend: 'command', command: 'my-llm --fast' } }));
    expect(backend.name).toBe('command');
  });
});

// =============================================================================
// Subprocess Sandbox
// =============================================================================

describe('SubprocessSandbox', () => {
  const source: CodeArtifact = { path: 'out/calc.js', content: 'exports.add = (a, b) => a + b;\n', dependencies: [] };

  function testFile(content: string): CodeArtifact {
    return { path: 'calc.test.js', content, dependencies: [] };
  }

  function sandbox(install: string | null = null): SubprocessSandbox {
    return new SubprocessSandbox({
      command: `${process.execPath} {test}`,
      install,
      installTimeoutMs: 10_000,
      testPrelude: '',
    });
  }

  it('runs the tests beside the source and reports a pass', async () => {
    const tests = testFile(
      'const { add } = require("./calc.js");\nif (add(2, 3) !== 5) process.exit(1);\nconsole.log("ok");\n',
    );
    expect(await sandbox().execute(source, tests, 10)).toEqual({
      exitCode: 0,
      stdout: 'ok\n',
      stderr: '',
      timedOut: false,
      passed: true,
    });
  });

  it('captures stderr and the exit code of a failing run', async () => {
    const tests = testFile('console.error("AssertionError: bad sum");\nprocess.exit(3);\n');
    const outcome = await sandbox().execute(source, tests, 10);
    expect(outcome.passed).toBe(false);
    expect(outcome.exitCode).toBe(3);
    expect(outcome.stderr).toBe('AssertionError: bad sum\n');
  });

  it('cuts off a run that exceeds the timeout', async () => {
    const outcome = await sandbox().execute(source, testFile('setTimeout(() => undefined, 30000);\n'), 1);
    expect(outcome.timedOut).toBe(true);
    expect(outcome.exitCode).toBe(TIMEOUT_EXIT_CODE);
    expect(outcome.passed).toBe(false);
  });

  it('returns a failing outcome when dependency installation fails', async () => {
    const withDeps: CodeArtifact = { ...source, dependencies: ['leftpad'] };
    const outcome = await sandbox(`${process.execPath} -e process.exit(3)`).execute(withDeps, testFile(''), 10);
    expect(outcome.passed).toBe(false);
    expect(outcome.timedOut).toBe(false);
    expect(outcome.exitCode).toBe(3);
    expect(outcome.stderr).toBe('dependency installation failed (exit code 3): leftpad\n');
  });

  it('throws TransportError when the test command cannot be started', async () => {
    const missing = new SubprocessSandbox({
      command: 'loopsmith-no-such-runner {test}',
      install: null,
      installTimeoutMs: 1000,
      testPrelude: '',
    });
    await expect(missing.execute(source, testFile(''), 5)).rejects.toBeInstanceOf(TransportError);
  });
});
