/**
 * Failure signals read from an execution log.
 *
 * Understands Python tracebacks (`File "x", line N`) and Node stack frames
 * (`at f (x.js:1:2)`). Each exception line becomes one signal, attributed to
 * the source or the test file by the deepest frame that names one of them.
 */

import type { CodeArtifact, ExecutionOutcome } from '../types.js';

export type SignalKind =
  | 'assertion'
  | 'undefined-name'
  | 'missing-attribute'
  | 'signature-mismatch'
  | 'syntax'
  | 'missing-module'
  | 'runtime'
  | 'environment';

export type SignalLocus = 'source' | 'test' | 'unknown';

export interface FailureSignal {
  kind: SignalKind;
  locus: SignalLocus;
  /** Exception type, e.g. `NameError`. */
  errorType: string;
  message: string;
  /** Identifier the message is about, when it names one. */
  name?: string;
}

export interface SignalContext {
  source: CodeArtifact;
  tests: CodeArtifact;
}

/** Prefix the sandbox puts on stderr when the install step fails. */
export const INSTALL_FAILURE_PREFIX = 'dependency installation failed';

const EXCEPTION_LINE = /^\s*(?:[A-Za-z_][\w.]*\.)?((?:[A-Z]\w*)?(?:Error|Exception|Exit|Interrupt))(?:\s*\[[A-Z_]+\])?(?::\s?(.*))?$/;
const PYTHON_FRAME = /^\s*File "([^"]+)", line \d+/;
const NODE_FRAME = /^\s*at (?:.*?\()?((?:file:\/\/)?[^()\s]+?):\d+(?::\d+)?\)?$/;

const ENVIRONMENT_ERRORS = new Set([
  'MemoryError',
  'PermissionError',
  'OSError',
  'ConnectionError',
  'ConnectionRefusedError',
  'TimeoutError',
  'KeyboardInterrupt',
  'SystemExit',
  'RecursionError',
]);

// =============================================================================
// Locus
// =============================================================================

function basename(path: string): string {
  const parts = path.split(/[\\/]/);
  return parts[parts.length - 1] ?? path;
}

function stem(path: string): string {
  return basename(path).replace(/\.[^.]+$/, '');
}

function locusOf(file: string, ctx: SignalContext): SignalLocus | null {
  const name = basename(file);
  if (name === basename(ctx.source.path)) return 'source';
  if (name === basename(ctx.tests.path)) return 'test';
  return null;
}

/**
 * Python prints frames before the exception, deepest last; Node prints them
 * after, deepest first.
 */
function findLocus(lines: string[], index: number, previous: number, ctx: SignalContext): SignalLocus {
  for (let i = index - 1; i > previous; i--) {
    const file = PYTHON_FRAME.exec(lines[i] ?? '')?.[1];
    const locus = file ? locusOf(file, ctx) : null;
    if (locus) return locus;
  }
  for (let i = index + 1; i < lines.length; i++) {
    const line = lines[i] ?? '';
    if (!/^\s+at /.test(line)) break;
    const file = NODE_FRAME.exec(line)?.[1];
    const locus = file ? locusOf(file, ctx) : null;
    if (locus) return locus;
  }
  return 'unknown';
}

// =============================================================================
// Classification
// =============================================================================

function quoted(message: string): string | undefined {
  return /['"]([^'"]+)['"]/.exec(message)?.[1];
}

function normalizePackage(name: string): string {
  return name.toLowerCase().replace(/-/g, '_');
}

function classify(
  errorType: string,
  message: string,
  ctx: SignalContext,
): Pick<FailureSignal, 'kind' | 'name'> {
  if (ENVIRONMENT_ERRORS.has(errorType)) return { kind: 'environment' };

  if (errorType === 'AssertionError') return { kind: 'assertion' };

  if (errorType === 'SyntaxError' || errorType === 'IndentationError' || errorType === 'TabError') {
    return { kind: 'syntax' };
  }

  if (errorType === 'ModuleNotFoundError' || /Cannot find (?:module|package)/.test(message)) {
    const name = quoted(message);
    const top = name?.split(/[./]/)[0];
    const declared = top !== undefined && ctx.source.dependencies.some((d) => normalizePackage(d) === normalizePackage(top));
    return { kind: declared ? 'environment' : 'missing-module', ...(name ? { name } : {}) };
  }

  if (errorType === 'ImportError') {
    const name = /cannot import name ['"]?(\w+)/.exec(message)?.[1];
    return name ? { kind: 'missing-attribute', name } : { kind: 'missing-module' };
  }

  if (errorType === 'NameError' || errorType === 'UnboundLocalError' || errorType === 'ReferenceError') {
    const name = /name ['"](\w+)['"]/.exec(message)?.[1] ?? /^(\w+) is not defined/.exec(message)?.[1];
    return { kind: 'undefined-name', ...(name ? { name } : {}) };
  }

  if (errorType === 'AttributeError') {
    const name = /has no attribute ['"](\w+)['"]/.exec(message)?.[1];
    return { kind: 'missing-attribute', ...(name ? { name } : {}) };
  }

  if (errorType === 'TypeError') {
    const signature =
      /(\w+)\(\) (?:takes|missing|got an unexpected|got multiple|takes no)/.exec(message)?.[1];
    if (signature) return { kind: 'signature-mismatch', name: signature };
    const notFunction = /(?:^|\.)(\w+) is not a (?:function|constructor)/.exec(message)?.[1];
    if (notFunction) return { kind: 'missing-attribute', name: notFunction };
  }

  return { kind: 'runtime' };
}

// =============================================================================
// Extraction
// =============================================================================

/** Short human-readable form, used as decision evidence. */
export function describeSignal(signal: FailureSignal): string {
  const message = signal.message ? `: ${signal.message}` : '';
  return `${signal.kind} in ${signal.locus} (${signal.errorType}${message})`;
}

export function extractSignals(outcome: ExecutionOutcome, ctx: SignalContext): FailureSignal[] {
  const signals: FailureSignal[] = [];
  const seen = new Set<string>();
  const push = (signal: FailureSignal) => {
    const key = `${signal.kind}|${signal.locus}|${signal.errorType}|${signal.message}`;
    if (seen.has(key)) return;
    seen.add(key);
    signals.push(signal);
  };

  if (outcome.stderr.startsWith(INSTALL_FAILURE_PREFIX)) {
    push({ kind: 'environment', locus: 'unknown', errorType: 'InstallError', message: INSTALL_FAILURE_PREFIX });
  }
  if (outcome.timedOut) {
    push({ kind: 'environment', locus: 'unknown', errorType: 'Timeout', message: 'execution timed out' });
  }

  const lines = `${outcome.stderr}\n${outcome.stdout}`.split('\n');
  let previous = -1;
  for (let i = 0; i < lines.length; i++) {
    const match = EXCEPTION_LINE.exec(lines[i] ?? '');
    const errorType = match?.[1];
    if (!match || !errorType) continue;
    const message = (match[2] ?? '').trim();
    const { kind, name } = classify(errorType, message, ctx);
    push({
      kind,
      locus: findLocus(lines, i, previous, ctx),
      errorType,
      message,
      ...(name ? { name } : {}),
    });
    previous = i;
  }

  return signals;
}
