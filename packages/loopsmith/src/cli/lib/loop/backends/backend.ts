/**
 * Shared process utilities for model CLIs and the execution sandbox.
 */

import { spawn, type ChildProcess } from 'node:child_process';

import type { ModelReply } from '../../../../lib/types.js';
import { GenerationTimeoutError, TransportError } from '../../errors.js';

// =============================================================================
// Shared Process Spawn
// =============================================================================

const MAX_OUTPUT_CHARS = 200_000;
const KILL_GRACE_MS = 5_000;

// =============================================================================
// Active Process Registry (for signal handler cleanup)
// =============================================================================

const activeProcesses = new Map<number, ChildProcess>();

/** Kill all active child process groups. Used by signal handler. */
export function killAllActiveProcesses(): void {
  for (const [, proc] of activeProcesses) {
    killProcessGroup(proc);
  }
}

export interface ProcessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
  /** Set when the executable could not be started at all. */
  spawnError?: string;
}

export interface SpawnOptions {
  cwd: string;
  /** Wall-clock bound in milliseconds. */
  timeout: number;
  env?: Record<string, string>;
  /** Written to stdin, which is then closed. */
  input?: string;
}

/** Keep the tail of a stream once it grows past the cap. */
class TailBuffer {
  private text = '';

  push(chunk: string): void {
    this.text += chunk;
    if (this.text.length > MAX_OUTPUT_CHARS) {
      this.text = this.text.slice(this.text.length - MAX_OUTPUT_CHARS);
    }
  }

  toString(): string {
    return this.text;
  }
}

/**
 * Spawn a process with:
 * - detached process group (for clean tree-kill)
 * - separate stdout and stderr capture, tail-capped
 * - external timeout via SIGTERM → grace → SIGKILL
 */
export function spawnProcess(command: string, args: string[], opts: SpawnOptions): Promise<ProcessResult> {
  return new Promise((resolve) => {
    const startTime = Date.now();
    let timedOut = false;

    const proc: ChildProcess = spawn(command, args, {
      cwd: opts.cwd,
      detached: true,
      env: { ...process.env, ...opts.env },
      stdio: [opts.input === undefined ? 'ignore' : 'pipe', 'pipe', 'pipe'],
    });

    // Track for signal handler cleanup
    const pid = proc.pid;
    if (pid) activeProcesses.set(pid, proc);

    const stdout = new TailBuffer();
    const stderr = new TailBuffer();
    // Decode per stream so a multibyte character split across chunks survives
    proc.stdout?.setEncoding('utf8');
    proc.stderr?.setEncoding('utf8');
    proc.stdout?.on('data', (chunk: string) => stdout.push(chunk));
    proc.stderr?.on('data', (chunk: string) => stderr.push(chunk));

    if (opts.input !== undefined && proc.stdin) {
      // EPIPE when the child exits without reading; the close handler reports the exit
      proc.stdin.on('error', () => undefined);
      proc.stdin.end(opts.input);
    }

    // Timeout handler
    const timeoutId = setTimeout(() => {
      timedOut = true;
      killProcessGroup(proc);
    }, opts.timeout);

    proc.on('close', (code) => {
      clearTimeout(timeoutId);
      if (pid) activeProcesses.delete(pid);
      resolve({
        exitCode: code ?? 1,
        stdout: stdout.toString(),
        stderr: stderr.toString(),
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    proc.on('error', (err) => {
      clearTimeout(timeoutId);
      if (pid) activeProcesses.delete(pid);
      resolve({
        exitCode: 127,
        stdout: stdout.toString(),
        stderr: stderr.toString(),
        duration: Date.now() - startTime,
        timedOut: false,
        spawnError: err.message,
      });
    });
  });
}

/**
 * Kill a process group: SIGTERM → grace period → SIGKILL.
 */
export function killProcessGroup(proc: ChildProcess): void {
  const pid = proc.pid;
  if (!pid) return;

  try {
    // Send SIGTERM to the entire process group
    process.kill(-pid, 'SIGTERM');
  } catch {
    // Process may already be dead
    return;
  }

  // Force kill after grace period
  setTimeout(() => {
    try {
      process.kill(-pid, 'SIGKILL');
    } catch {
      // Process already exited
    }
  }, KILL_GRACE_MS).unref();
}

/** Split a configured command line into executable and arguments. */
export function splitCommand(command: string): { executable: string; args: string[] } {
  const parts = command.trim().split(/\s+/).filter((p) => p.length > 0);
  const [executable, ...args] = parts;
  if (!executable) throw new Error('Empty command');
  return { executable, args };
}

/**
 * Convert a model CLI's ProcessResult into a ModelReply.
 * Throws on timeout, spawn failure or non-zero exit.
 */
export function toModelReply(backend: string, result: ProcessResult, timeoutMs: number): ModelReply {
  if (result.timedOut) {
    throw new GenerationTimeoutError(`${backend} did not answer within ${timeoutMs}ms`, timeoutMs);
  }
  if (result.spawnError) {
    throw new TransportError(`${backend} could not be started: ${result.spawnError}`, 'model');
  }
  if (result.exitCode !== 0) {
    const tail = (result.stderr || result.stdout).trim().split('\n').slice(-5).join('\n');
    throw new TransportError(`${backend} exited with code ${result.exitCode}${tail ? `: ${tail}` : ''}`, 'model');
  }
  return { text: result.stdout, durationMs: result.duration };
}
