/**
 * Structured run log (run-log.yml) writer.
 *
 * Updated at each attempt and at the end of a run; `loopsmith runs` reads it.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { writeFile } from 'atomically';
import { parse as yamlParse, stringify as yamlStringify } from 'yaml';

import {
  RunLogSchema,
  type ExecutionOutcome,
  type LoopPhaseType,
  type RunLog,
  type RunLogAttempt,
  type RunStats,
} from '../../../lib/types.js';

export const RUN_LOG_FILENAME = 'run-log.yml';

export class RunLogWriter {
  private readonly logPath: string;
  private log: RunLog;

  constructor(runDir: string, runId: string, requirement: string, maxAttempts: number) {
    this.logPath = join(runDir, RUN_LOG_FILENAME);
    this.log = {
      runId,
      requirement,
      startedAt: new Date().toISOString(),
      status: 'in_progress',
      phase: 'GENERATING',
      maxAttempts,
      attempts: [],
    };
  }

  setPhase(phase: LoopPhaseType): void {
    this.log.phase = phase;
  }

  /** Record an execution attempt. */
  recordAttempt(attempt: number, startedAt: string, outcome: ExecutionOutcome): void {
    const entry: RunLogAttempt = {
      attempt,
      startedAt,
      exitCode: outcome.exitCode,
      timedOut: outcome.timedOut,
      passed: outcome.passed,
      applied: [],
    };
    this.log.attempts.push(entry);
  }

  /** Update the latest attempt (verdict, applied artifacts). */
  updateAttempt(updates: Partial<RunLogAttempt>): void {
    const current = this.log.attempts[this.log.attempts.length - 1];
    if (current) {
      Object.assign(current, updates);
    }
  }

  /** Mark the run finished. */
  finish(status: 'succeeded' | 'exhausted' | 'failed', stats: RunStats, failure?: string): void {
    this.log.status = status;
    this.log.completedAt = new Date().toISOString();
    this.log.stats = stats;
    if (failure) this.log.failure = failure;

    const start = new Date(this.log.startedAt).getTime();
    const end = new Date(this.log.completedAt).getTime();
    this.log.totalDuration = formatDuration(end - start);
  }

  /** Write the run log to disk. */
  async flush(): Promise<void> {
    await writeFile(this.logPath, yamlStringify(this.log), 'utf-8');
  }

  /** Get the current log state (for status display). */
  getLog(): RunLog {
    return this.log;
  }
}

/** Read and validate a run log from a run directory. */
export async function readRunLog(runDir: string): Promise<RunLog> {
  const content = await readFile(join(runDir, RUN_LOG_FILENAME), 'utf-8');
  return RunLogSchema.parse(yamlParse(content));
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const secs = Math.floor(ms / 1000);
  if (secs < 60) return `${secs}s`;
  const mins = Math.floor(secs / 60);
  return `${mins}m${secs % 60}s`;
}
