/**
 * Real-time console reporter for loop milestones.
 *
 * Prints major loop events to stderr so the user isn't blind while the
 * run is in flight. Uses stderr to keep stdout clean for structured/JSON
 * output.
 */

import type { AgentRoleType, DebugDecision, ExecutionOutcome, RunStats } from '../../../lib/types.js';
import { createColors, type Colors } from '../output.js';
import { formatDuration } from './run-log.js';

/** Milestones the orchestrator reports. */
export interface LoopReporter {
  runStarted(runId: string, requirement: string): void;
  phaseStarted(phase: string, attempt: number): void;
  agentFinished(role: AgentRoleType, durationMs: number): void;
  extractionRetry(role: AgentRoleType, retry: number, reason: string): void;
  executionFinished(attempt: number, outcome: ExecutionOutcome): void;
  decision(attempt: number, decision: DebugDecision): void;
  adviceOverruled(advised: string, verdict: string): void;
  runSucceeded(attempts: number, stats: RunStats): void;
  runExhausted(attempts: number, cancelled: boolean): void;
  runFailed(message: string): void;
  warning(message: string): void;
}

function firstLine(text: string): string {
  const line = text.split('\n').find((l) => l.trim() !== '') ?? '';
  return line.length > 100 ? `${line.slice(0, 97)}...` : line;
}

export class ConsoleReporter implements LoopReporter {
  private readonly c: Colors;
  private readonly prefix: string;

  constructor(color: boolean) {
    this.c = createColors(color);
    this.prefix = this.c.dim('[loopsmith]');
  }

  private log(msg: string): void {
    console.error(`${this.prefix} ${this.c.dim(new Date().toLocaleTimeString())} ${msg}`);
  }

  runStarted(runId: string, requirement: string): void {
    this.log(`${this.c.bold('Run started')} ${this.c.dim(runId)}`);
    this.log(`  Requirement: ${firstLine(requirement)}`);
  }

  phaseStarted(phase: string, attempt: number): void {
    const suffix = attempt > 0 ? ` ${this.c.dim(`(attempt ${attempt})`)}` : '';
    this.log(`${this.c.id('→')} Phase: ${this.c.bold(phase)}${suffix}`);
  }

  agentFinished(role: AgentRoleType, durationMs: number): void {
    this.log(`  ${this.c.success('✓')} ${role} replied ${this.c.dim(formatDuration(durationMs))}`);
  }

  extractionRetry(role: AgentRoleType, retry: number, reason: string): void {
    this.log(`  ${this.c.warn('↻')} Re-asking ${role} (retry ${retry}): ${reason}`);
  }

  executionFinished(attempt: number, outcome: ExecutionOutcome): void {
    if (outcome.passed) {
      this.log(`  ${this.c.success('✓')} Tests passed ${this.c.dim(`(attempt ${attempt})`)}`);
      return;
    }
    const why = outcome.timedOut ? 'timed out' : `exit ${outcome.exitCode}`;
    this.log(`  ${this.c.error('✗')} Tests failed ${this.c.dim(`(attempt ${attempt}, ${why})`)}`);
  }

  decision(attempt: number, decision: DebugDecision): void {
    this.log(`  ${this.c.label('⚖')} ${this.c.bold(decision.verdict)} ${this.c.dim(`(attempt ${attempt})`)}`);
    this.log(`    ${this.c.dim(firstLine(decision.rationale))}`);
  }

  adviceOverruled(advised: string, verdict: string): void {
    this.log(`  ${this.c.warn('⚠')} Debugger advised ${advised}; applying ${verdict}`);
  }

  runSucceeded(attempts: number, stats: RunStats): void {
    this.log(
      `${this.c.success(this.c.bold('✓ Loop succeeded'))} — ${attempts} attempt(s), ${stats.modelCalls} model calls`,
    );
  }

  runExhausted(attempts: number, cancelled: boolean): void {
    const why = cancelled ? 'cancelled' : `no passing run in ${attempts} attempt(s)`;
    this.log(`${this.c.warn(this.c.bold('✗ Loop exhausted'))} — ${why}`);
  }

  runFailed(message: string): void {
    this.log(`${this.c.error(this.c.bold('✗ Run failed'))} — ${message}`);
  }

  warning(message: string): void {
    this.log(`${this.c.warn('⚠')} ${message}`);
  }
}

/** Reporter that prints nothing (tests, --json runs). */
export const silentReporter: LoopReporter = {
  runStarted: () => undefined,
  phaseStarted: () => undefined,
  agentFinished: () => undefined,
  extractionRetry: () => undefined,
  executionFinished: () => undefined,
  decision: () => undefined,
  adviceOverruled: () => undefined,
  runSucceeded: () => undefined,
  runExhausted: () => undefined,
  runFailed: () => undefined,
  warning: () => undefined,
};
