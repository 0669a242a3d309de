/**
 * Debug arbitration: decide which artifact a failing execution implicates.
 *
 * Authority runs UserStory > Logic > Artifact. A test is not trusted to
 * judge the source until a previous cycle has regenerated it against the
 * user story ("reconciled"); until then an unexplained expectation mismatch
 * is charged to the test. Pure: identical inputs give identical decisions.
 */

import type { CycleState, DebugDecision, ExecutionOutcome, VerdictType } from '../types.js';
import { describeSignal, extractSignals, type FailureSignal } from './signals.js';

interface Proposal {
  verdict: Exclude<VerdictType, 'VETO'>;
  reason: string;
}

// =============================================================================
// Helpers
// =============================================================================

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function mentions(text: string, name: string): boolean {
  return new RegExp(`(?<![\\w])${escapeRegExp(name)}(?![\\w])`, 'i').test(text);
}

/** Whether the source defines `name` at all (function, class, or binding). */
export function definesName(content: string, name: string): boolean {
  const n = escapeRegExp(name);
  return new RegExp(
    `(?:\\b(?:def|class|function|const|let|var)\\s+${n}\\b)|(?:^[ \\t]*${n}\\s*=(?!=))`,
    'm',
  ).test(content);
}

/** The test has been regenerated by an earlier cycle. */
export function isReconciled(state: Pick<CycleState, 'history'>): boolean {
  return state.history.some((entry) => entry.applied.includes('tests'));
}

function hierarchy(reconciled: boolean, detail: string): Proposal {
  return reconciled
    ? {
        verdict: 'FIX_SOURCE',
        reason: `the reconciled test encodes the user story and the source logic still violates it (${detail})`,
      }
    : {
        verdict: 'FIX_TEST',
        reason: `the test's expectation is not yet verified against the user story, so it is corrected before it may judge the source (${detail})`,
      };
}

// =============================================================================
// Per-Signal Policy
// =============================================================================

function propose(signal: FailureSignal, state: CycleState, reconciled: boolean): Proposal | null {
  const detail = describeSignal(signal);

  switch (signal.kind) {
    case 'assertion':
      return hierarchy(reconciled, detail);

    case 'syntax':
    case 'missing-module':
      if (signal.locus === 'test') return { verdict: 'FIX_TEST', reason: `the test is not valid logic (${detail})` };
      if (signal.locus === 'source') return { verdict: 'FIX_SOURCE', reason: `the source is not valid logic (${detail})` };
      return null;

    case 'undefined-name': {
      if (signal.locus === 'source') {
        return { verdict: 'FIX_SOURCE', reason: `the source references a name it never defines (${detail})` };
      }
      const name = signal.name;
      if (name && mentions(state.userStory, name) && !definesName(state.source.content, name)) {
        return {
          verdict: 'FIX_SOURCE',
          reason: `the user story requires "${name}" but the source does not define it (${detail})`,
        };
      }
      return { verdict: 'FIX_TEST', reason: `the test uses a name the user story does not require (${detail})` };
    }

    case 'missing-attribute':
    case 'signature-mismatch': {
      if (signal.locus === 'source') {
        return { verdict: 'FIX_SOURCE', reason: `the source violates its own interface (${detail})` };
      }
      const name = signal.name;
      // The source already has the name; only a reconciled test may say its shape is wrong
      if (name && definesName(state.source.content, name)) return hierarchy(reconciled, detail);
      if (name && mentions(state.userStory, name)) {
        return {
          verdict: 'FIX_SOURCE',
          reason: `the user story names "${name}" but the source does not define it (${detail})`,
        };
      }
      return {
        verdict: 'FIX_BOTH',
        reason: `source and test disagree on an API contract the user story does not settle (${detail})`,
      };
    }

    case 'runtime':
      if (signal.locus === 'test') return { verdict: 'FIX_TEST', reason: `the test itself fails to run (${detail})` };
      if (signal.locus === 'source') return hierarchy(reconciled, detail);
      return null;

    case 'environment':
      return null;
  }
}

function combine(proposals: Proposal[]): VerdictType {
  const verdicts = new Set(proposals.map((p) => p.verdict));
  if (verdicts.has('FIX_BOTH') || (verdicts.has('FIX_TEST') && verdicts.has('FIX_SOURCE'))) return 'FIX_BOTH';
  return proposals[0]?.verdict ?? 'VETO';
}

// =============================================================================
// Arbitrate
// =============================================================================

export function arbitrate(outcome: ExecutionOutcome, state: CycleState): DebugDecision {
  if (outcome.passed) {
    return { verdict: 'VETO', rationale: 'execution passed; nothing to change', evidence: [] };
  }

  const signals = extractSignals(outcome, { source: state.source, tests: state.tests });
  const evidence = signals.map(describeSignal);
  const reconciled = isReconciled(state);
  const proposals = signals
    .map((s) => propose(s, state, reconciled))
    .filter((p): p is Proposal => p !== null);

  if (proposals.length === 0) {
    const previous = state.history[state.history.length - 1];
    const reproduced =
      previous !== undefined &&
      previous.decision.verdict === 'VETO' &&
      !previous.outcome.passed &&
      previous.outcome.exitCode === outcome.exitCode &&
      previous.outcome.timedOut === outcome.timedOut;

    if (reproduced) {
      const p = hierarchy(reconciled, `exit code ${outcome.exitCode} reproduced after an unchanged retry`);
      return { verdict: p.verdict, rationale: `failure is reproducible, so it is a logic fault: ${p.reason}`, evidence };
    }

    const cause = outcome.timedOut ? 'timed out without a logic signal' : `exited with code ${outcome.exitCode}`;
    return {
      verdict: 'VETO',
      rationale: `execution ${cause} and the failure cannot be attributed to either artifact; retrying unchanged`,
      evidence,
    };
  }

  const verdict = combine(proposals);
  const reasons = [...new Set(proposals.map((p) => p.reason))];
  return { verdict, rationale: reasons.join('; '), evidence };
}
