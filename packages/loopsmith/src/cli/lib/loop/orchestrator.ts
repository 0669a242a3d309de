/**
 * Orchestration loop state machine for `loopsmith run`.
 *
 * GENERATING → EXECUTING → ARBITRATING → (SUCCEEDED | FIXING → EXECUTING)
 * until the tests pass or the attempt budget is spent (EXHAUSTED).
 * One step is in flight at a time; CycleState is owned here for the
 * lifetime of the run and never shared.
 */

import { mkdir } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { z } from 'zod';

import { arbitrate } from '../../../lib/arbitration/arbiter.js';
import type { LoopConfig } from '../../../lib/config.js';
import { getModelTimeoutMs, getSandboxTimeoutSeconds } from '../../../lib/config.js';
import { extract } from '../../../lib/extract/parser.js';
import { fieldCode, fieldDecision, fieldJson, fieldText } from '../../../lib/extract/result.js';
import {
  CODER_SCHEMA,
  DEBUGGER_SCHEMA,
  PLANNER_SCHEMA,
  TESTER_SCHEMA,
} from '../../../lib/extract/schemas.js';
import { runDir } from '../../../lib/paths.js';
import type {
  AgentRoleType,
  AgentSchema,
  ArtifactRoleType,
  ArtifactSink,
  CodeArtifact,
  CycleState,
  DebugDecision,
  DebugTargetType,
  ExecutionOutcome,
  ExtractionResult,
  HistoryEntry,
  ModelBackend,
  ModelReply,
  RunStats,
  SandboxBackend,
  VerdictType,
} from '../../../lib/types.js';
import { errorMessage, GenerationTimeoutError, LoopError } from '../errors.js';
import { moduleName, withPrelude } from './backends/sandbox.js';
import { silentReporter, type LoopReporter } from './console-reporter.js';
import { EventLogger } from './events.js';
import {
  buildCoderPrompt,
  buildDebuggerPrompt,
  buildPlannerPrompt,
  buildRetryPrompt,
  buildTesterPrompt,
  SYSTEM_PROMPTS,
} from './prompts.js';
import { RunLogWriter } from './run-log.js';
import { TranscriptWriter } from './transcripts.js';

/** Slack on top of a collaborator's own timeout before the loop stops waiting. */
const GUARD_GRACE_MS = 10_000;

// =============================================================================
// Run ID Generation
// =============================================================================

function generateRunId(): string {
  const date = new Date().toISOString().slice(0, 10);
  const hash = Math.random().toString(36).slice(2, 8);
  return `run-${date}-${hash}`;
}

// =============================================================================
// Metadata
// =============================================================================

const CoderMetadataSchema = z.object({
  path: z.string().min(1).optional(),
  dependencies: z.array(z.string()).optional(),
  packages: z.array(z.string()).optional(),
});

const TesterMetadataSchema = z.object({
  path: z.string().min(1).optional(),
});

/** Metadata may arrive as an object or as a one-element list of objects. */
function metadataObject(result: ExtractionResult): unknown {
  const value = fieldJson(result, 'Metadata');
  return Array.isArray(value) ? value[0] : value;
}

function validateMetadata(schema: z.ZodTypeAny): (result: ExtractionResult) => string[] {
  return (result) => {
    const parsed = schema.safeParse(metadataObject(result));
    if (parsed.success) return [];
    return [`field "Metadata": ${parsed.error.issues.map((i) => `${i.path.join('.') || 'value'} ${i.message}`).join('; ')}`];
  };
}

// =============================================================================
// Steps
// =============================================================================

type FixVerdict = Exclude<VerdictType, 'VETO'>;

type Step =
  | { phase: 'EXECUTING' }
  | { phase: 'ARBITRATING'; outcome: ExecutionOutcome }
  | { phase: 'FIXING'; outcome: ExecutionOutcome; entry: HistoryEntry }
  | { phase: 'SUCCEEDED' }
  | { phase: 'EXHAUSTED' };

const ADVICE_FOR: Record<FixVerdict, DebugTargetType> = {
  FIX_SOURCE: 'SOURCE',
  FIX_TEST: 'TEST',
  FIX_BOTH: 'BOTH',
};

function assertNever(value: never): never {
  throw new Error(`Unhandled value: ${JSON.stringify(value)}`);
}

function isFixDecision(decision: DebugDecision): decision is DebugDecision & { verdict: FixVerdict } {
  return decision.verdict !== 'VETO';
}

/** Resolve with the promise, or with `fallback()` once `ms` elapses. */
async function withGuard<T>(promise: Promise<T>, ms: number, fallback: () => T): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  // Once the guard wins nobody awaits the original; keep a late rejection from going unhandled
  void promise.catch(() => undefined);
  const guard = new Promise<T>((resolve) => {
    timer = setTimeout(() => resolve(fallback()), ms);
  });
  try {
    return await Promise.race([promise, guard]);
  } finally {
    clearTimeout(timer);
  }
}

// =============================================================================
// Orchestrator
// =============================================================================

export interface OrchestratorOptions {
  config: LoopConfig;
  requirement: string;
  /** Directory that holds `.loopsmith/runs/`. */
  root: string;
  model: ModelBackend;
  sandbox: SandboxBackend;
  sink: ArtifactSink;
  reporter?: LoopReporter;
  /** Checked between steps; an aborted run ends EXHAUSTED with `cancelled`. */
  signal?: AbortSignal;
}

export interface LoopResult {
  runId: string;
  runDir: string;
  status: 'succeeded' | 'exhausted';
  attempts: number;
  cancelled: boolean;
  history: HistoryEntry[];
  source: CodeArtifact | null;
  tests: CodeArtifact | null;
  persisted: string[];
  persistErrors: string[];
  stats: RunStats;
  message: string;
}

export class Orchestrator {
  private readonly config: LoopConfig;
  private readonly reporter: LoopReporter;
  private readonly runId = generateRunId();
  private readonly runDir: string;
  private readonly events: EventLogger;
  private readonly runLog: RunLogWriter;
  private readonly transcripts: TranscriptWriter;
  private readonly stats: RunStats = { modelCalls: 0, executions: 0, extractionRetries: 0, tokens: 0 };

  constructor(private readonly opts: OrchestratorOptions) {
    this.config = opts.config;
    this.reporter = opts.reporter ?? silentReporter;
    this.runDir = join(opts.root, runDir(this.runId));
    this.events = new EventLogger(join(this.runDir, 'events.jsonl'));
    this.runLog = new RunLogWriter(this.runDir, this.runId, opts.requirement, opts.config.loop.max_attempts);
    this.transcripts = new TranscriptWriter(this.runDir);
  }

  /** Run the loop to a terminal state. Throws LoopError on fatal conditions. */
  async run(): Promise<LoopResult> {
    await mkdir(this.runDir, { recursive: true });
    await this.events.open();

    this.events.emit({
      event: 'run_started',
      run_id: this.runId,
      model: this.opts.model.name,
      sandbox: this.opts.sandbox.name,
      max_attempts: this.config.loop.max_attempts,
    });
    this.reporter.runStarted(this.runId, this.opts.requirement);

    try {
      const state = await this.generate();
      const result = state ? await this.cycle(state) : this.exhausted(null, true);
      this.runLog.finish(result.status, { ...this.stats });
      await this.runLog.flush();
      return result;
    } catch (error) {
      const message = errorMessage(error);
      this.events.emit({
        event: 'run_failed',
        code: error instanceof LoopError ? error.code : 'E_UNEXPECTED',
        message,
      });
      this.reporter.runFailed(message);
      this.runLog.finish('failed', { ...this.stats }, message);
      await this.runLog.flush();
      throw error;
    } finally {
      await this.events.close();
    }
  }

  private cancelled(): boolean {
    return this.opts.signal?.aborted === true;
  }

  private enterPhase(phase: string, attempt: number): void {
    this.events.emit({ event: 'phase_started', phase, attempt });
    this.reporter.phaseStarted(phase, attempt);
  }

  // ===========================================================================
  // GENERATING
  // ===========================================================================

  /** Produce the initial artifacts; null when cancelled part-way. */
  private async generate(): Promise<CycleState | null> {
    this.enterPhase('GENERATING', 0);
    this.runLog.setPhase('GENERATING');
    const { loop, artifacts, sandbox } = this.config;

    let userStory = this.opts.requirement;
    if (loop.plan) {
      const plan = await this.require('planner', PLANNER_SCHEMA, buildPlannerPrompt(this.opts.requirement));
      userStory = fieldText(plan, 'User Story') ?? userStory;
      this.events.emit({ event: 'user_story', chars: userStory.length });
    }
    if (this.cancelled()) return null;

    const coded = await this.require(
      'coder',
      CODER_SCHEMA,
      buildCoderPrompt(userStory, artifacts.source_path),
      validateMetadata(CoderMetadataSchema),
    );
    const coderMeta = CoderMetadataSchema.parse(metadataObject(coded));
    const dependencies = [...(coderMeta.dependencies ?? []), ...(coderMeta.packages ?? [])]
      .map((d) => d.trim())
      .filter((d, i, all) => d !== '' && all.indexOf(d) === i);
    const source: CodeArtifact = {
      path: basename(coderMeta.path ?? artifacts.source_path),
      content: fieldCode(coded, 'Content') ?? '',
      dependencies,
    };
    if (this.cancelled()) return null;

    const tested = await this.require(
      'tester',
      TESTER_SCHEMA,
      buildTesterPrompt(userStory, source, artifacts.test_path, withPrelude('', sandbox.test_prelude, moduleName(source.path))),
      validateMetadata(TesterMetadataSchema),
    );
    const testerMeta = TesterMetadataSchema.parse(metadataObject(tested));
    const tests: CodeArtifact = {
      path: basename(testerMeta.path ?? artifacts.test_path),
      content: fieldCode(tested, 'Content') ?? '',
      dependencies: [],
    };

    this.events.emit({
      event: 'artifacts_generated',
      source: source.path,
      tests: tests.path,
      dependencies: source.dependencies,
    });

    return {
      attempt: 0,
      maxAttempts: loop.max_attempts,
      userStory,
      source,
      tests,
      history: [],
    };
  }

  // ===========================================================================
  // EXECUTING / ARBITRATING / FIXING
  // ===========================================================================

  private async cycle(state: CycleState): Promise<LoopResult> {
    let step: Step = { phase: 'EXECUTING' };

    for (;;) {
      if (this.cancelled() && step.phase !== 'SUCCEEDED') {
        return this.exhausted(state, true);
      }
      this.runLog.setPhase(step.phase);

      switch (step.phase) {
        case 'EXECUTING': {
          if (state.attempt >= state.maxAttempts) {
            step = { phase: 'EXHAUSTED' };
            break;
          }
          state.attempt++;
          this.enterPhase('EXECUTING', state.attempt);
          step = { phase: 'ARBITRATING', outcome: await this.execute(state) };
          break;
        }

        case 'ARBITRATING': {
          if (step.outcome.passed) {
            step = { phase: 'SUCCEEDED' };
            break;
          }
          this.enterPhase('ARBITRATING', state.attempt);
          const entry = this.recordDecision(state, step.outcome);
          step =
            state.attempt >= state.maxAttempts
              ? { phase: 'EXHAUSTED' }
              : { phase: 'FIXING', outcome: step.outcome, entry };
          break;
        }

        case 'FIXING': {
          this.enterPhase('FIXING', state.attempt);
          const decision = step.entry.decision;
          if (isFixDecision(decision)) {
            await this.applyFix(state, step.outcome, decision, step.entry);
          } else {
            this.events.emit({ event: 'fix_skipped', attempt: state.attempt, reason: decision.rationale });
          }
          await this.runLog.flush();
          step = { phase: 'EXECUTING' };
          break;
        }

        case 'SUCCEEDED':
          return await this.succeeded(state);

        case 'EXHAUSTED':
          return this.exhausted(state, false);

        default:
          return assertNever(step);
      }
    }
  }

  private async execute(state: CycleState): Promise<ExecutionOutcome> {
    const startedAt = new Date().toISOString();
    const timeoutSeconds = getSandboxTimeoutSeconds(this.config);
    this.stats.executions++;
    this.events.emit({ event: 'execution_started', attempt: state.attempt, timeout_s: timeoutSeconds });

    const outcome = await withGuard<ExecutionOutcome>(
      this.opts.sandbox.execute(state.source, state.tests, timeoutSeconds),
      timeoutSeconds * 1000 + GUARD_GRACE_MS,
      () => ({
        exitCode: -1,
        stdout: '',
        stderr: `sandbox did not return within ${timeoutSeconds}s`,
        timedOut: true,
        passed: false,
      }),
    );

    this.runLog.recordAttempt(state.attempt, startedAt, outcome);
    this.events.emit({
      event: 'execution_finished',
      attempt: state.attempt,
      exit_code: outcome.exitCode,
      timed_out: outcome.timedOut,
      passed: outcome.passed,
    });
    this.reporter.executionFinished(state.attempt, outcome);
    await this.runLog.flush();
    return outcome;
  }

  /** Arbitrate a failing outcome and append it to history. */
  private recordDecision(state: CycleState, outcome: ExecutionOutcome): HistoryEntry {
    const decision = arbitrate(outcome, state);
    const entry: HistoryEntry = { attempt: state.attempt, outcome, decision, applied: [] };
    state.history.push(entry);

    this.runLog.updateAttempt({ verdict: decision.verdict, rationale: decision.rationale });
    this.events.emit({
      event: 'decision',
      attempt: state.attempt,
      verdict: decision.verdict,
      rationale: decision.rationale,
      evidence: decision.evidence,
    });
    this.reporter.decision(state.attempt, decision);
    return entry;
  }

  /** Regenerate exactly the artifacts the verdict names. */
  private async applyFix(
    state: CycleState,
    outcome: ExecutionOutcome,
    decision: DebugDecision & { verdict: FixVerdict },
    entry: HistoryEntry,
  ): Promise<void> {
    const wantSource = decision.verdict !== 'FIX_TEST';
    const wantTest = decision.verdict !== 'FIX_SOURCE';

    const requireSections = (result: ExtractionResult): string[] => [
      ...(wantSource && fieldCode(result, 'Source') === null ? ['missing required field "Source"'] : []),
      ...(wantTest && fieldCode(result, 'Test') === null ? ['missing required field "Test"'] : []),
    ];

    let result: ExtractionResult | null;
    try {
      result = await this.ask('debugger', DEBUGGER_SCHEMA, buildDebuggerPrompt(state, outcome, decision), requireSections, false);
    } catch (error) {
      if (!(error instanceof GenerationTimeoutError)) throw error;
      this.recordGenerationTimeout(state, error);
      return;
    }

    if (!result) {
      this.events.emit({ event: 'fix_abandoned', attempt: state.attempt, verdict: decision.verdict });
      this.reporter.warning(`Debugger reply unusable; attempt ${state.attempt + 1} reruns unchanged artifacts`);
      return;
    }

    const advised = fieldDecision(result, 'Target');
    if (advised !== null && advised !== ADVICE_FOR[decision.verdict]) {
      this.events.emit({ event: 'advice_overruled', attempt: state.attempt, advised, verdict: decision.verdict });
      this.reporter.adviceOverruled(advised, decision.verdict);
    }

    const applied: ArtifactRoleType[] = [];
    const sourceCode = fieldCode(result, 'Source');
    if (wantSource && sourceCode !== null) {
      state.source = { ...state.source, content: sourceCode };
      applied.push('source');
    }
    const testCode = fieldCode(result, 'Test');
    if (wantTest && testCode !== null) {
      state.tests = { ...state.tests, content: testCode };
      applied.push('tests');
    }

    entry.applied = applied;
    this.runLog.updateAttempt({ applied });
    this.events.emit({ event: 'fix_applied', attempt: state.attempt, verdict: decision.verdict, applied });
  }

  /** A fix that timed out becomes a timed-out outcome of its own, arbitrated and recorded. */
  private recordGenerationTimeout(state: CycleState, error: GenerationTimeoutError): void {
    const outcome: ExecutionOutcome = {
      exitCode: -1,
      stdout: '',
      stderr: error.message,
      timedOut: true,
      passed: false,
    };
    this.events.emit({ event: 'generation_timeout', attempt: state.attempt, timeout_ms: error.timeoutMs });
    this.recordDecision(state, outcome);
  }

  // ===========================================================================
  // Model Calls
  // ===========================================================================

  private async callModel(role: AgentRoleType, prompt: string): Promise<ModelReply> {
    const timeoutMs = getModelTimeoutMs(this.config);
    this.stats.modelCalls++;

    const reply = await withGuard<ModelReply | null>(
      this.opts.model.generate({ role, system: SYSTEM_PROMPTS[role], prompt, timeoutMs }),
      timeoutMs + GUARD_GRACE_MS,
      () => null,
    );
    if (reply === null) {
      throw new GenerationTimeoutError(`${this.opts.model.name} did not answer within ${timeoutMs}ms`, timeoutMs);
    }

    this.stats.tokens += reply.tokens ?? 0;
    const transcript = await this.transcripts.save(role, reply.text);
    this.events.emit({
      event: 'agent_reply',
      role,
      transcript,
      duration_ms: reply.durationMs,
      ...(reply.tokens !== undefined ? { tokens: reply.tokens } : {}),
    });
    this.reporter.agentFinished(role, reply.durationMs);
    return reply;
  }

  /**
   * Ask one role until its reply extracts cleanly, within the retry budget.
   * Returns null when the budget runs out. With `retryTimeouts` a timed-out
   * call uses up a retry; otherwise the GenerationTimeoutError propagates.
   */
  private async ask(
    role: AgentRoleType,
    schema: AgentSchema,
    prompt: string,
    validate: (result: ExtractionResult) => string[] = () => [],
    retryTimeouts = true,
  ): Promise<ExtractionResult | null> {
    const maxRetries = this.config.loop.max_extraction_retries;
    let current = prompt;
    let lastTimeout: GenerationTimeoutError | null = null;

    for (let retry = 0; retry <= maxRetries; retry++) {
      let problems = [''];
      try {
        const reply = await this.callModel(role, current);
        const result = extract(reply.text, schema);
        problems = result.ok ? validate(result) : result.diagnostics;
        this.events.emit({ event: 'extraction', role, ok: problems.length === 0, diagnostics: result.diagnostics });
        if (problems.length === 0) return result;
        lastTimeout = null;
      } catch (error) {
        if (!(error instanceof GenerationTimeoutError) || !retryTimeouts) throw error;
        lastTimeout = error;
        problems = [error.message];
      }

      if (retry < maxRetries) {
        this.stats.extractionRetries++;
        this.reporter.extractionRetry(role, retry + 1, problems[0] ?? 'unreadable reply');
        current = lastTimeout ? prompt : buildRetryPrompt(prompt, problems);
      }
    }

    if (lastTimeout) throw lastTimeout;
    return null;
  }

  /** `ask` for the initial artifacts, where running out of retries is fatal. */
  private async require(
    role: AgentRoleType,
    schema: AgentSchema,
    prompt: string,
    validate?: (result: ExtractionResult) => string[],
  ): Promise<ExtractionResult> {
    const result = await this.ask(role, schema, prompt, validate);
    if (!result) {
      throw new LoopError(
        `The ${role} reply could not be extracted after ${this.config.loop.max_extraction_retries + 1} attempt(s)`,
        'E_EXTRACTION_FAILED',
      );
    }
    return result;
  }

  // ===========================================================================
  // Terminal States
  // ===========================================================================

  private async succeeded(state: CycleState): Promise<LoopResult> {
    this.runLog.setPhase('SUCCEEDED');
    const { artifacts, sandbox } = this.config;
    const files: [string, string][] = [
      [state.source.path, state.source.content],
      [state.tests.path, withPrelude(state.tests.content, sandbox.test_prelude, moduleName(state.source.path))],
    ];
    if (artifacts.dependencies_file && state.source.dependencies.length > 0) {
      files.push([artifacts.dependencies_file, `${state.source.dependencies.join('\n')}\n`]);
    }

    const persisted: string[] = [];
    const persistErrors: string[] = [];
    for (const [path, content] of files) {
      try {
        await this.opts.sink.persist(path, content);
        persisted.push(path);
      } catch (error) {
        const message = `${path}: ${errorMessage(error)}`;
        persistErrors.push(message);
        this.events.emit({ event: 'persist_failed', path, message: errorMessage(error) });
        this.reporter.warning(`Could not write ${message}`);
      }
    }

    this.events.emit({ event: 'run_succeeded', attempts: state.attempt, persisted });
    this.reporter.runSucceeded(state.attempt, this.stats);

    return {
      ...this.resultBase(state),
      status: 'succeeded',
      cancelled: false,
      persisted,
      persistErrors,
      message: `Tests passed on attempt ${state.attempt} of ${state.maxAttempts}`,
    };
  }

  private exhausted(state: CycleState | null, cancelled: boolean): LoopResult {
    this.runLog.setPhase('EXHAUSTED');
    const attempts = state?.attempt ?? 0;
    this.events.emit({ event: 'run_exhausted', attempts, cancelled });
    this.reporter.runExhausted(attempts, cancelled);

    return {
      ...this.resultBase(state),
      status: 'exhausted',
      cancelled,
      persisted: [],
      persistErrors: [],
      message: cancelled
        ? `Run cancelled after ${attempts} attempt(s)`
        : `No passing run within ${this.config.loop.max_attempts} attempt(s)`,
    };
  }

  private resultBase(state: CycleState | null) {
    return {
      runId: this.runId,
      runDir: this.runDir,
      attempts: state?.attempt ?? 0,
      history: state?.history ?? [],
      source: state?.source ?? null,
      tests: state?.tests ?? null,
      stats: { ...this.stats },
    };
  }
}
