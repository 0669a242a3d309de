/**
 * Zod schemas and TypeScript types for the loopsmith pipeline.
 *
 * Pure types — no CLI or Node dependencies.
 */

import { z } from 'zod';

// =============================================================================
// JSON Values
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ]),
);

// =============================================================================
// Agent Roles and Schemas
// =============================================================================

export const AgentRole = z.enum(['planner', 'coder', 'tester', 'debugger']);
export type AgentRoleType = z.infer<typeof AgentRole>;

export const FieldKind = z.enum(['text', 'code', 'json', 'decision']);
export type FieldKindType = z.infer<typeof FieldKind>;

export interface FieldSpec {
  readonly name: string;
  readonly kind: FieldKindType;
  readonly required: boolean;
  /** Literal names accepted for a `decision` field. */
  readonly choices?: readonly string[];
}

/** Ordered, frozen field list for one agent role. */
export interface AgentSchema {
  readonly role: AgentRoleType;
  readonly fields: readonly FieldSpec[];
}

// =============================================================================
// Extraction
// =============================================================================

export type BlockKind = 'heading' | 'fence' | 'paragraph';

export interface Block {
  /** Heading text for heading blocks; the governing heading's text otherwise. */
  headerText: string;
  kind: BlockKind;
  body: string;
  /** 1-6 for headings, 0 for everything else. */
  level: number;
  fenceLanguage?: string;
  /** Zero-based line span in the segmented text, end exclusive. */
  startLine: number;
  endLine: number;
}

export type RepairKind = 'peeled-wrapper' | 'closed-fence' | 'synthesized-metadata';

export interface NormalizedMessage {
  text: string;
  repairs: RepairKind[];
  diagnostics: string[];
}

export type ParsedValue =
  | { kind: 'text'; text: string }
  | { kind: 'code'; code: string; language?: string }
  | { kind: 'json'; value: JsonValue }
  | { kind: 'decision'; decision: string };

export interface FieldValue {
  raw: string;
  /** Null when the field is absent or its value could not be interpreted. */
  parsed: ParsedValue | null;
  present: boolean;
}

export interface ExtractionResult {
  fields: Record<string, FieldValue>;
  ok: boolean;
  diagnostics: string[];
}

// =============================================================================
// Artifacts and Execution
// =============================================================================

export const ArtifactRole = z.enum(['source', 'tests']);
export type ArtifactRoleType = z.infer<typeof ArtifactRole>;

export const CodeArtifactSchema = z.object({
  path: z.string(),
  content: z.string(),
  dependencies: z.array(z.string()),
});
export type CodeArtifact = z.infer<typeof CodeArtifactSchema>;

export const ExecutionOutcomeSchema = z.object({
  exitCode: z.number().int(),
  stdout: z.string(),
  stderr: z.string(),
  timedOut: z.boolean(),
  passed: z.boolean(),
});
export type ExecutionOutcome = z.infer<typeof ExecutionOutcomeSchema>;

// =============================================================================
// Arbitration
// =============================================================================

export const Verdict = z.enum(['FIX_SOURCE', 'FIX_TEST', 'FIX_BOTH', 'VETO']);
export type VerdictType = z.infer<typeof Verdict>;

/** Literal names the debugger uses for its advisory target. */
export const DebugTarget = z.enum(['SOURCE', 'TEST', 'BOTH']);
export type DebugTargetType = z.infer<typeof DebugTarget>;

export const DebugDecisionSchema = z.object({
  verdict: Verdict,
  rationale: z.string(),
  evidence: z.array(z.string()),
});
export type DebugDecision = z.infer<typeof DebugDecisionSchema>;

export const HistoryEntrySchema = z.object({
  attempt: z.number().int(),
  outcome: ExecutionOutcomeSchema,
  decision: DebugDecisionSchema,
  /** Artifacts the FIXING step actually regenerated for this decision. */
  applied: z.array(ArtifactRole),
});
export type HistoryEntry = z.infer<typeof HistoryEntrySchema>;

export interface CycleState {
  attempt: number;
  readonly maxAttempts: number;
  readonly userStory: string;
  source: CodeArtifact;
  tests: CodeArtifact;
  history: HistoryEntry[];
}

// =============================================================================
// Loop Phase
// =============================================================================

export const LoopPhase = z.enum([
  'GENERATING',
  'EXECUTING',
  'ARBITRATING',
  'FIXING',
  'SUCCEEDED',
  'EXHAUSTED',
]);
export type LoopPhaseType = z.infer<typeof LoopPhase>;

// =============================================================================
// Error Codes
// =============================================================================

export const LoopErrorCode = z.enum([
  'E_CONFIG_INVALID',
  'E_INPUT_MISSING',
  'E_BACKEND_UNAVAILABLE',
  'E_TRANSPORT',
  'E_GENERATION_TIMEOUT',
  'E_EXTRACTION_FAILED',
  'E_EXHAUSTED',
  'E_CANCELLED',
]);
export type LoopErrorCodeType = z.infer<typeof LoopErrorCode>;

/** Maps error codes to CLI exit codes */
export const ERROR_CODE_EXIT_MAP: Record<LoopErrorCodeType, number> = {
  E_CONFIG_INVALID: 2,
  E_INPUT_MISSING: 2,
  E_BACKEND_UNAVAILABLE: 2,
  E_TRANSPORT: 3,
  E_GENERATION_TIMEOUT: 4,
  E_EXTRACTION_FAILED: 4,
  E_EXHAUSTED: 5,
  E_CANCELLED: 130,
};

// =============================================================================
// Loop Event
// =============================================================================

export const LoopEventSchema = z
  .object({
    v: z.literal(1),
    ts: z.string().datetime(),
    event: z.string(),
    // Allow arbitrary additional fields
  })
  .passthrough();
export type LoopEvent = z.infer<typeof LoopEventSchema>;

// =============================================================================
// Run Log Schema
// =============================================================================

export const RunLogAttemptSchema = z.object({
  attempt: z.number().int(),
  startedAt: z.string().datetime(),
  exitCode: z.number().int(),
  timedOut: z.boolean(),
  passed: z.boolean(),
  verdict: Verdict.optional(),
  rationale: z.string().optional(),
  applied: z.array(ArtifactRole).default([]),
});
export type RunLogAttempt = z.infer<typeof RunLogAttemptSchema>;

export const RunStatsSchema = z.object({
  modelCalls: z.number().int(),
  executions: z.number().int(),
  extractionRetries: z.number().int(),
  tokens: z.number().int(),
});
export type RunStats = z.infer<typeof RunStatsSchema>;

export const RunLogSchema = z.object({
  runId: z.string(),
  requirement: z.string(),
  startedAt: z.string().datetime(),
  status: z.enum(['in_progress', 'succeeded', 'exhausted', 'failed']),
  phase: LoopPhase,
  maxAttempts: z.number().int(),
  attempts: z.array(RunLogAttemptSchema).default([]),
  completedAt: z.string().datetime().optional(),
  totalDuration: z.string().optional(),
  stats: RunStatsSchema.optional(),
  failure: z.string().optional(),
});
export type RunLog = z.infer<typeof RunLogSchema>;

// =============================================================================
// Collaborator Interfaces
// =============================================================================

export interface GenerateOptions {
  role: AgentRoleType;
  system: string;
  prompt: string;
  timeoutMs: number;
}

export interface ModelReply {
  text: string;
  durationMs: number;
  /** Total tokens, when the backend reports usage. */
  tokens?: number;
}

/** Language-model collaborator. Throws TransportError or GenerationTimeoutError. */
export interface ModelBackend {
  name: string;
  generate(opts: GenerateOptions): Promise<ModelReply>;
}

/** Execution sandbox collaborator. Throws TransportError when unreachable. */
export interface SandboxBackend {
  name: string;
  execute(source: CodeArtifact, tests: CodeArtifact, timeoutSeconds: number): Promise<ExecutionOutcome>;
}

export interface ArtifactSink {
  persist(path: string, content: string): Promise<void>;
}
