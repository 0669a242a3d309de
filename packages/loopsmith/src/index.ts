/**
 * Library entry: extraction, arbitration, configuration and the loop.
 */

export * from './lib/types.js';
export * from './lib/config.js';
export * from './lib/paths.js';

export { normalize, type NormalizeOptions } from './lib/extract/preprocess.js';
export { extract, parse, resolveDecision } from './lib/extract/parser.js';
export { fieldCode, fieldDecision, fieldJson, fieldText, summarizeResult } from './lib/extract/result.js';
export { parseLenientJson, type LenientJsonResult } from './lib/extract/lenient-json.js';
export {
  CODER_SCHEMA,
  DEBUGGER_SCHEMA,
  defineSchema,
  PLANNER_SCHEMA,
  ROLE_SCHEMAS,
  TESTER_SCHEMA,
} from './lib/extract/schemas.js';

export { arbitrate, isReconciled } from './lib/arbitration/arbiter.js';
export {
  describeSignal,
  extractSignals,
  type FailureSignal,
  type SignalKind,
  type SignalLocus,
} from './lib/arbitration/signals.js';

export { CLIError, GenerationTimeoutError, LoopError, TransportError } from './cli/lib/errors.js';
export { Orchestrator, type LoopResult, type OrchestratorOptions } from './cli/lib/loop/orchestrator.js';
export { ConsoleReporter, silentReporter, type LoopReporter } from './cli/lib/loop/console-reporter.js';
export { FileArtifactSink } from './cli/lib/loop/artifact-sink.js';
export { createModelBackend } from './cli/lib/loop/backends/detect.js';
export { ClaudeCodeBackend } from './cli/lib/loop/backends/claude-code.js';
export { CodexBackend } from './cli/lib/loop/backends/codex.js';
export { CommandBackend } from './cli/lib/loop/backends/command.js';
export { OpenAIBackend, type OpenAIBackendOptions } from './cli/lib/loop/backends/openai.js';
export { SubprocessSandbox, type SandboxOptions } from './cli/lib/loop/backends/sandbox.js';
export { readRunLog } from './cli/lib/loop/run-log.js';
