/**
 * Prompt assembly for loop agents.
 *
 * Builds prompts for: planner, coder, tester, debugger, plus the re-ask
 * sent when a reply cannot be extracted. Output sections mirror the role
 * schemas in lib/extract/schemas.ts.
 */

import type {
  AgentRoleType,
  CodeArtifact,
  CycleState,
  DebugDecision,
  ExecutionOutcome,
  VerdictType,
} from '../../../lib/types.js';

/** Execution logs are cut to their tail before going back to the model. */
const MAX_LOG_CHARS = 8_000;

function tail(text: string, max = MAX_LOG_CHARS): string {
  return text.length > max ? `[...truncated...]\n${text.slice(text.length - max)}` : text;
}

// =============================================================================
// System Prompts
// =============================================================================

const FORMAT_RULES = `Answer in Markdown using exactly the section headings listed below, in that order.
Put code in a fenced block directly under its heading. Do not wrap the whole answer in a code fence.`;

export const SYSTEM_PROMPTS: Record<AgentRoleType, string> = {
  planner: `You are a technical product manager. Turn the user's request into a precise user story that a coder and a tester can both work from.

Rules:
- Constraints the user states (data structures, function names, signatures, field names, input and output types) are binding. Copy them verbatim; never rename or retype them.
- Fill gaps the user left open (error handling, edge cases) with concrete behavior.
- Write commands, not suggestions: "MUST", "MUST NOT".
- Do not write code.

${FORMAT_RULES}

## Analysis
Interaction pattern, implied risks and derived constraints.

## User Story
Goal, binding constraints, logic flow as numbered steps, and acceptance criteria.`,

  coder: `You are the coder. Write one complete, runnable source file that implements the user story.

Rules:
- Prefer the standard library. Declare every third-party package you import.
- Keep every name the user story fixes exactly as written.
- Single file with a clear entry point.

${FORMAT_RULES}

## Reasoning
Short plan.

## Content
\`\`\`
the full source file
\`\`\`

## Metadata
\`\`\`json
{"path": "<file name>", "dependencies": ["<package>", "..."]}
\`\`\``,

  tester: `You are the tester. Write unit tests for the given source file that check it against the user story.

Rules:
- Do not compute expected values in your head: write the arithmetic expression and let the test evaluate it.
- Read the source for state side effects (counters, quotas, cleared collections) before calling a method repeatedly.
- Only call names the source actually defines and the user story requires.
- Cover the happy path and the edge cases the user story names.

${FORMAT_RULES}

## Reasoning
State variables, side effects, and how each test resets state.

## Content
\`\`\`
the full test file
\`\`\`

## Metadata
\`\`\`json
{"path": "<file name>"}
\`\`\``,

  debugger: `You are the debugger. A test run failed and an arbiter has already decided which file must change.

Rules:
- Rewrite only the file(s) you are asked for, in full.
- Make the smallest change that fixes the failure. Keep entry points and class structure.
- Never weaken a test just to make it pass; a test is changed only when it contradicts the user story.
- Comments state what was fixed, not your thought process.

${FORMAT_RULES}

## Reasoning
Root cause of the failure.

## Target
SOURCE, TEST or BOTH: where you believe the root cause is.

## Source
\`\`\`
the full fixed source file (only when asked)
\`\`\`

## Test
\`\`\`
the full fixed test file (only when asked)
\`\`\``,
};

// =============================================================================
// User Prompts
// =============================================================================

function fenced(artifact: CodeArtifact): string {
  return `File: ${artifact.path}\n\`\`\`\n${artifact.content}\n\`\`\``;
}

export function buildPlannerPrompt(requirement: string): string {
  return `## Request\n\n${requirement}`;
}

export function buildCoderPrompt(userStory: string, sourcePath: string): string {
  return `## User Story\n\n${userStory}\n\n## File\n\nName the source file \`${sourcePath}\` unless the user story fixes another name.`;
}

export function buildTesterPrompt(userStory: string, source: CodeArtifact, testPath: string, prelude: string): string {
  const preludeNote = prelude.trim()
    ? `\n\nThese lines are prepended to your test file automatically; do not repeat them:\n\`\`\`\n${prelude}\n\`\`\``
    : '';
  return `## User Story\n\n${userStory}\n\n## Source Code\n\n${fenced(source)}\n\n## File\n\nName the test file \`${testPath}\`.${preludeNote}`;
}

const VERDICT_INSTRUCTIONS: Record<Exclude<VerdictType, 'VETO'>, string> = {
  FIX_SOURCE: 'Rewrite the SOURCE file only. Return it under "## Source". The test is trusted.',
  FIX_TEST:
    'Rewrite the TEST file only. Return it under "## Test". Correct the expectations that contradict the user story; do not change the source.',
  FIX_BOTH:
    'Rewrite BOTH files so they agree with each other and with the user story. Return the source under "## Source" and the test under "## Test".',
};

export function buildDebuggerPrompt(
  state: CycleState,
  outcome: ExecutionOutcome,
  decision: DebugDecision & { verdict: Exclude<VerdictType, 'VETO'> },
): string {
  const status = outcome.timedOut ? 'timed out' : `exit code ${outcome.exitCode}`;
  const evidence = decision.evidence.length > 0 ? decision.evidence.map((e) => `- ${e}`).join('\n') : '- (none)';
  return `## User Story

${state.userStory}

## Source Code

${fenced(state.source)}

## Test Code

${fenced(state.tests)}

## Execution Output (${status}, attempt ${state.attempt} of ${state.maxAttempts})

stderr:
\`\`\`
${tail(outcome.stderr)}
\`\`\`

stdout:
\`\`\`
${tail(outcome.stdout)}
\`\`\`

## Arbiter Decision

${decision.verdict}: ${decision.rationale}

Evidence:
${evidence}

## Your Task

${VERDICT_INSTRUCTIONS[decision.verdict]}`;
}

/** Re-ask after an unreadable reply, quoting what was wrong with it. */
export function buildRetryPrompt(prompt: string, diagnostics: string[]): string {
  const problems = diagnostics.map((d) => `- ${d}`).join('\n');
  return `${prompt}

## Format Problems In Your Previous Reply

${problems}

Reply again with every required section.`;
}
