/**
 * Loop configuration schema and loader.
 *
 * Zero-config works out of the box — all fields have sensible defaults.
 * Power users can create .loopsmith/config.yml to customize.
 */

import { z } from 'zod';

// =============================================================================
// Duration Parsing
// =============================================================================

const DURATION_RE = /^(\d+)(ms|s|m|h)$/;

/** Parse a human-readable duration string into milliseconds. */
export function parseDuration(input: string): number {
  const match = DURATION_RE.exec(input);
  const amount = match?.[1];
  const unit = match?.[2];
  if (amount === undefined || unit === undefined) {
    throw new Error(`Invalid duration: "${input}" (expected format: 15m, 30s, 1h, 500ms)`);
  }
  const value = parseInt(amount, 10);
  switch (unit) {
    case 'ms':
      return value;
    case 's':
      return value * 1000;
    case 'm':
      return value * 60 * 1000;
    case 'h':
      return value * 60 * 60 * 1000;
    default:
      throw new Error(`Unknown duration unit: ${unit}`);
  }
}

const DurationString = z.string().refine((s) => DURATION_RE.test(s), {
  message: 'expected a duration such as 30s, 2m, 1h or 500ms',
});

// =============================================================================
// Config Schema
// =============================================================================

export const ModelBackendName = z.enum(['auto', 'claude-code', 'codex', 'command', 'openai']);
export type ModelBackendNameType = z.infer<typeof ModelBackendName>;

export const LoopConfigSchema = z.object({
  model: z
    .object({
      backend: ModelBackendName.default('auto'),
      command: z.string().nullable().default(null),
      name: z.string().default('gpt-4o-mini'),
      base_url: z.string().url().nullable().default(null),
      api_key_env: z.string().default('LLM_API_KEY'),
      temperature: z.number().min(0).max(2).default(0.7),
      timeout: DurationString.default('2m'),
    })
    .default({}),

  sandbox: z
    .object({
      command: z.string().default('python -m unittest {test}'),
      install: z.string().nullable().default('pip install {dependencies}'),
      timeout: DurationString.default('30s'),
      install_timeout: DurationString.default('2m'),
      test_prelude: z.string().default(''),
    })
    .default({}),

  loop: z
    .object({
      max_attempts: z.number().int().min(1).default(3),
      max_extraction_retries: z.number().int().min(0).default(2),
      plan: z.boolean().default(true),
    })
    .default({}),

  artifacts: z
    .object({
      source_path: z.string().default('main.py'),
      test_path: z.string().default('test_main.py'),
      output_dir: z.string().default('output'),
      dependencies_file: z.string().nullable().default('requirements.txt'),
    })
    .default({}),
});

export type LoopConfig = z.infer<typeof LoopConfigSchema>;

/** Load and validate a raw config object, applying all defaults. */
export function parseLoopConfig(raw: unknown): LoopConfig {
  return LoopConfigSchema.parse(raw ?? {});
}

/** Get the model call timeout in milliseconds. */
export function getModelTimeoutMs(config: LoopConfig): number {
  return parseDuration(config.model.timeout);
}

/** Get the sandbox execution timeout in whole seconds (at least 1). */
export function getSandboxTimeoutSeconds(config: LoopConfig): number {
  return Math.max(1, Math.ceil(parseDuration(config.sandbox.timeout) / 1000));
}
