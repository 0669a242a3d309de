/**
 * Load .loopsmith/config.yml and apply CLI overrides.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { parse as yamlParse } from 'yaml';
import { ZodError } from 'zod';

import { parseLoopConfig, type LoopConfig } from '../../lib/config.js';
import { CONFIG_FILENAME, LOOPSMITH_DIR } from '../../lib/paths.js';
import { LoopError } from './errors.js';

/** Section → key → value, merged over the file's sections. */
export type ConfigOverrides = Record<string, Record<string, unknown>>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeZodError(err: ZodError): string {
  return err.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
}

export async function loadLoopConfig(root: string, overrides: ConfigOverrides = {}): Promise<LoopConfig> {
  const configPath = join(root, LOOPSMITH_DIR, CONFIG_FILENAME);
  let rawConfig: unknown = {};

  try {
    const content = await readFile(configPath, 'utf-8');
    rawConfig = yamlParse(content) ?? {};
  } catch (err: unknown) {
    // Only ignore "file not found" — surface parse errors
    if (!(err && typeof err === 'object' && 'code' in err && err.code === 'ENOENT')) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new LoopError(`Invalid config at ${configPath}: ${msg}`, 'E_CONFIG_INVALID');
    }
  }

  if (!isRecord(rawConfig)) {
    throw new LoopError(`Invalid config at ${configPath}: expected a mapping`, 'E_CONFIG_INVALID');
  }

  const merged: Record<string, unknown> = { ...rawConfig };
  for (const [section, values] of Object.entries(overrides)) {
    const current = merged[section];
    merged[section] = { ...(isRecord(current) ? current : {}), ...values };
  }

  try {
    return parseLoopConfig(merged);
  } catch (err: unknown) {
    const msg = err instanceof ZodError ? describeZodError(err) : String(err);
    throw new LoopError(`Invalid config at ${configPath}: ${msg}`, 'E_CONFIG_INVALID');
  }
}
