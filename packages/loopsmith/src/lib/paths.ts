/**
 * Well-known locations under the working directory.
 */

import { join } from 'node:path';

export const LOOPSMITH_DIR = '.loopsmith';
export const CONFIG_FILENAME = 'config.yml';
export const RUNS_DIR = join(LOOPSMITH_DIR, 'runs');

/** Shape of the ids the loop generates; anything else is not a run directory name. */
export const RUN_ID_PATTERN = /^run-[\w-]+$/;

/** Relative path of one run's state directory. */
export function runDir(runId: string): string {
  return join(RUNS_DIR, runId);
}
