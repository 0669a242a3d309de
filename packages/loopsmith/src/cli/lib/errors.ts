/**
 * Error types for the loopsmith CLI and loop.
 *
 * Every error the loop raises on purpose carries a code from
 * ERROR_CODE_EXIT_MAP so the CLI can pick an exit status.
 */

import { ERROR_CODE_EXIT_MAP, type LoopErrorCodeType } from '../../lib/types.js';

/** Base class for errors surfaced to the user. */
export class CLIError extends Error {
  constructor(
    message: string,
    public readonly exitCode = 1,
  ) {
    super(message);
    this.name = 'CLIError';
  }
}

/** A loop failure with a stable code. */
export class LoopError extends CLIError {
  constructor(
    message: string,
    public readonly code: LoopErrorCodeType,
    exitCode: number = ERROR_CODE_EXIT_MAP[code],
  ) {
    super(message, exitCode);
    this.name = 'LoopError';
  }
}

/** Model or sandbox unreachable, or credentials rejected. Fatal to the run. */
export class TransportError extends LoopError {
  constructor(
    message: string,
    public readonly collaborator: 'model' | 'sandbox',
  ) {
    super(message, 'E_TRANSPORT');
    this.name = 'TransportError';
  }
}

/** A model call exceeded its wall-clock bound. */
export class GenerationTimeoutError extends LoopError {
  constructor(
    message: string,
    public readonly timeoutMs: number,
  ) {
    super(message, 'E_GENERATION_TIMEOUT');
    this.name = 'GenerationTimeoutError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
