/**
 * Output manager: human text or JSON on stdout, notices on stderr.
 */

import pc from 'picocolors';

export function createColors(enabled: boolean) {
  const c = pc.createColors(enabled);
  return {
    bold: c.bold,
    dim: c.dim,
    id: c.cyan,
    label: c.magenta,
    success: c.green,
    warn: c.yellow,
    error: c.red,
  };
}

export type Colors = ReturnType<typeof createColors>;

export interface OutputOptions {
  json: boolean;
  color: boolean;
  quiet: boolean;
}

export class OutputManager {
  private readonly colors: Colors;

  constructor(private readonly opts: OutputOptions) {
    this.colors = createColors(opts.color);
  }

  get isJson(): boolean {
    return this.opts.json;
  }

  getColors(): Colors {
    return this.colors;
  }

  /** Emit a result: JSON when --json, otherwise the human renderer. */
  data<T>(value: T, human: () => void): void {
    if (this.opts.json) {
      console.log(JSON.stringify(value, null, 2));
      return;
    }
    human();
  }

  info(message: string): void {
    if (this.opts.json || this.opts.quiet) return;
    console.error(message);
  }

  success(message: string): void {
    if (this.opts.json || this.opts.quiet) return;
    console.error(`${this.colors.success('✓')} ${message}`);
  }

  warn(message: string): void {
    if (this.opts.json) return;
    console.error(`${this.colors.warn('⚠')} ${message}`);
  }

  error(message: string): void {
    if (this.opts.json) {
      console.error(JSON.stringify({ error: { message } }));
      return;
    }
    console.error(this.colors.error(`Error: ${message}`));
  }
}
