/**
 * Verbatim model replies, one file per call: transcripts/<seq>-<role>.md.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { AgentRoleType } from '../../../lib/types.js';

export class TranscriptWriter {
  private seq = 0;
  private readonly dir: string;

  constructor(runDir: string) {
    this.dir = join(runDir, 'transcripts');
  }

  /** Save a raw reply; returns the file name. */
  async save(role: AgentRoleType, text: string): Promise<string> {
    this.seq++;
    const name = `${String(this.seq).padStart(3, '0')}-${role}.md`;
    await mkdir(this.dir, { recursive: true });
    await writeFile(join(this.dir, name), text, 'utf-8');
    return name;
  }
}
