/**
 * Filesystem artifact sink: final source, tests and dependency file.
 */

import { mkdir } from 'node:fs/promises';
import { dirname, isAbsolute, join, normalize, relative } from 'node:path';
import { writeFile } from 'atomically';

import type { ArtifactSink } from '../../../lib/types.js';

export class FileArtifactSink implements ArtifactSink {
  constructor(private readonly outDir: string) {}

  /** Write `content` under the output directory; paths may not escape it. */
  async persist(path: string, content: string): Promise<void> {
    const target = join(this.outDir, normalize(path));
    const rel = relative(this.outDir, target);
    if (rel.startsWith('..') || isAbsolute(rel)) {
      throw new Error(`Refusing to write outside ${this.outDir}: ${path}`);
    }
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content, 'utf-8');
  }
}
