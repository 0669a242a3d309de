/**
 * JSONL event log writer for loop runs.
 *
 * Append-only, serialized write queue so records land in emit order even
 * though emit() itself is synchronous.
 */

import { open, type FileHandle } from 'node:fs/promises';

import type { LoopEvent } from '../../../lib/types.js';

export type LoopEventInput = { event: string } & Record<string, unknown>;

export class EventLogger {
  private fd: FileHandle | null = null;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  /** Open the event log file for appending. */
  async open(): Promise<void> {
    this.fd = await open(this.filePath, 'a');
  }

  /** Emit a single event. Serialized through a write queue. */
  emit(event: LoopEventInput): void {
    const record: LoopEvent = {
      ...event,
      v: 1,
      ts: new Date().toISOString(),
    };
    const line = JSON.stringify(record) + '\n';

    // Chain onto the write queue so only one write is in-flight at a time
    this.writeQueue = this.writeQueue.then(async () => {
      if (this.fd) {
        await this.fd.write(line);
      }
    });
  }

  /** Flush all pending writes and close the file handle. */
  async close(): Promise<void> {
    await this.writeQueue;
    if (this.fd) {
      await this.fd.close();
      this.fd = null;
    }
  }
}
