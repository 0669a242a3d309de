/**
 * `loopsmith runs` - List past loop runs, or show one run's log.
 */

import { Command } from 'commander';
import { readdir } from 'node:fs/promises';
import { join } from 'node:path';

import { RUN_ID_PATTERN, RUNS_DIR } from '../../lib/paths.js';
import type { RunLog } from '../../lib/types.js';
import { BaseCommand } from '../lib/base-command.js';
import { LoopError } from '../lib/errors.js';
import type { Colors } from '../lib/output.js';
import { readRunLog } from '../lib/loop/run-log.js';

interface RunSummary {
  runId: string;
  status: string;
  attempts: number;
  requirement: string;
  startedAt: string;
}

function statusColor(colors: Colors, status: string): (s: string) => string {
  if (status === 'succeeded') return colors.success;
  if (status === 'failed' || status === 'exhausted') return colors.error;
  if (status === 'in_progress') return colors.warn;
  return colors.dim;
}

function firstLine(text: string, max = 60): string {
  const line = text.split('\n')[0] ?? '';
  return line.length > max ? `${line.slice(0, max - 1)}…` : line;
}

class RunsHandler extends BaseCommand {
  async run(runId: string | undefined): Promise<void> {
    const runsDir = join(process.cwd(), RUNS_DIR);
    try {
      if (runId) {
        await this.showRun(runsDir, runId);
      } else {
        await this.listRuns(runsDir);
      }
    } catch (err: unknown) {
      if (err instanceof LoopError) {
        const code = err.code;
        const msg = err.message;
        this.output.data({ error: { code, message: msg } }, () => {
          console.error(this.output.getColors().error(`Error [${code}]: ${msg}`));
        });
        process.exitCode = err.exitCode;
        return;
      }
      throw err;
    }
  }

  private async listRuns(runsDir: string): Promise<void> {
    let entries: string[];
    try {
      entries = await readdir(runsDir);
    } catch {
      this.output.data([], () => {
        this.output.info('No loop runs found.');
      });
      return;
    }

    const runs = entries
      .filter((e) => e.startsWith('run-'))
      .sort()
      .reverse();

    const summaries: RunSummary[] = [];
    for (const id of runs) {
      try {
        const log = await readRunLog(join(runsDir, id));
        summaries.push({
          runId: log.runId,
          status: log.status,
          attempts: log.attempts.length,
          requirement: log.requirement,
          startedAt: log.startedAt,
        });
      } catch {
        summaries.push({ runId: id, status: 'unknown', attempts: 0, requirement: '?', startedAt: '?' });
      }
    }

    this.output.data(summaries, () => {
      if (summaries.length === 0) {
        this.output.info('No loop runs found.');
        return;
      }
      const colors = this.output.getColors();
      console.log(colors.bold('Loop runs:'));
      console.log('');
      for (const s of summaries) {
        const color = statusColor(colors, s.status);
        console.log(`  ${colors.id(s.runId)}  ${color(s.status.padEnd(12))}  ${firstLine(s.requirement)}`);
      }
    });
  }

  private async showRun(runsDir: string, runId: string): Promise<void> {
    if (!RUN_ID_PATTERN.test(runId)) {
      throw new LoopError(`Invalid run id: ${runId}`, 'E_INPUT_MISSING');
    }
    let log: RunLog;
    try {
      log = await readRunLog(join(runsDir, runId));
    } catch {
      throw new LoopError(`Run not found: ${runId}`, 'E_INPUT_MISSING');
    }

    this.output.data(log, () => {
      const colors = this.output.getColors();
      console.log(colors.bold(`Run: ${log.runId}`));
      console.log(`  Requirement: ${firstLine(log.requirement)}`);
      console.log(`  Status:      ${statusColor(colors, log.status)(log.status)}`);
      console.log(`  Phase:       ${log.phase}`);
      console.log(`  Started:     ${log.startedAt}`);
      if (log.completedAt) console.log(`  Completed:   ${log.completedAt}`);
      if (log.totalDuration) console.log(`  Duration:    ${log.totalDuration}`);
      if (log.stats) {
        console.log(
          `  Model:       ${log.stats.modelCalls} calls, ${log.stats.extractionRetries} re-asks, ${log.stats.tokens} tokens`,
        );
      }
      if (log.failure) console.log(`  Failure:     ${colors.error(log.failure)}`);

      if (log.attempts.length > 0) {
        console.log('');
        console.log(colors.bold(`  Attempts (max ${log.maxAttempts}):`));
        for (const a of log.attempts) {
          const status = a.passed ? 'passed' : a.timedOut ? 'timed out' : `exit ${a.exitCode}`;
          const verdict = a.verdict ? `, ${a.verdict}` : '';
          const applied = a.applied.length > 0 ? ` → rewrote ${a.applied.join(', ')}` : '';
          console.log(`    #${a.attempt}: ${status}${verdict}${applied}`);
          if (a.rationale) console.log(`      ${colors.dim(a.rationale)}`);
        }
      }
    });
  }
}

export const runsCommand = new Command('runs')
  .description('List loop runs, or show one run')
  .argument('[run-id]', 'Run to show')
  .action(async (runId: string | undefined, _options: Record<string, never>, command: Command) => {
    const handler = new RunsHandler(command);
    await handler.run(runId);
  });
