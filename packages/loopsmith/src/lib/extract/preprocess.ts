/**
 * Fault-tolerant preprocessing of raw model text.
 *
 * Repairs, in order: outer fence wrapper, unterminated fence, missing
 * trailing metadata block. Repairs repeat until none applies, so the
 * result is a fixed point: normalizing it again changes nothing.
 * Never throws.
 */

import type { AgentSchema, FieldSpec, NormalizedMessage, RepairKind } from '../types.js';
import { segmentBlocks } from './blocks.js';
import { closesFence, closingDelimiter, readFence, scanFences } from './fences.js';
import { matchHeader } from './header-match.js';

/** Info strings that always mark a whole-reply wrapper. */
const MARKDOWN_INFO = new Set(['markdown', 'md']);
/** Info strings that mark a wrapper only when headings sit inside. */
const PLAIN_INFO = new Set(['', 'text', 'txt', 'plaintext']);

export interface NormalizeOptions {
  /** Enables metadata recovery for the schema's required JSON fields. */
  schema?: AgentSchema;
}

// =============================================================================
// Wrapper Peeling
// =============================================================================

function hasHeading(text: string): boolean {
  return segmentBlocks(text).some((b) => b.kind === 'heading');
}

/**
 * The whole reply is one fence: first and last non-blank lines pair up and
 * nothing inside is left open. Returns the inner text.
 */
function peelWrapper(text: string): { text: string; info: string } | null {
  const lines = text.split('\n');
  let first = 0;
  while (first < lines.length && (lines[first] ?? '').trim() === '') first++;
  let last = lines.length - 1;
  while (last > first && (lines[last] ?? '').trim() === '') last--;
  if (last <= first) return null;

  const open = readFence(lines[first] ?? '');
  if (!open || !closesFence(open, lines[last] ?? '')) return null;

  const inner = lines.slice(first + 1, last);
  if (scanFences(inner).openAtEnd) return null;

  const info = open.info.toLowerCase();
  const innerText = inner.join('\n');
  if (MARKDOWN_INFO.has(info) || (PLAIN_INFO.has(info) && hasHeading(innerText))) {
    return { text: innerText, info };
  }
  return null;
}

// =============================================================================
// Fence Auto-Completion
// =============================================================================

function closeDanglingFence(text: string): string | null {
  const { openAtEnd } = scanFences(text.split('\n'));
  if (!openAtEnd) return null;
  const sep = text === '' || text.endsWith('\n') ? '' : '\n';
  return `${text}${sep}${closingDelimiter(openAtEnd)}`;
}

// =============================================================================
// Metadata Recovery
// =============================================================================

function appendBlock(text: string, block: string): string {
  const base = text.replace(/\n+$/, '');
  return base === '' ? block : `${base}\n\n${block}`;
}

/**
 * A required JSON field with no heading at all, or whose heading ends the
 * reply with nothing after it, gets an empty object.
 */
function recoverMetadata(text: string, schema: AgentSchema, field: FieldSpec): string | null {
  const blocks = segmentBlocks(text);
  const matches = blocks
    .map((block, index) => ({ block, index }))
    .filter(({ block }) => {
      if (block.kind !== 'heading') return false;
      return matchHeader(block.headerText, schema.fields)?.field.name === field.name;
    });

  const emptyBlock = '```json\n{}\n```';

  if (matches.length === 0) {
    return appendBlock(text, `## ${field.name}\n${emptyBlock}`);
  }

  const lastMatch = matches[matches.length - 1];
  if (!lastMatch || lastMatch.index !== blocks.length - 1) return null;
  if (matchHeader(lastMatch.block.headerText, schema.fields)?.value) return null;

  return `${text.replace(/\n+$/, '')}\n${emptyBlock}`;
}

// =============================================================================
// Normalize
// =============================================================================

export function normalize(raw: string, opts: NormalizeOptions = {}): NormalizedMessage {
  let text = raw.replace(/\r\n?/g, '\n');
  const repairs: RepairKind[] = [];
  const diagnostics: string[] = [];
  const recovered = new Set<string>();

  for (;;) {
    const peeled = peelWrapper(text);
    if (peeled) {
      text = peeled.text;
      repairs.push('peeled-wrapper');
      diagnostics.push(`peeled outer ${peeled.info || 'unlabeled'} fence wrapping the whole reply`);
      continue;
    }

    const closed = closeDanglingFence(text);
    if (closed !== null) {
      text = closed;
      repairs.push('closed-fence');
      diagnostics.push('closed an unterminated code fence at end of reply');
      continue;
    }

    const pending = (opts.schema?.fields ?? []).filter(
      (f) => f.kind === 'json' && f.required && !recovered.has(f.name),
    );
    let synthesized = false;
    for (const field of pending) {
      recovered.add(field.name);
      const next = opts.schema ? recoverMetadata(text, opts.schema, field) : null;
      if (next !== null) {
        text = next;
        repairs.push('synthesized-metadata');
        diagnostics.push(`synthesized empty "${field.name}" block; the reply did not provide one`);
        synthesized = true;
        break;
      }
    }
    if (synthesized) continue;

    return { text, repairs, diagnostics };
  }
}
