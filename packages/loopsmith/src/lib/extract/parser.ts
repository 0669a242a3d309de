/**
 * Markdown sidecar parser: binds the blocks of a normalized reply to the
 * fields of an agent schema.
 *
 * Deterministic and total. A missing or unreadable field lands in
 * `diagnostics` and clears `ok`; nothing here throws on model text.
 */

import type {
  AgentSchema,
  Block,
  ExtractionResult,
  FieldSpec,
  FieldValue,
  NormalizedMessage,
  ParsedValue,
} from '../types.js';
import { segmentBlocks } from './blocks.js';
import { matchHeader } from './header-match.js';
import { parseLenientJson } from './lenient-json.js';
import { normalize } from './preprocess.js';

/** One heading bound to a field, with the blocks it governs. */
interface Binding {
  field: FieldSpec;
  inline: string;
  body: Block[];
  /** Line span of the body, end exclusive. */
  startLine: number;
  endLine: number;
}

interface Evaluated {
  value: FieldValue;
  diagnostic?: string;
  /** Code taken from unfenced text. */
  loose?: boolean;
}

const ABSENT: FieldValue = { raw: '', parsed: null, present: false };

// =============================================================================
// Binding
// =============================================================================

function bindHeadings(blocks: Block[], schema: AgentSchema, lineCount: number): Binding[] {
  const matches = blocks.map((b) => (b.kind === 'heading' ? matchHeader(b.headerText, schema.fields) : null));
  const bindings: Binding[] = [];

  for (let i = 0; i < blocks.length; i++) {
    const heading = blocks[i];
    const match = matches[i];
    if (!heading || !match) continue;

    // A field's content runs to the next heading at the same or a higher
    // level, or to the next heading that names another field.
    let end = i + 1;
    while (end < blocks.length) {
      const next = blocks[end];
      if (next?.kind === 'heading' && (next.level <= heading.level || matches[end])) break;
      end++;
    }

    bindings.push({
      field: match.field,
      inline: match.value,
      body: blocks.slice(i + 1, end),
      startLine: heading.endLine,
      endLine: blocks[end]?.startLine ?? lineCount,
    });
  }

  return bindings;
}

// =============================================================================
// Value Interpretation
// =============================================================================

function trimTrailingNewlines(s: string): string {
  return s.replace(/\n+$/, '');
}

function evaluateCode(b: Binding): Evaluated {
  for (const block of b.body) {
    if (block.kind !== 'fence') continue;
    const code = trimTrailingNewlines(block.body);
    if (code.trim() === '') continue;
    const parsed: ParsedValue = {
      kind: 'code',
      code,
      ...(block.fenceLanguage ? { language: block.fenceLanguage } : {}),
    };
    return { value: { raw: block.body, parsed, present: true } };
  }

  const loose = [b.inline, ...b.body.filter((x) => x.kind === 'paragraph').map((x) => x.body)]
    .filter((s) => s.trim() !== '')
    .join('\n');
  if (loose === '') return { value: ABSENT };
  return {
    value: { raw: loose, parsed: { kind: 'code', code: loose }, present: true },
    diagnostic: `field "${b.field.name}": no code fence, using unfenced text`,
    loose: true,
  };
}

function evaluateJson(b: Binding): Evaluated {
  const candidates = [
    ...b.body.filter((x) => x.kind === 'fence').map((x) => x.body),
    b.inline,
    ...b.body.filter((x) => x.kind === 'paragraph').map((x) => x.body),
  ].filter((s) => s.trim() !== '');

  const first = candidates[0];
  if (first === undefined) return { value: ABSENT };

  let lastError = '';
  for (const candidate of candidates) {
    const result = parseLenientJson(candidate);
    if (result.ok) {
      return { value: { raw: candidate, parsed: { kind: 'json', value: result.value }, present: true } };
    }
    lastError = result.error;
  }

  return {
    value: { raw: first, parsed: null, present: true },
    diagnostic: `field "${b.field.name}": not valid JSON (${lastError})`,
  };
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Resolve free text to one of the literal choices, case-insensitively. */
export function resolveDecision(raw: string, choices: readonly string[]): string | null {
  const cleaned = raw.trim().replace(/^[^\p{L}\p{N}_]+|[^\p{L}\p{N}_]+$/gu, '');
  const exact = choices.find((c) => c.toLowerCase() === cleaned.toLowerCase());
  if (exact) return exact;

  const mentioned = choices.filter((c) =>
    new RegExp(`(?<![\\p{L}\\p{N}_])${escapeRegExp(c)}(?![\\p{L}\\p{N}_])`, 'iu').test(raw),
  );
  return mentioned.length === 1 ? (mentioned[0] ?? null) : null;
}

function evaluateDecision(b: Binding): Evaluated {
  const raw =
    b.inline ||
    b.body.find((x) => x.kind === 'paragraph')?.body.trim() ||
    b.body.find((x) => x.kind === 'fence')?.body.trim() ||
    '';
  if (raw === '') return { value: ABSENT };

  const decision = resolveDecision(raw, b.field.choices ?? []);
  if (decision === null) {
    return {
      value: { raw, parsed: null, present: true },
      diagnostic: `field "${b.field.name}": "${raw}" is not one of ${(b.field.choices ?? []).join(', ')}`,
    };
  }
  return { value: { raw, parsed: { kind: 'decision', decision }, present: true } };
}

function evaluateText(b: Binding, lines: string[]): Evaluated {
  const span = lines.slice(b.startLine, b.endLine).join('\n').trim();
  const text = [b.inline, span].filter((s) => s !== '').join('\n');
  if (text === '') return { value: ABSENT };
  return { value: { raw: text, parsed: { kind: 'text', text }, present: true } };
}

function evaluate(b: Binding, lines: string[]): Evaluated {
  switch (b.field.kind) {
    case 'code':
      return evaluateCode(b);
    case 'json':
      return evaluateJson(b);
    case 'decision':
      return evaluateDecision(b);
    case 'text':
      return evaluateText(b, lines);
  }
}

// =============================================================================
// Parse
// =============================================================================

/**
 * Pick among repeated headings of one field: the first carrying a value
 * wins. Unfenced code counts only when its heading is the field's only one.
 */
function choose(field: FieldSpec, candidates: Evaluated[]): Evaluated {
  const present = candidates.filter((c) => c.value.present);
  const direct = present.find((c) => !c.loose);
  if (direct) return direct;

  const loose = present[0];
  if (!loose) return { value: ABSENT };
  if (candidates.length === 1) return loose;
  return {
    value: ABSENT,
    diagnostic: `field "${field.name}": ${candidates.length} headings and none holds a code fence`,
  };
}

export function parse(msg: NormalizedMessage, schema: AgentSchema): ExtractionResult {
  const lines = msg.text.split('\n');
  const bindings = bindHeadings(segmentBlocks(msg.text), schema, lines.length);
  const fields: Record<string, FieldValue> = {};
  const diagnostics = [...msg.diagnostics];
  let ok = true;

  for (const field of schema.fields) {
    const candidates = bindings.filter((b) => b.field.name === field.name).map((b) => evaluate(b, lines));
    const chosen = choose(field, candidates);

    fields[field.name] = chosen.value;
    if (chosen.diagnostic) diagnostics.push(chosen.diagnostic);

    if (!chosen.value.present) {
      if (field.required) {
        ok = false;
        diagnostics.push(`missing required field "${field.name}"`);
      }
    } else if (chosen.value.parsed === null) {
      ok = false;
    }
  }

  return { fields, ok, diagnostics };
}

/** Normalize then parse raw model text against a schema. */
export function extract(raw: string, schema: AgentSchema): ExtractionResult {
  return parse(normalize(raw, { schema }), schema);
}
