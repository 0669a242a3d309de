/**
 * Extraction engine tests: fences, header matching, lenient JSON,
 * preprocessing repairs and schema-bound parsing.
 *
 * Pure functions only; no file I/O.
 */

import { describe, it, expect } from 'vitest';

import { closesFence, countFenceDelimiters, readFence } from '../src/lib/extract/fences.js';
import { matchHeader, stripLeadingSymbols } from '../src/lib/extract/header-match.js';
import { parseLenientJson, removeTrailingCommas } from '../src/lib/extract/lenient-json.js';
import { normalize } from '../src/lib/extract/preprocess.js';
import { extract, resolveDecision } from '../src/lib/extract/parser.js';
import { fieldCode, fieldDecision, fieldJson, fieldText, summarizeResult } from '../src/lib/extract/result.js';
import {
  CODER_SCHEMA,
  DEBUGGER_SCHEMA,
  defineSchema,
  PLANNER_SCHEMA,
  TESTER_SCHEMA,
} from '../src/lib/extract/schemas.js';

const SCENARIO = '```markdown\n## Content:\n```python\nprint(1)\n```\n## Metadata: {"path": "a.py"}\n```';

// =============================================================================
// Fences
// =============================================================================

describe('fences', () => {
  it('reads backtick and tilde delimiters with their info string', () => {
    expect(readFence('```python')).toEqual({ char: '`', length: 3, info: 'python' });
    expect(readFence('~~~~')).toEqual({ char: '~', length: 4, info: '' });
    expect(readFence('``')).toBeNull();
    expect(readFence('``` a`b')).toBeNull();
  });

  it('closes only on a bare run of the same character at least as long', () => {
    const open = { char: '`' as const, length: 4, info: 'js' };
    expect(closesFence(open, '````')).toBe(true);
    expect(closesFence(open, '`````')).toBe(true);
    expect(closesFence(open, '```')).toBe(false);
    expect(closesFence(open, '````js')).toBe(false);
    expect(closesFence(open, '~~~~')).toBe(false);
  });
});

// =============================================================================
// Greedy Header Match
// =============================================================================

describe('matchHeader', () => {
  it('binds "Target: SOURCE" to Target with inline value SOURCE', () => {
    const match = matchHeader('Target: SOURCE', DEBUGGER_SCHEMA.fields);
    expect(match?.field.name).toBe('Target');
    expect(match?.value).toBe('SOURCE');
  });

  it('strips numbering, emoji and emphasis in front of the label', () => {
    expect(stripLeadingSymbols('1. 🎯 **Content**')).toBe('Content**');
    const match = matchHeader('1. 🎯 **Content**', CODER_SCHEMA.fields);
    expect(match?.field.name).toBe('Content');
    expect(match?.value).toBe('');
  });

  it('treats spaces, hyphens and underscores alike and ignores case', () => {
    expect(matchHeader('user_story', PLANNER_SCHEMA.fields)?.field.name).toBe('User Story');
    expect(matchHeader('USER-STORY', PLANNER_SCHEMA.fields)?.field.name).toBe('User Story');
  });

  it('does not match a label that continues into a longer word', () => {
    expect(matchHeader('Contents', CODER_SCHEMA.fields)).toBeNull();
  });

  it('prefers the longest matching label', () => {
    const schema = defineSchema('tester', [
      { name: 'Test', kind: 'text', required: false },
      { name: 'Test Plan', kind: 'text', required: false },
    ]);
    const match = matchHeader('Test Plan: x', schema.fields);
    expect(match?.field.name).toBe('Test Plan');
    expect(match?.value).toBe('x');
  });
});

// =============================================================================
// Lenient JSON
// =============================================================================

describe('parseLenientJson', () => {
  it('drops trailing commas outside strings', () => {
    expect(removeTrailingCommas('{"a": [1, 2,],}')).toBe('{"a": [1, 2]}');
    expect(parseLenientJson('{"a": ",}"}')).toEqual({ ok: true, value: { a: ',}' } });
  });

  it('accepts single outer quotes or backticks', () => {
    expect(parseLenientJson(`'{"a": [1, 2,]}'`)).toEqual({ ok: true, value: { a: [1, 2] } });
    expect(parseLenientJson('`{"b": true}`')).toEqual({ ok: true, value: { b: true } });
  });

  it('finds an object surrounded by prose', () => {
    expect(parseLenientJson('Here it is: {"path": "x.py"} thanks')).toEqual({
      ok: true,
      value: { path: 'x.py' },
    });
  });

  it('reports failure without throwing', () => {
    expect(parseLenientJson('')).toEqual({ ok: false, error: 'empty input' });
    expect(parseLenientJson('not json').ok).toBe(false);
  });
});

// =============================================================================
// Preprocessor
// =============================================================================

describe('normalize', () => {
  it('peels an outer markdown wrapper', () => {
    const msg = normalize(SCENARIO, { schema: CODER_SCHEMA });
    expect(msg.text).toBe('## Content:\n```python\nprint(1)\n```\n## Metadata: {"path": "a.py"}');
    expect(msg.repairs).toEqual(['peeled-wrapper']);
    expect(msg.diagnostics).toEqual(['peeled outer markdown fence wrapping the whole reply']);
  });

  it('peels an unlabeled wrapper only when headings sit inside', () => {
    const msg = normalize('```\n## User Story\nDo X\n```');
    expect(msg.text).toBe('## User Story\nDo X');
    expect(msg.diagnostics).toEqual(['peeled outer unlabeled fence wrapping the whole reply']);

    const code = '```python\nprint(1)\n```';
    expect(normalize(code)).toEqual({ text: code, repairs: [], diagnostics: [] });
  });

  it('closes an unterminated fence', () => {
    const msg = normalize('## Content\n```python\nprint(1)');
    expect(msg.text).toBe('## Content\n```python\nprint(1)\n```');
    expect(msg.repairs).toEqual(['closed-fence']);
    expect(msg.diagnostics).toEqual(['closed an unterminated code fence at end of reply']);

    expect(normalize('x\n~~~~\ncode\n').text).toBe('x\n~~~~\ncode\n~~~~');
  });

  it('synthesizes a missing required metadata block', () => {
    const msg = normalize('## Content\n```js\nx()\n```', { schema: TESTER_SCHEMA });
    expect(msg.text).toBe('## Content\n```js\nx()\n```\n\n## Metadata\n```json\n{}\n```');
    expect(msg.repairs).toEqual(['synthesized-metadata']);
    expect(msg.diagnostics).toEqual(['synthesized empty "Metadata" block; the reply did not provide one']);
  });

  it('fills a metadata heading that ends the reply with nothing after it', () => {
    const msg = normalize('## Content\n```\nx\n```\n## Metadata\n', { schema: TESTER_SCHEMA });
    expect(msg.text).toBe('## Content\n```\nx\n```\n## Metadata\n```json\n{}\n```');
    expect(msg.repairs).toEqual(['synthesized-metadata']);
  });

  it('converts CRLF line endings', () => {
    expect(normalize('## A\r\nb\r\n').text).toBe('## A\nb\n');
  });

  it('is idempotent', () => {
    const inputs: [string, typeof CODER_SCHEMA | undefined][] = [
      [SCENARIO, CODER_SCHEMA],
      ['## Content\n```python\nprint(1)', undefined],
      ['## Content\n```js\nx()\n```', TESTER_SCHEMA],
      ['```\n## User Story\nDo X\n```', PLANNER_SCHEMA],
      ['plain prose', CODER_SCHEMA],
    ];
    for (const [input, schema] of inputs) {
      const opts = schema ? { schema } : {};
      const once = normalize(input, opts);
      const twice = normalize(once.text, opts);
      expect(twice.text).toBe(once.text);
      expect(twice.repairs).toEqual([]);
    }
  });

  it('always leaves an even number of fence delimiters', () => {
    const inputs = ['```', '```\n```\n```', '~~~~\ncode\n```', '## A\n```json\n{', 'no fences', '````md\n```\n````'];
    for (const input of inputs) {
      expect(countFenceDelimiters(normalize(input).text) % 2).toBe(0);
    }
  });
});

// =============================================================================
// Parser
// =============================================================================

describe('extract', () => {
  it('recovers code and metadata from a wrapped reply', () => {
    const result = extract(SCENARIO, CODER_SCHEMA);
    expect(result.ok).toBe(true);
    expect(result.fields.Content?.parsed).toEqual({ kind: 'code', code: 'print(1)', language: 'python' });
    expect(result.fields.Metadata?.parsed).toEqual({ kind: 'json', value: { path: 'a.py' } });
    expect(result.fields.Reasoning).toEqual({ raw: '', parsed: null, present: false });
    expect(result.diagnostics).toEqual(['peeled outer markdown fence wrapping the whole reply']);
    expect(summarizeResult(result)).toEqual(['Reasoning: absent', 'Content: code', 'Metadata: json']);
  });

  it('reads a decision from the heading line', () => {
    const reply = [
      '## Reasoning',
      'Off by one.',
      '',
      '## Target: SOURCE',
      '',
      '## Source',
      '```python',
      'def f(): return 1',
      '```',
    ].join('\n');
    const result = extract(reply, DEBUGGER_SCHEMA);
    expect(result.ok).toBe(true);
    expect(fieldDecision(result, 'Target')).toBe('SOURCE');
    expect(fieldText(result, 'Reasoning')).toBe('Off by one.');
    expect(fieldCode(result, 'Source')).toBe('def f(): return 1');
    expect(result.fields.Test?.present).toBe(false);
    expect(result.diagnostics).toEqual([]);
  });

  it('never reads headings inside code as structure', () => {
    const reply = '## Content\n```python\n# Metadata\nx = 1\n```\n## Metadata\n```json\n{"path": "m.py"}\n```';
    const result = extract(reply, CODER_SCHEMA);
    expect(result.ok).toBe(true);
    expect(fieldCode(result, 'Content')).toBe('# Metadata\nx = 1');
    expect(fieldJson(result, 'Metadata')).toEqual({ path: 'm.py' });
    expect(result.diagnostics).toEqual([]);
  });

  it('records an unknown decision as a diagnostic', () => {
    const result = extract('## Target\nMAYBE\n', DEBUGGER_SCHEMA);
    expect(result.ok).toBe(false);
    expect(result.fields.Target).toEqual({ raw: 'MAYBE', parsed: null, present: true });
    expect(result.diagnostics).toEqual(['field "Target": "MAYBE" is not one of SOURCE, TEST, BOTH']);
  });

  it('records a missing required field without throwing', () => {
    const result = extract('Just some prose.', PLANNER_SCHEMA);
    expect(result.ok).toBe(false);
    expect(result.fields['User Story']).toEqual({ raw: '', parsed: null, present: false });
    expect(result.diagnostics).toEqual(['missing required field "User Story"']);
  });

  it('marks unreadable JSON as present but invalid', () => {
    const result = extract('## Content\n```\nx\n```\n## Metadata\n```json\n{not json}\n```', TESTER_SCHEMA);
    expect(result.ok).toBe(false);
    expect(result.fields.Metadata?.present).toBe(true);
    expect(result.fields.Metadata?.parsed).toBeNull();
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0]).toMatch(/^field "Metadata": not valid JSON \(/);
    expect(summarizeResult(result)).toEqual(['Reasoning: absent', 'Content: code', 'Metadata: invalid']);
  });

  it('falls back to unfenced code with a diagnostic', () => {
    const result = extract('## Content\nprint(2)\n## Metadata\n{"path": "p.py"}', TESTER_SCHEMA);
    expect(result.ok).toBe(true);
    expect(fieldCode(result, 'Content')).toBe('print(2)');
    expect(fieldJson(result, 'Metadata')).toEqual({ path: 'p.py' });
    expect(result.diagnostics).toEqual(['field "Content": no code fence, using unfenced text']);
  });

  it('uses the first repeated heading that carries a value', () => {
    const result = extract('## Content\n\n## Content\n```\nsecond\n```\n## Metadata\n{}', TESTER_SCHEMA);
    expect(result.ok).toBe(true);
    expect(fieldCode(result, 'Content')).toBe('second');
    expect(fieldJson(result, 'Metadata')).toEqual({});
  });

  it('prefers a fenced repeated heading over prose under a look-alike heading', () => {
    const reply = [
      '## Target: SOURCE',
      '## Source code analysis',
      'The loop bound is wrong.',
      '## Source',
      '```python',
      'def f():',
      '    return 1',
      '```',
    ].join('\n');
    const result = extract(reply, DEBUGGER_SCHEMA);
    expect(result.ok).toBe(true);
    expect(fieldCode(result, 'Source')).toBe('def f():\n    return 1');
    expect(result.diagnostics).toEqual([]);
  });

  it('drops unfenced code when the field has several headings', () => {
    const reply = '## Target: SOURCE\n## Source notes\nlooks off\n## Source\nreturn 1';
    const result = extract(reply, DEBUGGER_SCHEMA);
    expect(result.fields.Source?.present).toBe(false);
    expect(result.diagnostics).toEqual(['field "Source": 2 headings and none holds a code fence']);
  });

  it('keeps unmatched subheadings inside a text field', () => {
    const result = extract('## User Story\nAs a user\n### Acceptance\n- works', PLANNER_SCHEMA);
    expect(fieldText(result, 'User Story')).toBe('As a user\n### Acceptance\n- works');
  });

  it('is total over malformed input', () => {
    const inputs = ['', '```', '#', '## \n```json\n{', '\u0000\n# Target BOTH BOTH', '~~~\n## Content'];
    for (const input of inputs) {
      for (const schema of [PLANNER_SCHEMA, CODER_SCHEMA, TESTER_SCHEMA, DEBUGGER_SCHEMA]) {
        const result = extract(input, schema);
        expect(typeof result.ok).toBe('boolean');
        expect(Object.keys(result.fields)).toEqual(schema.fields.map((f) => f.name));
      }
    }
  });
});

describe('resolveDecision', () => {
  const choices = ['SOURCE', 'TEST', 'BOTH'];

  it('matches case-insensitively after stripping markup', () => {
    expect(resolveDecision('`test`', choices)).toBe('TEST');
    expect(resolveDecision('**Both**', choices)).toBe('BOTH');
  });

  it('accepts a sentence that names exactly one choice', () => {
    expect(resolveDecision('The bug is in the **source** file.', choices)).toBe('SOURCE');
    expect(resolveDecision('source and test', choices)).toBeNull();
    expect(resolveDecision('testing', choices)).toBeNull();
  });
});

describe('defineSchema', () => {
  it('rejects a decision field without choices', () => {
    expect(() => defineSchema('debugger', [{ name: 'Target', kind: 'decision', required: true }])).toThrow(
      'Decision field "Target" of debugger schema has no choices',
    );
  });

  it('freezes the field list', () => {
    expect(Object.isFrozen(CODER_SCHEMA)).toBe(true);
    expect(Object.isFrozen(CODER_SCHEMA.fields)).toBe(true);
    expect(Object.isFrozen(DEBUGGER_SCHEMA.fields[1])).toBe(true);
  });
});
