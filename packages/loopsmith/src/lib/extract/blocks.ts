/**
 * Structural segmentation of a normalized message into blocks.
 *
 * Fences are cut first: a fence body is never re-segmented, so headings
 * inside code stay code.
 */

import type { Block } from '../types.js';
import { closesFence, readFence, type FenceMarker } from './fences.js';

const HEADING_RE = /^ {0,3}(#{1,6})(?:[ \t]+(.*?))?[ \t]*$/;

/** Strip an ATX closing sequence ("## Title ##"). */
function headingText(raw: string): string {
  return raw.replace(/(?:^|[ \t]+)#+$/, '').trim();
}

export function segmentBlocks(text: string): Block[] {
  const lines = text.split('\n');
  const blocks: Block[] = [];
  let header = '';

  let paragraphStart = -1;
  let fence: FenceMarker | null = null;
  let fenceStart = -1;

  const flushParagraph = (end: number) => {
    if (paragraphStart < 0) return;
    blocks.push({
      headerText: header,
      kind: 'paragraph',
      body: lines.slice(paragraphStart, end).join('\n'),
      level: 0,
      startLine: paragraphStart,
      endLine: end,
    });
    paragraphStart = -1;
  };

  const pushFence = (open: FenceMarker, start: number, bodyEnd: number, end: number) => {
    blocks.push({
      headerText: header,
      kind: 'fence',
      body: lines.slice(start + 1, bodyEnd).join('\n'),
      level: 0,
      ...(open.info ? { fenceLanguage: open.info.split(/\s+/)[0] } : {}),
      startLine: start,
      endLine: end,
    });
  };

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? '';

    if (fence) {
      if (closesFence(fence, line)) {
        pushFence(fence, fenceStart, i, i + 1);
        fence = null;
      }
      continue;
    }

    const opened = readFence(line);
    if (opened) {
      flushParagraph(i);
      fence = opened;
      fenceStart = i;
      continue;
    }

    const heading = HEADING_RE.exec(line);
    const hashes = heading?.[1];
    if (heading && hashes) {
      flushParagraph(i);
      header = headingText(heading[2] ?? '');
      blocks.push({
        headerText: header,
        kind: 'heading',
        body: '',
        level: hashes.length,
        startLine: i,
        endLine: i + 1,
      });
      continue;
    }

    if (line.trim() === '') {
      flushParagraph(i);
    } else if (paragraphStart < 0) {
      paragraphStart = i;
    }
  }

  // Unterminated fence: keep its content as code rather than structure
  if (fence) {
    pushFence(fence, fenceStart, lines.length, lines.length);
  }
  flushParagraph(lines.length);

  return blocks;
}
