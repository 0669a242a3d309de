/**
 * Fence delimiter recognition shared by the preprocessor and the segmenter.
 *
 * A fence opens with three or more backticks (or tildes) and an optional
 * info string; it closes on a bare run of the same character at least as
 * long as the opener. Lines inside an open fence are content, even when
 * they look like fences with an info string.
 */

export interface FenceMarker {
  char: '`' | '~';
  length: number;
  info: string;
}

const FENCE_RE = /^ {0,3}(`{3,}|~{3,})(.*)$/;

/** Recognize a fence delimiter line. */
export function readFence(line: string): FenceMarker | null {
  const match = FENCE_RE.exec(line);
  if (!match?.[1]) return null;
  const run = match[1];
  const info = (match[2] ?? '').trim();
  // A backtick info string cannot itself contain backticks
  if (run.startsWith('`') && info.includes('`')) return null;
  return { char: run.startsWith('~') ? '~' : '`', length: run.length, info };
}

/** Whether `line` closes a fence opened by `open`. */
export function closesFence(open: FenceMarker, line: string): boolean {
  const fence = readFence(line);
  return fence !== null && fence.char === open.char && fence.length >= open.length && fence.info === '';
}

/** Render the delimiter that closes `open`. */
export function closingDelimiter(open: FenceMarker): string {
  return open.char.repeat(open.length);
}

export interface FenceScan {
  /** Opening plus closing delimiter lines recognized. */
  delimiters: number;
  /** The fence still open at the end of input, if any. */
  openAtEnd: FenceMarker | null;
}

/** Walk lines pairing openers with closers. */
export function scanFences(lines: readonly string[]): FenceScan {
  let open: FenceMarker | null = null;
  let delimiters = 0;
  for (const line of lines) {
    if (open) {
      if (closesFence(open, line)) {
        open = null;
        delimiters++;
      }
      continue;
    }
    const fence = readFence(line);
    if (fence) {
      open = fence;
      delimiters++;
    }
  }
  return { delimiters, openAtEnd: open };
}

/** Count fence delimiters in a text. */
export function countFenceDelimiters(text: string): number {
  return scanFences(text.split('\n')).delimiters;
}
