import { CALLOUT_PREFIX, STATUS_MARKER } from './status-block.js';

export interface BlockRegion {
  start: number;
  end: number;
}

export interface PatchResult {
  text: string;
  changed: boolean;
  blocksFound: number;
}

/**
 * Locate status blocks: a line starting with the marker, followed by one or
 * more lines starting with the callout prefix, taken greedily. A region ends
 * before the last line's terminator (and before its `\r` in CRLF text).
 */
export function findStatusBlocks(text: string): BlockRegion[] {
  const lines = text.split('\n');
  const starts: number[] = [];
  let offset = 0;
  for (const line of lines) {
    starts.push(offset);
    offset += line.length + 1;
  }

  const regions: BlockRegion[] = [];
  let i = 0;
  while (i < lines.length) {
    if (!lines[i].startsWith(STATUS_MARKER)) {
      i++;
      continue;
    }

    let last = i;
    while (last + 1 < lines.length && lines[last + 1].startsWith(CALLOUT_PREFIX)) {
      last++;
    }
    if (last === i) {
      // a lone marker line has no body and is not a block
      i++;
      continue;
    }

    const lastLine = lines[last];
    const length = lastLine.endsWith('\r') ? lastLine.length - 1 : lastLine.length;
    regions.push({ start: starts[i], end: starts[last] + length });
    i = last + 1;
  }

  return regions;
}

/**
 * Replace the first status block in `text` with `block`, or append the block
 * after one blank line when the document has none.
 */
export function patchDocument(text: string, block: string): PatchResult {
  const rendered = block.trim();
  const regions = findStatusBlocks(text);

  let next: string;
  if (regions.length > 0) {
    const first = regions[0];
    next = text.slice(0, first.start) + rendered + text.slice(first.end);
  } else {
    const existing = text.trimEnd();
    next = existing ? `${existing}\n\n${rendered}` : rendered;
  }

  return { text: next, changed: next !== text, blocksFound: regions.length };
}
