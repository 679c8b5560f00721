import { ClassifiedLine } from './types';

/**
 * Characters that may form a reST section under/overline
 */
export const SECTION_DECORATION_CHARS = '=-`:.\'"~^_*+#';

export const LIST_MARKERS = ['-', '*', '#.', '|'];

export const LIST_TABLE_MARKERS = ['.. list-table::', '* -'];

const ORDERED_LIST_PATTERN = /^\d+\.(?=\s)/;

/**
 * Split a line into its leading whitespace and stripped text
 */
export function splitIndent(line: string): { indent: string; text: string } {
  const text = line.trim();
  if (!text) {
    return { indent: '', text: '' };
  }
  const indent = line.slice(0, line.length - line.trimStart().length);
  return { indent, text };
}

/**
 * True when the text is one punctuation symbol repeated, e.g. `=====`
 */
export function isSectionDecoration(text: string): boolean {
  const first = text.charAt(0);
  if (!first || !SECTION_DECORATION_CHARS.includes(first)) {
    return false;
  }
  for (const other of text.slice(1)) {
    if (other !== first) {
      return false;
    }
  }
  return true;
}

/**
 * Separate `header` from the body. The returned marker is everything before
 * the body, so any extra spacing after the header is kept verbatim.
 */
function splitMarker(text: string, header: string): { marker: string; body: string } {
  const body = text.slice(header.length).trim();
  return { marker: text.slice(0, text.length - body.length), body };
}

export function splitListMarker(text: string): { marker: string; body: string } | null {
  for (const marker of LIST_MARKERS) {
    if (text.startsWith(marker + ' ')) {
      return splitMarker(text, marker);
    }
  }
  const ordered = ORDERED_LIST_PATTERN.exec(text);
  if (ordered) {
    return splitMarker(text, ordered[0]);
  }
  return null;
}

export function splitListTableMarker(text: string): { marker: string; body: string } | null {
  for (const marker of LIST_TABLE_MARKERS) {
    if (text.startsWith(marker + ' ')) {
      return splitMarker(text, marker);
    }
  }
  return null;
}

/**
 * Classify one raw docstring line. Never fails: anything unrecognised is plain text.
 */
export function classifyLine(line: string, lineIndex: number): ClassifiedLine {
  const { indent, text } = splitIndent(line);

  if (!text) {
    return { kind: 'blank', lineIndex, original: line };
  }

  if (isSectionDecoration(text)) {
    return { kind: 'decoration', indent, text, lineIndex, original: line };
  }

  // `* - cell` would otherwise be taken for a `* ` bullet
  const tableRow = splitListTableMarker(text);
  if (tableRow) {
    return { kind: 'listTableItem', indent, ...tableRow, lineIndex, original: line };
  }

  const listItem = splitListMarker(text);
  if (listItem) {
    return { kind: 'listItem', indent, ...listItem, lineIndex, original: line };
  }

  return { kind: 'plain', indent, text, lineIndex, original: line };
}
