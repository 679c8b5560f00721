/**
 * Greedy word wrap. Breaks only on whitespace; a word longer than the width
 * gets a line of its own instead of being split. Always returns at least one line.
 *
 * @param width - budget for every line after the first
 * @param firstLineWidth - budget for the first line (defaults to `width`)
 */
export function wrapText(text: string, width: number, firstLineWidth: number = width): string[] {
  const words = text.split(/\s+/).filter(word => word.length > 0);
  if (words.length === 0) {
    return [''];
  }

  const lines: string[] = [];
  let current = words[0];

  for (const word of words.slice(1)) {
    const budget = lines.length === 0 ? firstLineWidth : width;
    if (current.length + 1 + word.length <= budget) {
      current += ' ' + word;
    } else {
      lines.push(current);
      current = word;
    }
  }
  lines.push(current);

  return lines;
}

export interface RewrapParams {
  /** Indent recorded for the unit (list marker included) */
  indent: string;
  baseIndent: string;
  lineWidth: number;
  /** Extra columns taken on the first line, e.g. by an opening `"""` */
  firstLineOffset: number;
}

/**
 * Lay out translated text as physical docstring lines.
 *
 * The first line carries the unit's own indent. Continuation lines are indented
 * to the wider of the unit indent and the base indent, since the wrap primitive
 * knows nothing about indentation.
 */
export function rewrapUnit(text: string, params: RewrapParams): string[] {
  const { indent, baseIndent, lineWidth, firstLineOffset } = params;

  if (lineWidth <= 0) {
    return [indent + text];
  }

  const effectiveWidth = Math.max(indent.length, baseIndent.length);
  const width = Math.max(1, lineWidth - effectiveWidth);
  const firstLineWidth = Math.max(1, width - firstLineOffset);
  const continuation = ' '.repeat(effectiveWidth);

  return wrapText(text, width, firstLineWidth).map((line, i) =>
    i === 0 ? indent + line : continuation + line
  );
}
