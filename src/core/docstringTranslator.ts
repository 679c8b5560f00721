import { classifyLine, splitIndent } from './lineClassifier';
import { TranslationBuffer } from './translationBuffer';
import { DEFAULT_DOCSTRING_OPTIONS, DocstringOptions, TranslationLookup } from './types';

/**
 * Indentation of the last line, which in a multi-line docstring holds only
 * the whitespace in front of the closing delimiter
 */
export function getBaseIndent(lines: string[]): string {
  if (lines.length === 0) {
    return '';
  }
  const last = lines[lines.length - 1];
  const { indent, text } = splitIndent(last);
  return text ? indent : last;
}

/**
 * Translate the prose of one docstring, keeping its reST structure
 *
 * Paragraph lines at the same indent are joined and looked up as one unit.
 * Blank lines and section decorations are copied verbatim; list markers are
 * re-emitted in front of the translated item body.
 *
 * @example
 * ```typescript
 * const catalog = new MessageCatalog({ 'Hello world. This continues.': 'Bonjour le monde. Ceci continue.' });
 * translateDocstring('Hello world.\nThis continues.', catalog);
 * // → 'Bonjour le monde. Ceci continue.'
 * ```
 */
export function translateDocstring(
  original: string,
  lookup: TranslationLookup,
  options: Partial<DocstringOptions> = {}
): string {
  if (!original) {
    return '';
  }

  const resolved: DocstringOptions = { ...DEFAULT_DOCSTRING_OPTIONS, ...options };
  const lines = original.split(/\r\n|\r|\n/);
  const baseIndent = getBaseIndent(lines);
  const buffer = new TranslationBuffer(lookup, baseIndent, resolved);
  const translated: string[] = [];

  lines.forEach((line, lineIndex) => {
    const classified = classifyLine(line, lineIndex);

    switch (classified.kind) {
      case 'blank':
        translated.push(...buffer.flushTranslated(), line);
        return;

      case 'decoration':
        // Whatever precedes an underline is a title: keep it as written
        translated.push(...buffer.flushOriginal(), line);
        return;

      case 'listItem':
      case 'listTableItem':
        translated.push(...buffer.flushTranslated());
        buffer.put(classified.indent + classified.marker, classified.body, line, lineIndex);
        return;

      case 'plain': {
        const width = classified.indent.length;
        if (!buffer.isEmpty && width !== buffer.referenceIndentWidth) {
          // indent or unindent: a new block starts here
          translated.push(...buffer.flushTranslated());
        }
        buffer.put(classified.indent, classified.text, line, lineIndex);
        return;
      }
    }
  });

  translated.push(...buffer.flushTranslated());

  return translated.join('\n');
}
