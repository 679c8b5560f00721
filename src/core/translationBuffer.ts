import { rewrapUnit } from './rewrap';
import { DocstringOptions, TranslationLookup } from './types';

/**
 * Accumulates the contiguous lines of one translatable paragraph
 *
 * Owned by a single docstring pass. Each flush empties the buffer.
 */
export class TranslationBuffer {
  private indent = '';
  private startLine = -1;
  private texts: string[] = [];
  private originals: string[] = [];

  constructor(
    private readonly lookup: TranslationLookup,
    private readonly baseIndent: string,
    private readonly options: DocstringOptions
  ) {}

  get isEmpty(): boolean {
    return this.texts.length === 0;
  }

  /**
   * Width that following lines of the paragraph are compared against.
   * The opening line of a docstring has no indentation of its own, so a unit
   * that starts there is measured against the base indent as well.
   */
  get referenceIndentWidth(): number {
    if (this.startLine === 0) {
      return Math.max(this.indent.length, this.baseIndent.length);
    }
    return this.indent.length;
  }

  put(indent: string, text: string, original: string, lineIndex: number): void {
    if (this.isEmpty) {
      this.indent = indent;
      this.startLine = lineIndex;
    }
    this.texts.push(text);
    this.originals.push(original);
  }

  /**
   * Give back the raw lines untouched
   */
  flushOriginal(): string[] {
    const originals = this.originals;
    this.reset();
    return originals;
  }

  /**
   * Join, translate and re-wrap the buffered paragraph
   */
  flushTranslated(): string[] {
    if (this.isEmpty) {
      return [];
    }

    const sourceText = this.texts.join(' ');
    const translated = this.lookup.lookup(sourceText);
    const lines = rewrapUnit(translated, {
      indent: this.indent,
      baseIndent: this.baseIndent,
      lineWidth: this.options.lineWidth,
      firstLineOffset: this.startLine === 0 ? this.options.openingDelimiterWidth : 0,
    });

    this.reset();
    return lines;
  }

  private reset(): void {
    this.indent = '';
    this.startLine = -1;
    this.texts = [];
    this.originals = [];
  }
}
