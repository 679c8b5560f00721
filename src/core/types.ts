/**
 * Classification of a single docstring line
 */
export type ClassifiedLine =
  | BlankLine
  | DecorationLine
  | ListItemLine
  | PlainLine;

interface LineBase {
  lineIndex: number;
  original: string;
}

export interface BlankLine extends LineBase {
  kind: 'blank';
}

/** A row of one repeated punctuation symbol (heading under/overline) */
export interface DecorationLine extends LineBase {
  kind: 'decoration';
  indent: string;
  text: string;
}

/**
 * Bullet, numbered or list-table row. `marker` keeps its trailing whitespace
 * so it can be re-emitted verbatim in front of the translated body.
 */
export interface ListItemLine extends LineBase {
  kind: 'listItem' | 'listTableItem';
  indent: string;
  marker: string;
  body: string;
}

export interface PlainLine extends LineBase {
  kind: 'plain';
  indent: string;
  text: string;
}

/**
 * Source text → translated text. Must be total: return the input unchanged
 * when no translation exists.
 */
export interface TranslationLookup {
  lookup(sourceText: string): string;
}

/**
 * Options for rewriting a single docstring
 */
export interface DocstringOptions {
  /** Maximum physical line width. 0 disables wrapping (one line per unit) */
  lineWidth: number;
  /** Width of the opening delimiter that precedes the first line of text */
  openingDelimiterWidth: number;
}

export const DEFAULT_DOCSTRING_OPTIONS: DocstringOptions = {
  lineWidth: 0,
  openingDelimiterWidth: 3,
};

/**
 * Result of translating a whole stub file
 */
export interface StubTranslationResult {
  /** The rewritten stub source */
  code: string;
  /** Number of docstring literals found */
  docstrings: number;
  /** Units that had a catalog entry */
  translatedUnits: string[];
  /** Units that fell back to the source text */
  untranslatedUnits: string[];
}
