import { TranslationLookup } from '../core/types';

/**
 * In-memory message catalog
 *
 * Maps exact source text to its translation for one target language.
 * The header entry (empty msgid) and empty translations are ignored, as a
 * gettext catalog would ignore them.
 *
 * Example:
 *   const catalog = new MessageCatalog({ 'Return the sum.': '合計を返す。' }, 'ja');
 *   catalog.lookup('Return the sum.');  // → '合計を返す。'
 *   catalog.lookup('Unknown text.');    // → 'Unknown text.'
 */
export class MessageCatalog implements TranslationLookup {
  private messages: Map<string, string>;
  readonly language?: string;

  constructor(messages: Record<string, string> | Map<string, string> = {}, language?: string) {
    const entries = messages instanceof Map ? messages.entries() : Object.entries(messages);
    this.messages = new Map();
    for (const [source, translation] of entries) {
      if (source && translation) {
        this.messages.set(source, translation);
      }
    }
    this.language = language;
  }

  lookup(sourceText: string): string {
    return this.messages.get(sourceText) ?? sourceText;
  }

  has(sourceText: string): boolean {
    return this.messages.has(sourceText);
  }

  get size(): number {
    return this.messages.size;
  }
}

/**
 * Catalog with no entries: every text translates to itself
 */
export const IDENTITY_LOOKUP: TranslationLookup = {
  lookup: (sourceText: string) => sourceText,
};
