/**
 * Tests for docstring translation
 */

import { getBaseIndent, translateDocstring } from '../core/docstringTranslator';
import { classifyLine } from '../core/lineClassifier';
import { IDENTITY_LOOKUP, MessageCatalog } from '../catalog/catalog';

// Blank and decoration lines, in order
const structuralLines = (text: string): string[] =>
  text.split('\n').filter((line, i) => {
    const kind = classifyLine(line, i).kind;
    return kind === 'blank' || kind === 'decoration';
  });

const words = (text: string): string[] => text.split(/\s+/).filter(Boolean);

describe('translateDocstring', () => {
  describe('Paragraphs', () => {
    it('should merge continuation lines into one translated paragraph', () => {
      const catalog = new MessageCatalog({
        'Hello world. This continues.': 'Bonjour le monde. Ceci continue.',
      });

      expect(translateDocstring('Hello world.\nThis continues.', catalog, { lineWidth: 0 }))
        .toBe('Bonjour le monde. Ceci continue.');
    });

    it('should leave text without a catalog entry as it is', () => {
      expect(translateDocstring('Nothing to see here.', new MessageCatalog()))
        .toBe('Nothing to see here.');
    });

    it('should merge the opening line with lines at the base indent', () => {
      const catalog = new MessageCatalog({ 'Summary that wraps over two lines.': '要約。' });
      const doc = 'Summary that wraps\n    over two lines.\n    ';

      expect(translateDocstring(doc, catalog)).toBe('要約。\n    ');
    });
  });

  describe('Section decorations', () => {
    it('should keep a title and its underline untranslated', () => {
      const catalog = new MessageCatalog({ 'Title': 'Titre', 'Body text.': 'Corps.' });

      expect(translateDocstring('Title\n=====\n\nBody text.', catalog))
        .toBe('Title\n=====\n\nCorps.');
    });
  });

  describe('Lists', () => {
    it('should merge a wrapped list item and keep its marker', () => {
      const catalog = new MessageCatalog({ 'item one continued': 'élément un suite' });

      expect(translateDocstring('- item one\n  continued', catalog)).toBe('- élément un suite');
    });

    it('should translate list-table rows cell by cell', () => {
      const catalog = new MessageCatalog({ 'Options': 'Optionen', 'the name': 'der Name' });
      const doc = '.. list-table:: Options\n\n   * - name\n     - the name\n   ';

      expect(translateDocstring(doc, catalog))
        .toBe('.. list-table:: Optionen\n\n   * - name\n     - der Name\n   ');
    });
  });

  describe('Full docstring', () => {
    const doc = [
      'Compute the sum.',
      '',
      '        Adds the values',
      '        together.',
      '',
      '        Parameters',
      '        ----------',
      '        values : list',
      '            The values to add.',
      '',
      '        - first item',
      '          wraps here',
      '        - second item',
      '        ',
    ].join('\n');

    const catalog = new MessageCatalog({
      'Compute the sum.': '合計を計算する。',
      'Adds the values together.': '値を足し合わせる。',
      'The values to add.': '足す値。',
      'first item wraps here': '最初の項目',
      'Parameters': 'パラメータ',
    });

    it('should translate prose and keep the structure', () => {
      expect(translateDocstring(doc, catalog)).toBe([
        '合計を計算する。',
        '',
        '        値を足し合わせる。',
        '',
        '        Parameters',
        '        ----------',
        '        values : list',
        '            足す値。',
        '',
        '        - 最初の項目',
        '        - second item',
        '        ',
      ].join('\n'));
    });

    it('should preserve blank and decoration lines byte for byte', () => {
      for (const lineWidth of [0, 20, 40]) {
        const translated = translateDocstring(doc, catalog, { lineWidth });
        expect(structuralLines(translated)).toEqual(structuralLines(doc));
      }
    });

    it('should keep the prose under an identity catalog', () => {
      const translated = translateDocstring(doc, IDENTITY_LOOKUP, { lineWidth: 24 });
      expect(words(translated)).toEqual(words(doc));
    });
  });

  describe('Wrapping', () => {
    it('should re-wrap the opening paragraph around the opening quotes', () => {
      const doc = 'First line of text\n    continues on the next line.\n    ';

      expect(translateDocstring(doc, IDENTITY_LOOKUP, { lineWidth: 24 })).toBe(
        'First line of\n    text continues on\n    the next line.\n    '
      );
    });

    it('should keep every line within the width unless a word is longer', () => {
      const catalog = new MessageCatalog({
        'Short text.': 'a considerably longer replacement with incomprehensibilities inside',
      });
      const doc = 'Summary.\n\n    Short text.\n    ';
      const translated = translateDocstring(doc, catalog, { lineWidth: 16 });

      for (const line of translated.split('\n')) {
        if (words(line).length > 1) {
          expect(line.length).toBeLessThanOrEqual(16);
        }
      }
      expect(translated.split('\n')).toContain('    incomprehensibilities');
    });

    it('should emit one line per unit when wrapping is disabled', () => {
      const doc = 'One\n    two\n    three\n\n    four\n    five\n    ';
      expect(translateDocstring(doc, IDENTITY_LOOKUP, { lineWidth: 0 }))
        .toBe('One two three\n\n    four five\n    ');
    });

    it('should honour a custom opening delimiter width', () => {
      expect(translateDocstring('aaa bbb cc', IDENTITY_LOOKUP, { lineWidth: 10, openingDelimiterWidth: 0 }))
        .toBe('aaa bbb cc');
      expect(translateDocstring('aaa bbb cc', IDENTITY_LOOKUP, { lineWidth: 10, openingDelimiterWidth: 3 }))
        .toBe('aaa bbb\ncc');
    });
  });

  describe('Indentation changes', () => {
    it('should start a new unit on indent and on unindent', () => {
      const lookup = { lookup: jest.fn((text: string) => text) };
      const doc = 'Intro.\n\n    Para one\n        nested block\n    back out\n    ';

      translateDocstring(doc, lookup);

      expect(lookup.lookup.mock.calls.map(call => call[0])).toEqual([
        'Intro.',
        'Para one',
        'nested block',
        'back out',
      ]);
    });
  });

  describe('Degenerate input', () => {
    it('should return an empty string for an empty docstring', () => {
      expect(translateDocstring('', IDENTITY_LOOKUP)).toBe('');
    });

    it('should handle a single line', () => {
      const catalog = new MessageCatalog({ 'Just one line.': 'Nur eine Zeile.' });
      expect(translateDocstring('Just one line.', catalog)).toBe('Nur eine Zeile.');
    });

    it('should keep a trailing newline', () => {
      const catalog = new MessageCatalog({ 'Text.': 'Texte.' });
      expect(translateDocstring('Text.\n', catalog)).toBe('Texte.\n');
    });

    it('should not fail on a lone decoration character', () => {
      expect(translateDocstring('-', IDENTITY_LOOKUP)).toBe('-');
    });
  });
});

describe('getBaseIndent', () => {
  it('should use the whitespace of the closing line', () => {
    expect(getBaseIndent(['Text', '        '])).toBe('        ');
  });

  it('should use the indent of a last line that carries text', () => {
    expect(getBaseIndent(['Text', '    more'])).toBe('    ');
  });

  it('should be empty for no lines', () => {
    expect(getBaseIndent([])).toBe('');
  });
});
