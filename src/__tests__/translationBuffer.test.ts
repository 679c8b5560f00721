/**
 * Tests for TranslationBuffer
 */

import { TranslationBuffer } from '../core/translationBuffer';
import { IDENTITY_LOOKUP } from '../catalog/catalog';

describe('TranslationBuffer', () => {
  const noWrap = { lineWidth: 0, openingDelimiterWidth: 3 };

  it('should start empty and flush nothing', () => {
    const buffer = new TranslationBuffer(IDENTITY_LOOKUP, '', noWrap);

    expect(buffer.isEmpty).toBe(true);
    expect(buffer.flushTranslated()).toEqual([]);
    expect(buffer.flushOriginal()).toEqual([]);
  });

  it('should join fragments with a single space before lookup', () => {
    const lookup = { lookup: jest.fn((text: string) => text.toUpperCase()) };
    const buffer = new TranslationBuffer(lookup, '', noWrap);

    buffer.put('  ', 'first part', '  first part', 2);
    buffer.put('  ', 'second part', '  second part', 3);

    expect(buffer.flushTranslated()).toEqual(['  FIRST PART SECOND PART']);
    expect(lookup.lookup).toHaveBeenCalledWith('first part second part');
    expect(buffer.isEmpty).toBe(true);
  });

  it('should give back original lines without translating', () => {
    const lookup = { lookup: jest.fn((text: string) => text) };
    const buffer = new TranslationBuffer(lookup, '', noWrap);

    buffer.put('    ', 'Title', '    Title  ', 4);

    expect(buffer.flushOriginal()).toEqual(['    Title  ']);
    expect(lookup.lookup).not.toHaveBeenCalled();
    expect(buffer.isEmpty).toBe(true);
  });

  it('should keep the indent of the first fragment', () => {
    const buffer = new TranslationBuffer(IDENTITY_LOOKUP, '', noWrap);

    buffer.put('  - ', 'item', '  - item', 1);
    buffer.put('    ', 'continued', '    continued', 2);

    expect(buffer.flushTranslated()).toEqual(['  - item continued']);
  });

  it('should measure a unit opened on the first line against the base indent', () => {
    const buffer = new TranslationBuffer(IDENTITY_LOOKUP, '    ', noWrap);

    buffer.put('', 'Summary', 'Summary', 0);
    expect(buffer.referenceIndentWidth).toBe(4);

    buffer.flushTranslated();
    buffer.put('  ', 'Body', '  Body', 3);
    expect(buffer.referenceIndentWidth).toBe(2);
  });

  it('should shorten the first line only for a unit on the opening line', () => {
    const options = { lineWidth: 10, openingDelimiterWidth: 3 };

    const opening = new TranslationBuffer(IDENTITY_LOOKUP, '', options);
    opening.put('', 'aaa bbb cc', 'aaa bbb cc', 0);
    expect(opening.flushTranslated()).toEqual(['aaa bbb', 'cc']);

    const later = new TranslationBuffer(IDENTITY_LOOKUP, '', options);
    later.put('', 'aaa bbb cc', 'aaa bbb cc', 1);
    expect(later.flushTranslated()).toEqual(['aaa bbb cc']);
  });
});
