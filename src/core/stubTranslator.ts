import * as fs from 'fs';
import { log } from '../logging/logger';
import { translateDocstring } from './docstringTranslator';
import {
  containsNamedEscape,
  encodeStringBody,
  LiteralReplacement,
  replaceLiterals,
  StubExtractor,
} from './stubExtractor';
import { DocstringOptions, StubTranslationResult, TranslationLookup } from './types';

/**
 * Translates every docstring of a stub file
 *
 * Code outside docstrings is left byte for byte as it was, and so is any
 * docstring whose text does not change. Unless `openingDelimiterWidth` is
 * given, the first line of each docstring is measured against its own
 * prefix and quote (`r"""` takes four columns, `"` one).
 *
 * @example
 * ```typescript
 * const translator = new StubTranslator(catalog, { lineWidth: 79 });
 * const result = translator.translate(readFileSync('module.pyi', 'utf-8'));
 * console.log(result.code);
 * ```
 */
export class StubTranslator {
  private extractor = new StubExtractor();

  constructor(
    private readonly lookup: TranslationLookup,
    private readonly options: Partial<DocstringOptions> = {}
  ) {}

  translate(sourceCode: string): StubTranslationResult {
    const translatedUnits = new Set<string>();
    const untranslatedUnits = new Set<string>();

    // Record which units the catalog knew about
    const recorder: TranslationLookup = {
      lookup: (sourceText: string) => {
        const translation = this.lookup.lookup(sourceText);
        (translation !== sourceText ? translatedUnits : untranslatedUnits).add(sourceText);
        return translation;
      },
    };

    const literals = this.extractor.extract(sourceCode);
    const replacements: LiteralReplacement[] = [];
    const newline = sourceCode.includes('\r\n') ? '\r\n' : '\n';

    for (const literal of literals) {
      if (!literal.raw && containsNamedEscape(sourceCode.slice(literal.bodyStart, literal.bodyEnd))) {
        // \N{...} is not decoded, so its text cannot be looked up or written back
        log(`[StubTranslator] Skipping docstring on line ${literal.line}: named character escape`);
        continue;
      }

      const value = translateDocstring(literal.value, recorder, {
        ...this.options,
        openingDelimiterWidth: this.options.openingDelimiterWidth ?? literal.prefix.length + literal.quote.length,
      });
      if (value === literal.value) {
        continue;
      }

      const encoded = encodeStringBody(value, literal.quote, literal.raw);
      const prefix = encoded.raw ? literal.prefix : literal.prefix.replace(/[rR]/g, '');
      replacements.push({
        start: literal.start,
        end: literal.end,
        text: prefix + literal.quote + encoded.body.replace(/\n/g, newline) + literal.quote,
      });
    }

    log(`[StubTranslator] ${literals.length} docstrings, ${replacements.length} rewritten, ` +
      `${translatedUnits.size} units translated, ${untranslatedUnits.size} untranslated`);

    return {
      code: replaceLiterals(sourceCode, replacements),
      docstrings: literals.length,
      translatedUnits: Array.from(translatedUnits),
      untranslatedUnits: Array.from(untranslatedUnits),
    };
  }

  /**
   * Translate a stub file. Writes to `outputPath` when given.
   */
  translateFile(inputPath: string, outputPath?: string): StubTranslationResult {
    const sourceCode = fs.readFileSync(inputPath, 'utf-8');
    const result = this.translate(sourceCode);

    if (outputPath) {
      fs.writeFileSync(outputPath, result.code, 'utf-8');
      log(`[StubTranslator] Wrote ${outputPath}`);
    }

    return result;
  }
}
