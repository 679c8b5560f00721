/**
 * Translate command - rewrite the docstrings of a .pyi stub from a gettext catalog
 *
 * The catalog is looked up the way sphinx-intl lays it out:
 * <localeDir>/<language>/LC_MESSAGES/<domain>.mo
 */

import { InvalidArgumentError } from 'commander';
import { loadCatalog, loadCatalogFile } from '../catalog/loader';
import { CatalogFormatError, CatalogNotFoundError } from '../catalog/errors';
import { DEFAULT_CONFIG_PATH, getSettings } from '../config/settings';
import { StubTranslator } from '../core/stubTranslator';
import { StubTranslationResult } from '../core/types';
import { configureLogging, log } from '../logging/logger';
import { exitWithError } from '../utils/errorFormatter';

export interface TranslateOptions {
  output?: string;
  lineWidth?: number;
  openingDelimiterWidth?: number;
  catalog?: string;
  config?: string;
  quiet?: boolean;
  stats?: boolean;
}

/**
 * Option parser for widths
 */
export function parseWidth(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parseInt(value, 10);
}

/**
 * Load settings and catalog, then translate `pyi`. Throws on I/O or catalog errors.
 */
export function runTranslate(
  pyi: string,
  domain: string,
  localeDir: string,
  language: string,
  options: TranslateOptions
): StubTranslationResult {
  const settings = getSettings(options.config ?? DEFAULT_CONFIG_PATH);
  configureLogging({ file: settings.logFile, quiet: options.quiet ?? false });

  const catalog = options.catalog
    ? loadCatalogFile(options.catalog, language)
    : loadCatalog({ localeDir, domain, language });

  const translator = new StubTranslator(catalog, {
    lineWidth: options.lineWidth ?? settings.lineWidth,
    openingDelimiterWidth: options.openingDelimiterWidth ?? settings.openingDelimiterWidth ?? undefined,
  });

  log(`[Translate] ${pyi} → ${options.output ?? 'stdout'} (${language})`);
  return translator.translateFile(pyi, options.output);
}

export function formatStats(result: StubTranslationResult): string {
  const total = result.translatedUnits.length + result.untranslatedUnits.length;
  return `${result.docstrings} docstrings, ${result.translatedUnits.length}/${total} units translated`;
}

/**
 * Command action: report errors the CLI way and print the stub when no output file is given
 */
export function translateAction(
  pyi: string,
  domain: string,
  localeDir: string,
  language: string,
  options: TranslateOptions
): void {
  let result: StubTranslationResult;

  try {
    result = runTranslate(pyi, domain, localeDir, language, options);
  } catch (error) {
    if (error instanceof CatalogNotFoundError) {
      exitWithError(error.message, error.searchedPaths.map(p => `Searched: ${p}`));
    }
    if (error instanceof CatalogFormatError) {
      exitWithError(error.message, ['Check that the catalog was compiled with msgfmt or sphinx-intl']);
    }
    const message = error instanceof Error ? error.message : String(error);
    exitWithError(`Failed to translate ${pyi}: ${message}`);
  }

  if (!options.output) {
    process.stdout.write(result.code);
  }

  if (options.stats) {
    console.error(formatStats(result));
    for (const unit of result.untranslatedUnits) {
      console.error(`  untranslated: ${unit}`);
    }
  }
}
