/**
 * stubdoc-i18n
 *
 * Translates the docstrings of typed stub files from a message catalog while
 * keeping their reStructuredText layout.
 */

export { classifyLine, isSectionDecoration, splitIndent } from './core/lineClassifier';
export { TranslationBuffer } from './core/translationBuffer';
export { rewrapUnit, wrapText } from './core/rewrap';
export { getBaseIndent, translateDocstring } from './core/docstringTranslator';
export {
  StubExtractor,
  containsNamedEscape,
  decodeStringBody,
  encodeStringBody,
  replaceLiterals,
} from './core/stubExtractor';
export type { DocstringLiteral, LiteralReplacement } from './core/stubExtractor';
export { StubTranslator } from './core/stubTranslator';
export * from './core/types';
export { MessageCatalog, IDENTITY_LOOKUP } from './catalog/catalog';
export { loadCatalog, loadCatalogFile, catalogCandidates, expandLanguage } from './catalog/loader';
export type { CatalogLocation } from './catalog/loader';
export { CatalogFormatError, CatalogNotFoundError } from './catalog/errors';
export { getSettings, reloadConfig, DEFAULT_SETTINGS } from './config/settings';
export type { StubdocSettings } from './config/settings';
export { configureLogging, log } from './logging/logger';
