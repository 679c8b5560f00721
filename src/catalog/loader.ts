import * as fs from 'fs';
import * as path from 'path';
import { mo, po } from 'gettext-parser';
import { log } from '../logging/logger';
import { MessageCatalog } from './catalog';
import { CatalogFormatError, CatalogNotFoundError } from './errors';

/**
 * Where to look for a compiled catalog, gettext style:
 * `<localeDir>/<language>/LC_MESSAGES/<domain>.mo`
 */
export interface CatalogLocation {
  localeDir: string;
  domain: string;
  language: string;
}

type ParsedTable = ReturnType<typeof mo.parse>;

/**
 * Language fallbacks, most specific first: `ja_JP.UTF-8@x` → `ja_JP.UTF-8@x`, `ja_JP.UTF-8`, `ja_JP`, `ja`
 */
export function expandLanguage(language: string): string[] {
  const candidates: string[] = [language];
  let current = language;
  for (const separator of ['@', '.', '_']) {
    const index = current.indexOf(separator);
    if (index > 0) {
      current = current.slice(0, index);
      candidates.push(current);
    }
  }
  return Array.from(new Set(candidates));
}

/**
 * Collect msgid → msgstr from the default context, skipping fuzzy entries
 */
function tableToMessages(table: ParsedTable): Map<string, string> {
  const messages = new Map<string, string>();
  const entries = table.translations[''] ?? {};

  for (const [msgid, entry] of Object.entries(entries)) {
    if (!msgid) continue; // header
    const flags = entry.comments?.flag ?? '';
    if (flags.split(',').some(flag => flag.trim() === 'fuzzy')) continue;
    const msgstr = entry.msgstr[0];
    if (msgstr) {
      messages.set(msgid, msgstr);
    }
  }

  return messages;
}

function jsonToMessages(content: string, filePath: string): Map<string, string> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new CatalogFormatError(filePath, error instanceof Error ? error.message : String(error));
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new CatalogFormatError(filePath, 'expected a JSON object');
  }

  // Either { "messages": { ... } } or a flat { source: translation } object
  const nested = 'messages' in parsed ? parsed.messages : parsed;
  if (typeof nested !== 'object' || nested === null || Array.isArray(nested)) {
    throw new CatalogFormatError(filePath, '"messages" must be an object');
  }

  const messages = new Map<string, string>();
  for (const [source, translation] of Object.entries(nested)) {
    if (typeof translation !== 'string') {
      throw new CatalogFormatError(filePath, `translation of "${source}" is not a string`);
    }
    messages.set(source, translation);
  }
  return messages;
}

/**
 * Load a catalog from a `.mo`, `.po` or `.json` file
 */
export function loadCatalogFile(filePath: string, language?: string): MessageCatalog {
  let buffer: Buffer;
  try {
    buffer = fs.readFileSync(filePath);
  } catch (error) {
    throw new CatalogFormatError(filePath, error instanceof Error ? error.message : String(error));
  }

  const ext = path.extname(filePath).toLowerCase();
  let messages: Map<string, string>;

  try {
    switch (ext) {
      case '.mo':
        messages = tableToMessages(mo.parse(buffer));
        break;
      case '.po':
        messages = tableToMessages(po.parse(buffer));
        break;
      case '.json':
        messages = jsonToMessages(buffer.toString('utf-8'), filePath);
        break;
      default:
        throw new CatalogFormatError(filePath, `unsupported extension "${ext}"`);
    }
  } catch (error) {
    if (error instanceof CatalogFormatError) throw error;
    throw new CatalogFormatError(filePath, error instanceof Error ? error.message : String(error));
  }

  const catalog = new MessageCatalog(messages, language);
  log(`[Catalog] Loaded ${catalog.size} messages from ${filePath}`);
  return catalog;
}

/**
 * Candidate catalog paths in search order
 */
export function catalogCandidates(location: CatalogLocation): string[] {
  const candidates: string[] = [];
  for (const language of expandLanguage(location.language)) {
    const dir = path.join(location.localeDir, language, 'LC_MESSAGES');
    candidates.push(path.join(dir, `${location.domain}.mo`));
    candidates.push(path.join(dir, `${location.domain}.po`));
  }
  return candidates;
}

/**
 * Find and load the catalog for a domain and language under a locale directory
 * (the layout sphinx-intl produces)
 */
export function loadCatalog(location: CatalogLocation): MessageCatalog {
  const candidates = catalogCandidates(location);
  const found = candidates.find(candidate => fs.existsSync(candidate));

  if (!found) {
    throw new CatalogNotFoundError(location.domain, location.language, candidates);
  }

  return loadCatalogFile(found, location.language);
}
