#!/usr/bin/env node
/**
 * stubdoc-i18n - translate the docstrings of .pyi stubs with a gettext catalog
 */

import { Command } from 'commander';
import { parseWidth, translateAction } from './commands/translate';

export const VERSION = '1.0.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('stubdoc-i18n')
    .description('.pyi file translator using a Sphinx gettext catalog')
    .version(VERSION)
    .argument('<pyi>', '.pyi file path for translation')
    .argument('<domain>', 'translation domain')
    .argument('<localeDir>', 'locale directory output by sphinx-intl')
    .argument('<language>', 'language to translate into')
    .option('-o, --output <file>', 'output .pyi file path (stdout when omitted)')
    .option('-w, --line-width <n>', 'wrap translated text at this width, 0 to disable', parseWidth)
    .option('--opening-delimiter-width <n>', 'columns taken by the opening quotes (default: measured per docstring)', parseWidth)
    .option('-c, --catalog <file>', 'use this .mo, .po or .json catalog instead of searching localeDir')
    .option('--config <file>', 'settings file (default: ~/.stubdoc-i18n/config)')
    .option('-q, --quiet', 'do not log to stderr')
    .option('--stats', 'print translated/untranslated unit counts to stderr')
    .addHelpText('after', `
Examples:
  stubdoc-i18n mod.pyi mod locale ja                 Print the translated stub
  stubdoc-i18n mod.pyi mod locale ja -o ja/mod.pyi   Write it to a file
  stubdoc-i18n mod.pyi mod locale ja -w 79 --stats   Re-wrap at 79 columns
`)
    .action(translateAction);

  return program;
}

if (require.main === module) {
  createProgram().parse();
}
