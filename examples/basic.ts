/**
 * Basic example of translating the docstrings of a stub
 */

import { MessageCatalog } from '../src/catalog/catalog';
import { StubTranslator } from '../src/core/stubTranslator';

// Define Spanish catalog
const spanishCatalog = new MessageCatalog({
  'A simple calculator.': 'Una calculadora sencilla.',
  'Keeps a running total of every value added to it.': 'Lleva un total acumulado de cada valor que se le suma.',
  'Add a value to the total.': 'Suma un valor al total.',
  'the value to add': 'el valor a sumar',
  'Return the current total.': 'Devuelve el total actual.',
}, 'es');

// Original English stub
const englishStub = `
class Calculator:
    """A simple calculator.

    Keeps a running total of every value
    added to it.
    """

    def add(self, value: float) -> None:
        """Add a value to the total.

        Parameters
        ----------
        - the value to add
        """
        ...

    def total(self) -> float:
        """Return the current total."""
        ...
`;

const translator = new StubTranslator(spanishCatalog, { lineWidth: 60 });
const result = translator.translate(englishStub);

console.log('=== Original ===');
console.log(englishStub);

console.log('\n=== Spanish ===');
console.log(result.code);

console.log(`\n${result.translatedUnits.length} units translated, ${result.untranslatedUnits.length} left as is`);
