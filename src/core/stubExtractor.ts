/**
 * Docstring literal information
 */
export interface DocstringLiteral {
  start: number;      // Start of the literal (prefix included)
  end: number;        // End of the literal (closing quote included)
  bodyStart: number;  // First character after the opening quote
  bodyEnd: number;    // Position of the closing quote
  prefix: string;     // String prefix as written, e.g. 'r' or ''
  quote: string;      // '"""', "'''", '"' or "'"
  raw: boolean;
  line: number;       // Line of the opening quote (1-indexed)
  value: string;      // Body with escape sequences decoded and newlines as \n
}

export interface LiteralReplacement {
  start: number;
  end: number;
  text: string;
}

const STRING_PREFIX = /^(?:[rRuUbBfF]|[bBfF][rR]|[rR][bBfF])$/;
const IDENTIFIER = /[A-Za-z_][A-Za-z0-9_]*/y;
const REST_OF_LINE = /[ \t\f\r]*(?:#[^\n]*)?(?:\n|$)/y;

const SIMPLE_ESCAPES: Record<string, string> = {
  '\\': '\\',
  "'": "'",
  '"': '"',
  a: '\x07',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  v: '\v',
};

/**
 * Decode the escape sequences of a non-raw string body.
 * Unknown escapes keep their backslash; backslash-newline is a line continuation.
 */
export function decodeStringBody(body: string, raw: boolean): string {
  if (raw) {
    return body;
  }
  return body.replace(
    /\\(?:(\r\n|\n|\r)|x([0-9a-fA-F]{2})|u([0-9a-fA-F]{4})|U([0-9a-fA-F]{8})|([0-7]{1,3})|([\s\S]))/g,
    (match, newline?: string, hex?: string, u16?: string, u32?: string, octal?: string, other?: string) => {
      if (newline) return '';
      const code = hex ?? u16 ?? u32;
      if (code) {
        const point = parseInt(code, 16);
        return point <= 0x10ffff ? String.fromCodePoint(point) : match;
      }
      if (octal) return String.fromCharCode(parseInt(octal, 8));
      if (other !== undefined && other in SIMPLE_ESCAPES) return SIMPLE_ESCAPES[other];
      return match;
    }
  );
}

/**
 * True when a non-raw body holds a named character escape (`\N{BULLET}`)
 */
export function containsNamedEscape(body: string): boolean {
  return /(?:^|[^\\])(?:\\\\)*\\N\{/.test(body);
}

/**
 * Encode a value as the body of a literal delimited by `quote`.
 * A raw literal stays raw only when the value can be written raw.
 */
export function encodeStringBody(value: string, quote: string, raw: boolean): { body: string; raw: boolean } {
  const q = quote.charAt(0);
  const triple = quote.length === 3;

  if (raw) {
    const closesEarly = triple
      ? value.includes(quote) || value.endsWith(q) || value.includes('\r')
      : value.includes(q) || /[\r\n]/.test(value);
    if (!closesEarly && !/\\$/.test(value)) {
      return { body: value, raw: true };
    }
  }

  let body = value.replace(/\\/g, '\\\\');
  if (triple) {
    // Only quotes that could join into a closing delimiter need escaping
    body = body
      .replace(new RegExp(`${q}(?=${q}|$)`, 'g'), `\\${q}`)
      .replace(/\r/g, '\\r');
  } else {
    body = body
      .split(q).join(`\\${q}`)
      .replace(/\n/g, '\\n')
      .replace(/\r/g, '\\r');
  }
  return { body, raw: false };
}

/**
 * Apply replacements to the source, by offset
 */
export function replaceLiterals(sourceCode: string, replacements: LiteralReplacement[]): string {
  const sorted = [...replacements].sort((a, b) => a.start - b.start);
  const parts: string[] = [];
  let pos = 0;

  for (const replacement of sorted) {
    parts.push(sourceCode.slice(pos, replacement.start), replacement.text);
    pos = replacement.end;
  }
  parts.push(sourceCode.slice(pos));

  return parts.join('');
}

function countNewlines(text: string): number {
  let count = 0;
  for (const ch of text) {
    if (ch === '\n') count++;
  }
  return count;
}

/**
 * Locate docstring literals in stub (`.pyi`) source code
 *
 * Scans the text directly, without a Python runtime. A docstring is a string
 * literal that starts a statement outside any brackets and is the only thing
 * on the rest of its line. Bytes and f-strings are never docstrings.
 */
export class StubExtractor {
  /**
   * Docstring literals in source order
   */
  extract(sourceCode: string): DocstringLiteral[] {
    const literals: DocstringLiteral[] = [];
    const n = sourceCode.length;
    let i = 0;
    let line = 1;
    let depth = 0;
    let atStatementStart = true;

    while (i < n) {
      const c = sourceCode[i];

      if (c === '\n') {
        line++;
        if (depth === 0) atStatementStart = true;
        i++;
        continue;
      }
      if (c === ' ' || c === '\t' || c === '\r' || c === '\f') {
        i++;
        continue;
      }
      if (c === '#') {
        while (i < n && sourceCode[i] !== '\n') i++;
        continue;
      }
      if (c === '\\') {
        // explicit line join
        const joined = sourceCode.startsWith('\\\r\n', i) ? 3 : 2;
        if (sourceCode[i + joined - 1] === '\n') line++;
        i += joined;
        continue;
      }
      if (c === ';') {
        if (depth === 0) atStatementStart = true;
        i++;
        continue;
      }

      let prefix = '';
      if (/[A-Za-z_]/.test(c)) {
        IDENTIFIER.lastIndex = i;
        const word = IDENTIFIER.exec(sourceCode)?.[0] ?? c;
        const next = sourceCode[i + word.length];
        if (!STRING_PREFIX.test(word) || (next !== '"' && next !== "'")) {
          i += word.length;
          atStatementStart = false;
          continue;
        }
        prefix = word;
      }

      if (prefix || c === '"' || c === "'") {
        const literal = this.readString(sourceCode, i, prefix, line);
        const isDocstring = atStatementStart
          && depth === 0
          && literal.terminated
          && !/[bBfF]/.test(prefix)
          && this.endsLine(sourceCode, literal.end);
        if (isDocstring) {
          literals.push(literal.docstring);
        }
        line += countNewlines(sourceCode.slice(i, literal.end));
        i = literal.end;
        atStatementStart = false;
        continue;
      }

      if (c === '(' || c === '[' || c === '{') {
        depth++;
      } else if (c === ')' || c === ']' || c === '}') {
        depth = Math.max(0, depth - 1);
      }
      atStatementStart = false;
      i++;
    }

    return literals;
  }

  /**
   * Read a string literal whose prefix starts at `start`
   */
  private readString(
    sourceCode: string,
    start: number,
    prefix: string,
    line: number
  ): { end: number; terminated: boolean; docstring: DocstringLiteral } {
    const quoteStart = start + prefix.length;
    const q = sourceCode[quoteStart];
    const quote = sourceCode.startsWith(q.repeat(3), quoteStart) ? q.repeat(3) : q;
    const bodyStart = quoteStart + quote.length;
    const n = sourceCode.length;

    let j = bodyStart;
    let bodyEnd = n;
    let end = n;
    let terminated = false;

    while (j < n) {
      if (sourceCode[j] === '\\') {
        j += 2;
        continue;
      }
      if (sourceCode.startsWith(quote, j)) {
        bodyEnd = j;
        end = j + quote.length;
        terminated = true;
        break;
      }
      if (quote.length === 1 && sourceCode[j] === '\n') {
        bodyEnd = j;
        end = j;
        break;
      }
      j++;
    }

    const raw = /[rR]/.test(prefix);
    // Physical line breaks read as \n whatever the file's line endings
    const body = sourceCode.slice(bodyStart, Math.min(bodyEnd, n)).replace(/\r\n?/g, '\n');

    return {
      end,
      terminated,
      docstring: {
        start,
        end,
        bodyStart,
        bodyEnd,
        prefix,
        quote,
        raw,
        line,
        value: decodeStringBody(body, raw),
      },
    };
  }

  /**
   * True when only whitespace or a comment follows `pos` on its line
   */
  private endsLine(sourceCode: string, pos: number): boolean {
    REST_OF_LINE.lastIndex = pos;
    return REST_OF_LINE.test(sourceCode);
  }
}
