/**
 * Docstring extraction for Python definitions
 */

import type { SyntaxNode } from './types.js';

const STRING_PREFIX = /^[rRuUbBfF]*/;

const SIMPLE_ESCAPES: Record<string, string> = {
  '\\': '\\',
  "'": "'",
  '"': '"',
  n: '\n',
  t: '\t',
  r: '\r',
};

/**
 * Docstring of a module, class or function body: the first statement when it
 * is a plain string literal. f-strings, byte strings and implicitly
 * concatenated literals are not docstrings.
 */
export function extractDocstring(body: SyntaxNode | null): string | undefined {
  const first = body?.namedChildren.find(child => child.type !== 'comment');
  if (!first || first.type !== 'expression_statement' || first.namedChildren.length !== 1) {
    return undefined;
  }

  const literal = first.namedChildren[0];
  if (!literal || literal.type !== 'string') {
    return undefined;
  }

  const value = stringLiteralValue(literal.text);
  return value === null ? undefined : cleanDocstring(value);
}

/**
 * Value of a Python string literal from its source text, or null for
 * f-strings and byte strings.
 */
export function stringLiteralValue(source: string): string | null {
  const prefix = STRING_PREFIX.exec(source)?.[0] ?? '';
  if (/[fFbB]/.test(prefix)) {
    return null;
  }

  const quoted = source.slice(prefix.length);
  const quote = quoted.startsWith('"""') || quoted.startsWith("'''") ? quoted.slice(0, 3) : quoted.slice(0, 1);
  if (!quoted.endsWith(quote) || quoted.length < quote.length * 2) {
    return null;
  }

  const content = quoted.slice(quote.length, quoted.length - quote.length);
  if (/[rR]/.test(prefix)) {
    return content;
  }
  return content.replace(/\\(\n|.)/g, (escape: string, char: string) => {
    if (char === '\n') {
      return '';
    }
    return SIMPLE_ESCAPES[char] ?? escape;
  });
}

/**
 * Normalise docstring indentation the way Python's `inspect.cleandoc` does:
 * leading whitespace of the first line is dropped, the common indentation of
 * the remaining lines is removed, and blank lines at either end are trimmed.
 */
export function cleanDocstring(docstring: string): string {
  const lines = expandTabs(docstring).split('\n');

  let margin = Infinity;
  for (const line of lines.slice(1)) {
    const content = line.trimStart();
    if (content.length > 0) {
      margin = Math.min(margin, line.length - content.length);
    }
  }

  const cleaned = lines.map((line, index) => {
    if (index === 0) {
      return line.trimStart();
    }
    return margin === Infinity ? line : line.slice(margin);
  });

  while (cleaned.length > 0 && cleaned[cleaned.length - 1]?.trim() === '') {
    cleaned.pop();
  }
  while (cleaned.length > 0 && cleaned[0]?.trim() === '') {
    cleaned.shift();
  }

  return cleaned.join('\n');
}

function expandTabs(text: string, tabSize = 8): string {
  return text
    .split('\n')
    .map(line => {
      let column = 0;
      let result = '';
      for (const char of line) {
        if (char === '\t') {
          const spaces = tabSize - (column % tabSize);
          result += ' '.repeat(spaces);
          column += spaces;
        } else {
          result += char;
          column += 1;
        }
      }
      return result;
    })
    .join('\n');
}
