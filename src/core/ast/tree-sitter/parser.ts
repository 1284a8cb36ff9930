/**
 * Tree-sitter parser for Python sources
 */

import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';
import type { SyntaxNode, Tree } from './types.js';

export type { Point, SyntaxNode, Tree } from './types.js';

// Parsing is synchronous, so one parser instance serves every caller
let pythonParser: Parser | null = null;

function getPythonParser(): Parser {
  if (!pythonParser) {
    pythonParser = new Parser();
    pythonParser.setLanguage(Python);
  }
  return pythonParser;
}

/**
 * Minimum input buffer handed to the binding. The default (32 KiB) makes
 * larger sources fail with "Invalid argument".
 */
const MIN_BUFFER_SIZE = 32 * 1024;

/**
 * Parse Python source code. Tree-sitter always produces a tree; malformed
 * input shows up as ERROR or missing nodes (see {@link findSyntaxError}).
 */
export function parsePython(code: string): Tree {
  const bufferSize = Math.max(MIN_BUFFER_SIZE, code.length * 2 + 1);
  return getPythonParser().parse(code, undefined, { bufferSize });
}

/**
 * First syntax problem in a tree, in document order.
 */
export interface SyntaxProblem {
  /** Line number (1-based) */
  line: number;
  message: string;
}

// Reserved words that the grammar still accepts as definition names
const PYTHON_KEYWORDS = new Set([
  'False', 'None', 'True', 'and', 'as', 'assert', 'async', 'await', 'break', 'class', 'continue', 'def',
  'del', 'elif', 'else', 'except', 'finally', 'for', 'from', 'global', 'if', 'import', 'in', 'is',
  'lambda', 'nonlocal', 'not', 'or', 'pass', 'raise', 'return', 'try', 'while', 'with', 'yield',
]);

/**
 * Constructs the grammar parses without complaint but Python 3 rejects:
 * the Python 2 print and exec statements, `except X, e`, and keywords used
 * as function or class names.
 */
function python3Problem(node: SyntaxNode): string | null {
  switch (node.type) {
    case 'print_statement':
      return "Missing parentheses in call to 'print'";
    case 'exec_statement':
      return "Missing parentheses in call to 'exec'";
    case 'except_clause':
      return node.children.some(child => child.type === ',') ? 'multiple exception types must be parenthesized' : null;
    case 'function_definition':
    case 'class_definition': {
      const name = node.childForFieldName('name');
      return name && PYTHON_KEYWORDS.has(name.text) ? `invalid syntax near ${describeText(name.text)}` : null;
    }
    default:
      return null;
  }
}

/**
 * Find the first syntax problem in a parsed tree: an ERROR node, a missing
 * token, or a construct that only Python 2 accepts.
 *
 * Missing tokens are the zero-width leaves tree-sitter inserts during error
 * recovery; the root of an empty module is the only legitimate zero-width node.
 */
export function findSyntaxError(root: SyntaxNode): SyntaxProblem | null {
  const stack: SyntaxNode[] = [root];

  let node = stack.pop();
  while (node) {
    if (node.type === 'ERROR') {
      return { line: node.startPosition.row + 1, message: `invalid syntax near ${describeText(node.text)}` };
    }
    if (node !== root && node.childCount === 0 && node.startIndex === node.endIndex && node.type !== 'string_content') {
      return { line: node.startPosition.row + 1, message: `expected "${node.type}"` };
    }
    const rejected = python3Problem(node);
    if (rejected) {
      return { line: node.startPosition.row + 1, message: rejected };
    }

    // Add children in reverse order for document-order traversal
    for (let i = node.childCount - 1; i >= 0; i--) {
      const child = node.child(i);
      if (child) stack.push(child);
    }
    node = stack.pop();
  }

  return null;
}

function describeText(text: string): string {
  const firstLine = text.split('\n')[0]?.trim() ?? '';
  const clipped = firstLine.length > 40 ? `${firstLine.slice(0, 40)}...` : firstLine;
  return `"${clipped}"`;
}

/**
 * Walk a tree-sitter tree and find all nodes matching any of the given types,
 * in document order
 */
export function findNodesByTypes(root: SyntaxNode, types: string[]): SyntaxNode[] {
  const typeSet = new Set(types);
  const results: SyntaxNode[] = [];
  const stack: SyntaxNode[] = [root];

  let node = stack.pop();
  while (node) {
    if (typeSet.has(node.type)) {
      results.push(node);
    }

    for (let i = node.childCount - 1; i >= 0; i--) {
      const child = node.child(i);
      if (child) stack.push(child);
    }
    node = stack.pop();
  }

  return results;
}

/**
 * Walk a tree-sitter tree and find all nodes of a given type
 */
export function findNodes(root: SyntaxNode, type: string): SyntaxNode[] {
  return findNodesByTypes(root, [type]);
}

/**
 * Best-effort dotted name of an expression: `name`, or `a.b.c` for an
 * attribute chain. When the chain does not start at a plain name (`f().b`),
 * only the attribute is kept. Anything else has no name.
 */
export function dottedName(node: SyntaxNode): string | null {
  switch (node.type) {
    case 'identifier':
      return node.text;
    case 'attribute': {
      const attribute = node.childForFieldName('attribute');
      if (!attribute) {
        return null;
      }
      const object = node.childForFieldName('object');
      const base = object ? dottedName(object) : null;
      return base ? `${base}.${attribute.text}` : attribute.text;
    }
    default:
      return null;
  }
}

/**
 * 1-based line span of a node.
 */
export function lineSpan(node: SyntaxNode): { lineStart: number; lineEnd: number } {
  return { lineStart: node.startPosition.row + 1, lineEnd: node.endPosition.row + 1 };
}
