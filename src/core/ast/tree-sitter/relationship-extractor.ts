/**
 * Second pass over a Python syntax tree: calls and inheritance.
 *
 * Targets are recorded by name only. `self.ledger.post(entry)` becomes a call
 * to `self.ledger.post`; nothing checks that such a function exists. Cross-file
 * resolution happens later, by name, in the project aggregator.
 */

import { createLocation, createRelationship } from '../entities.js';
import type { Relationship } from '../types.js';
import { dottedName, findNodes } from './parser.js';
import type { SyntaxNode } from './types.js';

interface VisitContext {
  readonly filePath: string;
  /** Name of the class whose body is being visited, if any */
  readonly currentClass: string | null;
  readonly emit: (relationship: Relationship) => void;
}

export function extractRelationships(root: SyntaxNode, filePath: string): Relationship[] {
  const relationships: Relationship[] = [];
  visitChildren(root, {
    filePath,
    currentClass: null,
    emit: relationship => relationships.push(relationship),
  });
  return relationships;
}

function visit(node: SyntaxNode, ctx: VisitContext): void {
  switch (node.type) {
    case 'function_definition':
      visitFunction(node, ctx);
      return;
    case 'class_definition':
      visitClass(node, ctx);
      return;
    default:
      visitChildren(node, ctx);
  }
}

function visitChildren(node: SyntaxNode, ctx: VisitContext): void {
  for (const child of node.namedChildren) {
    visit(child, ctx);
  }
}

/**
 * Every call in the function body belongs to this function, including calls
 * made from nested definitions, which are not entities of their own.
 */
function visitFunction(node: SyntaxNode, ctx: VisitContext): void {
  const name = node.childForFieldName('name')?.text;
  const body = node.childForFieldName('body');
  if (!name || !body) {
    return;
  }

  const source = ctx.currentClass ? `${ctx.currentClass}.${name}` : name;

  for (const call of findNodes(body, 'call')) {
    const callee = call.childForFieldName('function');
    const target = callee ? dottedName(callee) : null;
    if (!callee || !target) {
      continue;
    }
    ctx.emit(
      createRelationship(
        source,
        target,
        'calls',
        createLocation(ctx.filePath, call.startPosition.row + 1, call.startPosition.column),
        { call_type: callee.type === 'attribute' ? 'method' : 'function' }
      )
    );
  }
}

function visitClass(node: SyntaxNode, ctx: VisitContext): void {
  const name = node.childForFieldName('name')?.text;
  if (!name) {
    return;
  }

  const superclasses = node.childForFieldName('superclasses');
  for (const argument of superclasses?.namedChildren ?? []) {
    const base = dottedName(argument);
    if (base) {
      ctx.emit(
        createRelationship(
          name,
          base,
          'inherits',
          createLocation(ctx.filePath, node.startPosition.row + 1, node.startPosition.column)
        )
      );
    }
  }

  const body = node.childForFieldName('body');
  if (body) {
    visitChildren(body, { ...ctx, currentClass: name });
  }
}
