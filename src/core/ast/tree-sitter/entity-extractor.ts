/**
 * First pass over a Python syntax tree: functions, classes and imports.
 *
 * The visitor carries its state in an explicit context argument. Function
 * bodies are not entered, so closures and nested helpers are not reported;
 * a class defined inside another class is reported as its own entity.
 */

import { ClassBuilder, createFunction, createImport, createLocation } from '../entities.js';
import type { Entity, Metadata } from '../types.js';
import { extractDocstring } from './docstring.js';
import { dottedName, lineSpan } from './parser.js';
import type { SyntaxNode } from './types.js';

export const DEFAULT_PREVIEW_LINES = 5;

export interface EntityExtractionOptions {
  /** Number of source lines kept as the entity preview */
  previewLines?: number;
}

interface VisitContext {
  readonly filePath: string;
  readonly previewLines: number;
  /** Class whose body is being visited, if any */
  readonly currentClass: ClassBuilder | null;
  readonly emit: (entity: Entity) => void;
}

/**
 * Extract entities from a parsed module, in the order their definitions
 * complete (a nested class precedes its enclosing class).
 */
export function extractEntities(
  root: SyntaxNode,
  filePath: string,
  options: EntityExtractionOptions = {}
): Entity[] {
  const entities: Entity[] = [];
  visitChildren(root, {
    filePath,
    previewLines: options.previewLines ?? DEFAULT_PREVIEW_LINES,
    currentClass: null,
    emit: entity => entities.push(entity),
  });
  return entities;
}

function visit(node: SyntaxNode, ctx: VisitContext, decorators: string[] = []): void {
  switch (node.type) {
    case 'function_definition':
      visitFunction(node, ctx, decorators);
      return;
    case 'class_definition':
      visitClass(node, ctx, decorators);
      return;
    case 'decorated_definition': {
      const definition = node.childForFieldName('definition');
      if (definition) {
        visit(definition, ctx, decoratorNames(node));
      }
      return;
    }
    case 'import_statement':
      visitImport(node, ctx);
      return;
    case 'import_from_statement':
    case 'future_import_statement':
      visitImportFrom(node, ctx);
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

function visitFunction(node: SyntaxNode, ctx: VisitContext, decorators: string[]): void {
  const name = node.childForFieldName('name')?.text;
  if (!name) {
    return;
  }

  const isAsync = node.child(0)?.type === 'async';
  const { lineStart, lineEnd } = lineSpan(node);
  const docstring = extractDocstring(node.childForFieldName('body'));

  const metadata: Metadata = {
    is_async: isAsync,
    decorators,
    args: parameterNames(node.childForFieldName('parameters')),
    line_count: lineEnd - lineStart + 1,
  };

  const entity = createFunction({
    kind: isAsync ? 'async_function' : 'function',
    name,
    location: createLocation(ctx.filePath, lineStart, node.startPosition.column, lineEnd),
    ...(docstring !== undefined ? { docstring } : {}),
    sourceCode: preview(node, ctx.previewLines),
    metadata,
  });

  if (ctx.currentClass) {
    ctx.currentClass.addMethod(entity);
  } else {
    ctx.emit(entity);
  }
}

function visitClass(node: SyntaxNode, ctx: VisitContext, decorators: string[]): void {
  const name = node.childForFieldName('name')?.text;
  if (!name) {
    return;
  }

  const { lineStart, lineEnd } = lineSpan(node);
  const body = node.childForFieldName('body');
  const docstring = extractDocstring(body);

  const builder = new ClassBuilder({
    name,
    location: createLocation(ctx.filePath, lineStart, node.startPosition.column, lineEnd),
    ...(docstring !== undefined ? { docstring } : {}),
    sourceCode: preview(node, ctx.previewLines),
    metadata: { decorators },
    baseClasses: baseClassNames(node),
  });

  if (body) {
    visitChildren(body, { ...ctx, currentClass: builder });
  }

  ctx.emit(builder.build());
}

function visitImport(node: SyntaxNode, ctx: VisitContext): void {
  for (const child of node.namedChildren) {
    const imported = importedName(child);
    if (!imported) {
      continue;
    }
    ctx.emit(
      createImport({
        name: imported.alias ?? imported.name,
        location: createLocation(ctx.filePath, node.startPosition.row + 1, node.startPosition.column),
        module: imported.name,
        ...(imported.alias !== undefined ? { alias: imported.alias } : {}),
        isFrom: false,
      })
    );
  }
}

function visitImportFrom(node: SyntaxNode, ctx: VisitContext): void {
  const moduleNode = node.childForFieldName('module_name');
  let module = node.type === 'future_import_statement' ? '__future__' : '';
  let level = 0;

  if (moduleNode?.type === 'dotted_name') {
    module = moduleNode.text;
  } else if (moduleNode?.type === 'relative_import') {
    for (const part of moduleNode.children) {
      if (part.type === 'import_prefix') {
        level = part.text.length;
      } else if (part.type === 'dotted_name') {
        module = part.text;
      }
    }
  }

  for (const child of node.namedChildren) {
    if (moduleNode && child.startIndex === moduleNode.startIndex) {
      continue;
    }
    const imported: ImportedName | null = child.type === 'wildcard_import' ? { name: '*' } : importedName(child);
    if (!imported) {
      continue;
    }
    ctx.emit(
      createImport({
        name: imported.alias ?? imported.name,
        location: createLocation(ctx.filePath, node.startPosition.row + 1, node.startPosition.column),
        module,
        ...(imported.alias !== undefined ? { alias: imported.alias } : {}),
        isFrom: true,
        metadata: level > 0 ? { level } : {},
      })
    );
  }
}

interface ImportedName {
  name: string;
  alias?: string;
}

function importedName(node: SyntaxNode): ImportedName | null {
  if (node.type === 'dotted_name') {
    return { name: node.text };
  }
  if (node.type === 'aliased_import') {
    const name = node.childForFieldName('name')?.text;
    const alias = node.childForFieldName('alias')?.text;
    if (!name) {
      return null;
    }
    return alias ? { name, alias } : { name };
  }
  return null;
}

/**
 * Decorators written as a bare name (`@staticmethod`). Calls and attribute
 * chains (`@app.route("/")`, `@lru_cache(1)`) are dropped.
 */
function decoratorNames(node: SyntaxNode): string[] {
  const names: string[] = [];
  for (const child of node.namedChildren) {
    if (child.type !== 'decorator') {
      continue;
    }
    const expression = child.namedChildren[0];
    if (expression?.type === 'identifier') {
      names.push(expression.text);
    }
  }
  return names;
}

function baseClassNames(node: SyntaxNode): string[] {
  const superclasses = node.childForFieldName('superclasses');
  if (!superclasses) {
    return [];
  }
  const names: string[] = [];
  for (const argument of superclasses.namedChildren) {
    const name = dottedName(argument);
    if (name) {
      names.push(name);
    }
  }
  return names;
}

/**
 * Names of plain, typed and defaulted parameters; `*args` and `**kwargs` are
 * left out.
 */
function parameterNames(parameters: SyntaxNode | null): string[] {
  if (!parameters) {
    return [];
  }
  const names: string[] = [];
  for (const parameter of parameters.namedChildren) {
    switch (parameter.type) {
      case 'identifier':
        names.push(parameter.text);
        break;
      case 'typed_parameter': {
        const inner = parameter.namedChildren[0];
        if (inner?.type === 'identifier') {
          names.push(inner.text);
        }
        break;
      }
      case 'default_parameter':
      case 'typed_default_parameter': {
        const name = parameter.childForFieldName('name');
        if (name?.type === 'identifier') {
          names.push(name.text);
        }
        break;
      }
    }
  }
  return names;
}

function preview(node: SyntaxNode, previewLines: number): string {
  return node.text.split('\n').slice(0, previewLines).join('\n');
}
