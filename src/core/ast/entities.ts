/**
 * Constructors and views for the entity model.
 *
 * Every value leaving this module is frozen. Class entities are assembled
 * through {@link ClassBuilder}; the mutable method list never escapes it.
 */

import { EntityValidationError } from '../errors.js';
import type {
  ClassEntity,
  Entity,
  EntityKind,
  FileAnalysis,
  FunctionEntity,
  ImportEntity,
  Location,
  Metadata,
  ProjectAnalysis,
  Relationship,
  RelationKind,
} from './types.js';

interface EntityFields {
  name: string;
  location: Location;
  docstring?: string;
  sourceCode?: string;
  metadata?: Metadata;
}

export interface FunctionFields extends EntityFields {
  kind: EntityKind;
}

export interface ClassFields extends EntityFields {
  kind?: EntityKind;
  methods?: readonly FunctionEntity[];
  baseClasses?: readonly string[];
}

export interface ImportFields extends EntityFields {
  kind?: EntityKind;
  module: string;
  alias?: string;
  isFrom?: boolean;
}

export function createLocation(
  filePath: string,
  lineStart: number,
  columnStart = 0,
  lineEnd?: number
): Location {
  if (lineEnd !== undefined && lineEnd < lineStart) {
    throw new EntityValidationError(`Location ends before it starts: ${lineStart}-${lineEnd}`);
  }
  return Object.freeze({
    filePath,
    lineStart,
    ...(lineEnd !== undefined ? { lineEnd } : {}),
    columnStart,
  });
}

function baseFields(fields: EntityFields): EntityFields & { metadata: Metadata } {
  if (fields.name.length === 0) {
    throw new EntityValidationError('Entity name must not be empty');
  }
  return {
    name: fields.name,
    location: fields.location,
    ...(fields.docstring !== undefined ? { docstring: fields.docstring } : {}),
    ...(fields.sourceCode !== undefined ? { sourceCode: fields.sourceCode } : {}),
    metadata: Object.freeze({ ...(fields.metadata ?? {}) }),
  };
}

/**
 * Create a function entity. The kind must be a function variant.
 */
export function createFunction(fields: FunctionFields): FunctionEntity {
  const { kind } = fields;
  if (kind !== 'function' && kind !== 'async_function') {
    throw new EntityValidationError(`Function entity must have function type, got ${kind}`);
  }
  return Object.freeze({ ...baseFields(fields), kind });
}

export function createClass(fields: ClassFields): ClassEntity {
  if (fields.kind !== undefined && fields.kind !== 'class') {
    throw new EntityValidationError(`Class entity must have class type, got ${fields.kind}`);
  }
  return Object.freeze({
    ...baseFields(fields),
    kind: 'class' as const,
    methods: Object.freeze([...(fields.methods ?? [])]),
    baseClasses: Object.freeze([...(fields.baseClasses ?? [])]),
  });
}

export function createImport(fields: ImportFields): ImportEntity {
  if (fields.kind !== undefined && fields.kind !== 'import') {
    throw new EntityValidationError(`Import entity must have import type, got ${fields.kind}`);
  }
  return Object.freeze({
    ...baseFields(fields),
    kind: 'import' as const,
    module: fields.module,
    ...(fields.alias !== undefined ? { alias: fields.alias } : {}),
    isFrom: fields.isFrom ?? false,
  });
}

export function createRelationship(
  source: string,
  target: string,
  kind: RelationKind,
  sourceLocation?: Location,
  metadata: Metadata = {}
): Relationship {
  if (source.length === 0 || target.length === 0) {
    throw new EntityValidationError('Relationship ends must not be empty');
  }
  return Object.freeze({
    source,
    target,
    kind,
    ...(sourceLocation ? { sourceLocation } : {}),
    metadata: Object.freeze({ ...metadata }),
  });
}

/**
 * Collects the methods of a class while its body is being visited.
 */
export class ClassBuilder {
  private readonly methods: FunctionEntity[] = [];
  private built = false;

  constructor(private readonly fields: Omit<ClassFields, 'methods'>) {}

  get name(): string {
    return this.fields.name;
  }

  addMethod(method: FunctionEntity): void {
    if (this.built) {
      throw new EntityValidationError(`Class ${this.fields.name} is already built`);
    }
    this.methods.push(method);
  }

  build(): ClassEntity {
    this.built = true;
    return createClass({ ...this.fields, methods: this.methods });
  }
}

export function createFileAnalysis(
  filePath: string,
  entities: readonly Entity[] = [],
  relationships: readonly Relationship[] = [],
  errors: readonly string[] = []
): FileAnalysis {
  return Object.freeze({
    filePath,
    entities: Object.freeze([...entities]),
    relationships: Object.freeze([...relationships]),
    errors: Object.freeze([...errors]),
  });
}

export function createProjectAnalysis(fields: {
  projectName: string;
  rootPath: string;
  fileAnalyses: readonly FileAnalysis[];
  allRelationships?: readonly Relationship[];
  errors?: readonly string[];
}): ProjectAnalysis {
  return Object.freeze({
    projectName: fields.projectName,
    rootPath: fields.rootPath,
    fileAnalyses: Object.freeze([...fields.fileAnalyses]),
    allRelationships: Object.freeze([...(fields.allRelationships ?? [])]),
    errors: Object.freeze([...(fields.errors ?? [])]),
  });
}

export function isFunction(entity: Entity): entity is FunctionEntity {
  return entity.kind === 'function' || entity.kind === 'async_function';
}

export function isClass(entity: Entity): entity is ClassEntity {
  return entity.kind === 'class';
}

export function isImport(entity: Entity): entity is ImportEntity {
  return entity.kind === 'import';
}

export function functionsOf(analysis: FileAnalysis): FunctionEntity[] {
  return analysis.entities.filter(isFunction);
}

export function classesOf(analysis: FileAnalysis): ClassEntity[] {
  return analysis.entities.filter(isClass);
}

export function importsOf(analysis: FileAnalysis): ImportEntity[] {
  return analysis.entities.filter(isImport);
}

export function allEntities(project: ProjectAnalysis): Entity[] {
  return project.fileAnalyses.flatMap(file => [...file.entities]);
}

/**
 * Whether an entity defines a name that other code can call or subclass.
 */
export function isDefinition(entity: Entity): boolean {
  switch (entity.kind) {
    case 'function':
    case 'async_function':
    case 'class':
      return true;
    case 'import':
      return false;
    default:
      return assertNever(entity);
  }
}

export function assertNever(value: never): never {
  throw new EntityValidationError(`Unexpected entity variant: ${JSON.stringify(value)}`);
}
