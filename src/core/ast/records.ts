/**
 * JSON records for project analyses.
 *
 * Records use snake_case keys and explicit nulls so that other tools can read
 * them without knowing the TypeScript model.
 */

import { z } from 'zod';
import { parseRecord } from '../validation.js';
import {
  assertNever,
  classesOf,
  createClass,
  createFileAnalysis,
  createFunction,
  createImport,
  createLocation,
  createProjectAnalysis,
  createRelationship,
  functionsOf,
  importsOf,
} from './entities.js';
import type {
  Entity,
  FileAnalysis,
  FunctionEntity,
  Location,
  ProjectAnalysis,
  Relationship,
} from './types.js';
import { RELATION_KINDS } from './types.js';

const metadataSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(z.string())]));

const locationSchema = z
  .object({
    file_path: z.string(),
    line_start: z.number().int(),
    line_end: z.number().int().nullable(),
    column_start: z.number().int(),
  })
  .refine(location => location.line_end === null || location.line_end >= location.line_start, {
    message: 'line_end is before line_start',
    path: ['line_end'],
  });

const entityBaseSchema = z.object({
  name: z.string().min(1),
  location: locationSchema,
  docstring: z.string().nullable(),
  source_code: z.string().nullable(),
  metadata: metadataSchema,
});

const functionRecordSchema = entityBaseSchema.extend({
  type: z.enum(['function', 'async_function']),
});

const classRecordSchema = entityBaseSchema.extend({
  type: z.literal('class'),
  methods: z.array(functionRecordSchema),
  base_classes: z.array(z.string()),
});

const importRecordSchema = entityBaseSchema.extend({
  type: z.literal('import'),
  module: z.string(),
  alias: z.string().nullable(),
  is_from: z.boolean(),
});

const entityRecordSchema = z.union([functionRecordSchema, classRecordSchema, importRecordSchema]);

const relationKindSchema = z.enum(RELATION_KINDS);

const relationshipRecordSchema = z.object({
  source: z.string().min(1),
  target: z.string().min(1),
  type: relationKindSchema,
  source_location: locationSchema.nullable(),
  metadata: metadataSchema,
});

const fileAnalysisRecordSchema = z.object({
  file_path: z.string(),
  entities: z.array(entityRecordSchema),
  relationships: z.array(relationshipRecordSchema),
  errors: z.array(z.string()),
  summary: z.object({
    total_entities: z.number(),
    functions: z.number(),
    classes: z.number(),
    imports: z.number(),
    relationships: z.number(),
  }),
});

export const projectAnalysisRecordSchema = z.object({
  project_name: z.string(),
  root_path: z.string(),
  file_analyses: z.array(fileAnalysisRecordSchema),
  all_relationships: z.array(relationshipRecordSchema),
  errors: z.array(z.string()),
  summary: z.object({
    total_files: z.number(),
    total_entities: z.number(),
    total_functions: z.number(),
    total_classes: z.number(),
    total_relationships: z.number(),
  }),
});

export type LocationRecord = z.infer<typeof locationSchema>;
export type FunctionRecord = z.infer<typeof functionRecordSchema>;
export type EntityRecord = z.infer<typeof entityRecordSchema>;
export type RelationshipRecord = z.infer<typeof relationshipRecordSchema>;
export type FileAnalysisRecord = z.infer<typeof fileAnalysisRecordSchema>;
export type ProjectAnalysisRecord = z.infer<typeof projectAnalysisRecordSchema>;

export function locationToRecord(location: Location): LocationRecord {
  return {
    file_path: location.filePath,
    line_start: location.lineStart,
    line_end: location.lineEnd ?? null,
    column_start: location.columnStart,
  };
}

function locationFromRecord(record: LocationRecord): Location {
  return createLocation(record.file_path, record.line_start, record.column_start, record.line_end ?? undefined);
}

function functionToRecord(entity: FunctionEntity): FunctionRecord {
  return {
    name: entity.name,
    type: entity.kind,
    location: locationToRecord(entity.location),
    docstring: entity.docstring ?? null,
    source_code: entity.sourceCode ?? null,
    metadata: { ...entity.metadata },
  };
}

function functionFromRecord(record: FunctionRecord): FunctionEntity {
  return createFunction({
    kind: record.type,
    name: record.name,
    location: locationFromRecord(record.location),
    ...(record.docstring !== null ? { docstring: record.docstring } : {}),
    ...(record.source_code !== null ? { sourceCode: record.source_code } : {}),
    metadata: record.metadata,
  });
}

export function entityToRecord(entity: Entity): EntityRecord {
  switch (entity.kind) {
    case 'function':
    case 'async_function':
      return functionToRecord(entity);
    case 'class':
      return {
        name: entity.name,
        type: 'class',
        location: locationToRecord(entity.location),
        docstring: entity.docstring ?? null,
        source_code: entity.sourceCode ?? null,
        metadata: { ...entity.metadata },
        methods: entity.methods.map(functionToRecord),
        base_classes: [...entity.baseClasses],
      };
    case 'import':
      return {
        name: entity.name,
        type: 'import',
        location: locationToRecord(entity.location),
        docstring: entity.docstring ?? null,
        source_code: entity.sourceCode ?? null,
        metadata: { ...entity.metadata },
        module: entity.module,
        alias: entity.alias ?? null,
        is_from: entity.isFrom,
      };
    default:
      return assertNever(entity);
  }
}

export function entityFromRecord(record: EntityRecord): Entity {
  const shared = {
    name: record.name,
    location: locationFromRecord(record.location),
    ...(record.docstring !== null ? { docstring: record.docstring } : {}),
    ...(record.source_code !== null ? { sourceCode: record.source_code } : {}),
    metadata: record.metadata,
  };

  switch (record.type) {
    case 'function':
    case 'async_function':
      return createFunction({ ...shared, kind: record.type });
    case 'class':
      return createClass({
        ...shared,
        methods: record.methods.map(functionFromRecord),
        baseClasses: record.base_classes,
      });
    case 'import':
      return createImport({
        ...shared,
        module: record.module,
        ...(record.alias !== null ? { alias: record.alias } : {}),
        isFrom: record.is_from,
      });
  }
}

export function relationshipToRecord(relationship: Relationship): RelationshipRecord {
  return {
    source: relationship.source,
    target: relationship.target,
    type: relationship.kind,
    source_location: relationship.sourceLocation ? locationToRecord(relationship.sourceLocation) : null,
    metadata: { ...relationship.metadata },
  };
}

export function relationshipFromRecord(record: RelationshipRecord): Relationship {
  return createRelationship(
    record.source,
    record.target,
    record.type,
    record.source_location ? locationFromRecord(record.source_location) : undefined,
    record.metadata
  );
}

export function fileAnalysisToRecord(analysis: FileAnalysis): FileAnalysisRecord {
  return {
    file_path: analysis.filePath,
    entities: analysis.entities.map(entityToRecord),
    relationships: analysis.relationships.map(relationshipToRecord),
    errors: [...analysis.errors],
    summary: {
      total_entities: analysis.entities.length,
      functions: functionsOf(analysis).length,
      classes: classesOf(analysis).length,
      imports: importsOf(analysis).length,
      relationships: analysis.relationships.length,
    },
  };
}

export type ProjectSummary = ProjectAnalysisRecord['summary'];

export function summarizeProject(project: ProjectAnalysis): ProjectSummary {
  const files = project.fileAnalyses;
  return {
    total_files: files.length,
    total_entities: files.reduce((sum, file) => sum + file.entities.length, 0),
    total_functions: files.reduce((sum, file) => sum + functionsOf(file).length, 0),
    total_classes: files.reduce((sum, file) => sum + classesOf(file).length, 0),
    total_relationships: files.reduce((sum, file) => sum + file.relationships.length, 0),
  };
}

export function projectAnalysisToRecord(project: ProjectAnalysis): ProjectAnalysisRecord {
  return {
    project_name: project.projectName,
    root_path: project.rootPath,
    file_analyses: project.fileAnalyses.map(fileAnalysisToRecord),
    all_relationships: project.allRelationships.map(relationshipToRecord),
    errors: [...project.errors],
    summary: summarizeProject(project),
  };
}

/**
 * Rebuild a project analysis from its JSON record.
 *
 * @throws {IndexFormatError} If the data does not match the record schema
 */
export function projectAnalysisFromRecord(data: unknown): ProjectAnalysis {
  const record = parseRecord(projectAnalysisRecordSchema, data, 'project analysis');
  return createProjectAnalysis({
    projectName: record.project_name,
    rootPath: record.root_path,
    fileAnalyses: record.file_analyses.map(file =>
      createFileAnalysis(
        file.file_path,
        file.entities.map(entityFromRecord),
        file.relationships.map(relationshipFromRecord),
        file.errors
      )
    ),
    allRelationships: record.all_relationships.map(relationshipFromRecord),
    errors: record.errors,
  });
}
