/**
 * Structural analysis of Python sources
 */

export * from './types.js';
export * from './entities.js';
export * from './records.js';
export { PythonFileParser, DEFAULT_MAX_FILE_SIZE, type FileParserOptions } from './file-parser.js';
export {
  ProjectAnalyzer,
  analyzeProject,
  resolveCrossFileRelationships,
  DEFAULT_CONCURRENCY,
  type AnalyzeOptions,
} from './analyzer.js';
export * from './tree-sitter/index.js';
