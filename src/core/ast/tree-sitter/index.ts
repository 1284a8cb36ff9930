/**
 * Tree-sitter extraction for Python sources
 */

export {
  parsePython,
  findSyntaxError,
  findNodes,
  findNodesByTypes,
  dottedName,
  type SyntaxNode,
  type SyntaxProblem,
  type Tree,
} from './parser.js';
export { extractEntities, DEFAULT_PREVIEW_LINES, type EntityExtractionOptions } from './entity-extractor.js';
export { extractRelationships } from './relationship-extractor.js';
export { extractDocstring, cleanDocstring } from './docstring.js';
