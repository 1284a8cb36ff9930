/**
 * Parses one Python file into a FileAnalysis.
 *
 * Nothing thrown while reading, decoding or parsing a file escapes
 * {@link PythonFileParser.parseFile}: failures become messages on the
 * returned analysis, which then carries no entities.
 */

import { readFile, stat } from 'node:fs/promises';
import { TextDecoder } from 'node:util';
import {
  AnalysisError,
  EncodingError,
  errorMessage,
  FileAccessError,
  ParseError,
  SizeLimitExceededError,
} from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { classesOf, createFileAnalysis, functionsOf, importsOf } from './entities.js';
import type { FileAnalysis } from './types.js';
import { extractEntities, DEFAULT_PREVIEW_LINES } from './tree-sitter/entity-extractor.js';
import { extractRelationships } from './tree-sitter/relationship-extractor.js';
import { findSyntaxError, parsePython } from './tree-sitter/parser.js';

export const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024; // 10MB

export interface FileParserOptions {
  /** Files larger than this many bytes are skipped */
  maxFileSize?: number;
  /** Number of source lines kept as each entity's preview */
  previewLines?: number;
  logger?: Logger;
}

export class PythonFileParser {
  private readonly maxFileSize: number;
  private readonly previewLines: number;
  private readonly logger: Logger;
  private readonly decoder = new TextDecoder('utf-8', { fatal: true });

  constructor(options: FileParserOptions = {}) {
    this.maxFileSize = options.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
    this.previewLines = options.previewLines ?? DEFAULT_PREVIEW_LINES;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Read and parse a file.
   *
   * @param path - Where to read the file from
   * @param filePath - Path recorded in the analysis (defaults to `path`)
   */
  async parseFile(path: string, filePath: string = path): Promise<FileAnalysis> {
    let source: string;
    try {
      source = await this.readSource(path);
    } catch (error) {
      return this.failed(filePath, error);
    }
    return this.parseSource(source, filePath);
  }

  /**
   * Parse source text that is already in memory.
   */
  parseSource(source: string, filePath: string): FileAnalysis {
    try {
      const tree = parsePython(source);
      const problem = findSyntaxError(tree.rootNode);
      if (problem) {
        throw new ParseError(problem.line, problem.message);
      }

      const analysis = createFileAnalysis(
        filePath,
        extractEntities(tree.rootNode, filePath, { previewLines: this.previewLines }),
        extractRelationships(tree.rootNode, filePath)
      );

      this.logger.debug('Parsed file', {
        file: filePath,
        functions: functionsOf(analysis).length,
        classes: classesOf(analysis).length,
        imports: importsOf(analysis).length,
      });
      return analysis;
    } catch (error) {
      return this.failed(filePath, error);
    }
  }

  private async readSource(path: string): Promise<string> {
    let bytes: Buffer;
    try {
      const stats = await stat(path);
      if (stats.size > this.maxFileSize) {
        throw new SizeLimitExceededError(stats.size, this.maxFileSize);
      }
      bytes = await readFile(path);
    } catch (error) {
      if (error instanceof AnalysisError) {
        throw error;
      }
      throw new FileAccessError(errorMessage(error));
    }

    try {
      return this.decoder.decode(bytes);
    } catch (error) {
      throw new EncodingError(errorMessage(error));
    }
  }

  private failed(filePath: string, error: unknown): FileAnalysis {
    const message = error instanceof AnalysisError ? error.message : `Unexpected error: ${errorMessage(error)}`;
    this.logger.warn('Could not analyze file', { file: filePath, error: message });
    return createFileAnalysis(filePath, [], [], [message]);
  }
}
