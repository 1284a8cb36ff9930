/**
 * Query CLI command - ranked search over a saved semantic index
 */

import { createLogger, type Logger } from '../../core/logger.js';
import { SemanticQueryEngine } from '../../core/semantic/query-engine.js';
import type { FileQueryResult, QueryResult } from '../../core/semantic/types.js';
import { loadConfig } from '../../storage/config.js';
import { loadSemanticIndex } from '../../storage/index-store.js';

export interface QueryOptions {
  /** Maximum results (default: the maxResults setting) */
  limit?: number;
  /** Rank files instead of entities */
  files?: boolean;
  logger?: Logger;
}

export type QueryCommandResult =
  | { mode: 'entities'; query: string; results: QueryResult[]; count: number }
  | { mode: 'files'; query: string; results: FileQueryResult[]; count: number };

/**
 * Run the query command
 */
export async function runQueryCommand(
  indexFile: string,
  query: string,
  options: QueryOptions = {}
): Promise<QueryCommandResult> {
  const config = await loadConfig();
  const logger = options.logger ?? createLogger('query', { level: config.logLevel });
  const limit = options.limit ?? config.maxResults;
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new Error(`Invalid result limit: ${limit}`);
  }

  const engine = new SemanticQueryEngine(await loadSemanticIndex(indexFile, logger), logger);

  if (options.files) {
    const results = engine.searchFiles(query, limit);
    return { mode: 'files', query, results, count: results.length };
  }
  const results = engine.query(query, limit);
  return { mode: 'entities', query, results, count: results.length };
}

export function formatQueryResult(result: QueryCommandResult): string {
  if (result.count === 0) {
    return `No results found for "${result.query}"`;
  }

  const lines: string[] = [`Found ${result.count} result${result.count === 1 ? '' : 's'} for "${result.query}":`];
  if (result.mode === 'files') {
    result.results.forEach((file, i) => {
      lines.push(`\n${i + 1}. ${file.filePath} [${file.contextScore}] (${file.relevanceScore.toFixed(2)})`);
      lines.push(...file.reasoning.map(reason => `   ${reason}`));
    });
    return lines.join('\n');
  }

  result.results.forEach((entity, i) => {
    lines.push(
      `\n${i + 1}. ${entity.entityName} (${entity.filePath}) [${entity.contextScore}] (${entity.relevanceScore.toFixed(2)})`
    );
    if (entity.domainTags.length > 0) {
      lines.push(`   Tags: ${entity.domainTags.join(', ')}`);
    }
    lines.push(...entity.reasoning.map(reason => `   ${reason}`));
  });
  return lines.join('\n');
}
