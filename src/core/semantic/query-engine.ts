/**
 * Ranks indexed entities and files against a free-text query.
 */

import { basename } from 'node:path';
import { silentLogger, type Logger } from '../logger.js';
import { fileStem, tokenizeName, tokenizeQuery } from './tokenize.js';
import type { DomainContext, FileQueryResult, QualityTier, QueryResult, SemanticIndex } from './types.js';

export const DEFAULT_MAX_RESULTS = 10;

const NAME_MATCH_BONUS = 0.3;
const DOMAIN_BONUS = 0.2;
const PRIMARY_TAG_BONUS = 0.3;
const TIER_BONUS: Record<QualityTier, number> = { HIGH: 0.1, MEDIUM: 0.05, LOW: 0.02 };

interface Candidate {
  /** Name shown in results and matched by substring */
  name: string;
  terms: Set<string>;
  domainContext: DomainContext;
  tier: QualityTier;
}

function searchTerms(nameTokens: Set<string>, context: DomainContext): Set<string> {
  const terms = new Set(nameTokens);
  for (const tag of context.tags) {
    terms.add(tag.tag.toLowerCase());
  }
  if (context.primaryTag) {
    terms.add(context.primaryTag.toLowerCase());
  }
  return terms;
}

/**
 * Relevance of a candidate, or 0 when it shares no term with the query.
 */
function relevance(candidate: Candidate, queryTerms: ReadonlySet<string>): number {
  const overlap = [...queryTerms].filter(term => candidate.terms.has(term)).length;
  if (overlap === 0) {
    return 0;
  }

  const name = candidate.name.toLowerCase();
  const primaryTag = candidate.domainContext.primaryTag?.toLowerCase();

  let score = overlap / queryTerms.size;
  if ([...queryTerms].some(term => name.includes(term))) {
    score += NAME_MATCH_BONUS;
  }
  if (candidate.domainContext.isDomainRelated) {
    score += DOMAIN_BONUS;
  }
  if (primaryTag && [...queryTerms].some(term => primaryTag.includes(term))) {
    score += PRIMARY_TAG_BONUS;
  }
  score += TIER_BONUS[candidate.tier];

  return Math.min(score, 1);
}

function explain(candidate: Candidate, queryTerms: ReadonlySet<string>): string[] {
  const matching = [...queryTerms].filter(term => candidate.terms.has(term)).sort();
  const reasoning = [`Matches query terms: ${matching.join(', ')}`];
  if (candidate.domainContext.isDomainRelated) {
    reasoning.push('Identified as domain-related code');
  }
  if (candidate.tier === 'HIGH') {
    reasoning.push('High-quality, well-documented code');
  }
  return reasoning;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export class SemanticQueryEngine {
  private readonly entityCandidates: Array<{ key: string; filePath: string; candidate: Candidate }>;
  private readonly fileCandidates: Array<{ filePath: string; candidate: Candidate }>;
  private readonly logger: Logger;

  constructor(index: SemanticIndex, logger: Logger = silentLogger) {
    this.logger = logger;

    this.entityCandidates = Object.entries(index.entities).map(([key, entity]) => ({
      key,
      filePath: entity.filePath,
      candidate: {
        name: entity.name,
        terms: searchTerms(tokenizeName(entity.name), entity.domainContext),
        domainContext: entity.domainContext,
        tier: entity.contextScore.overallScore,
      },
    }));

    this.fileCandidates = Object.values(index.files).map(file => ({
      filePath: file.filePath,
      candidate: {
        name: basename(file.filePath),
        terms: searchTerms(tokenizeName(fileStem(file.filePath)), file.domainContext),
        domainContext: file.domainContext,
        tier: file.contextScore.overallScore,
      },
    }));
  }

  /**
   * Entities ranked by relevance, highest first. Equal scores are ordered by
   * entity name, then file path.
   */
  query(queryString: string, maxResults = DEFAULT_MAX_RESULTS): QueryResult[] {
    const queryTerms = tokenizeQuery(queryString);
    this.logger.debug('Executing semantic query', { query: queryString, terms: [...queryTerms] });
    if (queryTerms.size === 0) {
      return [];
    }

    const results: QueryResult[] = [];
    for (const { filePath, candidate } of this.entityCandidates) {
      const score = relevance(candidate, queryTerms);
      if (score <= 0) {
        continue;
      }
      const { primaryTag, tags } = candidate.domainContext;
      results.push({
        entityName: candidate.name,
        filePath,
        relevanceScore: score,
        domainTags: tags.map(tag => tag.tag),
        contextScore: candidate.tier,
        ...(primaryTag ? { shortContext: `Primary domain: ${primaryTag}` } : {}),
        reasoning: explain(candidate, queryTerms),
      });
    }

    results.sort(
      (a, b) =>
        b.relevanceScore - a.relevanceScore ||
        compareStrings(a.entityName, b.entityName) ||
        compareStrings(a.filePath, b.filePath)
    );

    const limited = results.slice(0, Math.max(0, maxResults));
    this.logger.info('Query complete', { query: queryString, results: limited.length });
    return limited;
  }

  /**
   * Files ranked with the same formula, using the file name as the name.
   */
  searchFiles(queryString: string, maxResults = DEFAULT_MAX_RESULTS): FileQueryResult[] {
    const queryTerms = tokenizeQuery(queryString);
    if (queryTerms.size === 0) {
      return [];
    }

    const results: FileQueryResult[] = [];
    for (const { filePath, candidate } of this.fileCandidates) {
      const score = relevance(candidate, queryTerms);
      if (score > 0) {
        results.push({
          filePath,
          relevanceScore: score,
          domainTags: candidate.domainContext.tags.map(tag => tag.tag),
          contextScore: candidate.tier,
          reasoning: explain(candidate, queryTerms),
        });
      }
    }

    results.sort((a, b) => b.relevanceScore - a.relevanceScore || compareStrings(a.filePath, b.filePath));
    return results.slice(0, Math.max(0, maxResults));
  }
}

/**
 * Query a semantic index without keeping an engine around.
 */
export function querySemanticIndex(
  query: string,
  index: SemanticIndex,
  maxResults = DEFAULT_MAX_RESULTS
): QueryResult[] {
  return new SemanticQueryEngine(index).query(query, maxResults);
}
