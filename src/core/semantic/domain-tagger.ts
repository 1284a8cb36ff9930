/**
 * Rule-based domain tagging of files and entities.
 *
 * Keywords are matched on word boundaries after both sides go through
 * {@link normalizeText}, so `calculate_tax_amount` and `calculateTaxAmount`
 * both mention "tax".
 */

import { basename } from 'node:path';
import type { Entity, FileAnalysis } from '../ast/types.js';
import { silentLogger, type Logger } from '../logger.js';
import { ACCOUNTING_VOCABULARY } from './concepts.js';
import { keywordPattern, normalizeText } from './tokenize.js';
import type { DomainContext, DomainTag, DomainVocabulary } from './types.js';

/** Most a single text can contribute to one concept */
export const MAX_TEXT_CONFIDENCE = 0.8;
/** Added to every found concept when the file path matches a path pattern */
export const PATH_MATCH_BOOST = 0.3;
/** Aggregated tags below this are dropped */
export const MIN_TAG_CONFIDENCE = 0.1;

const CONFIDENCE_PER_MATCH = 0.2;
const LISTED_KEYWORDS = 3;

interface ConceptMatcher {
  concept: string;
  keywords: Array<{ keyword: string; pattern: RegExp }>;
}

export interface DomainTaggerOptions {
  vocabulary?: DomainVocabulary;
  logger?: Logger;
}

export class DomainTagger {
  private readonly vocabulary: DomainVocabulary;
  private readonly matchers: ConceptMatcher[];
  private readonly logger: Logger;

  constructor(options: DomainTaggerOptions = {}) {
    this.vocabulary = options.vocabulary ?? ACCOUNTING_VOCABULARY;
    this.logger = options.logger ?? silentLogger;
    this.matchers = Object.entries(this.vocabulary.concepts).map(([concept, keywords]) => ({
      concept,
      keywords: keywords.map(keyword => ({ keyword, pattern: keywordPattern(keyword) })),
    }));
  }

  /**
   * Tags found in one piece of text, one per concept with at least one match.
   *
   * @param source - Where the text came from, quoted in the reasoning
   */
  tagText(text: string, source: string): DomainTag[] {
    const normalized = normalizeText(text);
    const tags: DomainTag[] = [];

    for (const { concept, keywords } of this.matchers) {
      const matched = keywords.filter(({ pattern }) => pattern.test(normalized)).map(({ keyword }) => keyword);
      if (matched.length === 0) {
        continue;
      }

      let reason = `Found ${matched.length} keyword matches in ${source}: ${matched.slice(0, LISTED_KEYWORDS).join(', ')}`;
      if (matched.length > LISTED_KEYWORDS) {
        reason += ` (and ${matched.length - LISTED_KEYWORDS} more)`;
      }

      tags.push({
        tag: concept,
        confidence: Math.min(matched.length * CONFIDENCE_PER_MATCH, MAX_TEXT_CONFIDENCE),
        reasoning: [reason],
      });
    }

    return tags;
  }

  /**
   * Tag a file from its name, its entities' names and docstrings, and its
   * full path.
   */
  tagFile(file: FileAnalysis): DomainContext {
    const pathReasons = this.vocabulary.pathPatterns
      .filter(pattern => pattern.test(file.filePath))
      .map(pattern => `File path matches domain pattern: ${pattern.source}`);

    const found = [
      ...this.tagText(basename(file.filePath), 'file name'),
      ...file.entities.flatMap(entity => this.tagText(entity.name, `name of ${entity.name}`)),
      ...file.entities.flatMap(entity =>
        entity.docstring ? this.tagText(entity.docstring, `docstring of ${entity.name}`) : []
      ),
    ];

    const context = this.aggregate(found, pathReasons);
    this.logger.debug('Tagged file', {
      file: file.filePath,
      tags: context.tags.length,
      primary: context.primaryTag ?? null,
    });
    return context;
  }

  /**
   * Tag an entity from its name and docstring.
   */
  tagEntity(entity: Entity): DomainContext {
    return this.aggregate(
      [
        ...this.tagText(entity.name, 'entity name'),
        ...(entity.docstring ? this.tagText(entity.docstring, 'docstring') : []),
      ],
      []
    );
  }

  private aggregate(found: readonly DomainTag[], pathReasons: readonly string[]): DomainContext {
    const tags: DomainTag[] = [];

    // Vocabulary order, so the stable sort below breaks ties by it
    for (const { concept } of this.matchers) {
      const contributions = found.filter(tag => tag.tag === concept);
      if (contributions.length === 0) {
        continue;
      }

      let score = contributions.reduce((sum, tag) => sum + tag.confidence, 0);
      const reasoning = contributions.flatMap(tag => tag.reasoning);
      if (pathReasons.length > 0) {
        score += PATH_MATCH_BOOST;
        reasoning.push(...pathReasons);
      }

      const confidence = Math.min(score, 1);
      if (confidence >= MIN_TAG_CONFIDENCE) {
        tags.push({ tag: concept, confidence, reasoning });
      }
    }

    tags.sort((a, b) => b.confidence - a.confidence);

    const primaryTag = tags[0]?.tag;
    return {
      tags,
      ...(primaryTag !== undefined ? { primaryTag } : {}),
      isDomainRelated: primaryTag !== undefined || pathReasons.length > 0,
    };
  }
}
