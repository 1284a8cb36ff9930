/**
 * Text normalisation shared by the tagger and the query engine.
 */

import { basename, extname } from 'node:path';

/**
 * Split camelCase and `_ - . / \` separators into spaces and lower-case.
 *
 * @example
 * normalizeText('postJournalEntry') // "post journal entry"
 * normalizeText('tax_utils.py')     // "tax utils py"
 */
export function normalizeText(text: string): string {
  return text
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1 $2')
    .replace(/[_\-./\\]+/g, ' ')
    .toLowerCase();
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Word-boundary pattern for a keyword, normalised the same way as the text
 * it will be tested against.
 */
export function keywordPattern(keyword: string): RegExp {
  const words = normalizeText(keyword).trim().split(/\s+/).map(escapeRegExp);
  return new RegExp(`\\b${words.join('\\s+')}\\b`);
}

/**
 * File name without directories or extension.
 */
export function fileStem(filePath: string): string {
  return basename(filePath, extname(filePath));
}

/**
 * Search terms of an entity or file name. Tokens of two characters or fewer
 * are discarded.
 */
export function tokenizeName(name: string): Set<string> {
  return new Set(
    normalizeText(name)
      .split(/\s+/)
      .filter(token => token.length > 2)
  );
}

/**
 * Search terms of a free-text query.
 */
export function tokenizeQuery(query: string): Set<string> {
  return new Set(
    query
      .toLowerCase()
      .split(/\s+/)
      .map(token => token.replace(/[^\p{L}\p{N}_]/gu, ''))
      .filter(token => token.length > 2)
  );
}
