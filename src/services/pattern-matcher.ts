import { QueryPattern } from '../interfaces';

/**
 * Picks the query patterns a query triggers, in declaration order.
 * Swap in another implementation through the PATTERN_MATCHER token.
 */
export interface PatternMatcher {
  match(query: string, patterns: QueryPattern[]): QueryPattern[];
}

/**
 * Case-insensitive substring containment; any one keyword suffices
 */
export class KeywordPatternMatcher implements PatternMatcher {
  match(query: string, patterns: QueryPattern[]): QueryPattern[] {
    const text = query.toLowerCase();
    return patterns.filter((pattern) =>
      pattern.keywords.some((keyword) => text.includes(keyword.toLowerCase())),
    );
  }
}
