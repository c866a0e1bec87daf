import { termEquals, termKey } from './term.js';
import type { ConjunctiveClause, Term } from '../types.js';

export function createClause(terms: Term[], confidence = 1, score = 0): ConjunctiveClause {
  const seen = new Set<string>();
  const unique: Term[] = [];

  for (const term of terms) {
    const key = termKey(term);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(term);
  }

  return { terms: unique, confidence, score };
}

export function clauseHasTerm(clause: ConjunctiveClause, term: Term): boolean {
  return clause.terms.some(t => termEquals(t, term));
}

/**
 * Copy of `clause` with `term` dropped. Confidence and score carry over.
 */
export function clauseWithout(clause: ConjunctiveClause, term: Term): ConjunctiveClause {
  return {
    terms: clause.terms.filter(t => !termEquals(t, term)),
    confidence: clause.confidence,
    score: clause.score,
  };
}
