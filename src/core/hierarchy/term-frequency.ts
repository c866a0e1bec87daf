import { termKey } from '../rules/term.js';
import type { Ruleset, Term } from '../types.js';

export interface TermUsage {
  term: Term;
  count: number;
}

export interface TermRanking {
  /** Distinct terms, most used first. */
  terms: Term[];
  /** Number of rules using each term, keyed by `termKey`. */
  counts: Map<string, number>;
}

/**
 * Count in how many rules each term is used and rank the terms by that
 * count. Equal counts fall back to the term key so the order never depends
 * on input order.
 */
export function rankTerms(ruleset: Ruleset): TermRanking {
  const counts = new Map<string, number>();
  const termsByKey = new Map<string, Term>();

  for (const rule of ruleset.rules) {
    const usedInRule = new Set<string>();
    for (const clause of rule.premise) {
      for (const term of clause.terms) {
        const key = termKey(term);
        if (usedInRule.has(key)) continue;
        usedInRule.add(key);
        termsByKey.set(key, termsByKey.get(key) ?? term);
        counts.set(key, (counts.get(key) ?? 0) + 1);
      }
    }
  }

  const keys = [...termsByKey.keys()].sort((a, b) => {
    const diff = (counts.get(b) ?? 0) - (counts.get(a) ?? 0);
    if (diff !== 0) return diff;
    return a < b ? -1 : a > b ? 1 : 0;
  });

  const terms: Term[] = [];
  for (const key of keys) {
    const term = termsByKey.get(key);
    if (term) terms.push(term);
  }

  return { terms, counts };
}

export function termUsage(ruleset: Ruleset): TermUsage[] {
  const { terms, counts } = rankTerms(ruleset);
  return terms.map(term => ({ term, count: counts.get(termKey(term)) ?? 0 }));
}
