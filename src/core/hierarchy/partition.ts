import { clauseHasTerm, clauseWithout } from '../rules/clause.js';
import { termKey } from '../rules/term.js';
import { createRule, emptyLike, soleClause } from '../rules/ruleset.js';
import type { Ruleset, Term } from '../types.js';

export interface RulesetPartition {
  /** Rules that used the term, rewritten without it. */
  contains: Ruleset;
  /** Rules that never mention the term. */
  disjoint: Ruleset;
}

/**
 * Split `ruleset` around `term`. Each rule lands in exactly one half; the
 * input rules and clauses are left untouched.
 */
export function partitionRuleset(ruleset: Ruleset, term: Term): RulesetPartition {
  const contains = emptyLike(ruleset);
  const disjoint = emptyLike(ruleset);

  for (const rule of ruleset.rules) {
    const clause = soleClause(rule);

    if (!clause) {
      // Nothing to match against
      disjoint.rules.push(rule);
    } else if (clauseHasTerm(clause, term)) {
      contains.rules.push(createRule([clauseWithout(clause, term)], rule.conclusion));
    } else {
      disjoint.rules.push(createRule([clause], rule.conclusion));
    }
  }

  return { contains, disjoint };
}

/**
 * Copy of `ruleset` with `terms` removed from every rule's clause.
 */
export function stripTerms(ruleset: Ruleset, terms: Term[]): Ruleset {
  const drop = new Set(terms.map(termKey));
  const stripped = emptyLike(ruleset);

  for (const rule of ruleset.rules) {
    const clause = soleClause(rule);
    if (!clause) {
      stripped.rules.push(rule);
      continue;
    }
    stripped.rules.push(createRule([{
      terms: clause.terms.filter(t => !drop.has(termKey(t))),
      confidence: clause.confidence,
      score: clause.score,
    }], rule.conclusion));
  }

  return stripped;
}
