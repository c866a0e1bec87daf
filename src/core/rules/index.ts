export { createTerm, termKey, termEquals, termToString, formatThreshold, parseTerm, termHolds } from './term.js';
export { createClause, clauseHasTerm, clauseWithout } from './clause.js';
export { createRule, createRuleset, emptyLike, soleClause, assertSingleClauseRules, expandRuleset } from './ruleset.js';
