import { RulesetError } from '../errors.js';
import type { ConjunctiveClause, Rule, Ruleset } from '../types.js';

export function createRule(premise: ConjunctiveClause[], conclusion: string): Rule {
  return { premise, conclusion };
}

export function createRuleset(
  rules: Rule[],
  options: { featureNames?: string[]; outputClassNames?: string[]; regression?: boolean } = {},
): Ruleset {
  return {
    rules,
    featureNames: options.featureNames ?? [],
    outputClassNames: options.outputClassNames ?? [...new Set(rules.map(r => r.conclusion))],
    regression: options.regression ?? false,
  };
}

/**
 * A ruleset with the same metadata as `ruleset` and no rules.
 */
export function emptyLike(ruleset: Ruleset): Ruleset {
  return {
    rules: [],
    featureNames: ruleset.featureNames,
    outputClassNames: ruleset.outputClassNames,
    regression: ruleset.regression,
  };
}

/**
 * The single clause of a rule's premise, or undefined for an empty premise.
 * Rules with several clauses have to be expanded first.
 */
export function soleClause(rule: Rule): ConjunctiveClause | undefined {
  if (rule.premise.length > 1) {
    throw new RulesetError(
      'MULTI_CLAUSE_RULE',
      `Rule concluding "${rule.conclusion}" has ${rule.premise.length} clauses; expand the ruleset first`,
    );
  }
  return rule.premise[0];
}

export function assertSingleClauseRules(ruleset: Ruleset): void {
  for (const rule of ruleset.rules) {
    soleClause(rule);
  }
}

/**
 * Split every multi-clause rule into one rule per clause, keeping the
 * conclusion. Rules with zero or one clause are kept as they are.
 */
export function expandRuleset(ruleset: Ruleset): Ruleset {
  const expanded = emptyLike(ruleset);

  for (const rule of ruleset.rules) {
    if (rule.premise.length <= 1) {
      expanded.rules.push(rule);
      continue;
    }
    for (const clause of rule.premise) {
      expanded.rules.push(createRule([clause], rule.conclusion));
    }
  }

  return expanded;
}
