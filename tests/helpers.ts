import { createClause } from '../src/core/rules/clause.js';
import { createRule, createRuleset } from '../src/core/rules/ruleset.js';
import { parseTerm } from '../src/core/rules/term.js';
import type { AnnotatedNode, Rule, Ruleset } from '../src/core/types.js';

export function makeRule(terms: string[], conclusion: string, score = 0): Rule {
  return createRule([createClause(terms.map(parseTerm), 1, score)], conclusion);
}

export function makeRuleset(rules: Rule[]): Ruleset {
  return createRuleset(rules, { featureNames: ['a', 'b', 'c'], regression: false });
}

export function collectNodes(tree: AnnotatedNode): AnnotatedNode[] {
  const nodes: AnnotatedNode[] = [tree];
  for (const child of tree.children) {
    nodes.push(...collectNodes(child));
  }
  return nodes;
}

export function leavesOf(tree: AnnotatedNode): AnnotatedNode[] {
  return collectNodes(tree).filter(n => n.children.length === 0 && n.depth > 0);
}

/**
 * Deterministic pseudo-random ruleset over a small term pool.
 */
export function generateRuleset(seed: number, ruleCount: number): Ruleset {
  const pool = ['a <= 1', 'a > 1', 'b <= 2.5', 'b > 2.5', 'c >= 0', 'd == 3', 'e != 4'];
  const classes = ['setosa', 'versicolor', 'virginica'];
  let state = seed;
  const next = (n: number): number => {
    state = (state * 1103515245 + 12345) % 2147483648;
    return state % n;
  };

  const rules: Rule[] = [];
  for (let i = 0; i < ruleCount; i++) {
    const size = next(4);
    const terms: string[] = [];
    for (let j = 0; j < size; j++) {
      terms.push(pool[next(pool.length)]);
    }
    rules.push(makeRule(terms, classes[next(classes.length)], next(100) / 100));
  }
  return makeRuleset(rules);
}
