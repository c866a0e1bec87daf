import { describe, it, expect } from 'vitest';
import { extractHierarchy } from '../../../src/core/hierarchy/extractor.js';
import { createRule, createRuleset } from '../../../src/core/rules/ruleset.js';
import { createClause } from '../../../src/core/rules/clause.js';
import { parseTerm } from '../../../src/core/rules/term.js';
import { RulesetError } from '../../../src/core/errors.js';
import type { Term, TermFormatter } from '../../../src/core/types.js';
import { makeRule, makeRuleset } from '../../helpers.js';

describe('extractHierarchy', () => {
  it('should return nothing for an empty ruleset', () => {
    expect(extractHierarchy(makeRuleset([]))).toEqual([]);
  });

  it('should emit a bare leaf for a rule without terms', () => {
    const nodes = extractHierarchy(makeRuleset([makeRule([], 'yes', 0.4)]));

    expect(nodes).toEqual([{ name: 'yes', children: [], score: 0.4 }]);
  });

  it('should score a rule with an empty premise as zero', () => {
    const nodes = extractHierarchy(makeRuleset([createRule([], 'yes')]));

    expect(nodes).toEqual([{ name: 'yes', children: [], score: 0 }]);
  });

  it('should chain the terms of a single rule in clause order', () => {
    const nodes = extractHierarchy(makeRuleset([makeRule(['a > 1', 'b <= 2'], 'Z', 0.7)]));

    expect(nodes).toEqual([{
      name: '(a > 1)',
      children: [{
        name: '(b &leq; 2)',
        children: [{ name: 'Z', children: [], score: 0.7 }],
      }],
    }]);
  });

  it('should join the terms of a single rule when merging', () => {
    const nodes = extractHierarchy(
      makeRuleset([makeRule(['a > 1', 'b <= 2'], 'Z', 0.7)]),
      { merge: true },
    );

    expect(nodes).toEqual([{
      name: '(a > 1) AND (b &leq; 2)',
      children: [{ name: 'Z', children: [], score: 0.7 }],
    }]);
  });

  it('should split on the most used term and keep other rules as siblings', () => {
    const nodes = extractHierarchy(makeRuleset([
      makeRule(['a > 1', 'b <= 2'], 'X', 0.9),
      makeRule(['b <= 2'], 'Y', 0.5),
      makeRule(['c >= 3'], 'Z', 0.2),
    ]));

    expect(nodes).toEqual([
      {
        name: '(b &leq; 2)',
        children: [
          { name: '(a > 1)', children: [{ name: 'X', children: [], score: 0.9 }] },
          { name: 'Y', children: [], score: 0.5 },
        ],
      },
      {
        name: '(c &geq; 3)',
        children: [{ name: 'Z', children: [], score: 0.2 }],
      },
    ]);
  });

  it('should emit one leaf per rule once no terms are left', () => {
    const nodes = extractHierarchy(makeRuleset([
      makeRule([], 'X', 0.1),
      createRule([], 'Y'),
    ]));

    expect(nodes).toEqual([
      { name: 'X', children: [], score: 0.1 },
      { name: 'Y', children: [], score: 0 },
    ]);
  });

  it('should escape conclusions', () => {
    const nodes = extractHierarchy(makeRuleset([makeRule([], '>=50K')]));

    expect(nodes[0].name).toBe('&geq;50K');
  });

  it('should render terms through the formatter when given', () => {
    const formatter: TermFormatter = {
      formatTerm: (term: Term) => `${term.variable.toUpperCase()} <= ?`,
    };

    const nodes = extractHierarchy(makeRuleset([makeRule(['a > 1'], 'X')]), { dataset: formatter });

    expect(nodes[0].name).toBe('A &leq; ?');
  });

  it('should reject multi-clause rules', () => {
    const ruleset = createRuleset([
      createRule([createClause([parseTerm('a > 1')]), createClause([parseTerm('b > 1')])], 'X'),
    ]);

    expect(() => extractHierarchy(ruleset)).toThrow(RulesetError);
  });

  it('should chain the terms every rule shares before splitting the rest', () => {
    const nodes = extractHierarchy(makeRuleset([
      makeRule(['a > 1', 'b <= 2', 'c >= 3'], 'X'),
      makeRule(['b <= 2', 'a > 1'], 'Y'),
    ]));

    expect(nodes).toEqual([{
      name: '(a > 1)',
      children: [{
        name: '(b &leq; 2)',
        children: [
          { name: '(c &geq; 3)', children: [{ name: 'X', children: [], score: 0 }] },
          { name: 'Y', children: [], score: 0 },
        ],
      }],
    }]);
  });
});
