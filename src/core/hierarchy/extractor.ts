import { termKey, termToString } from '../rules/term.js';
import { assertSingleClauseRules, soleClause } from '../rules/ruleset.js';
import { htmlify } from './escape.js';
import { partitionRuleset, stripTerms } from './partition.js';
import { rankTerms } from './term-frequency.js';
import type { TermRanking } from './term-frequency.js';
import type { HierarchyNode, Rule, Ruleset, Term, TermFormatter } from '../types.js';

export interface ExtractOptions {
  /** Renders terms in dataset-aware form when given. */
  dataset?: TermFormatter;
  /** Fold the leftover terms of a rule into a single `A AND B` node. */
  merge?: boolean;
}

interface ExtractContext {
  dataset?: TermFormatter;
  merge: boolean;
}

/**
 * Build the raw n-ary tree for a ruleset by greedily splitting on the most
 * used term.
 *
 * Rules that use the chosen term go under its split node (with the term
 * removed), all other rules stay siblings of that node. Leaves map one-to-one
 * onto rules and carry the clause score.
 */
export function extractHierarchy(ruleset: Ruleset, options: ExtractOptions = {}): HierarchyNode[] {
  assertSingleClauseRules(ruleset);
  return extractNodes(ruleset, {
    dataset: options.dataset,
    merge: options.merge ?? false,
  });
}

interface PendingLevel {
  ruleset: Ruleset;
  /** Children array of the split node this level fills. */
  out: HierarchyNode[];
  /** Ranking already known for `ruleset`, read from `start` on. */
  ranking?: OffsetRanking;
}

interface OffsetRanking extends TermRanking {
  start: number;
}

// Levels are expanded from a work stack rather than by recursion, so a long
// clause shared by several rules cannot exhaust the call stack
function extractNodes(ruleset: Ruleset, ctx: ExtractContext): HierarchyNode[] {
  const roots: HierarchyNode[] = [];
  const stack: PendingLevel[] = [{ ruleset, out: roots }];

  while (stack.length > 0) {
    const level = stack.pop();
    if (!level) break;
    expandLevel(level, ctx, stack);
  }

  return roots;
}

function expandLevel(level: PendingLevel, ctx: ExtractContext, stack: PendingLevel[]): void {
  let out = level.out;
  let remaining = level.ruleset;
  let ranking = level.ranking;

  // The disjoint half only ever adds siblings at this level
  while (remaining.rules.length > 1) {
    ranking = ranking ?? { ...rankTerms(remaining), start: 0 };

    const shared = sharedTerms(ranking, remaining.rules.length);
    if (shared.length > 0) {
      // Every rule uses these: splitting on each in turn leaves nothing
      // disjoint, so they form a single chain and are stripped in one pass
      for (const term of shared) {
        const node: HierarchyNode = { name: htmlify(renderTerm(term, ctx)), children: [] };
        out.push(node);
        out = node.children;
      }
      stack.push({
        ruleset: stripTerms(remaining, shared),
        out,
        ranking: { ...ranking, start: ranking.start + shared.length },
      });
      return;
    }

    const splitTerm: Term | undefined = ranking.terms[ranking.start];
    if (!splitTerm) {
      // Several rules and no terms left: each one is a bare conclusion
      for (const rule of remaining.rules) {
        out.push(ruleNode(rule, ctx));
      }
      return;
    }

    const { contains, disjoint } = partitionRuleset(remaining, splitTerm);
    const node: HierarchyNode = {
      name: htmlify(renderTerm(splitTerm, ctx)),
      children: [],
    };
    out.push(node);
    stack.push({ ruleset: contains, out: node.children });

    remaining = disjoint;
    ranking = undefined;
  }

  const [last] = remaining.rules;
  if (last) out.push(ruleNode(last, ctx));
}

/**
 * Leading ranked terms used by all `ruleCount` rules.
 */
function sharedTerms(ranking: OffsetRanking, ruleCount: number): Term[] {
  const shared: Term[] = [];
  for (let i = ranking.start; i < ranking.terms.length; i++) {
    const term = ranking.terms[i];
    if (ranking.counts.get(termKey(term)) !== ruleCount) break;
    shared.push(term);
  }
  return shared;
}

function ruleNode(rule: Rule, ctx: ExtractContext): HierarchyNode {
  const clause = soleClause(rule);
  const leaf: HierarchyNode = {
    name: htmlify(rule.conclusion),
    children: [],
    score: clause?.score ?? 0,
  };

  if (!clause || clause.terms.length === 0) return leaf;

  if (ctx.merge) {
    return {
      name: htmlify(clause.terms.map(t => renderTerm(t, ctx)).join(' AND ')),
      children: [leaf],
    };
  }

  // One node per term, innermost holds the leaf
  let chain = leaf;
  for (let i = clause.terms.length - 1; i >= 0; i--) {
    chain = {
      name: htmlify(renderTerm(clause.terms[i], ctx)),
      children: [chain],
    };
  }
  return chain;
}

function renderTerm(term: Term, ctx: ExtractContext): string {
  return ctx.dataset ? ctx.dataset.formatTerm(term) : termToString(term);
}
