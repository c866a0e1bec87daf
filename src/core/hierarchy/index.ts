import { expandRuleset } from '../rules/ruleset.js';
import { annotateTree } from './annotator.js';
import { extractHierarchy } from './extractor.js';
import type { AnnotatedNode, Ruleset, TermFormatter } from '../types.js';

export { rankTerms, termUsage } from './term-frequency.js';
export type { TermRanking, TermUsage } from './term-frequency.js';
export { partitionRuleset, stripTerms } from './partition.js';
export type { RulesetPartition } from './partition.js';
export { extractHierarchy } from './extractor.js';
export type { ExtractOptions } from './extractor.js';
export { annotateTree } from './annotator.js';
export type { AnnotateOptions } from './annotator.js';
export { htmlify, unhtmlify } from './escape.js';

export interface HierarchyTreeOptions {
  dataset?: TermFormatter;
  merge?: boolean;
  /** Split multi-clause rules into one rule per clause instead of rejecting them. */
  expandClauses?: boolean;
  rootName?: string;
}

/**
 * Turn a ruleset into an annotated n-ary tree ready for a D3 hierarchy
 * layout. Split nodes are terms, most used first; leaves are rule
 * conclusions.
 */
export function rulesetHierarchyTree(ruleset: Ruleset, options: HierarchyTreeOptions = {}): AnnotatedNode {
  const source = options.expandClauses ? expandRuleset(ruleset) : ruleset;
  const merge = options.merge ?? false;

  const root = {
    name: options.rootName ?? 'ruleset',
    children: extractHierarchy(source, { dataset: options.dataset, merge }),
  };

  return annotateTree(root, { merge });
}
