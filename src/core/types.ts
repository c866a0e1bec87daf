// Two-character operators first so they win when matched as alternatives
export const TERM_OPERATORS = ['<=', '>=', '==', '!=', '<', '>'] as const;

export type TermOperator = typeof TERM_OPERATORS[number];

export interface Term {
  variable: string;
  operator: TermOperator;
  threshold: number;
}

export interface ConjunctiveClause {
  terms: Term[];
  confidence: number;
  score: number;
}

export interface Rule {
  premise: ConjunctiveClause[];
  conclusion: string;
}

export interface Ruleset {
  rules: Rule[];
  featureNames: string[];
  outputClassNames: string[];
  regression: boolean;
}

/**
 * Anything that can turn a term into display text, e.g. a dataset descriptor
 * that knows which columns are categorical.
 */
export interface TermFormatter {
  formatTerm(term: Term): string;
}

export interface HierarchyNode {
  name: string;
  children: HierarchyNode[];
  score?: number;
}

export interface AnnotatedNode {
  name: string;
  children: AnnotatedNode[];
  score?: number;
  depth: number;
  num_descendants: number;
  class_counts: Record<string, number>;
}

export type FeatureType = 'numeric' | 'binary' | 'one_hot' | 'categorical';

export interface FeatureDescription {
  name: string;
  type: FeatureType;
  units?: string;
  // one_hot columns stand for `feature = value`
  feature?: string;
  value?: string;
  // categorical columns are integer-coded into this list
  categories?: string[];
}

export interface DatasetDescription {
  name?: string;
  features: FeatureDescription[];
}

export type OutputFormat = 'json' | 'text';

export interface RuletreeConfig {
  merge: boolean;
  expandClauses: boolean;
  rootName: string;
  format: OutputFormat;
  indent: number;
}

export const DEFAULT_CONFIG: RuletreeConfig = {
  merge: false,
  expandClauses: false,
  rootName: 'ruleset',
  format: 'json',
  indent: 2,
};
