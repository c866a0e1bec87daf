// Core types
export * from './types.js';
export { RulesetError } from './errors.js';
export type { RulesetErrorCode } from './errors.js';

// Rules
export {
  createTerm, termKey, termEquals, termToString, formatThreshold, parseTerm, termHolds,
  createClause, clauseHasTerm, clauseWithout,
  createRule, createRuleset, emptyLike, soleClause, assertSingleClauseRules, expandRuleset,
} from './rules/index.js';

// Hierarchy
export {
  rulesetHierarchyTree,
  rankTerms, termUsage,
  partitionRuleset,
  extractHierarchy,
  annotateTree,
  htmlify, unhtmlify,
} from './hierarchy/index.js';
export type {
  HierarchyTreeOptions, TermRanking, TermUsage, RulesetPartition, ExtractOptions, AnnotateOptions,
} from './hierarchy/index.js';

// Dataset
export { DatasetDescriptor } from './dataset.js';

// Loading
export { parseRuleset, parseDataset, loadRuleset, loadDataset, rulesetSchema, datasetSchema } from './loader.js';
export type { RulesetInput, DatasetInput } from './loader.js';

// Rendering
export { treeStats, renderTextTree } from './render.js';
export type { TreeStats } from './render.js';

// Config
export { resolveConfig, saveConfig, parseSetting, parseBoolean, getConfigDir, getConfigPath } from './config.js';
