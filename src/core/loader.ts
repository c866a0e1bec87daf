import { existsSync, readFileSync } from 'node:fs';
import { z } from 'zod';
import { RulesetError } from './errors.js';
import { createClause } from './rules/clause.js';
import { createRule, createRuleset } from './rules/ruleset.js';
import { parseTerm } from './rules/term.js';
import { TERM_OPERATORS } from './types.js';
import type { DatasetDescription, Ruleset, Term } from './types.js';

const termObjectSchema = z.object({
  variable: z.string().min(1),
  operator: z.enum(TERM_OPERATORS),
  threshold: z.number(),
});

const termSchema = z.union([termObjectSchema, z.string().min(1)]);

const clauseSchema = z.object({
  terms: z.array(termSchema),
  confidence: z.number().optional(),
  score: z.number().optional(),
});

const ruleSchema = z.object({
  premise: z.array(clauseSchema).default([]),
  conclusion: z.union([z.string(), z.number()]).transform(String),
});

export const rulesetSchema = z.object({
  rules: z.array(ruleSchema),
  feature_names: z.array(z.string()).optional(),
  output_class_names: z.array(z.string()).optional(),
  regression: z.boolean().optional(),
});

const featureSchema = z.object({
  name: z.string().min(1),
  type: z.enum(['numeric', 'binary', 'one_hot', 'categorical']),
  units: z.string().optional(),
  feature: z.string().optional(),
  value: z.string().optional(),
  categories: z.array(z.string()).optional(),
});

export const datasetSchema = z.object({
  name: z.string().optional(),
  features: z.array(featureSchema),
});

export type RulesetInput = z.input<typeof rulesetSchema>;
export type DatasetInput = z.input<typeof datasetSchema>;

/**
 * Validate a JSON ruleset document and build the in-memory ruleset.
 * Terms may be given as objects or as strings like `"x <= 0.5"`.
 */
export function parseRuleset(data: unknown): Ruleset {
  const parsed = rulesetSchema.safeParse(data);
  if (!parsed.success) {
    throw new RulesetError('INVALID_RULESET', formatIssues(parsed.error));
  }

  const doc = parsed.data;
  const rules = doc.rules.map(rule => createRule(
    rule.premise.map(clause => createClause(
      clause.terms.map(toTerm),
      clause.confidence,
      clause.score,
    )),
    rule.conclusion,
  ));

  return createRuleset(rules, {
    featureNames: doc.feature_names,
    outputClassNames: doc.output_class_names,
    regression: doc.regression,
  });
}

export function parseDataset(data: unknown): DatasetDescription {
  const parsed = datasetSchema.safeParse(data);
  if (!parsed.success) {
    throw new RulesetError('INVALID_DATASET', formatIssues(parsed.error));
  }
  return parsed.data;
}

export function loadRuleset(filePath: string): Ruleset {
  return parseRuleset(readJson(filePath, 'INVALID_RULESET'));
}

export function loadDataset(filePath: string): DatasetDescription {
  return parseDataset(readJson(filePath, 'INVALID_DATASET'));
}

function toTerm(term: z.infer<typeof termSchema>): Term {
  return typeof term === 'string' ? parseTerm(term) : term;
}

function readJson(filePath: string, code: 'INVALID_RULESET' | 'INVALID_DATASET'): unknown {
  if (!existsSync(filePath)) {
    throw new RulesetError('FILE_NOT_FOUND', filePath);
  }

  const raw = readFileSync(filePath, 'utf-8');
  try {
    return JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new RulesetError(code, `${filePath} is not valid JSON (${reason})`);
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
