import { RulesetError } from '../errors.js';
import { TERM_OPERATORS } from '../types.js';
import type { Term, TermOperator } from '../types.js';

const TERM_RE = new RegExp(
  `^\\(?\\s*(.+?)\\s*(${TERM_OPERATORS.join('|')})\\s*([-+]?(?:\\d+\\.?\\d*|\\.\\d+)(?:[eE][-+]?\\d+)?)\\s*\\)?$`,
);

export function createTerm(variable: string, operator: TermOperator, threshold: number): Term {
  return { variable, operator, threshold };
}

/**
 * Canonical identity of a term. Two terms are the same condition iff their
 * keys are equal.
 */
export function termKey(term: Term): string {
  return `${term.variable} ${term.operator} ${term.threshold}`;
}

/**
 * Same result as comparing `termKey`s, without building the strings.
 */
export function termEquals(a: Term, b: Term): boolean {
  return a.variable === b.variable
    && a.operator === b.operator
    && (a.threshold === b.threshold || (Number.isNaN(a.threshold) && Number.isNaN(b.threshold)));
}

export function formatThreshold(threshold: number): string {
  return String(Number(threshold.toFixed(4)));
}

export function termToString(term: Term): string {
  return `(${term.variable} ${term.operator} ${formatThreshold(term.threshold)})`;
}

/**
 * Parse `x <= 0.5` or `(x <= 0.5)` into a term.
 */
export function parseTerm(text: string): Term {
  const match = text.trim().match(TERM_RE);
  if (!match) {
    throw new RulesetError('INVALID_RULESET', `Cannot parse term "${text}"`);
  }

  const [, variable, operator, threshold] = match;
  return createTerm(variable, toOperator(operator), Number(threshold));
}

export function termHolds(term: Term, value: number): boolean {
  switch (term.operator) {
    case '<': return value < term.threshold;
    case '<=': return value <= term.threshold;
    case '>': return value > term.threshold;
    case '>=': return value >= term.threshold;
    case '==': return value === term.threshold;
    case '!=': return value !== term.threshold;
  }
}

function toOperator(op: string): TermOperator {
  const operator = TERM_OPERATORS.find(o => o === op);
  if (!operator) {
    throw new RulesetError('INVALID_RULESET', `Unknown operator "${op}"`);
  }
  return operator;
}
