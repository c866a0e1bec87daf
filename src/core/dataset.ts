import { formatThreshold, termHolds, termToString } from './rules/term.js';
import type { DatasetDescription, FeatureDescription, Term, TermFormatter } from './types.js';

/**
 * Describes the columns a ruleset was trained on, so terms over encoded
 * columns can be shown in their original categorical form:
 *
 *   (color_red > 0.5)   ->  color = red
 *   (smoker <= 0.5)     ->  NOT smoker
 *   (size >= 1)         ->  size in {medium, large}
 */
export class DatasetDescriptor implements TermFormatter {
  private readonly features = new Map<string, FeatureDescription>();

  constructor(private readonly description: DatasetDescription) {
    for (const feature of description.features) {
      this.features.set(feature.name, feature);
    }
  }

  get name(): string | undefined {
    return this.description.name;
  }

  get featureNames(): string[] {
    return this.description.features.map(f => f.name);
  }

  getFeature(name: string): FeatureDescription | undefined {
    return this.features.get(name);
  }

  formatTerm(term: Term): string {
    const feature = this.features.get(term.variable);
    if (!feature) return termToString(term);

    switch (feature.type) {
      case 'numeric':
        return feature.units
          ? `(${term.variable} ${term.operator} ${formatThreshold(term.threshold)} ${feature.units})`
          : termToString(term);
      case 'binary':
        return binaryForm(term, term.variable, `NOT ${term.variable}`);
      case 'one_hot': {
        const base = feature.feature ?? term.variable;
        const value = feature.value ?? term.variable;
        return binaryForm(term, `${base} = ${value}`, `${base} != ${value}`);
      }
      case 'categorical':
        return categoricalForm(term, feature.categories ?? []);
    }
  }
}

// Terms over a 0/1 column read as the column being set or unset
function binaryForm(term: Term, whenOne: string, whenZero: string): string {
  const one = termHolds(term, 1);
  const zero = termHolds(term, 0);
  if (one && !zero) return whenOne;
  if (zero && !one) return whenZero;
  return termToString(term);
}

function categoricalForm(term: Term, categories: string[]): string {
  const matching = categories.filter((_, code) => termHolds(term, code));
  if (matching.length === 0 || matching.length === categories.length) {
    return termToString(term);
  }
  if (matching.length === 1) return `${term.variable} = ${matching[0]}`;
  return `${term.variable} in {${matching.join(', ')}}`;
}
