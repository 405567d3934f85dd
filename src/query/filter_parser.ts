/**
 * @fileoverview Natural-language filter parsing
 *
 * Turns phrases such as "high quality" or "simple" into dimension constraints.
 * Matching is case-insensitive phrase matching on word boundaries; there is
 * no NLP. Phrases that overlap ("advanced" and "complex") both fire and their
 * constraints are unioned, earlier mappings first.
 */

import type { FilterMappingDefinition, FilterSettings } from '../config/schema.js';
import type { FilterConstraint } from '../types.js';

export interface PhraseMatch {
  readonly phrase: string;
  readonly confidence: number;
  /** False when the phrase matched but its confidence is below the threshold */
  readonly active: boolean;
}

interface CompiledMapping {
  readonly definition: FilterMappingDefinition;
  readonly pattern: RegExp;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * "high  quality" matches "High Quality" and "high\tquality", but not
 * "highquality" or "thigh quality".
 */
function compilePhrase(phrase: string): RegExp {
  const words = phrase.trim().split(/\s+/).map(escapeRegExp);
  return new RegExp(`(?<![\\p{L}\\p{N}_])${words.join('\\s+')}(?![\\p{L}\\p{N}_])`, 'iu');
}

function constraintKey(constraint: Pick<FilterConstraint, 'dimension' | 'target'>): string {
  return `${constraint.dimension}\u0000${String(constraint.target)}`;
}

export class FilterParser {
  private readonly mappings: readonly CompiledMapping[];

  constructor(private readonly settings: FilterSettings) {
    this.mappings = settings.mappings
      .filter((definition) => definition.phrase.trim().length > 0)
      .map((definition) => ({ definition, pattern: compilePhrase(definition.phrase) }));
  }

  /**
   * Every mapping phrase found in the query, active or not.
   */
  matchPhrases(queryText: string): PhraseMatch[] {
    if (!this.settings.enableParsing) return [];
    return this.mappings
      .filter((mapping) => mapping.pattern.test(queryText))
      .map(({ definition }) => ({
        phrase: definition.phrase,
        confidence: definition.confidence,
        active: definition.confidence >= this.settings.confidenceThreshold,
      }));
  }

  /**
   * Constraints from every active phrase. Identical (dimension, target)
   * pairs are kept once; the first phrase to produce one is recorded.
   */
  parse(queryText: string): FilterConstraint[] {
    if (!this.settings.enableParsing) return [];

    const constraints: FilterConstraint[] = [];
    const seen = new Set<string>();

    for (const { definition, pattern } of this.mappings) {
      if (definition.confidence < this.settings.confidenceThreshold) continue;
      if (!pattern.test(queryText)) continue;

      for (const template of definition.constraints) {
        const key = constraintKey(template);
        if (seen.has(key)) continue;
        seen.add(key);
        constraints.push({
          dimension: template.dimension,
          target: template.target,
          phrase: definition.phrase,
          confidence: definition.confidence,
        });
      }
    }

    return constraints;
  }
}
