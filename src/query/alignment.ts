/**
 * @fileoverview Dimension alignment
 *
 * Scores how well a chunk's conceptual-dimension values match the active
 * profile and the query's filter constraints:
 *
 * 1. Per dimension: raw value x profile multiplier, penalized by
 *    (1 - filterStrength) for every constraint the value fails.
 * 2. Aggregate (min | max | average | weighted_average).
 * 3. Normalize (none | total_weight | max_weight), clamp to [0, 1].
 * 4. Confidence boost for chunks whose dimension confidences are high.
 * 5. Same-profile bonus or cross-profile penalty.
 *
 * The result is always within [0, 1].
 */

import type { AlignmentSettings, FilterSettings, FilterTarget } from '../config/schema.js';
import { dimensionMultiplier, type Profile } from '../profiles/registry.js';
import type { DimensionScore, DimensionScores, FilterConstraint } from '../types.js';
import { clamp01, mean, sum } from '../utils/math.js';

// ============================================================================
// TYPES
// ============================================================================

export interface AlignmentInput {
  readonly dimensionScores: DimensionScores;
  readonly profile: Profile;
  readonly constraints: readonly FilterConstraint[];
  /** The chunk's own best-matching profile, if known */
  readonly chunkProfileId?: string;
}

export interface DimensionContribution {
  readonly dimension: string;
  readonly rawScore: number;
  readonly multiplier: number;
  readonly value: number;
  /** Constraints on this dimension the raw score failed */
  readonly failedConstraints: readonly FilterConstraint[];
}

export interface AlignmentBreakdown {
  readonly contributions: readonly DimensionContribution[];
  readonly aggregate: number;
  /** Aggregate after normalization, clamped to [0, 1] */
  readonly normalized: number;
  readonly confidenceBoost: number;
  /** Bonus (positive) or penalty (negative) applied for profile match */
  readonly profileAdjustment: number;
  readonly alignment: number;
}

export type ConstraintThresholds = Pick<FilterSettings, 'filterStrength' | 'highThreshold' | 'lowThreshold'>;

// ============================================================================
// HELPERS
// ============================================================================

function usableScore(score: DimensionScore | undefined): score is DimensionScore {
  return score !== undefined && Number.isFinite(score.value);
}

export function constraintFails(score: number, target: FilterTarget, thresholds: ConstraintThresholds): boolean {
  if (target === 'high') return score < thresholds.highThreshold;
  if (target === 'low') return score > thresholds.lowThreshold;
  return score < target;
}

/**
 * Mean confidence over the chunk's dimensions that carry one, or undefined
 * when none does.
 */
export function averageConfidence(scores: DimensionScores): number | undefined {
  const confidences = Object.values(scores)
    .map((score) => score.confidence)
    .filter((confidence): confidence is number => confidence !== undefined && Number.isFinite(confidence));
  return confidences.length > 0 ? mean(confidences) : undefined;
}

/**
 * The profile whose dimensions this chunk scores best on: the highest mean of
 * value x multiplier over the profile dimensions the chunk has. Profiles the
 * chunk shares no dimension with are skipped; ties go to the earlier profile.
 */
export function findBestMatchingProfile(
  scores: DimensionScores,
  profiles: readonly Profile[]
): string | undefined {
  let bestId: string | undefined;
  let bestScore = -Infinity;

  for (const profile of profiles) {
    const values: number[] = [];
    for (const [dimension, multiplier] of Object.entries(profile.dimensions)) {
      const score = scores[dimension];
      if (usableScore(score)) values.push(score.value * multiplier);
    }
    if (values.length === 0) continue;
    const profileScore = mean(values);
    if (profileScore > bestScore) {
      bestScore = profileScore;
      bestId = profile.id;
    }
  }

  return bestId;
}

// ============================================================================
// CALCULATOR
// ============================================================================

export class AlignmentCalculator {
  constructor(
    private readonly settings: AlignmentSettings,
    private readonly thresholds: ConstraintThresholds,
  ) {}

  calculate(input: AlignmentInput): AlignmentBreakdown {
    const contributions = this.computeContributions(input);
    const aggregate = this.aggregate(contributions);
    const normalized = clamp01(this.normalize(aggregate, contributions));

    const confidenceBoost = this.confidenceBoost(input.dimensionScores);
    const boosted = Math.min(1, normalized + confidenceBoost);

    const profileAdjustment = this.profileAdjustment(input);
    const alignment = clamp01(boosted + profileAdjustment);

    return { contributions, aggregate, normalized, confidenceBoost, profileAdjustment, alignment };
  }

  private computeContributions(input: AlignmentInput): DimensionContribution[] {
    const { dimensionScores, profile, constraints } = input;

    const dimensions: string[] = Object.keys(profile.dimensions);
    for (const constraint of constraints) {
      if (!dimensions.includes(constraint.dimension)) dimensions.push(constraint.dimension);
    }

    const contributions: DimensionContribution[] = [];
    for (const dimension of dimensions) {
      const score = dimensionScores[dimension];
      // a dimension the chunk was never scored on is skipped, not zeroed
      if (!usableScore(score)) continue;

      const multiplier = dimensionMultiplier(profile, dimension);
      const failedConstraints = constraints.filter(
        (constraint) =>
          constraint.dimension === dimension &&
          constraintFails(score.value, constraint.target, this.thresholds)
      );

      let value = score.value * multiplier;
      for (let i = 0; i < failedConstraints.length; i++) {
        value *= 1 - this.thresholds.filterStrength;
      }

      contributions.push({ dimension, rawScore: score.value, multiplier, value, failedConstraints });
    }
    return contributions;
  }

  private aggregate(contributions: readonly DimensionContribution[]): number {
    if (contributions.length === 0) return 0;
    const values = contributions.map((c) => c.value);

    switch (this.settings.method) {
      case 'min':
        return Math.min(...values);
      case 'max':
        return Math.max(...values);
      case 'average':
        return mean(values);
      case 'weighted_average': {
        const totalWeight = sum(contributions.map((c) => c.multiplier));
        return totalWeight > 0 ? sum(contributions.map((c) => c.value * c.multiplier)) / totalWeight : 0;
      }
    }
  }

  private normalize(aggregate: number, contributions: readonly DimensionContribution[]): number {
    if (contributions.length === 0) return 0;
    const multipliers = contributions.map((c) => c.multiplier);

    switch (this.settings.normalization) {
      case 'none':
        return aggregate;
      case 'total_weight':
        return aggregate / sum(multipliers);
      case 'max_weight':
        return aggregate / Math.max(...multipliers);
    }
  }

  private confidenceBoost(scores: DimensionScores): number {
    const { enable, maxBoost, threshold } = this.settings.confidenceBoost;
    if (!enable || maxBoost <= 0) return 0;

    const confidence = averageConfidence(scores);
    if (confidence === undefined || confidence < threshold) return 0;
    if (threshold >= 1) return maxBoost;

    return maxBoost * clamp01((confidence - threshold) / (1 - threshold));
  }

  private profileAdjustment(input: AlignmentInput): number {
    const { enable, sameProfileBonus, crossProfilePenalty } = this.settings.profileBonus;
    if (!enable) return 0;
    return input.chunkProfileId === input.profile.id ? sameProfileBonus : -crossProfilePenalty;
  }
}
