/**
 * @fileoverview Profile registry
 *
 * Profiles are validated and their detection patterns compiled once, at load.
 * A registry is immutable; a reload builds a complete new snapshot and swaps
 * the handle's reference, so a query that captured the old snapshot keeps
 * using it to completion and never sees a mix of old and new profiles.
 */

import { Errors } from '../core/errors.js';
import type { DetectionSettings, FactorWeights, ProfileDefinition } from '../config/schema.js';
import { approxEqual, sum } from '../utils/math.js';

// ============================================================================
// TYPES
// ============================================================================

export const DEFAULT_PROFILE_ID = 'general';

/** Allowed deviation of a profile's factor weights from 1.0 */
export const WEIGHT_SUM_TOLERANCE = 1e-6;

/** Multiplier applied to a dimension the profile does not list */
export const DEFAULT_DIMENSION_MULTIPLIER = 1.0;

export interface Profile extends ProfileDefinition {
  /** Detection patterns, compiled case-insensitive, in declaration order */
  readonly patterns: readonly RegExp[];
  /** Declaration position; lower wins detection ties */
  readonly order: number;
}

export interface ProfileRegistrySource {
  readonly profiles: readonly ProfileDefinition[];
  readonly detection: Pick<DetectionSettings, 'patterns'>;
}

// ============================================================================
// VALIDATION
// ============================================================================

function validateWeights(id: string, weights: FactorWeights, issues: string[]): void {
  const values = [
    weights.semanticSimilarity,
    weights.dimensionAlignment,
    weights.recencyScore,
    weights.confidenceScore,
  ];
  if (values.some((value) => !Number.isFinite(value) || value < 0)) {
    issues.push(`profiles.${id}.weights: every weight must be a finite number >= 0`);
    return;
  }
  const total = sum(values);
  if (!approxEqual(total, 1, WEIGHT_SUM_TOLERANCE)) {
    issues.push(`profiles.${id}.weights: must sum to 1.0, got ${total}`);
  }
}

function validateDimensions(id: string, dimensions: Readonly<Record<string, number>>, issues: string[]): void {
  for (const [dimension, multiplier] of Object.entries(dimensions)) {
    if (!Number.isFinite(multiplier) || multiplier <= 0) {
      issues.push(`profiles.${id}.dimensions.${dimension}: multiplier must be > 0, got ${multiplier}`);
    }
  }
}

function compilePatterns(id: string, sources: readonly string[], issues: string[]): RegExp[] {
  const compiled: RegExp[] = [];
  sources.forEach((source, index) => {
    try {
      compiled.push(new RegExp(source, 'i'));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      issues.push(`auto_profile_detection.patterns.${id}[${index}]: ${reason}`);
    }
  });
  return compiled;
}

// ============================================================================
// REGISTRY
// ============================================================================

export class ProfileRegistry {
  private constructor(
    private readonly profiles: ReadonlyMap<string, Profile>,
    readonly version: number,
  ) {}

  /**
   * Validate every profile and build a registry. Any violation rejects the
   * whole load; nothing is normalized or skipped.
   *
   * @throws ConfigurationError listing every problem found
   */
  static load(source: ProfileRegistrySource, version = 1): ProfileRegistry {
    const issues: string[] = [];
    const profiles = new Map<string, Profile>();
    const patternSources = source.detection.patterns;

    if (source.profiles.length === 0) {
      issues.push('profiles: at least one profile is required');
    }

    source.profiles.forEach((definition, order) => {
      if (profiles.has(definition.id)) {
        issues.push(`profiles.${definition.id}: declared more than once`);
        return;
      }
      validateWeights(definition.id, definition.weights, issues);
      validateDimensions(definition.id, definition.dimensions, issues);
      const patterns = compilePatterns(definition.id, patternSources[definition.id] ?? [], issues);
      profiles.set(definition.id, Object.freeze({ ...definition, patterns, order }));
    });

    if (source.profiles.length > 0 && !profiles.has(DEFAULT_PROFILE_ID)) {
      issues.push(`profiles.${DEFAULT_PROFILE_ID}: the default profile must be defined`);
    }

    for (const id of Object.keys(patternSources)) {
      if (!profiles.has(id)) {
        issues.push(`auto_profile_detection.patterns.${id}: no profile named "${id}"`);
      }
    }

    if (issues.length > 0) {
      throw Errors.config('profiles', `rejected ${issues.length} problem(s): ${issues.join('; ')}`, issues);
    }

    return new ProfileRegistry(profiles, version);
  }

  get(profileId: string): Profile | undefined {
    return this.profiles.get(profileId);
  }

  /**
   * @throws UnknownProfileError
   */
  require(profileId: string): Profile {
    const profile = this.profiles.get(profileId);
    if (!profile) {
      throw Errors.unknownProfile(profileId, this.ids());
    }
    return profile;
  }

  has(profileId: string): boolean {
    return this.profiles.has(profileId);
  }

  default(): Profile {
    return this.require(DEFAULT_PROFILE_ID);
  }

  /** Profiles in declaration order */
  list(): Profile[] {
    return Array.from(this.profiles.values());
  }

  ids(): string[] {
    return Array.from(this.profiles.keys());
  }
}

export function dimensionMultiplier(profile: Profile, dimension: string): number {
  return profile.dimensions[dimension] ?? DEFAULT_DIMENSION_MULTIPLIER;
}

// ============================================================================
// HANDLE (ATOMIC RELOAD)
// ============================================================================

export class ProfileRegistryHandle {
  private current: ProfileRegistry;

  constructor(source: ProfileRegistrySource) {
    this.current = ProfileRegistry.load(source);
  }

  /** The registry to use for one query, start to finish */
  get snapshot(): ProfileRegistry {
    return this.current;
  }

  /**
   * Build and install a new snapshot. On failure the current snapshot stays
   * installed and the ConfigurationError propagates.
   */
  reload(source: ProfileRegistrySource): ProfileRegistry {
    const next = ProfileRegistry.load(source, this.current.version + 1);
    this.current = next;
    return next;
  }
}
