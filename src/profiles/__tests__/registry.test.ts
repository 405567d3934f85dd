/**
 * @fileoverview Tests for the profile registry
 */

import { describe, it, expect } from 'vitest';
import type { ProfileDefinition } from '../../config/schema.js';
import { ConfigurationError, UnknownProfileError } from '../../core/errors.js';
import {
  ProfileRegistry,
  ProfileRegistryHandle,
  dimensionMultiplier,
  type ProfileRegistrySource,
} from '../registry.js';

function profile(
  id: string,
  weights: [number, number, number, number],
  dimensions: Record<string, number> = {}
): ProfileDefinition {
  const [semanticSimilarity, dimensionAlignment, recencyScore, confidenceScore] = weights;
  return {
    id,
    targetUsers: [],
    weights: { semanticSimilarity, dimensionAlignment, recencyScore, confidenceScore },
    dimensions,
  };
}

const GENERAL = profile('general', [0.4, 0.3, 0.2, 0.1], { clarity: 1.1 });
const RESEARCHER = profile('researcher', [0.3, 0.4, 0.2, 0.1], { novelty: 1.5, technical_depth: 1.3 });

function source(profiles: ProfileDefinition[], patterns: Record<string, string[]> = {}): ProfileRegistrySource {
  return { profiles, detection: { patterns } };
}

function loadIssues(input: ProfileRegistrySource): string[] {
  try {
    ProfileRegistry.load(input);
  } catch (error) {
    if (error instanceof ConfigurationError) return error.issues;
    throw error;
  }
  throw new Error('expected the load to be rejected');
}

describe('ProfileRegistry.load', () => {
  it('keeps profiles in declaration order', () => {
    const registry = ProfileRegistry.load(source([GENERAL, RESEARCHER]));

    expect(registry.ids()).toEqual(['general', 'researcher']);
    expect(registry.list().map((p) => p.order)).toEqual([0, 1]);
    expect(registry.default().id).toBe('general');
  });

  it('accepts weights within 1e-6 of one', () => {
    const nearlyOne = profile('general', [0.4, 0.3, 0.2, 0.1 + 5e-7]);

    expect(() => ProfileRegistry.load(source([nearlyOne]))).not.toThrow();
  });

  it('rejects the whole load when one profile has bad weights', () => {
    const broken = profile('business', [0.5, 0.5, 0.5, 0.5]);

    expect(loadIssues(source([GENERAL, RESEARCHER, broken]))).toEqual([
      'profiles.business.weights: must sum to 1.0, got 2',
    ]);
  });

  it('rejects a non-positive multiplier', () => {
    const broken = profile('general', [0.4, 0.3, 0.2, 0.1], { clarity: -1 });

    expect(loadIssues(source([broken]))).toEqual([
      'profiles.general.dimensions.clarity: multiplier must be > 0, got -1',
    ]);
  });

  it('requires the default profile', () => {
    expect(loadIssues(source([RESEARCHER]))).toEqual([
      'profiles.general: the default profile must be defined',
    ]);
  });

  it('rejects patterns for unknown profiles and invalid regular expressions', () => {
    const issues = loadIssues(source([GENERAL], { general: ['(unclosed'], astronaut: ['space'] }));

    expect(issues).toHaveLength(2);
    expect(issues[0].startsWith('auto_profile_detection.patterns.general[0]:')).toBe(true);
    expect(issues[1]).toBe('auto_profile_detection.patterns.astronaut: no profile named "astronaut"');
  });

  it('compiles patterns case-insensitively', () => {
    const registry = ProfileRegistry.load(source([GENERAL, RESEARCHER], { researcher: ['\\bresearch\\b'] }));

    expect(registry.require('researcher').patterns[0].test('RESEARCH methods')).toBe(true);
  });
});

describe('ProfileRegistry lookups', () => {
  const registry = ProfileRegistry.load(source([GENERAL, RESEARCHER]));

  it('throws UnknownProfileError listing the known profiles', () => {
    expect(() => registry.require('astronaut')).toThrow(UnknownProfileError);
    expect(registry.get('astronaut')).toBeUndefined();
    expect(registry.has('researcher')).toBe(true);
  });

  it('defaults unlisted dimension multipliers to 1.0', () => {
    const researcher = registry.require('researcher');

    expect(dimensionMultiplier(researcher, 'novelty')).toBe(1.5);
    expect(dimensionMultiplier(researcher, 'clarity')).toBe(1);
  });
});

describe('ProfileRegistryHandle', () => {
  it('swaps in a new snapshot and bumps the version', () => {
    const handle = new ProfileRegistryHandle(source([GENERAL]));
    const before = handle.snapshot;

    handle.reload(source([GENERAL, RESEARCHER]));

    expect(before.version).toBe(1);
    expect(before.has('researcher')).toBe(false);
    expect(handle.snapshot.version).toBe(2);
    expect(handle.snapshot.has('researcher')).toBe(true);
  });

  it('keeps the installed snapshot when a reload fails', () => {
    const handle = new ProfileRegistryHandle(source([GENERAL, RESEARCHER]));
    const before = handle.snapshot;

    expect(() => handle.reload(source([GENERAL, profile('legal', [1, 1, 0, 0])]))).toThrow(ConfigurationError);
    expect(handle.snapshot).toBe(before);
  });
});
