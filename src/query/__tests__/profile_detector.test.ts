/**
 * @fileoverview Tests for query profile detection
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { loadDefaultRankingConfig } from '../../config/loader.js';
import type { RankingConfig } from '../../config/schema.js';
import { ProfileRegistry } from '../../profiles/registry.js';
import { TEST_PROFILES, makeConfig } from '../../__tests__/helpers/ranking_fixtures.js';
import { ProfileDetector, scoreProfile } from '../profile_detector.js';

function detectorFor(config: RankingConfig): { detector: ProfileDetector; registry: ProfileRegistry } {
  return { detector: new ProfileDetector(config.detection), registry: ProfileRegistry.load(config) };
}

const BUSINESS = {
  weights: { semantic_similarity: 0.35, dimension_alignment: 0.35, recency_score: 0.2, confidence_score: 0.1 },
};

describe('ProfileDetector with the bundled patterns', () => {
  let detector: ProfileDetector;
  let registry: ProfileRegistry;

  beforeAll(async () => {
    ({ detector, registry } = detectorFor(await loadDefaultRankingConfig()));
  });

  it('detects a profile when every pattern matches', () => {
    const detection = detector.detect('novel research methodology, peer-reviewed', registry);

    expect(detection.profileId).toBe('researcher');
    expect(detection.confidence).toBe(1);
    expect(detection.detected).toBe(true);
  });

  it('detects a profile at three of four patterns', () => {
    const detection = detector.detect('ITAR export compliance case', registry);

    expect(detection.profileId).toBe('legal');
    expect(detection.confidence).toBe(0.75);
  });

  it('falls back to the default profile below the threshold', () => {
    const detection = detector.detect('market growth strategy', registry);

    expect(detection.profileId).toBe('general');
    expect(detection.detected).toBe(false);
    expect(detection.confidence).toBe(0);
    expect(detection.scores.find((s) => s.profileId === 'business')?.confidence).toBe(0.5);
  });

  it('reports one score per profile in declaration order', () => {
    const detection = detector.detect('anything', registry);

    expect(detection.scores.map((s) => s.profileId)).toEqual(['general', 'researcher', 'business', 'legal']);
  });
});

describe('ProfileDetector tie-breaking', () => {
  const patterns = { researcher: ['\\bdata\\b'], business: ['\\bdata\\b'] };

  it('prefers the profile declared first', () => {
    const { detector, registry } = detectorFor(
      makeConfig({ profiles: { ...TEST_PROFILES, business: BUSINESS }, auto_profile_detection: { patterns } })
    );

    expect(detector.detect('data pipelines', registry).profileId).toBe('researcher');
  });

  it('follows declaration order, not pattern order', () => {
    const { detector, registry } = detectorFor(
      makeConfig({
        profiles: { general: TEST_PROFILES.general, business: BUSINESS, researcher: TEST_PROFILES.researcher },
        auto_profile_detection: { patterns },
      })
    );

    expect(detector.detect('data pipelines', registry).profileId).toBe('business');
  });
});

describe('ProfileDetector settings', () => {
  it('returns the default profile with no scores when disabled', () => {
    const { detector, registry } = detectorFor(makeConfig({ auto_profile_detection: { enable: false } }));

    expect(detector.detect('novel research', registry)).toEqual({
      profileId: 'general',
      confidence: 0,
      detected: false,
      scores: [],
    });
  });
});

describe('scoreProfile', () => {
  it('counts duplicate patterns once', () => {
    const config = makeConfig({
      auto_profile_detection: { patterns: { researcher: ['\\bdata\\b', '\\bdata\\b', '\\bmodel\\b'] } },
    });
    const researcher = ProfileRegistry.load(config).require('researcher');

    expect(scoreProfile(researcher, 'data lakes')).toEqual({
      profileId: 'researcher',
      confidence: 0.5,
      matchedPatterns: 1,
      totalPatterns: 2,
    });
  });

  it('scores a profile without patterns as zero', () => {
    const general = ProfileRegistry.load(makeConfig()).require('general');

    expect(scoreProfile(general, 'anything').confidence).toBe(0);
  });
});
