/**
 * @fileoverview Query profile detection
 *
 * A profile's confidence for a query is the fraction of its distinct patterns
 * that match, so a profile with many overlapping patterns gains nothing over
 * one with a few precise ones. The most confident profile wins; on a tie the
 * profile declared first in the registry wins.
 */

import type { DetectionSettings } from '../config/schema.js';
import type { Profile, ProfileRegistry } from '../profiles/registry.js';

export interface ProfileScore {
  readonly profileId: string;
  readonly confidence: number;
  readonly matchedPatterns: number;
  readonly totalPatterns: number;
}

export interface ProfileDetection {
  readonly profileId: string;
  readonly confidence: number;
  /** False when the default profile was used because nothing cleared the threshold */
  readonly detected: boolean;
  /** One entry per profile, in declaration order */
  readonly scores: readonly ProfileScore[];
}

export function scoreProfile(profile: Profile, queryText: string): ProfileScore {
  const distinct = new Map<string, RegExp>();
  for (const pattern of profile.patterns) {
    distinct.set(pattern.source, pattern);
  }
  let matched = 0;
  for (const pattern of distinct.values()) {
    if (pattern.test(queryText)) matched++;
  }
  return {
    profileId: profile.id,
    confidence: distinct.size > 0 ? matched / distinct.size : 0,
    matchedPatterns: matched,
    totalPatterns: distinct.size,
  };
}

export class ProfileDetector {
  constructor(private readonly settings: DetectionSettings) {}

  detect(queryText: string, registry: ProfileRegistry): ProfileDetection {
    const fallback = registry.default();

    if (!this.settings.enable) {
      return { profileId: fallback.id, confidence: 0, detected: false, scores: [] };
    }

    const scores = registry.list().map((profile) => scoreProfile(profile, queryText));

    let best: ProfileScore | undefined;
    for (const score of scores) {
      // strict comparison keeps the earliest-declared profile on ties
      if (!best || score.confidence > best.confidence) {
        best = score;
      }
    }

    if (best && best.confidence > 0 && best.confidence >= this.settings.confidenceThreshold) {
      return { profileId: best.profileId, confidence: best.confidence, detected: true, scores };
    }

    const defaultScore = scores.find((score) => score.profileId === fallback.id);
    return {
      profileId: fallback.id,
      confidence: defaultScore?.confidence ?? 0,
      detected: false,
      scores,
    };
  }
}
