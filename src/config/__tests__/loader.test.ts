/**
 * @fileoverview Tests for ranking configuration loading
 */

import { describe, it, expect } from 'vitest';
import * as os from 'node:os';
import * as path from 'node:path';
import { ConfigurationError } from '../../core/errors.js';
import {
  loadDefaultRankingConfig,
  loadRankingConfig,
  parseRankingConfig,
  parseRankingConfigYaml,
} from '../loader.js';

const MINIMAL_PROFILES = `
profiles:
  general:
    weights:
      semantic_similarity: 0.4
      dimension_alignment: 0.3
      recency_score: 0.2
      confidence_score: 0.1
`;

function expectIssues(text: string): string[] {
  const result = parseRankingConfigYaml(text);
  if (result.ok) throw new Error('expected the document to be rejected');
  expect(result.error).toBeInstanceOf(ConfigurationError);
  return result.error.issues;
}

describe('loadDefaultRankingConfig', () => {
  it('loads the bundled profiles in declaration order', async () => {
    const config = await loadDefaultRankingConfig();

    expect(config.profiles.map((p) => p.id)).toEqual(['general', 'researcher', 'business', 'legal']);
    expect(config.profiles[1].weights).toEqual({
      semanticSimilarity: 0.3,
      dimensionAlignment: 0.4,
      recencyScore: 0.2,
      confidenceScore: 0.1,
    });
    expect(config.profiles[3].dimensions.compliance_risk).toBe(1.5);
  });

  it('loads retrieval, caching and alignment settings', async () => {
    const config = await loadDefaultRankingConfig();

    expect(config.retrieval.defaultStrategy).toBe('hybrid');
    expect(config.retrieval.minCandidates).toBe(20);
    expect(config.retrieval.maxProcessingTimeMs).toBe(200);
    expect(config.caching.cacheTtlMs).toBe(3_600_000);
    expect(config.alignment.method).toBe('min');
    expect(config.alignment.normalization).toBe('total_weight');
    expect(config.detection.confidenceThreshold).toBe(0.7);
  });

  it('expands filter phrases into constraint lists', async () => {
    const config = await loadDefaultRankingConfig();
    const advanced = config.filters.mappings.find((m) => m.phrase === 'advanced');

    expect(config.filters.mappings).toHaveLength(12);
    expect(advanced).toEqual({
      phrase: 'advanced',
      constraints: [
        { dimension: 'complexity', target: 'high' },
        { dimension: 'technical_depth', target: 'high' },
      ],
      confidence: 1,
    });
  });

  it('returns a frozen configuration', async () => {
    const config = await loadDefaultRankingConfig();

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.profiles[0].weights)).toBe(true);
  });
});

describe('parseRankingConfigYaml', () => {
  it('fills every section default', () => {
    const result = parseRankingConfigYaml(MINIMAL_PROFILES);
    if (!result.ok) throw result.error;

    expect(result.value.retrieval.enableDimensionRanking).toBe(true);
    expect(result.value.retrieval.fallbackStrategy).toBe('vector_only');
    expect(result.value.retrieval.scoringConcurrency).toBe(4);
    expect(result.value.adaptive).toEqual({ timeoutThreshold: 3, cooldownQueries: 10 });
    expect(result.value.filters.highThreshold).toBe(0.5);
    expect(result.value.filters.mappings).toEqual([]);
    expect(result.value.profiles[0].targetUsers).toEqual([]);
  });

  it('accepts a phrase with its own confidence and numeric targets', () => {
    const result = parseRankingConfigYaml(`${MINIMAL_PROFILES}
natural_language_filters:
  filter_mappings:
    "very technical":
      constraints: {technical_depth: 0.7}
      confidence: 0.8
`);
    if (!result.ok) throw result.error;

    expect(result.value.filters.mappings).toEqual([
      { phrase: 'very technical', constraints: [{ dimension: 'technical_depth', target: 0.7 }], confidence: 0.8 },
    ]);
  });

  it('rejects a document without profiles', () => {
    expect(expectIssues('retrieval: {}')).toEqual(['profiles: Required']);
  });

  it('treats an empty document as an empty configuration', () => {
    expect(expectIssues('')).toEqual(['profiles: Required']);
  });

  it('reports out-of-range weights by path', () => {
    const issues = expectIssues(MINIMAL_PROFILES.replace('semantic_similarity: 0.4', 'semantic_similarity: 2'));

    expect(issues).toEqual(['profiles.general.weights.semantic_similarity: Number must be less than or equal to 1']);
  });

  it('rejects an unknown strategy', () => {
    const issues = expectIssues(`${MINIMAL_PROFILES}
retrieval:
  default_strategy: fastest
`);

    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith('retrieval.default_strategy:')).toBe(true);
  });

  it('rejects malformed YAML', () => {
    const result = parseRankingConfigYaml('profiles: [', 'broken.yaml');
    if (result.ok) throw new Error('expected the document to be rejected');

    expect(result.error.configKey).toBe('broken.yaml');
    expect(result.error.message).toContain('invalid YAML');
  });
});

describe('parseRankingConfig', () => {
  it('rejects a non-positive dimension multiplier', () => {
    const result = parseRankingConfig({
      profiles: {
        general: {
          weights: { semantic_similarity: 1, dimension_alignment: 0, recency_score: 0, confidence_score: 0 },
          dimensions: { clarity: 0 },
        },
      },
    });

    expect(result.ok).toBe(false);
  });
});

describe('loadRankingConfig', () => {
  it('reports an unreadable file as a ConfigurationError', async () => {
    const missing = path.join(os.tmpdir(), `ranking-missing-${Date.now()}.yaml`);

    await expect(loadRankingConfig(missing)).rejects.toBeInstanceOf(ConfigurationError);
  });
});
