/**
 * @fileoverview In-process collaborators and configuration for ranking tests
 *
 * The similarity index and chunk store are plain maps; the clock only moves
 * when a test (or a store hook) advances it.
 */

import { parseRankingConfig } from '../../config/loader.js';
import type { RankingConfig, RawRankingConfig } from '../../config/schema.js';
import { unwrap } from '../../core/result.js';
import type { CandidateHit, ChunkId, ChunkStore, DimensionScores, SimilarityIndex } from '../../types.js';

// ============================================================================
// CLOCK
// ============================================================================

export class FakeClock {
  constructor(private current = 1_000_000) {}

  readonly now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

// ============================================================================
// SIMILARITY INDEX
// ============================================================================

export class InMemorySimilarityIndex implements SimilarityIndex {
  embedCalls = 0;
  readonly fetchCounts: number[] = [];
  embedFailure?: Error;
  fetchFailure?: Error;

  /** @param hits - Candidates in descending similarity order */
  constructor(private readonly hits: readonly CandidateHit[]) {}

  async embed(queryText: string): Promise<number[]> {
    this.embedCalls++;
    if (this.embedFailure) throw this.embedFailure;
    return [queryText.length, 1];
  }

  async fetchCandidates(_queryEmbedding: readonly number[], count: number): Promise<CandidateHit[]> {
    this.fetchCounts.push(count);
    if (this.fetchFailure) throw this.fetchFailure;
    return this.hits.slice(0, count);
  }
}

// ============================================================================
// CHUNK STORE
// ============================================================================

export interface ChunkRecord {
  dimensionScores: DimensionScores;
  recency: number;
  confidence: number;
  profileHint?: string;
}

export class InMemoryChunkStore implements ChunkStore {
  private readonly records = new Map<ChunkId, ChunkRecord>();
  dimensionScoreCalls = 0;
  /** Runs on every dimension-score lookup, before the record is read */
  onDimensionScores?: (chunkId: ChunkId) => void;
  /** Real-timer wait before a chunk's dimension scores resolve */
  readonly dimensionScoreDelayMs: Partial<Record<ChunkId, number>> = {};

  constructor(records: Record<ChunkId, ChunkRecord> = {}) {
    for (const [chunkId, record] of Object.entries(records)) {
      this.records.set(chunkId, record);
    }
  }

  async getDimensionScores(chunkId: ChunkId): Promise<DimensionScores> {
    this.dimensionScoreCalls++;
    this.onDimensionScores?.(chunkId);
    const delayMs = this.dimensionScoreDelayMs[chunkId] ?? 0;
    if (delayMs > 0) {
      await new Promise<void>((resolve) => setTimeout(resolve, delayMs));
    }
    return this.record(chunkId).dimensionScores;
  }

  async getRecency(chunkId: ChunkId): Promise<number> {
    return this.record(chunkId).recency;
  }

  async getConfidence(chunkId: ChunkId): Promise<number> {
    return this.record(chunkId).confidence;
  }

  async getProfileHint(chunkId: ChunkId): Promise<string | undefined> {
    return this.record(chunkId).profileHint;
  }

  private record(chunkId: ChunkId): ChunkRecord {
    const record = this.records.get(chunkId);
    if (!record) throw new Error(`no such chunk: ${chunkId}`);
    return record;
  }
}

// ============================================================================
// CONFIGURATION
// ============================================================================

type Sections = Required<RawRankingConfig>;

export type ConfigOverrides = {
  [K in Exclude<keyof Sections, 'profiles'>]?: Partial<Sections[K]>;
} & {
  profiles?: Sections['profiles'];
};

export const TEST_PROFILES: Sections['profiles'] = {
  general: {
    weights: {
      semantic_similarity: 0.4,
      dimension_alignment: 0.3,
      recency_score: 0.2,
      confidence_score: 0.1,
    },
    dimensions: { utility: 1.2, relevance: 1.3, clarity: 1.1, complexity: 1.0, credibility: 1.1 },
  },
  researcher: {
    weights: {
      semantic_similarity: 0.3,
      dimension_alignment: 0.4,
      recency_score: 0.2,
      confidence_score: 0.1,
    },
    dimensions: { novelty: 1.5, technical_depth: 1.3 },
  },
};

/**
 * A small, fully explicit configuration: two profiles, three filter phrases,
 * no confidence boost or profile bonus, caches on.
 */
export function makeConfig(overrides: ConfigOverrides = {}): RankingConfig {
  const raw: RawRankingConfig = {
    retrieval: {
      enable_dimension_ranking: true,
      default_strategy: 'hybrid',
      max_candidates_multiplier: 2,
      min_candidates: 4,
      max_processing_time_ms: 200,
      enable_fallback: true,
      scoring_concurrency: 1,
      external_call_timeout_ms: 0,
      ...overrides.retrieval,
    },
    adaptive: { timeout_threshold: 2, cooldown_queries: 2, ...overrides.adaptive },
    profiles: overrides.profiles ?? TEST_PROFILES,
    natural_language_filters: {
      enable_parsing: true,
      confidence_threshold: 0.6,
      filter_strength: 0.5,
      filter_mappings: {
        simple: { complexity: 'low' },
        complex: { complexity: 'high' },
        'high quality': { credibility: 'high', utility: 'high' },
      },
      ...overrides.natural_language_filters,
    },
    auto_profile_detection: {
      enable: true,
      confidence_threshold: 0.5,
      patterns: {
        researcher: ['\\b(?:research|study)\\b', '\\b(?:novel|innovative)\\b'],
      },
      ...overrides.auto_profile_detection,
    },
    dimension_alignment: {
      alignment_method: 'min',
      normalization: 'total_weight',
      confidence_boost: { enable: false },
      profile_bonus: { enable: false },
      ...overrides.dimension_alignment,
    },
    caching: { cache_size: 100, cache_ttl: 60, ...overrides.caching },
    logging: { log_performance: false, ...overrides.logging },
  };
  return unwrap(parseRankingConfig(raw));
}
