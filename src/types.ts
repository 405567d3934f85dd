/**
 * @fileoverview Core types for the dimension ranker
 */

import type { FilterTarget, RetrievalStrategy } from './config/schema.js';

// ============================================================================
// CHUNK TYPES (OWNED BY THE STORAGE COLLABORATOR)
// ============================================================================

export type ChunkId = string;

export interface DimensionScore {
  readonly value: number;
  /** Confidence in this value, 0-1 */
  readonly confidence?: number;
}

export type DimensionScores = Readonly<Record<string, DimensionScore>>;

/** A similarity-index hit, ordered by similarity alone. */
export interface CandidateHit {
  readonly chunkId: ChunkId;
  readonly similarity: number;
}

// ============================================================================
// COLLABORATORS
// ============================================================================

/**
 * Vector index the ranker over-fetches candidates from. Query embeddings are
 * cached by the ranker; the index owns the model.
 */
export interface SimilarityIndex {
  embed(queryText: string): Promise<number[]>;
  fetchCandidates(queryEmbedding: readonly number[], count: number): Promise<CandidateHit[]>;
}

/**
 * Read-only access to per-chunk metadata precomputed at ingest time.
 */
export interface ChunkStore {
  getDimensionScores(chunkId: ChunkId): Promise<DimensionScores>;
  getRecency(chunkId: ChunkId): Promise<number>;
  getConfidence(chunkId: ChunkId): Promise<number>;
  /** Profile the chunk was classified under at ingest, when recorded. */
  getProfileHint?(chunkId: ChunkId): Promise<string | undefined>;
}

// ============================================================================
// QUERY TYPES
// ============================================================================

export interface FilterConstraint {
  readonly dimension: string;
  readonly target: FilterTarget;
  /** Phrase in the query that produced this constraint */
  readonly phrase: string;
  readonly confidence: number;
}

export type RankingFactor =
  | 'semanticSimilarity'
  | 'dimensionAlignment'
  | 'recencyScore'
  | 'confidenceScore';

export const RANKING_FACTORS: readonly RankingFactor[] = [
  'semanticSimilarity',
  'dimensionAlignment',
  'recencyScore',
  'confidenceScore',
];

export type FactorScores = Readonly<Record<RankingFactor, number>>;

export interface ScoredCandidate {
  readonly chunkId: ChunkId;
  /** 0-based position in the similarity-only ordering */
  readonly similarityRank: number;
  readonly factors: FactorScores;
  readonly compositeScore: number;
  readonly profileId: string;
  /** False when the time budget ran out before this candidate was scored */
  readonly dimensionScored: boolean;
  readonly cacheHit: boolean;
  readonly explanation: string;
}

// ============================================================================
// RANKING RESPONSE
// ============================================================================

export type RankingState =
  | 'INIT'
  | 'PROFILE_RESOLVED'
  | 'CANDIDATES_FETCHED'
  | 'SCORED'
  | 'RANKED'
  | 'DONE'
  | 'FALLBACK'
  | 'TIMEOUT';

export type ExecutionMode = 'vector_only' | 'dimension_only' | 'hybrid';

export type DegradationReason =
  | 'dimension_ranking_disabled'
  | 'vector_only_strategy'
  | 'adaptive_downgrade'
  | 'timeout'
  | 'scoring_error';

export type ProfileSource = 'override' | 'detected' | 'default' | 'override_rejected';

export interface RankingTimings {
  readonly totalMs: number;
  readonly fetchMs: number;
  readonly scoringMs: number;
}

export interface RankingResponse {
  readonly results: readonly ScoredCandidate[];
  readonly profileUsed: string;
  readonly profileSource: ProfileSource;
  readonly profileConfidence: number;
  readonly degraded: boolean;
  readonly degradation?: DegradationReason;
  readonly strategy: RetrievalStrategy;
  readonly mode: ExecutionMode;
  readonly constraints: readonly FilterConstraint[];
  readonly candidatesFetched: number;
  readonly candidatesScored: number;
  /** States visited, in order */
  readonly states: readonly RankingState[];
  /** True when a cache failure forced recomputation for this call */
  readonly cacheBypassed: boolean;
  readonly timings: RankingTimings;
}
